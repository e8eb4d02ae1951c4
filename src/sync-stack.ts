import { SyncEnvConfig } from './utils/env-validation.js';
import { AuthenticationError } from './utils/errors.js';
import { Sleep, ThrottleController } from './utils/throttle.js';
import { ClientCredentialsTokenProvider, StaticTokenProvider, TokenProvider, defaultScopeFor } from './auth/token-provider.js';
import { GraphEndpoints } from './graph/endpoints.js';
import { PagedFetcher } from './graph/paged-fetcher.js';
import { IdentityResolver } from './graph/identity-resolver.js';
import { AxiosGraphTransport, GraphTransport } from './graph/transport.js';
import { SetReconciler } from './reconcile/set-reconciler.js';
import { DeviceSelector } from './sources/device-selector.js';

export interface SyncSettings {
  baseUrl: string;
  pageDelayMs: number;
  throttleBackoffMs: number;
  /** Unbounded when undefined */
  maxThrottleRetries?: number;
  batchSize: number;
}

export interface SyncStack {
  endpoints: GraphEndpoints;
  throttle: ThrottleController;
  fetcher: PagedFetcher;
  resolver: IdentityResolver;
  reconciler: SetReconciler;
  selector: DeviceSelector;
}

export function settingsFromConfig(config: SyncEnvConfig): SyncSettings {
  return {
    baseUrl: config.GRAPH_BASE_URL,
    pageDelayMs: config.SYNC_PAGE_DELAY_MS,
    throttleBackoffMs: config.SYNC_THROTTLE_BACKOFF_MS,
    maxThrottleRetries: config.SYNC_MAX_THROTTLE_RETRIES,
    batchSize: config.SYNC_BATCH_SIZE,
  };
}

export function createTokenProvider(config: SyncEnvConfig): TokenProvider {
  const { GRAPH_TENANT_ID: tenantId, GRAPH_CLIENT_ID: clientId, GRAPH_CLIENT_SECRET: clientSecret } = config;
  if (tenantId && clientId && clientSecret) {
    return new ClientCredentialsTokenProvider({
      tenantId,
      clientId,
      clientSecret,
      authorityUrl: config.GRAPH_AUTHORITY_URL,
      scope: defaultScopeFor(config.GRAPH_BASE_URL),
    });
  }
  if (config.GRAPH_ACCESS_TOKEN) {
    return new StaticTokenProvider(config.GRAPH_ACCESS_TOKEN);
  }
  throw new AuthenticationError('No Graph credentials configured');
}

export function createTransport(config: SyncEnvConfig): GraphTransport {
  return new AxiosGraphTransport({
    tokenProvider: createTokenProvider(config),
    timeoutMs: config.SYNC_REQUEST_TIMEOUT_MS,
  });
}

/**
 * Wire the core components over one transport. A single ThrottleController
 * and PagedFetcher are shared so every call follows the same policy.
 */
export function createSyncStack(transport: GraphTransport, settings: SyncSettings, sleepFn?: Sleep): SyncStack {
  const endpoints = new GraphEndpoints(settings.baseUrl);
  const throttle = new ThrottleController({
    backoffMs: settings.throttleBackoffMs,
    maxRetries: settings.maxThrottleRetries,
    sleep: sleepFn,
  });
  const fetcher = new PagedFetcher(transport, throttle, { interPageDelayMs: settings.pageDelayMs, sleep: sleepFn });
  const resolver = new IdentityResolver(transport, fetcher, throttle, endpoints);
  const reconciler = new SetReconciler(transport, fetcher, resolver, throttle, endpoints, { batchSize: settings.batchSize });
  const selector = new DeviceSelector(fetcher, endpoints);

  return { endpoints, throttle, fetcher, resolver, reconciler, selector };
}
