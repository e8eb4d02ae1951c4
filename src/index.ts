export { createLogger, setLogLevel } from './utils/logger.js';
export type { Logger } from './utils/logger.js';
export * from './utils/errors.js';
export { toGraphApiError, buildErrorContext, logErrorWithContext } from './utils/error-handler.js';
export type { ErrorContext } from './utils/error-handler.js';
export { ThrottleController, DEFAULT_THROTTLE_BACKOFF_MS, sleep } from './utils/throttle.js';
export type { Sleep, ThrottleClassification, ThrottleOptions } from './utils/throttle.js';
export { validateSyncConfig, hasClientCredentials, EnvValidationError } from './utils/env-validation.js';
export type { SyncEnvConfig } from './utils/env-validation.js';
export { loadDotenv } from './utils/dotenv-loader.js';

export {
  ClientCredentialsTokenProvider,
  StaticTokenProvider,
  defaultScopeFor,
} from './auth/token-provider.js';
export type { TokenProvider, ClientCredentialsConfig } from './auth/token-provider.js';

export * from './graph/entity.js';
export * from './graph/endpoints.js';
export { AxiosGraphTransport } from './graph/transport.js';
export type { GraphTransport, AxiosGraphTransportConfig } from './graph/transport.js';
export { PagedFetcher, DEFAULT_INTER_PAGE_DELAY_MS } from './graph/paged-fetcher.js';
export type { FetchResult, PagedFetcherOptions } from './graph/paged-fetcher.js';
export { IdentityResolver, IDENTIFIER_NAMESPACES, BATCHED_LOOKUP_SIZE, describeDevice } from './graph/identity-resolver.js';
export type {
  DesiredDevice,
  IdentifierNamespace,
  IdentityKey,
  NotFoundReason,
  Resolution,
  ResolveManyOptions,
  ResolveManyResult,
  UnresolvedDevice,
} from './graph/identity-resolver.js';

export { computeReconciliationPlan, isEmptyPlan, chunk } from './reconcile/plan.js';
export type { ReconciliationPlan, PlanOptions } from './reconcile/plan.js';
export { SetReconciler, MAX_BATCH_SIZE, outcomeExitCode, mailNicknameFor } from './reconcile/set-reconciler.js';
export type {
  FailedBatch,
  ReconcileMode,
  ReconcileOptions,
  ReconciliationOutcome,
  SetReconcilerOptions,
  TargetCollection,
  UnresolvedEntry,
} from './reconcile/set-reconciler.js';

export { DeviceSelector, desiredFromIdentifiers, desiredFromManagedDevice } from './sources/device-selector.js';
export type { Selection } from './sources/device-selector.js';
export { parseDeviceListFile, readDeviceListFile } from './sources/device-list-file.js';

export { createSyncStack, createTokenProvider, createTransport, settingsFromConfig } from './sync-stack.js';
export type { SyncSettings, SyncStack } from './sync-stack.js';
