import { createLogger } from '../utils/logger.js';
import { NetworkError, ValidationError } from '../utils/errors.js';
import { ErrorContext, buildErrorContext } from '../utils/error-handler.js';
import { Sleep, ThrottleController, sleep } from '../utils/throttle.js';
import { DEFAULT_CONTINUATION_FIELD, Entity, Page, parsePage } from './entity.js';
import { GraphTransport } from './transport.js';

const logger = createLogger('paged-fetcher');

export const DEFAULT_INTER_PAGE_DELAY_MS = 100;

export interface PagedFetcherOptions {
  /** Minimum spacing between successful page requests */
  interPageDelayMs?: number;
  continuationField?: string;
  /** Stop after this many pages and report the result as incomplete */
  maxPages?: number;
  sleep?: Sleep;
}

export interface FetchResult {
  entities: Entity[];
  /** False when a page failed or maxPages cut the walk short */
  complete: boolean;
  pageCount: number;
  failure?: ErrorContext;
}

function assertAbsoluteUri(uri: string): void {
  let parsed: URL;
  try {
    parsed = new URL(uri);
  } catch {
    throw new ValidationError(`Listing URI is not absolute: ${uri}`, { uri });
  }
  if (parsed.protocol !== 'https:' && parsed.protocol !== 'http:') {
    throw new ValidationError(`Listing URI must be http(s): ${uri}`, { uri });
  }
}

/**
 * Walks a paginated listing endpoint to exhaustion.
 *
 * Throttled pages are re-requested under the ThrottleController. Any other
 * failure ends the walk and returns what was gathered so far with
 * `complete: false`; only a bad initial URI or an unreachable host on the
 * first request is thrown.
 */
export class PagedFetcher {
  private readonly interPageDelayMs: number;
  private readonly continuationField: string;
  private readonly maxPages?: number;
  private readonly sleepFn: Sleep;

  constructor(
    private readonly transport: GraphTransport,
    private readonly throttle: ThrottleController,
    options: PagedFetcherOptions = {}
  ) {
    this.interPageDelayMs = Math.max(0, options.interPageDelayMs ?? DEFAULT_INTER_PAGE_DELAY_MS);
    this.continuationField = options.continuationField ?? DEFAULT_CONTINUATION_FIELD;
    this.maxPages = options.maxPages;
    this.sleepFn = options.sleep ?? sleep;
  }

  async fetchAll(initialUri: string): Promise<Entity[]> {
    return (await this.fetchAllDetailed(initialUri)).entities;
  }

  async fetchAllDetailed(initialUri: string): Promise<FetchResult> {
    assertAbsoluteUri(initialUri);

    const entities: Entity[] = [];
    // Entity count returned by each URI already fetched in this walk.
    const seen = new Map<string, number>();
    let uri: string | undefined = initialUri;
    let pageCount = 0;

    while (uri) {
      if (this.maxPages !== undefined && pageCount >= this.maxPages) {
        logger.warn('Page limit reached; result is incomplete', { initialUri, maxPages: this.maxPages });
        return { entities, complete: false, pageCount };
      }

      const current: string = uri;
      let payload: unknown;
      try {
        payload = await this.throttle.run(() => this.transport.get(current), { operation: 'fetchPage', uri: current });
      } catch (error) {
        if (pageCount === 0 && error instanceof NetworkError) {
          throw error;
        }
        return this.partial(entities, pageCount, error, current);
      }

      let page: Page;
      try {
        page = parsePage(payload, this.continuationField);
      } catch (error) {
        return this.partial(entities, pageCount, error, current);
      }

      const previousCount = seen.get(current);
      if (previousCount !== undefined && previousCount === page.entities.length) {
        logger.warn('Continuation points back to a page already fetched; stopping', {
          uri: current,
          entityCount: previousCount,
        });
        break;
      }

      seen.set(current, page.entities.length);
      entities.push(...page.entities);
      pageCount++;
      uri = page.nextLink;

      if (uri && this.interPageDelayMs > 0) {
        await this.sleepFn(this.interPageDelayMs);
      }
    }

    return { entities, complete: true, pageCount };
  }

  private partial(entities: Entity[], pageCount: number, error: unknown, uri: string): FetchResult {
    const failure = buildErrorContext(error, 'fetchPage', 'paged-fetcher', { uri, pagesFetched: pageCount });
    logger.warn('Page fetch failed; returning partial result', {
      uri,
      pagesFetched: pageCount,
      entitiesFetched: entities.length,
      error: failure.message,
    });
    return { entities, complete: false, pageCount, failure };
  }
}
