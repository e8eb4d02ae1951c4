import { RateLimitError, ThrottleRetriesExhaustedError, isRateLimitError } from './errors.js';
import { toGraphApiError } from './error-handler.js';
import { createLogger } from './logger.js';

const logger = createLogger('throttle');

export type ThrottleClassification = 'retryable' | 'fatal';

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface ThrottleOptions {
  /** Wait applied to the first throttled attempt (default 60000) */
  backoffMs?: number;
  /** Retries allowed per call; unbounded when omitted */
  maxRetries?: number;
  /** 1 keeps the wait fixed */
  backoffMultiplier?: number;
  /** Cap for the grown wait when backoffMultiplier > 1 */
  maxBackoffMs?: number;
  sleep?: Sleep;
}

export const DEFAULT_THROTTLE_BACKOFF_MS = 60_000;

/**
 * Retry policy for rate-limited Graph calls.
 *
 * Classification is a pure function of the error. Only throttling is retried;
 * everything else propagates on the first failure.
 */
export class ThrottleController {
  private readonly backoffMs: number;
  private readonly maxRetries: number;
  private readonly backoffMultiplier: number;
  private readonly maxBackoffMs: number;
  private readonly sleepFn: Sleep;

  constructor(options: ThrottleOptions = {}) {
    this.backoffMs = Math.max(0, options.backoffMs ?? DEFAULT_THROTTLE_BACKOFF_MS);
    this.maxRetries = options.maxRetries ?? Number.POSITIVE_INFINITY;
    this.backoffMultiplier = Math.max(1, options.backoffMultiplier ?? 1);
    this.maxBackoffMs = Math.max(this.backoffMs, options.maxBackoffMs ?? this.backoffMs * 10);
    this.sleepFn = options.sleep ?? sleep;
  }

  classify(error: unknown): ThrottleClassification {
    return isRateLimitError(error) ? 'retryable' : 'fatal';
  }

  /**
   * Wait before retry number `attempt` (1-based)
   */
  backoffDuration(attempt: number): number {
    if (this.backoffMultiplier === 1) {
      return this.backoffMs;
    }
    const grown = this.backoffMs * Math.pow(this.backoffMultiplier, Math.max(0, attempt - 1));
    return Math.min(grown, this.maxBackoffMs);
  }

  /**
   * Run a call under the policy. Fatal errors and exhausted retries are thrown
   * as GraphApiError.
   */
  async run<T>(operation: () => Promise<T>, context: Record<string, unknown> = {}): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await operation();
      } catch (error) {
        if (this.classify(error) === 'fatal') {
          throw toGraphApiError(error, context);
        }

        const graphError = toGraphApiError(error, context);
        if (attempt > this.maxRetries) {
          throw new ThrottleRetriesExhaustedError(attempt - 1, graphError, context);
        }

        // Never retry sooner than the service asked.
        const retryAfterSeconds = graphError instanceof RateLimitError ? graphError.retryAfter : 0;
        const waitMs = Math.max(this.backoffDuration(attempt), retryAfterSeconds * 1000);
        logger.warn('Request throttled; waiting before retry', {
          ...context,
          attempt,
          maxRetries: Number.isFinite(this.maxRetries) ? this.maxRetries : 'unbounded',
          waitMs,
          retryAfterSeconds,
          error: graphError.message,
        });
        await this.sleepFn(waitMs);
      }
    }
  }
}
