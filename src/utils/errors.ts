/**
 * Error taxonomy for Graph calls.
 *
 * Everything the transport throws is a GraphApiError; the subclasses let the
 * throttle policy and the reconciler decide between retry, skip and abort.
 */

export class GraphApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode?: number,
    public readonly errorCode?: string,
    public readonly suggestions: string[] = [],
    public readonly context?: Record<string, unknown>,
    public readonly originalError?: Error
  ) {
    super(message);
    this.name = 'GraphApiError';
  }
}

export class RateLimitError extends GraphApiError {
  /** Seconds the service asked us to wait, 0 when it gave no hint. */
  public readonly retryAfter: number;

  constructor(message: string, retryAfter: number = 0, context?: Record<string, unknown>, originalError?: Error) {
    super(
      message,
      429,
      'TOO_MANY_REQUESTS',
      ['Requests are being throttled; lower the request rate or wait before retrying'],
      context,
      originalError
    );
    this.name = 'RateLimitError';
    this.retryAfter = retryAfter;
  }
}

export class NetworkError extends GraphApiError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(
      message,
      undefined,
      'NETWORK_ERROR',
      ['Check that the Graph endpoint is reachable from this host'],
      context,
      originalError
    );
    this.name = 'NetworkError';
  }

  static fromError(error: Error, context?: Record<string, unknown>): NetworkError {
    return new NetworkError(error.message, context, error);
  }
}

export class AuthenticationError extends GraphApiError {
  constructor(message: string, context?: Record<string, unknown>, statusCode: number = 401, originalError?: Error) {
    super(
      message,
      statusCode,
      statusCode === 403 ? 'FORBIDDEN' : 'UNAUTHORIZED',
      ['Check the app registration credentials and its granted Graph permissions'],
      context,
      originalError
    );
    this.name = 'AuthenticationError';
  }
}

export class NotFoundError extends GraphApiError {
  constructor(message: string, context?: Record<string, unknown>, originalError?: Error) {
    super(message, 404, 'NOT_FOUND', [], context, originalError);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends GraphApiError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, undefined, 'VALIDATION_ERROR', [], context);
    this.name = 'ValidationError';
  }
}

export class ThrottleRetriesExhaustedError extends GraphApiError {
  constructor(public readonly attempts: number, lastError: Error, context?: Record<string, unknown>) {
    super(
      `Still throttled after ${attempts} retries: ${lastError.message}`,
      429,
      'THROTTLE_RETRIES_EXHAUSTED',
      ['Raise SYNC_MAX_THROTTLE_RETRIES or run again later'],
      context,
      lastError
    );
    this.name = 'ThrottleRetriesExhaustedError';
  }
}

const THROTTLE_MESSAGE_PATTERN = /too many requests|throttl|rate limit|request limit/i;

export function isThrottlingMessage(message: string): boolean {
  return THROTTLE_MESSAGE_PATTERN.test(message);
}

export function isRateLimitError(error: unknown): boolean {
  if (error instanceof ThrottleRetriesExhaustedError) return false;
  if (error instanceof RateLimitError) return true;
  if (error instanceof GraphApiError && error.statusCode === 429) return true;
  return error instanceof Error && isThrottlingMessage(error.message);
}

export type TargetErrorCode = 'TARGET_EXISTS' | 'TARGET_AMBIGUOUS' | 'TARGET_NOT_FOUND' | 'TARGET_LOOKUP_FAILED';

/** The target collection cannot be used; fatal to the whole reconciliation */
export class TargetCollectionError extends GraphApiError {
  constructor(message: string, public readonly targetCode: TargetErrorCode, context?: Record<string, unknown>, suggestions: string[] = []) {
    super(message, undefined, targetCode, suggestions, context);
    this.name = 'TargetCollectionError';
  }
}
