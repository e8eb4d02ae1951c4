/**
 * Centralized error handling utilities
 */

import axios from 'axios';
import { z } from 'zod';
import { createLogger } from './logger.js';
import {
  GraphApiError,
  NetworkError,
  AuthenticationError,
  NotFoundError,
  RateLimitError,
  isThrottlingMessage,
} from './errors.js';

const logger = createLogger('error-handler');

const NETWORK_ERROR_CODES = new Set(['ECONNREFUSED', 'ETIMEDOUT', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'ECONNABORTED']);

const GraphErrorBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    message: z.string().optional(),
  }),
});

function parseRetryAfter(value: unknown): number {
  const seconds = Number(value);
  return Number.isFinite(seconds) && seconds > 0 ? seconds : 0;
}

/**
 * Convert anything thrown by an HTTP call into the GraphApiError taxonomy
 */
export function toGraphApiError(error: unknown, context?: Record<string, unknown>): GraphApiError {
  if (error instanceof GraphApiError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    const response = error.response;
    if (!response) {
      return new NetworkError(error.message, { ...context, code: error.code }, error);
    }

    const body = GraphErrorBodySchema.safeParse(response.data);
    const serviceCode = body.success ? body.data.error.code : undefined;
    const serviceMessage = body.success ? body.data.error.message : undefined;
    const message = serviceMessage ? `${error.message}: ${serviceMessage}` : error.message;
    const fullContext = { ...context, status: response.status };

    if (response.status === 429 || isThrottlingMessage(serviceMessage ?? '') || isThrottlingMessage(serviceCode ?? '')) {
      return new RateLimitError(message, parseRetryAfter(response.headers['retry-after']), fullContext, error);
    }
    if (response.status === 401 || response.status === 403) {
      return new AuthenticationError(message, fullContext, response.status, error);
    }
    if (response.status === 404) {
      return new NotFoundError(message, fullContext, error);
    }
    return new GraphApiError(message, response.status, serviceCode ?? `HTTP_${response.status}`, [], fullContext, error);
  }

  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    if ((code && NETWORK_ERROR_CODES.has(code)) || [...NETWORK_ERROR_CODES].some((c) => error.message.includes(c))) {
      return NetworkError.fromError(error, context);
    }
    if (isThrottlingMessage(error.message)) {
      return new RateLimitError(error.message, 0, context, error);
    }
    if (error.message.toLowerCase().includes('unauthorized')) {
      return new AuthenticationError(error.message, context, 401, error);
    }
    return new GraphApiError(error.message, undefined, 'UNKNOWN_ERROR', ['Check the logs for more details'], context, error);
  }

  return new GraphApiError(String(error), undefined, 'UNKNOWN_ERROR', ['An unexpected error occurred'], context);
}

/**
 * Structured error context for capturing full error details
 */
export interface ErrorContext {
  /** The operation that was being performed */
  operation: string;
  message: string;
  /** Technical error code for programmatic handling */
  code?: string;
  component?: string;
  stack?: string;
  metadata?: Record<string, unknown>;
  suggestions?: string[];
  timestamp: string;
}

export function buildErrorContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const timestamp = new Date().toISOString();
  const graphError = toGraphApiError(error);

  return {
    operation,
    message: graphError.message,
    code: graphError.errorCode ?? (graphError.statusCode ? `HTTP_${graphError.statusCode}` : 'ERROR'),
    component,
    stack: graphError.stack ?? graphError.originalError?.stack,
    metadata: {
      ...metadata,
      ...(graphError.statusCode !== undefined ? { statusCode: graphError.statusCode } : {}),
    },
    suggestions: graphError.suggestions.length > 0 ? graphError.suggestions : undefined,
    timestamp,
  };
}

/**
 * Log error with full context and hand the context back for reporting
 */
export function logErrorWithContext(
  error: unknown,
  operation: string,
  component?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  const context = buildErrorContext(error, operation, component, metadata);

  logger.error(`${operation} failed`, {
    error: context.message,
    code: context.code,
    component: context.component,
    metadata: context.metadata,
    suggestions: context.suggestions,
  });

  return context;
}

/**
 * Unhandled rejection handler
 */
export function setupGlobalErrorHandlers(): void {
  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', {
      reason: reason instanceof Error ? reason.message : String(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    process.exit(1);
  });

  process.on('uncaughtException', (error: Error) => {
    logger.error('Uncaught Exception', {
      error: error.message,
      stack: error.stack,
    });
    process.exit(1);
  });
}
