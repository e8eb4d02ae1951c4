import { describe, expect, test } from '@jest/globals';
import { AxiosError, AxiosHeaders, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { buildErrorContext, toGraphApiError } from '../../utils/error-handler.js';
import {
  GraphApiError,
  NetworkError,
  AuthenticationError,
  NotFoundError,
  RateLimitError,
} from '../../utils/errors.js';

function responseError(status: number, data: unknown = {}, headers: Record<string, string> = {}): AxiosError {
  const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
  const response: AxiosResponse = { data, status, statusText: '', headers, config };
  return new AxiosError(`Request failed with status code ${status}`, AxiosError.ERR_BAD_REQUEST, config, undefined, response);
}

describe('Error Handler Utilities', () => {
  describe('toGraphApiError', () => {
    test('should return GraphApiError as-is', () => {
      const error = new GraphApiError('Test error', 400);
      expect(toGraphApiError(error)).toBe(error);
    });

    test('should convert axios errors without a response to NetworkError', () => {
      const config: InternalAxiosRequestConfig = { headers: new AxiosHeaders() };
      const result = toGraphApiError(new AxiosError('connect ECONNREFUSED', 'ECONNREFUSED', config));

      expect(result).toBeInstanceOf(NetworkError);
      expect(result.context).toEqual({ code: 'ECONNREFUSED' });
    });

    test('should convert 429 responses with the retry-after hint', () => {
      const result = toGraphApiError(
        responseError(429, { error: { code: 'TooManyRequests', message: 'Rate limit hit' } }, { 'retry-after': '7' }),
        { operation: 'fetchPage' }
      );

      expect(result).toBeInstanceOf(RateLimitError);
      expect(result.message).toBe('Request failed with status code 429: Rate limit hit');
      expect(result).toMatchObject({ retryAfter: 7 });
      expect(result.context).toEqual({ operation: 'fetchPage', status: 429 });
    });

    test('should treat throttling messages on other statuses as rate limiting', () => {
      const result = toGraphApiError(responseError(503, { error: { message: 'Request was throttled' } }));
      expect(result).toBeInstanceOf(RateLimitError);
    });

    test('should convert 403 responses to AuthenticationError', () => {
      const result = toGraphApiError(responseError(403, { error: { code: 'Authorization_RequestDenied' } }));

      expect(result).toBeInstanceOf(AuthenticationError);
      expect(result.statusCode).toBe(403);
      expect(result.errorCode).toBe('FORBIDDEN');
    });

    test('should convert 404 responses to NotFoundError', () => {
      expect(toGraphApiError(responseError(404))).toBeInstanceOf(NotFoundError);
    });

    test('should keep the service error code for other failures', () => {
      const result = toGraphApiError(
        responseError(400, { error: { code: 'Request_BadRequest', message: 'Invalid object identifier' } })
      );

      expect(result.constructor).toBe(GraphApiError);
      expect(result.statusCode).toBe(400);
      expect(result.errorCode).toBe('Request_BadRequest');
      expect(result.message).toBe('Request failed with status code 400: Invalid object identifier');
    });

    test('should fall back to an HTTP status code', () => {
      expect(toGraphApiError(responseError(500, 'Internal Server Error')).errorCode).toBe('HTTP_500');
    });

    test('should convert network errors', () => {
      const result = toGraphApiError(new Error('ECONNRESET: socket hang up'));
      expect(result).toBeInstanceOf(NetworkError);
      expect(result.message).toBe('ECONNRESET: socket hang up');
    });

    test('should convert auth errors', () => {
      expect(toGraphApiError(new Error('Unauthorized access'))).toBeInstanceOf(AuthenticationError);
    });

    test('should handle non-Error objects', () => {
      const result = toGraphApiError('String error');
      expect(result).toBeInstanceOf(GraphApiError);
      expect(result.message).toBe('String error');
    });
  });

  describe('buildErrorContext', () => {
    test('captures code, status and metadata', () => {
      const result = buildErrorContext(new NotFoundError('Group missing'), 'getGroup', 'set-reconciler', {
        groupId: 'grp-1',
      });

      expect(result.operation).toBe('getGroup');
      expect(result.message).toBe('Group missing');
      expect(result.code).toBe('NOT_FOUND');
      expect(result.component).toBe('set-reconciler');
      expect(result.metadata).toEqual({ groupId: 'grp-1', statusCode: 404 });
      expect(result.suggestions).toBeUndefined();
    });

    test('carries suggestions from the error', () => {
      const result = buildErrorContext(new RateLimitError('Too many requests'), 'addMembers');

      expect(result.code).toBe('TOO_MANY_REQUESTS');
      expect(result.suggestions).toEqual([
        'Requests are being throttled; lower the request rate or wait before retrying',
      ]);
    });
  });
});
