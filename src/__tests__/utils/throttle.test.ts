import { describe, expect, test, jest } from '@jest/globals';
import { ThrottleController } from '../../utils/throttle.js';
import {
  GraphApiError,
  NotFoundError,
  RateLimitError,
  ThrottleRetriesExhaustedError,
} from '../../utils/errors.js';
import { recordingSleep } from '../helpers/fake-graph.js';

describe('ThrottleController', () => {
  describe('classify', () => {
    const controller = new ThrottleController();

    test('treats rate limiting as retryable', () => {
      expect(controller.classify(new RateLimitError('Too many requests'))).toBe('retryable');
      expect(controller.classify(new GraphApiError('slow down', 429))).toBe('retryable');
      expect(controller.classify(new Error('Request was throttled by the service'))).toBe('retryable');
    });

    test('treats everything else as fatal', () => {
      expect(controller.classify(new NotFoundError('missing'))).toBe('fatal');
      expect(controller.classify(new GraphApiError('Bad request', 400))).toBe('fatal');
      expect(controller.classify('boom')).toBe('fatal');
      expect(controller.classify(new ThrottleRetriesExhaustedError(3, new RateLimitError('Too many requests')))).toBe('fatal');
    });
  });

  describe('backoffDuration', () => {
    test('is fixed at 60 seconds by default', () => {
      const controller = new ThrottleController();
      expect(controller.backoffDuration(1)).toBe(60_000);
      expect(controller.backoffDuration(7)).toBe(60_000);
    });

    test('grows with a multiplier up to the cap', () => {
      const controller = new ThrottleController({ backoffMs: 1000, backoffMultiplier: 2, maxBackoffMs: 5000 });
      expect([1, 2, 3, 4].map((attempt) => controller.backoffDuration(attempt))).toEqual([1000, 2000, 4000, 5000]);
    });

    test('caps grown waits at ten times the base by default', () => {
      const controller = new ThrottleController({ backoffMs: 1000, backoffMultiplier: 3 });
      expect(controller.backoffDuration(4)).toBe(10_000);
    });
  });

  describe('run', () => {
    test('retries throttled calls until they succeed', async () => {
      const { sleep, waits } = recordingSleep();
      const controller = new ThrottleController({ sleep });
      const operation = jest
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new RateLimitError('Too many requests'))
        .mockRejectedValueOnce(new RateLimitError('Too many requests'))
        .mockResolvedValue('ok');

      await expect(controller.run(operation)).resolves.toBe('ok');
      expect(operation).toHaveBeenCalledTimes(3);
      expect(waits).toEqual([60_000, 60_000]);
    });

    test('waits at least as long as Retry-After asks', async () => {
      const { sleep, waits } = recordingSleep();
      const controller = new ThrottleController({ sleep });
      const operation = jest
        .fn<() => Promise<string>>()
        .mockRejectedValueOnce(new RateLimitError('Too many requests', 90))
        .mockRejectedValueOnce(new RateLimitError('Too many requests', 5))
        .mockResolvedValue('ok');

      await expect(controller.run(operation)).resolves.toBe('ok');
      expect(waits).toEqual([90_000, 60_000]);
    });

    test('propagates fatal errors on the first failure', async () => {
      const { sleep, waits } = recordingSleep();
      const controller = new ThrottleController({ sleep });
      const failure = new GraphApiError('Bad request', 400);
      const operation = jest.fn<() => Promise<string>>().mockRejectedValue(failure);

      await expect(controller.run(operation)).rejects.toBe(failure);
      expect(operation).toHaveBeenCalledTimes(1);
      expect(waits).toEqual([]);
    });

    test('converts unknown errors into GraphApiError', async () => {
      const controller = new ThrottleController({ sleep: recordingSleep().sleep });
      const error = await controller.run(() => Promise.reject(new Error('boom'))).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(GraphApiError);
      expect(error).toMatchObject({ message: 'boom', errorCode: 'UNKNOWN_ERROR' });
    });

    test('gives up after maxRetries when configured', async () => {
      const { sleep, waits } = recordingSleep();
      const controller = new ThrottleController({ sleep, maxRetries: 2 });
      const operation = jest.fn<() => Promise<string>>().mockRejectedValue(new RateLimitError('Too many requests'));

      const error = await controller.run(operation, { operation: 'fetchPage' }).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ThrottleRetriesExhaustedError);
      expect(error).toMatchObject({ attempts: 2, errorCode: 'THROTTLE_RETRIES_EXHAUSTED' });
      expect(operation).toHaveBeenCalledTimes(3);
      expect(waits).toEqual([60_000, 60_000]);
    });

    test('maxRetries of zero fails on the first throttle', async () => {
      const { sleep, waits } = recordingSleep();
      const controller = new ThrottleController({ sleep, maxRetries: 0 });

      const error = await controller.run(() => Promise.reject(new RateLimitError('Too many requests'))).catch((e: unknown) => e);

      expect(error).toMatchObject({ attempts: 0 });
      expect(waits).toEqual([]);
    });
  });
});
