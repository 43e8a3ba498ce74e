import { describe, it, expect } from 'vitest';
import {
  OperationError,
  classifyStatus,
  classifyTransportFailure,
  errorForStatus,
  redact,
  toOperationError,
} from '../../src/api/errors.js';

describe('Error Classifier', () => {
  describe('classifyStatus', () => {
    it('should map the documented statuses deterministically', () => {
      const statuses = [401, 403, 404, 429, 500, 503];

      expect(statuses.map(classifyStatus)).toEqual([
        'Unauthorized',
        'Unauthorized',
        'NotFound',
        'RateLimited',
        'RemoteFault',
        'RemoteFault',
      ]);
    });

    it('should treat remote rejections of the request as Invalid', () => {
      expect(classifyStatus(400)).toBe('Invalid');
      expect(classifyStatus(422)).toBe('Invalid');
    });

    it('should map every other status to RemoteFault', () => {
      for (const status of [301, 409, 418, 502, 504, 599]) {
        expect(classifyStatus(status)).toBe('RemoteFault');
      }
    });
  });

  describe('errorForStatus', () => {
    it('should name the subject on NotFound', () => {
      const error = errorForStatus(404, { subject: 'Service order 42' });

      expect(error.kind).toBe('NotFound');
      expect(error.status).toBe(404);
      expect(error.message).toBe('Service order 42 not found (HTTP 404)');
    });

    it('should append a flattened remote message', () => {
      const error = errorForStatus(500, { remoteMessage: 'database\n  unavailable' });

      expect(error.message).toBe('The Qualer API failed to handle the request: database unavailable (HTTP 500)');
    });

    it('should truncate long remote messages', () => {
      const error = errorForStatus(500, { remoteMessage: 'x'.repeat(300) });

      expect(error.message).toBe(`The Qualer API failed to handle the request: ${'x'.repeat(200)}… (HTTP 500)`);
    });

    it('should report Retry-After seconds on RateLimited without retrying', () => {
      const error = errorForStatus(429, { retryAfter: '12' });

      expect(error.kind).toBe('RateLimited');
      expect(error.retryAfterSeconds).toBe(12);
      expect(error.toPayload()).toEqual({
        success: false,
        kind: 'RateLimited',
        error: 'The Qualer API is rate limiting requests; try again later (HTTP 429)',
        status: 429,
        retry_after_seconds: 12,
      });
    });

    it('should ignore an unparseable Retry-After', () => {
      expect(errorForStatus(429, { retryAfter: 'later' }).retryAfterSeconds).toBeUndefined();
    });
  });

  describe('classifyTransportFailure', () => {
    it('should classify timeouts as Unreachable', () => {
      const timeout = Object.assign(new Error('The operation timed out'), { name: 'TimeoutError' });

      const error = classifyTransportFailure(timeout);

      expect(error.kind).toBe('Unreachable');
      expect(error.detail).toBe('Timeout');
    });

    it('should classify connection failures as Unreachable', () => {
      const error = classifyTransportFailure(new TypeError('fetch failed'));

      expect(error.kind).toBe('Unreachable');
      expect(error.message).toBe('The Qualer API could not be reached');
    });

    it('should report caller cancellation distinctly', () => {
      const error = classifyTransportFailure(Object.assign(new Error('This operation was aborted'), { name: 'AbortError' }), true);

      expect(error.kind).toBe('Unreachable');
      expect(error.detail).toBe('Cancelled');
    });

    it('should pass classified errors through', () => {
      const original = new OperationError('Configuration', 'no token');

      expect(classifyTransportFailure(original)).toBe(original);
    });
  });

  describe('toOperationError', () => {
    it('should map unexpected failures to RemoteFault without leaking the message', () => {
      const error = toOperationError(new Error('Cannot read properties of undefined'));

      expect(error.kind).toBe('RemoteFault');
      expect(error.message).toBe('Unexpected failure while handling the Qualer response');
    });
  });

  describe('redact', () => {
    it('should remove every occurrence of the secret', () => {
      expect(redact('token test-secret echoed test-secret', 'test-secret')).toBe('token [redacted] echoed [redacted]');
    });

    it('should leave text alone when there is no secret', () => {
      expect(redact('plain', '')).toBe('plain');
    });
  });
});
