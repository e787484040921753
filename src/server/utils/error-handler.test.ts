/**
 * Unit tests for error handler utility.
 *
 * Covers error classification, request context extraction, structured
 * logging, and the mapping from domain errors to API errors.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Request } from 'express';
import {
  classifyError,
  ErrorClass,
  extractErrorContext,
  logError,
  toAPIError,
} from './error-handler';
import { APIErrorCode } from './response.formatter';
import { CapacityExhaustedError, InconsistentLengthError } from './errors';

describe('Error Handler', () => {
  describe('classifyError', () => {
    it('should classify validation errors as CLIENT_ERROR', () => {
      expect(classifyError(APIErrorCode.MISSING_PARAMETER)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.INVALID_TYPE)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.INVALID_KEYS)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.ROW_COUNT_EXCEEDED)).toBe(ErrorClass.CLIENT_ERROR);
      expect(classifyError(APIErrorCode.INCONSISTENT_LENGTH)).toBe(ErrorClass.CLIENT_ERROR);
    });

    it('should classify exhausted capacity as CLIENT_ERROR', () => {
      expect(classifyError(APIErrorCode.CAPACITY_EXHAUSTED)).toBe(ErrorClass.CLIENT_ERROR);
    });

    it('should classify oversized bodies as CLIENT_ERROR', () => {
      expect(classifyError(APIErrorCode.PAYLOAD_TOO_LARGE)).toBe(ErrorClass.CLIENT_ERROR);
    });

    it('should classify internal errors as SERVER_ERROR', () => {
      expect(classifyError(APIErrorCode.INTERNAL_ERROR)).toBe(ErrorClass.SERVER_ERROR);
    });
  });

  describe('extractErrorContext', () => {
    it('should extract basic request context', () => {
      const req = {
        method: 'POST',
        path: '/api/pseudonymize',
      } as unknown as Request;

      const context = extractErrorContext(req, 'req123', 'pseudonymize', { rows: 2 });

      expect(context).toEqual({
        requestId: 'req123',
        method: 'POST',
        path: '/api/pseudonymize',
        operation: 'pseudonymize',
        metadata: { rows: 2 },
        timestamp: expect.any(String),
      });
    });
  });

  describe('logError', () => {
    const context = {
      method: 'POST',
      path: '/api/pseudonymize',
      timestamp: '2026-01-01T00:00:00.000Z',
    };

    beforeEach(() => {
      vi.spyOn(console, 'log').mockImplementation(() => {});
      vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
      vi.restoreAllMocks();
    });

    it('should log client errors to console.log without a stack', () => {
      logError(new Error('bad keys'), context, APIErrorCode.INVALID_KEYS);

      expect(console.error).not.toHaveBeenCalled();
      const [tag, payload] = vi.mocked(console.log).mock.calls[0];
      expect(tag).toBe('[CLIENT_ERROR]');
      expect(JSON.parse(String(payload))).toEqual({
        errorCode: APIErrorCode.INVALID_KEYS,
        errorClass: ErrorClass.CLIENT_ERROR,
        message: 'bad keys',
        context,
      });
    });

    it('should log server errors to console.error with a stack', () => {
      logError(new Error('boom'), context, APIErrorCode.INTERNAL_ERROR);

      const [tag, payload] = vi.mocked(console.error).mock.calls[0];
      expect(tag).toBe('[SERVER_ERROR]');
      const logged = JSON.parse(String(payload));
      expect(logged.message).toBe('boom');
      expect(logged.stack).toContain('boom');
    });

    it('should stringify non-Error values', () => {
      logError('plain failure', context, APIErrorCode.INTERNAL_ERROR);

      const logged = JSON.parse(String(vi.mocked(console.error).mock.calls[0][1]));
      expect(logged.message).toBe('plain failure');
      expect(logged).not.toHaveProperty('stack');
    });
  });

  describe('toAPIError', () => {
    it('should carry capacity counts', () => {
      const error = new CapacityExhaustedError({
        requested: 3,
        remainingTotal: 5,
        remainingAlliterations: 1,
        alliterate: true,
      });

      expect(toAPIError(error)).toEqual({
        code: APIErrorCode.CAPACITY_EXHAUSTED,
        message: error.message,
        details: {
          requested: 3,
          remainingTotal: 5,
          remainingAlliterations: 1,
          alliterationOnly: true,
        },
      });
    });

    it('should map inconsistent column lengths', () => {
      const apiError = toAPIError(new InconsistentLengthError([1, 2]));

      expect(apiError).toEqual({
        code: APIErrorCode.INCONSISTENT_LENGTH,
        message: 'All key columns must have the same length, got 1, 2.',
        details: { field: 'columns', received: [1, 2] },
      });
    });

    it('should hide unexpected errors behind a generic message', () => {
      const apiError = toAPIError(new Error('secret internals'), 'req_9');

      expect(apiError.code).toBe(APIErrorCode.INTERNAL_ERROR);
      expect(apiError.message).toBe('Failed to process request');
      expect(apiError.details).toMatchObject({ requestId: 'req_9' });
    });
  });
});
