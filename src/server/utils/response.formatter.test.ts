/**
 * Unit tests for response formatter utility.
 *
 * Tests success and error response structure, HTTP status mapping and the
 * send helpers against a mocked Express response.
 */

import { describe, it, expect, vi } from 'vitest';
import type { Response } from 'express';
import {
  APIErrorCode,
  createAPIError,
  formatErrorResponse,
  formatSuccessResponse,
  getHttpStatusForError,
  isAPIError,
  sendErrorResponse,
  sendSuccessResponse,
} from './response.formatter';

const createMockResponse = () => {
  const res = {
    status: vi.fn(),
    json: vi.fn(),
  };
  res.status.mockReturnValue(res);
  return res;
};

describe('Response Formatter', () => {
  describe('formatSuccessResponse', () => {
    it('should spread data and add a timestamp', () => {
      const response = formatSuccessResponse({ pseudonyms: ['Big Bear'], size: 1 });

      expect(response).toEqual({
        pseudonyms: ['Big Bear'],
        size: 1,
        timestamp: expect.any(Number),
      });
      expect(response.timestamp).toBeLessThanOrEqual(Date.now());
    });

    it('should include the request ID when given', () => {
      expect(formatSuccessResponse({}, 'req_1').requestId).toBe('req_1');
      expect(formatSuccessResponse({})).not.toHaveProperty('requestId');
    });
  });

  describe('isAPIError', () => {
    it('should recognize API errors by known code', () => {
      expect(isAPIError({ code: APIErrorCode.NOT_FOUND, message: 'gone' })).toBe(true);
      expect(isAPIError({ code: 'TEAPOT', message: 'short and stout' })).toBe(false);
      expect(isAPIError(new Error('plain'))).toBe(false);
      expect(isAPIError(null)).toBe(false);
    });
  });

  describe('formatErrorResponse', () => {
    it('should pass API errors through', () => {
      const apiError = createAPIError(APIErrorCode.INVALID_KEYS, 'bad keys', { field: 'keys' });

      expect(formatErrorResponse(apiError, APIErrorCode.INTERNAL_ERROR, 'req_2')).toEqual({
        error: { code: APIErrorCode.INVALID_KEYS, message: 'bad keys', details: { field: 'keys' } },
        timestamp: expect.any(Number),
        requestId: 'req_2',
      });
    });

    it('should wrap Error instances with the default code', () => {
      const response = formatErrorResponse(new Error('boom'), APIErrorCode.INVALID_TYPE);

      expect(response.error).toEqual({ code: APIErrorCode.INVALID_TYPE, message: 'boom' });
    });

    it('should wrap strings with the default code', () => {
      expect(formatErrorResponse('nope').error).toEqual({
        code: APIErrorCode.INTERNAL_ERROR,
        message: 'nope',
      });
    });

    it('should fall back to a generic internal error', () => {
      expect(formatErrorResponse(42, APIErrorCode.INVALID_TYPE).error).toEqual({
        code: APIErrorCode.INTERNAL_ERROR,
        message: 'An unexpected error occurred',
      });
    });
  });

  describe('getHttpStatusForError', () => {
    it('should map validation errors to 400', () => {
      expect(getHttpStatusForError(APIErrorCode.MISSING_PARAMETER)).toBe(400);
      expect(getHttpStatusForError(APIErrorCode.INVALID_TYPE)).toBe(400);
      expect(getHttpStatusForError(APIErrorCode.INVALID_KEYS)).toBe(400);
      expect(getHttpStatusForError(APIErrorCode.ROW_COUNT_EXCEEDED)).toBe(400);
      expect(getHttpStatusForError(APIErrorCode.INCONSISTENT_LENGTH)).toBe(400);
    });

    it('should map the remaining codes', () => {
      expect(getHttpStatusForError(APIErrorCode.NOT_FOUND)).toBe(404);
      expect(getHttpStatusForError(APIErrorCode.CAPACITY_EXHAUSTED)).toBe(409);
      expect(getHttpStatusForError(APIErrorCode.PAYLOAD_TOO_LARGE)).toBe(413);
      expect(getHttpStatusForError(APIErrorCode.INTERNAL_ERROR)).toBe(500);
    });
  });

  describe('createAPIError', () => {
    it('should omit details when none are given', () => {
      expect(createAPIError(APIErrorCode.NOT_FOUND, 'gone')).toEqual({
        code: APIErrorCode.NOT_FOUND,
        message: 'gone',
      });
    });
  });

  describe('send helpers', () => {
    it('should send success responses as JSON', () => {
      const res = createMockResponse();

      sendSuccessResponse(res as unknown as Response, { ok: true }, 'req_3');

      expect(res.status).not.toHaveBeenCalled();
      expect(res.json).toHaveBeenCalledWith({
        ok: true,
        timestamp: expect.any(Number),
        requestId: 'req_3',
      });
    });

    it('should send errors with the mapped status', () => {
      const res = createMockResponse();

      sendErrorResponse(
        res as unknown as Response,
        createAPIError(APIErrorCode.CAPACITY_EXHAUSTED, 'full')
      );

      expect(res.status).toHaveBeenCalledWith(409);
      expect(res.json).toHaveBeenCalledWith({
        error: { code: APIErrorCode.CAPACITY_EXHAUSTED, message: 'full' },
        timestamp: expect.any(Number),
      });
    });
  });
});
