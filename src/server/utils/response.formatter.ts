/**
 * Response formatter utility for the pseudonym API endpoints.
 *
 * Provides standardized response formatting for:
 * - Success responses with consistent structure
 * - Error responses with structured error codes
 * - HTTP status code mapping for different error types
 * - Response timestamps and request tracing
 */

import type { Response } from 'express';
import { APIErrorCode as ValidationErrorCode } from '../validation/api.validation';

/**
 * API error codes that do not come from request validation.
 */
export enum AdditionalAPIErrorCode {
  /** Not enough unused pseudonyms left for the request */
  CAPACITY_EXHAUSTED = 'CAPACITY_EXHAUSTED',
  /** Route does not exist */
  NOT_FOUND = 'NOT_FOUND',
  /** Request body exceeds the JSON body limit */
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  /** Internal server error or unexpected failure */
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export const APIErrorCode = {
  MISSING_PARAMETER: ValidationErrorCode.MISSING_PARAMETER,
  INVALID_TYPE: ValidationErrorCode.INVALID_TYPE,
  INVALID_KEYS: ValidationErrorCode.INVALID_KEYS,
  ROW_COUNT_EXCEEDED: ValidationErrorCode.ROW_COUNT_EXCEEDED,
  INCONSISTENT_LENGTH: ValidationErrorCode.INCONSISTENT_LENGTH,
  CAPACITY_EXHAUSTED: AdditionalAPIErrorCode.CAPACITY_EXHAUSTED,
  NOT_FOUND: AdditionalAPIErrorCode.NOT_FOUND,
  PAYLOAD_TOO_LARGE: AdditionalAPIErrorCode.PAYLOAD_TOO_LARGE,
  INTERNAL_ERROR: AdditionalAPIErrorCode.INTERNAL_ERROR,
} as const;

export type APIErrorCode = ValidationErrorCode | AdditionalAPIErrorCode;

/**
 * Structured API error information.
 */
export interface APIError {
  /** Machine-readable error code for client handling */
  code: APIErrorCode;
  /** Human-readable error message */
  message: string;
  details?: {
    field?: string;
    expected?: string;
    received?: unknown;
    [key: string]: unknown;
  };
}

export interface ErrorResponseData {
  error: APIError;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  requestId?: string;
}

export type SuccessResponseData<T> = T & { timestamp: number; requestId?: string };

const ERROR_STATUS_MAP: Record<APIErrorCode, number> = {
  // 400 Bad Request - Client validation errors
  [APIErrorCode.MISSING_PARAMETER]: 400,
  [APIErrorCode.INVALID_TYPE]: 400,
  [APIErrorCode.INVALID_KEYS]: 400,
  [APIErrorCode.ROW_COUNT_EXCEEDED]: 400,
  [APIErrorCode.INCONSISTENT_LENGTH]: 400,

  // 404 Not Found
  [APIErrorCode.NOT_FOUND]: 404,

  // 413 Payload Too Large
  [APIErrorCode.PAYLOAD_TOO_LARGE]: 413,

  // 409 Conflict - the registry cannot take more keys of this kind
  [APIErrorCode.CAPACITY_EXHAUSTED]: 409,

  // 500 Internal Server Error
  [APIErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Formats a successful API response: data fields at the root plus a timestamp.
 *
 * @example
 * ```typescript
 * formatSuccessResponse({ pseudonyms: ['Big Bear'] });
 * // Returns: { pseudonyms: ['Big Bear'], timestamp: 1728950400000 }
 * ```
 */
export function formatSuccessResponse<T extends object>(
  data: T,
  requestId?: string
): SuccessResponseData<T> {
  const response: SuccessResponseData<T> = {
    ...data,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * Type guard to check if an object is an APIError.
 */
export function isAPIError(error: unknown): error is APIError {
  if (typeof error !== 'object' || error === null) return false;
  if (!('code' in error) || !('message' in error)) return false;
  const { code, message } = error;
  return (
    typeof message === 'string' &&
    typeof code === 'string' &&
    Object.values<string>(APIErrorCode).includes(code)
  );
}

/**
 * Formats an error API response.
 *
 * APIError objects are used as-is; Error objects and strings become an
 * APIError with `defaultCode`; anything else becomes a generic internal error.
 */
export function formatErrorResponse(
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): ErrorResponseData {
  let apiError: APIError;

  if (isAPIError(error)) {
    apiError = error;
  } else if (error instanceof Error) {
    apiError = {
      code: defaultCode,
      message: error.message || 'An unexpected error occurred',
    };
  } else if (typeof error === 'string') {
    apiError = {
      code: defaultCode,
      message: error || 'An unexpected error occurred',
    };
  } else {
    apiError = {
      code: APIErrorCode.INTERNAL_ERROR,
      message: 'An unexpected error occurred',
    };
  }

  const response: ErrorResponseData = {
    error: apiError,
    timestamp: Date.now(),
  };

  if (requestId) {
    response.requestId = requestId;
  }

  return response;
}

/**
 * HTTP status for an API error code.
 *
 * @example
 * ```typescript
 * getHttpStatusForError(APIErrorCode.INVALID_KEYS);       // 400
 * getHttpStatusForError(APIErrorCode.CAPACITY_EXHAUSTED); // 409
 * ```
 */
export function getHttpStatusForError(errorCode: APIErrorCode): number {
  return ERROR_STATUS_MAP[errorCode] ?? 500;
}

export function createAPIError(
  code: APIErrorCode,
  message: string,
  details?: APIError['details']
): APIError {
  const error: APIError = { code, message };

  if (details) {
    error.details = details;
  }

  return error;
}

export function sendSuccessResponse<T extends object>(
  res: Response,
  data: T,
  requestId?: string
): void {
  res.json(formatSuccessResponse(data, requestId));
}

/**
 * Sends a formatted error response with the mapped status code.
 *
 * @example
 * ```typescript
 * sendErrorResponse(res, createAPIError(APIErrorCode.INVALID_KEYS, 'keys contains invalid values'));
 * // Sends 400 status with formatted error response
 * ```
 */
export function sendErrorResponse(
  res: Response,
  error: unknown,
  defaultCode: APIErrorCode = APIErrorCode.INTERNAL_ERROR,
  requestId?: string
): void {
  const response = formatErrorResponse(error, defaultCode, requestId);
  res.status(getHttpStatusForError(response.error.code)).json(response);
}
