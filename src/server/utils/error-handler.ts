/**
 * Error handling utilities for the pseudonym API.
 *
 * Provides:
 * - Classification of API error codes into client (4xx) and server (5xx) errors
 * - Structured error context built from express requests
 * - Logging at the level each class deserves
 * - Translation of domain errors into API errors
 *
 * Raw key values never reach the logs; requests carry them only in the body,
 * which is not part of the error context.
 */

import type { Request } from 'express';
import {
  APIErrorCode,
  createAPIError,
  type APIError,
} from './response.formatter';
import {
  CapacityExhaustedError,
  InconsistentLengthError,
} from './errors';

/**
 * Error context information for structured logging.
 */
export interface ErrorContext {
  /** Request ID for tracing */
  requestId?: string;
  method: string;
  path: string;
  /** Operation being performed */
  operation?: string;
  metadata?: Record<string, unknown>;
  /** ISO timestamp when error occurred */
  timestamp: string;
}

export enum ErrorClass {
  /** Client errors (4xx) - validation, capacity */
  CLIENT_ERROR = 'CLIENT_ERROR',
  /** Server errors (5xx) - internal failures */
  SERVER_ERROR = 'SERVER_ERROR',
}

const CLIENT_ERRORS: ReadonlySet<APIErrorCode> = new Set<APIErrorCode>([
  APIErrorCode.MISSING_PARAMETER,
  APIErrorCode.INVALID_TYPE,
  APIErrorCode.INVALID_KEYS,
  APIErrorCode.ROW_COUNT_EXCEEDED,
  APIErrorCode.INCONSISTENT_LENGTH,
  APIErrorCode.CAPACITY_EXHAUSTED,
  APIErrorCode.NOT_FOUND,
  APIErrorCode.PAYLOAD_TOO_LARGE,
]);

/**
 * Classifies an API error code into client or server error category.
 */
export function classifyError(errorCode: APIErrorCode): ErrorClass {
  return CLIENT_ERRORS.has(errorCode) ? ErrorClass.CLIENT_ERROR : ErrorClass.SERVER_ERROR;
}

/**
 * Extracts error context from an express request for structured logging.
 */
export function extractErrorContext(
  req: Request,
  requestId?: string,
  operation?: string,
  metadata?: Record<string, unknown>
): ErrorContext {
  return {
    requestId,
    method: req.method,
    path: req.path,
    operation,
    metadata,
    timestamp: new Date().toISOString(),
  };
}

/**
 * Logs an error with structured context.
 *
 * Client errors are expected and go to console.log; server errors go to
 * console.error with their stack.
 */
export function logError(
  error: unknown,
  context: ErrorContext,
  errorCode: APIErrorCode
): void {
  const errorClass = classifyError(errorCode);
  const errorMessage = error instanceof Error ? error.message : String(error);
  const errorStack = error instanceof Error ? error.stack : undefined;

  const logData = {
    errorCode,
    errorClass,
    message: errorMessage,
    context,
    ...(errorClass === ErrorClass.SERVER_ERROR && errorStack ? { stack: errorStack } : {}),
  };

  if (errorClass === ErrorClass.CLIENT_ERROR) {
    // eslint-disable-next-line no-console
    console.log('[CLIENT_ERROR]', JSON.stringify(logData, null, 2));
  } else {
    // eslint-disable-next-line no-console
    console.error('[SERVER_ERROR]', JSON.stringify(logData, null, 2));
  }
}

/**
 * Translates an error thrown by the pseudonymizer into an API error.
 *
 * Capacity and column-length errors are the caller's to fix and keep their
 * numbers; everything else is reported as an internal error without detail.
 */
export function toAPIError(error: unknown, requestId?: string): APIError {
  if (error instanceof CapacityExhaustedError) {
    return createAPIError(APIErrorCode.CAPACITY_EXHAUSTED, error.message, {
      requested: error.requested,
      remainingTotal: error.remainingTotal,
      remainingAlliterations: error.remainingAlliterations,
      alliterationOnly: error.alliterationOnly,
    });
  }

  if (error instanceof InconsistentLengthError) {
    return createAPIError(APIErrorCode.INCONSISTENT_LENGTH, error.message, {
      field: 'columns',
      received: error.lengths,
    });
  }

  return createAPIError(APIErrorCode.INTERNAL_ERROR, 'Failed to process request', {
    requestId,
    timestamp: Date.now(),
  });
}
