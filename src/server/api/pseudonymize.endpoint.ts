/**
 * POST /api/pseudonymize endpoint implementation
 *
 * Turns rows of key values into pseudonyms:
 * - Validates the body ({ columns } or { keys }, optional alliterate flag)
 * - Hashes each row and asks the pseudonymizer for its pseudonym
 * - Reports exhausted capacity with the counts needed to pick a remedy
 *
 * The same row always gets the same pseudonym for the lifetime of the server.
 */

import type { Request, Response } from 'express';
import type { Pseudonymizer } from '../services/pseudonymizer.service';
import { parsePseudonymizeRequest } from '../validation/api.validation';
import {
  sendSuccessResponse,
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';
import {
  extractErrorContext,
  logError,
  toAPIError,
} from '../utils/error-handler';

export interface PseudonymizeResponse {
  /** One pseudonym per input row, in row order */
  pseudonyms: string[];
  /** Registered keys after this request */
  size: number;
}

export function createRequestId(prefix: string): string {
  return `${prefix}_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
}

/**
 * Handles POST /api/pseudonymize requests
 *
 * 1. Validate request body and row limit
 * 2. Pseudonymize all rows in one call (one critical section)
 * 3. Return pseudonyms in row order
 *
 * @param req - Express request with JSON body
 * @param res - Express response object
 * @param pseudonymizer - Shared pseudonymizer instance
 * @param maxRows - Maximum rows per request
 */
export function handlePseudonymize(
  req: Request,
  res: Response,
  pseudonymizer: Pseudonymizer,
  maxRows: number
): void {
  const requestId = createRequestId('pseudonymize');
  const startTime = Date.now();

  const { result, request } = parsePseudonymizeRequest(req.body, maxRows);
  if (!result.isValid || request === undefined) {
    const [first] = result.errors;
    const code = first?.code ?? APIErrorCode.INVALID_TYPE;
    const apiError = createAPIError(code, first?.message ?? 'Invalid request body', {
      field: first?.field,
      errors: result.errors,
    });
    logError(
      new Error(apiError.message),
      extractErrorContext(req, requestId, 'pseudonymize'),
      code
    );
    return sendErrorResponse(res, apiError, code, requestId);
  }

  try {
    const pseudonyms = pseudonymizer.pseudonymize(request.columns, {
      alliterate: request.alliterate,
    });

    console.log(
      JSON.stringify({
        operation: 'pseudonymize',
        requestId,
        rows: pseudonyms.length,
        columns: request.columns.length,
        alliterate: request.alliterate ?? null,
        size: pseudonymizer.size(),
        duration: `${Date.now() - startTime}ms`,
        timestamp: new Date().toISOString(),
      })
    );

    const response: PseudonymizeResponse = {
      pseudonyms,
      size: pseudonymizer.size(),
    };
    sendSuccessResponse(res, response, requestId);
  } catch (error) {
    const apiError = toAPIError(error, requestId);
    logError(error, extractErrorContext(req, requestId, 'pseudonymize'), apiError.code);
    sendErrorResponse(res, apiError, apiError.code, requestId);
  }
}
