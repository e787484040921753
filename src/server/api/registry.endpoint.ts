/**
 * GET /api/registry endpoint implementation
 *
 * Returns a usage summary of the registry and its first entries, each as a
 * shortened fingerprint and the pseudonym issued for it. Raw keys are never
 * stored, so they cannot be returned.
 */

import type { Request, Response } from 'express';
import type { Pseudonymizer } from '../services/pseudonymizer.service';
import type { PseudonymSummary } from '../types/pseudonym.types';
import { parseRegistryLimit } from '../validation/api.validation';
import {
  sendSuccessResponse,
  sendErrorResponse,
  createAPIError,
} from '../utils/response.formatter';
import { extractErrorContext, logError } from '../utils/error-handler';
import { createRequestId } from './pseudonymize.endpoint';

export interface RegistryResponse {
  summary: PseudonymSummary;
  entries: Array<{ key: string; pseudonym: string }>;
  /** Entries left out because of the limit */
  more: number;
}

/**
 * Handles GET /api/registry?limit=n requests
 *
 * @param req - Express request with optional limit query parameter
 * @param res - Express response object
 * @param pseudonymizer - Shared pseudonymizer instance
 */
export function handleRegistry(
  req: Request,
  res: Response,
  pseudonymizer: Pseudonymizer
): void {
  const requestId = createRequestId('registry');

  const { result, limit } = parseRegistryLimit(req.query.limit);
  if (!result.isValid) {
    const [first] = result.errors;
    const apiError = createAPIError(first.code, first.message, {
      field: first.field,
      ...first.details,
    });
    logError(
      new Error(apiError.message),
      extractErrorContext(req, requestId, 'registry'),
      first.code
    );
    return sendErrorResponse(res, apiError, first.code, requestId);
  }

  const summary = pseudonymizer.summary();
  const entries = pseudonymizer.preview(limit);

  res.set('Cache-Control', 'no-store');

  const response: RegistryResponse = {
    summary,
    entries,
    more: summary.used - entries.length,
  };
  sendSuccessResponse(res, response, requestId);
}
