/**
 * API Router for the pseudonym endpoints
 *
 * Central router that handles all client-facing endpoints with middleware for:
 * - Request logging
 * - Error handling and response formatting
 *
 * Endpoints:
 * - POST /api/pseudonymize - Pseudonyms for rows of key values
 * - GET /api/registry - Usage summary and first registry entries
 */

import express, { Request, Response, NextFunction } from 'express';
import type { Pseudonymizer } from '../services/pseudonymizer.service';
import { handlePseudonymize } from './pseudonymize.endpoint';
import { handleRegistry } from './registry.endpoint';
import {
  sendErrorResponse,
  APIErrorCode,
  createAPIError,
} from '../utils/response.formatter';

export const API_ROUTES = ['POST /api/pseudonymize', 'GET /api/registry'] as const;

export interface APIRouterOptions {
  pseudonymizer: Pseudonymizer;
  maxRowsPerRequest: number;
}

/**
 * Creates and configures the API router with all endpoints and middleware.
 */
export function createAPIRouter(options: APIRouterOptions): express.Router {
  const { pseudonymizer, maxRowsPerRequest } = options;
  const router = express.Router();

  // Request logging middleware
  router.use((req: Request, res: Response, next: NextFunction) => {
    const startTime = Date.now();

    console.log(`API Request: ${req.method} ${req.path}`, {
      timestamp: new Date().toISOString(),
      userAgent: req.get('User-Agent'),
    });

    res.on('finish', () => {
      console.log(`API Response: ${req.method} ${req.path} - ${res.statusCode}`, {
        duration: `${Date.now() - startTime}ms`,
        timestamp: new Date().toISOString(),
      });
    });

    next();
  });

  router.post('/pseudonymize', (req: Request, res: Response) => {
    handlePseudonymize(req, res, pseudonymizer, maxRowsPerRequest);
  });

  router.get('/registry', (req: Request, res: Response) => {
    handleRegistry(req, res, pseudonymizer);
  });

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true, ts: Date.now() });
  });

  // Unknown API routes
  router.use((req: Request, res: Response) => {
    const apiError = createAPIError(
      APIErrorCode.NOT_FOUND,
      `API route not found: ${req.method} ${req.path}`,
      {
        method: req.method,
        path: req.path,
        availableRoutes: [...API_ROUTES, 'GET /api/health'],
      }
    );
    sendErrorResponse(res, apiError);
  });

  return router;
}
