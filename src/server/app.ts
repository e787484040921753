/**
 * Express application setup.
 *
 * Kept apart from index.ts so the app can be built without binding a port.
 */

import express, { NextFunction, Request, Response } from 'express';
import { createAPIRouter } from './api/router';
import { Pseudonymizer } from './services/pseudonymizer.service';
import type { ServerConfig } from './utils/config';
import { extractErrorContext, logError } from './utils/error-handler';
import {
  APIErrorCode,
  createAPIError,
  sendErrorResponse,
} from './utils/response.formatter';

export const JSON_BODY_LIMIT = '1mb';

/**
 * Builds the pseudonymizer described by the configuration.
 *
 * @throws {NamePartsFileError} If the configured name-parts file is unusable
 * @throws {EmptyCategoryError} If a configured category has no words
 */
export function createPseudonymizer(config: ServerConfig): Pseudonymizer {
  return Pseudonymizer.create({
    namePartsFile: config.namePartsFile,
    seed: config.seed,
    alliterate: config.alliterate,
    separator: config.separator,
    pepper: config.pepper,
  });
}

/**
 * The `type` tag body-parser puts on its errors, if any.
 */
function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'type' in error) {
    return typeof error.type === 'string' ? error.type : undefined;
  }
  return undefined;
}

export function createApp(
  config: ServerConfig,
  pseudonymizer: Pseudonymizer = createPseudonymizer(config)
): express.Express {
  const app = express();

  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(
    '/api',
    createAPIRouter({
      pseudonymizer,
      maxRowsPerRequest: config.maxRowsPerRequest,
    })
  );

  // Body parser failures (malformed or oversized JSON) and anything else
  // a route lets escape
  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }

    const type = bodyParserErrorType(error);
    const apiError =
      type === 'entity.parse.failed'
        ? createAPIError(APIErrorCode.INVALID_TYPE, 'request body must be valid JSON', {
            field: 'body',
          })
        : type === 'entity.too.large'
          ? createAPIError(APIErrorCode.PAYLOAD_TOO_LARGE, 'request body is too large', {
              field: 'body',
              maxAllowed: JSON_BODY_LIMIT,
            })
          : createAPIError(APIErrorCode.INTERNAL_ERROR, 'An unexpected error occurred');

    logError(error, extractErrorContext(req, undefined, 'request'), apiError.code);
    sendErrorResponse(res, apiError);
  });

  app.use((req: Request, res: Response) => {
    sendErrorResponse(
      res,
      createAPIError(APIErrorCode.NOT_FOUND, `Route not found: ${req.method} ${req.path}`, {
        method: req.method,
        path: req.path,
      })
    );
  });

  return app;
}
