/**
 * Global Error Handler Middleware
 * Layer: Interfaces (HTTP)
 *
 * The last middleware in the chain. Express 5 forwards rejected promises from
 * async handlers here, so controllers simply throw.
 *
 *   - AppError (operational): logged at warn, answered with its own status
 *     and message.
 *   - Client errors raised by Express itself (malformed JSON, oversized
 *     body): answered with their 4xx status.
 *   - Anything else, non-operational AppErrors included: logged at error,
 *     answered 500 with a generic message.
 *
 * Express recognizes an error handler by its four parameters.
 */
import { logger } from '@core/logger';
import { AppError } from '@shared/errors/AppError';
import type { ErrorResponseBody } from '@shared/types';
import type { NextFunction, Request, Response } from 'express';

export function errorHandler(err: Error, _req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError && err.isOperational) {
    logger.warn({ statusCode: err.statusCode, message: err.message }, 'Operational error');
    res.status(err.statusCode).json(err.toResponseBody());
    return;
  }

  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== null) {
    logger.warn({ statusCode: clientStatus, message: err.message }, 'Rejected request');
    const body: ErrorResponseBody = {
      status: 'error',
      message: err instanceof SyntaxError ? 'Malformed JSON in request body' : err.message,
    };
    res.status(clientStatus).json(body);
    return;
  }

  logger.error({ err }, 'Unhandled error');
  const body: ErrorResponseBody = { status: 'error', message: 'Internal server error' };
  res.status(500).json(body);
}

/** 4xx status carried by body-parser / http-errors style errors, else null. */
function clientErrorStatus(err: Error): number | null {
  if (!('status' in err) || typeof err.status !== 'number') return null;
  return err.status >= 400 && err.status < 500 ? err.status : null;
}
