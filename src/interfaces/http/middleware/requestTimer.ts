/**
 * Request Timer Middleware
 * Layer: Interfaces (HTTP)
 *
 * Stamps the moment a request enters the pipeline; controllers turn it into
 * `meta.totalTimeMs`. Registered first so the measurement covers body parsing
 * and logging too.
 */
import '@shared/express';

import type { NextFunction, Request, Response } from 'express';

export function requestTimer(req: Request, _res: Response, next: NextFunction): void {
  req.requestStartTime = Date.now();
  next();
}
