/**
 * Express Application Factory
 * Layer: Interfaces (HTTP)
 * Pattern: Factory Function
 *
 * Assembles a fresh Express app on every call. The server calls it once;
 * integration tests call it after registering their own database in the
 * container, so route controllers resolve services against that database.
 *
 * Middleware order:
 *   1. requestTimer     — stamps req.requestStartTime for meta.totalTimeMs
 *   2. helmet()         — security headers
 *   3. cors()           — cross-origin access for browser clients
 *   4. compression()    — gzip response bodies
 *   5. express.json()   — JSON request bodies
 *   6. requestLogger    — one log line per request
 *   7. routes
 *   8. notFoundHandler  — 404 for anything unmatched
 *   9. errorHandler     — MUST be last
 */
import '@core/container';

import { errorHandler } from '@interfaces/http/middleware/errorHandler';
import { notFoundHandler } from '@interfaces/http/middleware/notFoundHandler';
import { requestLogger } from '@interfaces/http/middleware/requestLogger';
import { requestTimer } from '@interfaces/http/middleware/requestTimer';
import { healthRoutes } from '@interfaces/http/routes/healthRoutes';
import { createSwiftCodeRoutes } from '@interfaces/http/routes/swiftCodeRoutes';
import compression from 'compression';
import cors from 'cors';
import express from 'express';
import helmet from 'helmet';

export function createApp(): express.Express {
  const app = express();

  app.use(requestTimer);

  app.use(helmet());
  app.use(cors());
  app.use(compression());

  app.use(express.json());

  app.use(requestLogger);

  app.use('/v1', healthRoutes);
  app.use('/v1/swift-codes', createSwiftCodeRoutes());

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
