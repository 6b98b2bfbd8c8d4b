/**
 * HTTP Request Logger Middleware
 * Layer: Interfaces (HTTP)
 *
 * pino-http on top of the shared logger: one line per request with method,
 * URL, status and response time, in the same format as the rest of the app.
 * Health probes are left out to keep the log readable.
 */
import { logger } from '@core/logger';
import pinoHttp from 'pino-http';

export const requestLogger = pinoHttp({
  logger,
  autoLogging: {
    ignore: (req) => req.url === '/v1/health',
  },
});
