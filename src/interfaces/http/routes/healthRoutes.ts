/**
 * Health Check Route
 * Layer: Interfaces (HTTP)
 *
 *   GET /v1/health  →  { status: 'ok', uptime: 123.4, timestamp: '...' }
 *
 * Confirms the HTTP process is up for load balancers and container probes. It
 * does not touch the database.
 */
import { Router } from 'express';

const router = Router();

router.get('/health', (_req, res) => {
  res.status(200).json({
    status: 'ok',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
  });
});

export { router as healthRoutes };
