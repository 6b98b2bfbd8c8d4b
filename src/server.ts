/**
 * Server Entry Point — Bootstrap & Graceful Shutdown
 * Layer: Entry Point
 *
 * Startup runs in order, and the port only opens once the data is in place:
 *
 *   1. migrations    (DB_MIGRATE_ON_START)
 *   2. spreadsheet   (LOAD_ON_START) — fills the table only when it is empty.
 *                    A missing file is logged and skipped; any other loader
 *                    failure aborts startup.
 *   3. listen
 *
 * One process serves every request; the database provides its own isolation.
 *
 * On SIGTERM/SIGINT the server stops accepting connections, lets in-flight
 * requests finish, destroys the database connection and exits 0.
 */
import { container } from '@core/container';
import { config } from '@core/config';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import { IngestionService } from '@application/services/IngestionService';
import { destroyDbConnection, getDbConnection } from '@infrastructure/database/connection';
import { runMigrations } from '@infrastructure/database/migrations';
import { createApp } from '@interfaces/http/app';
import { NotFoundError } from '@shared/errors/AppError';

async function loadSpreadsheet(): Promise<void> {
  const ingestion = container.resolve<IngestionService>(TOKENS.IngestionService);
  try {
    await ingestion.loadIfEmpty(config.loader.dataFile);
  } catch (err) {
    if (err instanceof NotFoundError) {
      logger.warn({ dataFile: config.loader.dataFile }, 'Data file not found, starting without loading');
      return;
    }
    throw err;
  }
}

async function start(): Promise<void> {
  if (config.database.migrateOnStart) {
    const applied = await runMigrations(getDbConnection());
    logger.info({ applied }, 'Migrations up to date');
  }

  if (config.loader.loadOnStart) {
    await loadSpreadsheet();
  }

  const app = createApp();
  const server = app.listen(config.port, () => {
    logger.info({ pid: process.pid, port: config.port }, `Listening on :${config.port}`);
  });

  const shutdown = (signal: string) => {
    logger.info({ signal }, 'Graceful shutdown initiated');
    server.close(() => {
      destroyDbConnection()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, 'Failed to close database connection');
          process.exit(1);
        });
    });
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
}

start().catch(async (err: unknown) => {
  logger.fatal({ err }, 'Startup failed');
  await destroyDbConnection();
  process.exit(1);
});
