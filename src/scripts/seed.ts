/**
 * Seed CLI Script — Standalone Spreadsheet Load
 * Layer: Entry Point (CLI, not HTTP)
 *
 *   npm run seed -- [--file data/swift_codes.xlsx] [--migrate]
 *
 * Without --file it reads DATA_FILE (default ./data/sample_swift_codes.csv).
 *
 * Runs the same loader the server runs at startup, against the configured
 * database, and prints what happened. Like the server, it only fills an empty
 * table; clear the table (or point DATABASE_FILE elsewhere) to load again.
 */
import 'dotenv/config';

import { container } from '@core/container';
import { config } from '@core/config';
import { TOKENS } from '@core/types';
import { IngestionService } from '@application/services/IngestionService';
import {
  describePgTarget,
  destroyDbConnection,
  getDbConnection,
} from '@infrastructure/database/connection';
import { runMigrations } from '@infrastructure/database/migrations';
import path from 'node:path';

const args = process.argv.slice(2);

function getArg(flag: string, fallback: string): string {
  const idx = args.indexOf(flag);
  const value = idx !== -1 ? args[idx + 1] : undefined;
  return value ?? fallback;
}

const hasFlag = (flag: string): boolean => args.includes(flag);

const filePath = path.resolve(getArg('--file', config.loader.dataFile));
const migrate = hasFlag('--migrate');

function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  return `${(ms / 1000).toFixed(1)}s`;
}

async function main(): Promise<void> {
  // eslint-disable-next-line no-console
  const log = console.log;

  const target =
    config.database.client === 'pg' ? describePgTarget(config.database.url) : config.database.file;

  log('');
  log('  SWIFT codes — seed');
  log(`  File:       ${filePath}`);
  log(`  Database:   ${config.database.client} ${target}`);
  log(`  Batch size: ${config.loader.batchSize}`);
  log('');

  if (migrate) {
    const applied = await runMigrations(getDbConnection());
    log(`  Migrations applied: ${applied.length > 0 ? applied.join(', ') : 'none pending'}`);
  }

  const ingestion = container.resolve<IngestionService>(TOKENS.IngestionService);
  const result = await ingestion.loadIfEmpty(filePath);

  if (result === null) {
    log('  Table already populated — nothing loaded.');
  } else {
    log('  ✓ Load complete');
    log(`    Rows read:     ${result.totalRead}`);
    log(`    Inserted:      ${result.totalInserted}`);
    log(`    Skipped:       ${result.totalSkipped}`);
    log(`    Duration:      ${formatDuration(result.durationMs)}`);
  }
  log('');
}

main()
  .then(() => destroyDbConnection())
  .catch(async (err: unknown) => {
    // eslint-disable-next-line no-console
    console.error('Seed failed:', err instanceof Error ? err.message : err);
    await destroyDbConnection();
    process.exit(1);
  });
