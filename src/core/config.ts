/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, database target, loader behaviour, log level) flows
 * through this file; other modules import `config` instead of reading
 * process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * the values at startup ("8080" → 8080, "false" → false). Anything missing or
 * invalid stops the process immediately with the tree of issues. The result is
 * a nested `config` object exported `as const`.
 *
 * Boolean flags are parsed from the literal strings "true"/"false" rather than
 * with z.coerce.boolean(), which treats any non-empty string (including
 * "false") as true.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const booleanFlag = (fallback: boolean) =>
  z
    .enum(['true', 'false'])
    .default(fallback ? 'true' : 'false')
    .transform((value) => value === 'true');

export const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8080),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Knex client: a local SQLite file by default, PostgreSQL when set to "pg". */
  DB_CLIENT: z.enum(['better-sqlite3', 'pg']).default('better-sqlite3'),
  /** SQLite database file (":memory:" for a throwaway database). */
  DATABASE_FILE: z.string().min(1).default('./data/swift_codes.db'),
  /** Full PostgreSQL connection URL, only read when DB_CLIENT=pg. */
  DATABASE_URL: z.string().min(1).default('postgres://postgres:@localhost:5432/swift_codes'),
  DB_POOL_MIN: z.coerce.number().int().min(0).default(2),
  DB_POOL_MAX: z.coerce.number().int().min(1).default(10),
  DB_MIGRATE_ON_START: booleanFlag(true),

  /** Spreadsheet (.xlsx or .csv) read by the loader when the table is empty. */
  DATA_FILE: z.string().min(1).default('./data/sample_swift_codes.csv'),
  LOAD_ON_START: booleanFlag(true),
  LOADER_BATCH_SIZE: z.coerce.number().int().min(1).max(5000).default(500),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',

  database: {
    client: env.DB_CLIENT,
    file: env.DATABASE_FILE,
    url: env.DATABASE_URL,
    pool: {
      min: env.DB_POOL_MIN,
      max: env.DB_POOL_MAX,
    },
    migrateOnStart: env.DB_MIGRATE_ON_START,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  loader: {
    dataFile: env.DATA_FILE,
    loadOnStart: env.LOAD_ON_START,
    batchSize: env.LOADER_BATCH_SIZE,
  },
} as const;

export type AppConfig = typeof config;
export type DatabaseConfig = AppConfig['database'];
