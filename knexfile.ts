/**
 * Knex Configuration (knexfile.ts)
 *
 * Lets the Knex CLI (`npm run migrate`, `npm run migrate:rollback`) reach the
 * same database the app uses. Connection settings and the in-code migration
 * list both come from src/infrastructure/database/connection.ts, which reads
 * src/core/config.ts (DB_CLIENT, DATABASE_FILE, DATABASE_URL, DB_POOL_*).
 *
 * The CLI runs through `tsx`, which compiles this file and honours the
 * tsconfig path aliases used underneath.
 */
import type { Knex } from 'knex';

import { buildKnexConfig } from './src/infrastructure/database/connection';

const knexConfig: Record<string, Knex.Config> = {
  development: buildKnexConfig(),
  test: buildKnexConfig(),
  production: buildKnexConfig(),
};

export default knexConfig;
