/**
 * Database Connection — Singleton
 * Layer: Infrastructure
 * Pattern: Singleton
 *
 * One Knex instance per process. The default target is an SQLite database file
 * through better-sqlite3; setting DB_CLIENT=pg points the same queries at
 * PostgreSQL with a connection pool.
 *
 * SQLite keeps a single connection (Knex's default pool for the client), so
 * anything run inside a transaction must use the transaction handle, never the
 * root instance, or it will wait on itself.
 *
 * `destroyDbConnection()` is called during graceful shutdown and by scripts
 * before they exit.
 */
import fs from 'node:fs';
import path from 'node:path';

import { config, type DatabaseConfig } from '@core/config';
import { logger } from '@core/logger';
import knex, { Knex } from 'knex';

import { migrationSource } from './migrations';

export const IN_MEMORY_DATABASE = ':memory:';

export function buildKnexConfig(database: DatabaseConfig = config.database): Knex.Config {
  if (database.client === 'pg') {
    return {
      client: 'pg',
      connection: { connectionString: database.url },
      pool: {
        min: database.pool.min,
        max: database.pool.max,
        afterCreate: (conn: unknown, done: (err: Error | null, conn: unknown) => void) => {
          logger.debug('New database connection established');
          done(null, conn);
        },
      },
      acquireConnectionTimeout: 10000,
      migrations: { migrationSource },
    };
  }

  return {
    client: 'better-sqlite3',
    connection: { filename: database.file },
    useNullAsDefault: true,
    migrations: { migrationSource },
  };
}

let instance: Knex | null = null;

export function getDbConnection(): Knex {
  if (!instance) {
    const { database } = config;
    if (database.client === 'better-sqlite3' && database.file !== IN_MEMORY_DATABASE) {
      fs.mkdirSync(path.dirname(path.resolve(database.file)), { recursive: true });
    }

    instance = knex(buildKnexConfig(database));

    logger.info(
      {
        client: database.client,
        target: database.client === 'pg' ? describePgTarget(database.url) : database.file,
      },
      'Database connection initialized',
    );
  }

  return instance;
}

/** Gracefully tears down the connection (used on SIGTERM and by scripts). */
export async function destroyDbConnection(): Promise<void> {
  if (instance) {
    await instance.destroy();
    instance = null;
    logger.info('Database connection destroyed');
  }
}

/** host:port/db without credentials, for logs. */
export function describePgTarget(url: string): string {
  try {
    const u = new URL(url);
    return `${u.hostname}:${u.port || '5432'}${u.pathname}`;
  } catch {
    return '(unparseable DATABASE_URL)';
  }
}
