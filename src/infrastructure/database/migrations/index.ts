/**
 * In-code Migration Source
 * Layer: Infrastructure (Database)
 *
 * Knex normally discovers migrations by scanning a directory, which depends on
 * whether it runs from .ts sources (tsx, ts-jest) or compiled .js. Listing the
 * modules here gives the server, the seed script, the Knex CLI and the tests
 * one ordered list that works in every mode.
 *
 * New migrations are appended; names must stay stable once applied.
 */
import type { Knex } from 'knex';

import * as createSwiftCodes from './001_create_swift_codes';

interface NamedMigration {
  name: string;
  migration: Knex.Migration;
}

const MIGRATIONS: NamedMigration[] = [
  { name: '001_create_swift_codes', migration: createSwiftCodes },
];

export const migrationSource: Knex.MigrationSource<NamedMigration> = {
  getMigrations: async () => MIGRATIONS,
  getMigrationName: (entry) => entry.name,
  getMigration: async (entry) => entry.migration,
};

/** Apply every pending migration; returns the names applied in this run. */
export async function runMigrations(db: Knex): Promise<string[]> {
  const [, applied] = await db.migrate.latest({ migrationSource });
  return applied;
}
