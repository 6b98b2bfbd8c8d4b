/**
 * Migration 001 — Create the `swift_codes` Table
 * Layer: Infrastructure (Database)
 *
 * One row per SWIFT/BIC code, headquarters and branches alike. The code itself
 * is the primary key, always stored in its 11-character form. There is no
 * self-reference from branch to headquarters: a branch is linked to its head
 * office only by sharing the first eight characters, and either may exist
 * without the other.
 *
 * `country_iso2` is indexed for the by-country listing. Branch lookup filters
 * on a `swift_code` prefix and is served by the primary key index.
 */
import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  await knex.schema.createTable('swift_codes', (table) => {
    table.string('swift_code', 11).primary();
    table.text('bank_name').notNullable();
    table.text('address').notNullable().defaultTo('');
    table.string('country_iso2', 2).notNullable();
    table.text('country_name').notNullable();
    table.boolean('is_headquarters').notNullable();
    table.timestamp('created_at').notNullable().defaultTo(knex.fn.now());

    table.index('country_iso2', 'idx_swift_codes_country_iso2');
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('swift_codes');
}
