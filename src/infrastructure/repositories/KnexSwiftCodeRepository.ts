/**
 * Knex SWIFT Code Repository — Data Access Implementation
 * Layer: Infrastructure
 * Pattern: Repository Pattern (implements ISwiftCodeRepository)
 *
 * Plain Knex queries that run unchanged on SQLite and PostgreSQL. Branches are
 * found by a LIKE on the 8-character bank code; codes reaching this class are
 * validated alphanumeric, so the prefix never carries wildcard characters.
 *
 * Unique-key violations from either database surface as ConflictError so the
 * HTTP layer can answer 409 without knowing which engine is underneath.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SwiftCodeEntry, SwiftCodeRecord, SwiftCodeRow } from '@domain/entities/SwiftCode';
import type { ISwiftCodeRepository } from '@domain/interfaces/ISwiftCodeRepository';
import { bankCodeOf } from '@domain/rules/swiftCodeRules';
import { SWIFT_CODES_TABLE } from '@shared/constants';
import { ConflictError } from '@shared/errors/AppError';
import type { Knex } from 'knex';
import { inject, injectable } from 'tsyringe';

/** SQLite (better-sqlite3) and PostgreSQL codes for a duplicate primary/unique key. */
const UNIQUE_VIOLATION_CODES = new Set([
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_UNIQUE',
  '23505',
]);

export function isUniqueViolation(err: unknown): boolean {
  if (typeof err !== 'object' || err === null || !('code' in err)) return false;
  return typeof err.code === 'string' && UNIQUE_VIOLATION_CODES.has(err.code);
}

@injectable()
export class KnexSwiftCodeRepository implements ISwiftCodeRepository {
  constructor(
    @inject(TOKENS.Knex) private db: Knex,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async findByCode(swiftCode: string): Promise<SwiftCodeEntry | null> {
    const row = await this.records().where('swift_code', swiftCode).first();
    return row ? toDomain(row) : null;
  }

  async findBranches(headquartersCode: string): Promise<SwiftCodeEntry[]> {
    const rows = await this.records()
      .where('swift_code', 'like', `${bankCodeOf(headquartersCode)}%`)
      .whereNot('swift_code', headquartersCode)
      .orderBy('swift_code', 'asc');
    return rows.map(toDomain);
  }

  async findByCountry(countryISO2: string): Promise<SwiftCodeEntry[]> {
    const rows = await this.records()
      .where('country_iso2', countryISO2)
      .orderBy('swift_code', 'asc');
    return rows.map(toDomain);
  }

  async findCountryName(countryISO2: string): Promise<string | null> {
    const row = await this.records()
      .where('country_iso2', countryISO2)
      .first('country_name');
    return row ? row.country_name : null;
  }

  async insert(entry: SwiftCodeEntry): Promise<SwiftCodeEntry> {
    try {
      await this.db<SwiftCodeRow>(SWIFT_CODES_TABLE).insert(toRow(entry));
    } catch (err) {
      if (isUniqueViolation(err)) {
        throw new ConflictError('SWIFT code', entry.swiftCode);
      }
      throw err;
    }

    this.log.debug({ swiftCode: entry.swiftCode }, 'SWIFT code inserted');
    return entry;
  }

  /** One transaction for the whole load; a failing chunk rolls every chunk back. */
  async bulkInsert(entries: SwiftCodeEntry[], chunkSize: number): Promise<number> {
    if (entries.length === 0) return 0;

    const rows = entries.map(toRow);
    await this.db.transaction(async (trx) => {
      for (let start = 0; start < rows.length; start += chunkSize) {
        const chunk = rows.slice(start, start + chunkSize);
        await trx<SwiftCodeRow>(SWIFT_CODES_TABLE).insert(chunk);
        this.log.debug({ inserted: start + chunk.length, total: rows.length }, 'bulkInsert chunk');
      }
    });

    return rows.length;
  }

  async deleteByCode(swiftCode: string): Promise<number> {
    const removed = await this.records().where('swift_code', swiftCode).del();
    this.log.debug({ swiftCode, removed }, 'deleteByCode complete');
    return removed;
  }

  async isEmpty(): Promise<boolean> {
    const row = await this.records().first('swift_code');
    return row === undefined;
  }

  private records() {
    return this.db<SwiftCodeRecord>(SWIFT_CODES_TABLE);
  }
}

/** snake_case record → camelCase entry (single place for this conversion). */
function toDomain(row: SwiftCodeRecord): SwiftCodeEntry {
  return {
    swiftCode: row.swift_code,
    bankName: row.bank_name,
    address: row.address,
    countryISO2: row.country_iso2,
    countryName: row.country_name,
    // SQLite stores booleans as 0/1.
    isHeadquarters: Boolean(row.is_headquarters),
  };
}

function toRow(entry: SwiftCodeEntry): SwiftCodeRow {
  return {
    swift_code: entry.swiftCode,
    bank_name: entry.bankName,
    address: entry.address,
    country_iso2: entry.countryISO2,
    country_name: entry.countryName,
    is_headquarters: entry.isHeadquarters,
  };
}
