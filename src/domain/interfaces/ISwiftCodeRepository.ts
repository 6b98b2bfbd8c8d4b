/**
 * SWIFT Code Repository Interface — The Data Access Contract
 * Layer: Domain
 * Pattern: Repository Pattern
 *
 * Lists the data operations the application needs without saying how they are
 * performed. KnexSwiftCodeRepository fulfils it against SQLite or PostgreSQL;
 * tests swap in a jest.fn() double.
 *
 * All codes passed in are already canonical (11 characters, uppercase).
 */
import type { SwiftCodeEntry } from '@domain/entities/SwiftCode';

export interface ISwiftCodeRepository {
  /** Single entry by its primary key, or null. */
  findByCode(swiftCode: string): Promise<SwiftCodeEntry | null>;

  /** Every entry sharing the 8-character bank code except the given headquarters, ordered by code. */
  findBranches(headquartersCode: string): Promise<SwiftCodeEntry[]>;

  /** Every entry of a country, ordered by code. */
  findByCountry(countryISO2: string): Promise<SwiftCodeEntry[]>;

  /** Country name already stored for an ISO2 code, or null when the country is unknown. */
  findCountryName(countryISO2: string): Promise<string | null>;

  /** Insert one entry. Throws ConflictError when the code already exists. */
  insert(entry: SwiftCodeEntry): Promise<SwiftCodeEntry>;

  /** Insert many entries in chunks inside one transaction. Returns the number inserted. */
  bulkInsert(entries: SwiftCodeEntry[], chunkSize: number): Promise<number>;

  /** Remove one entry. Returns the number of rows removed (0 or 1). */
  deleteByCode(swiftCode: string): Promise<number>;

  /** True when the table holds no rows at all. */
  isEmpty(): Promise<boolean>;
}
