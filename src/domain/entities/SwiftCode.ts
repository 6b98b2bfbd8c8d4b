/**
 * SWIFT Code Entity — The Core Data Model
 * Layer: Domain
 *
 * Three shapes for the same concept:
 *
 *   SwiftCodeEntry   — camelCase, used by services, controllers and the loader.
 *   SwiftCodeRow     — snake_case, what we write to the `swift_codes` table.
 *   SwiftCodeRecord  — snake_case, what we read back. SQLite hands booleans
 *                      back as 0/1 and timestamps as strings, so the read
 *                      shape is wider than the write shape.
 *
 * The row ↔ entry mapping lives in the repository (toDomain / toRow).
 *
 * A headquarters entry ends in "XXX"; its branches share the first eight
 * characters (the bank code). No foreign key links the two.
 */
export interface SwiftCodeEntry {
  swiftCode: string;
  bankName: string;
  address: string;
  countryISO2: string;
  countryName: string;
  isHeadquarters: boolean;
}

/** Entry as listed under a headquarters or a country: the country name is implied by the parent. */
export type SwiftCodeSummary = Omit<SwiftCodeEntry, 'countryName'>;

/** Lookup result for a single code; `branches` is present only for headquarters. */
export interface SwiftCodeDetails extends SwiftCodeEntry {
  branches?: SwiftCodeSummary[];
}

export interface CountrySwiftCodes {
  countryISO2: string;
  countryName: string;
  swiftCodes: SwiftCodeSummary[];
}

export interface SwiftCodeRow {
  swift_code: string;
  bank_name: string;
  address: string;
  country_iso2: string;
  country_name: string;
  is_headquarters: boolean;
}

export interface SwiftCodeRecord extends Omit<SwiftCodeRow, 'is_headquarters'> {
  is_headquarters: boolean | number;
  created_at: Date | string;
}

export function toSummary(entry: SwiftCodeEntry): SwiftCodeSummary {
  return {
    address: entry.address,
    bankName: entry.bankName,
    countryISO2: entry.countryISO2,
    isHeadquarters: entry.isHeadquarters,
    swiftCode: entry.swiftCode,
  };
}
