/**
 * Spreadsheet Data Source Adapter — Raw Row → SwiftCodeEntry
 * Layer: ETL
 * Pattern: Adapter Pattern (implements IDataSourceAdapter<RawSwiftCodeRecord>)
 *
 * Cleans one spreadsheet row into the shape the store keeps:
 *   - every cell trimmed
 *   - code, ISO2 and country name uppercased
 *   - 8-character codes expanded to their 11-character headquarters form
 *   - isHeadquarters derived from the "XXX" suffix, never read from the sheet
 *
 * No validation happens here; the loader checks the normalized entry and
 * decides whether to keep it.
 */
import type { SwiftCodeEntry } from '@domain/entities/SwiftCode';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import { canonicalizeSwiftCode, isHeadquartersCode } from '@domain/rules/swiftCodeRules';
import { injectable } from 'tsyringe';

import type { RawSwiftCodeRecord } from './SpreadsheetReader';

@injectable()
export class SpreadsheetDataSourceAdapter implements IDataSourceAdapter<RawSwiftCodeRecord> {
  normalize(raw: RawSwiftCodeRecord): SwiftCodeEntry {
    const swiftCode = canonicalizeSwiftCode(raw.swiftCode.trim().toUpperCase());

    return {
      swiftCode,
      bankName: raw.bankName.trim(),
      address: raw.address.trim(),
      countryISO2: raw.countryISO2.trim().toUpperCase(),
      countryName: raw.countryName.trim().toUpperCase(),
      isHeadquarters: isHeadquartersCode(swiftCode),
    };
  }
}
