/**
 * Ingestion Service — Spreadsheet Loader
 * Layer: Application
 * Pattern: Facade Pattern
 *
 * `loadIfEmpty(filePath)` hides the whole load behind one call:
 *
 *   empty table? → read spreadsheet → normalize rows → filter → bulk insert
 *
 * It only ever fills an empty table. A populated table is left untouched and
 * the call returns null, so restarting the server never duplicates or
 * refreshes data.
 *
 * Rows are dropped (and logged at warn) when they fail a format rule, repeat a
 * code seen earlier in the file, or name a country differently from the first
 * row with the same ISO2 code. Everything else goes in, in one transaction.
 */
import { config } from '@core/config';
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { SwiftCodeEntry } from '@domain/entities/SwiftCode';
import type { IDataSourceAdapter } from '@domain/interfaces/IDataSourceAdapter';
import type { IDataSourceReader } from '@domain/interfaces/IDataSourceReader';
import type { ISwiftCodeRepository } from '@domain/interfaces/ISwiftCodeRepository';
import {
  describeCountryNameProblem,
  describeIso2Problem,
  describeSwiftCodeProblem,
} from '@domain/rules/swiftCodeRules';
import type { RawSwiftCodeRecord } from '@etl/SpreadsheetReader';
import type { IngestionResult } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class IngestionService {
  constructor(
    @inject(TOKENS.SwiftCodeRepository) private repo: ISwiftCodeRepository,
    @inject(TOKENS.DataSourceReader) private reader: IDataSourceReader<RawSwiftCodeRecord>,
    @inject(TOKENS.DataSourceAdapter) private adapter: IDataSourceAdapter<RawSwiftCodeRecord>,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  /** Null when the table already holds data and nothing was read. */
  async loadIfEmpty(filePath: string): Promise<IngestionResult | null> {
    if (!(await this.repo.isEmpty())) {
      this.log.info('swift_codes already populated, skipping spreadsheet load');
      return null;
    }

    const startTime = Date.now();
    this.log.info({ filePath }, 'Loading SWIFT codes from spreadsheet');

    const rawRecords = await this.reader.read(filePath);
    const entries = this.selectEntries(rawRecords);
    const totalInserted = await this.repo.bulkInsert(entries, config.loader.batchSize);

    const result: IngestionResult = {
      totalRead: rawRecords.length,
      totalInserted,
      totalSkipped: rawRecords.length - entries.length,
      durationMs: Date.now() - startTime,
    };
    this.log.info(result, 'Spreadsheet load complete');
    return result;
  }

  private selectEntries(rawRecords: RawSwiftCodeRecord[]): SwiftCodeEntry[] {
    const seenCodes = new Set<string>();
    const countryNames = new Map<string, string>();
    const accepted: SwiftCodeEntry[] = [];

    for (const raw of rawRecords) {
      const entry = this.adapter.normalize(raw);

      const problem =
        describeSwiftCodeProblem(entry.swiftCode) ??
        describeIso2Problem(entry.countryISO2) ??
        describeCountryNameProblem(entry.countryName) ??
        (entry.bankName === '' ? 'bankName is required.' : null);
      if (problem) {
        this.log.warn({ row: raw.rowNumber, swiftCode: entry.swiftCode, problem }, 'Skipping row');
        continue;
      }

      if (seenCodes.has(entry.swiftCode)) {
        this.log.warn({ row: raw.rowNumber, swiftCode: entry.swiftCode }, 'Skipping duplicate code');
        continue;
      }

      const knownCountryName = countryNames.get(entry.countryISO2);
      if (knownCountryName !== undefined && knownCountryName !== entry.countryName) {
        this.log.warn(
          {
            row: raw.rowNumber,
            countryISO2: entry.countryISO2,
            expected: knownCountryName,
            actual: entry.countryName,
          },
          'Skipping row with conflicting country name',
        );
        continue;
      }

      seenCodes.add(entry.swiftCode);
      countryNames.set(entry.countryISO2, entry.countryName);
      accepted.push(entry);
    }

    return accepted;
  }
}
