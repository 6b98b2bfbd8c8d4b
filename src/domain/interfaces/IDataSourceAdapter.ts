import type { SwiftCodeEntry } from '@domain/entities/SwiftCode';

/**
 * Data Source Adapter Interface
 * Layer: Domain
 * Pattern: Adapter Pattern
 *
 * Converts one raw record from an external source into a SwiftCodeEntry. The
 * loader never looks at spreadsheet cells itself; it asks the adapter.
 *
 * The generic `TRaw` lets each adapter declare the raw shape it expects
 * (SpreadsheetDataSourceAdapter implements IDataSourceAdapter<RawSwiftCodeRecord>).
 */
export interface IDataSourceAdapter<TRaw = unknown> {
  normalize(raw: TRaw): SwiftCodeEntry;
}
