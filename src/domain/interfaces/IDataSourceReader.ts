/**
 * Data Source Reader Interface
 * Layer: Domain
 *
 * Reads every raw record of a source file in one go. The loader runs once per
 * empty database, so the whole sheet is held in memory.
 */
export interface IDataSourceReader<TRaw = unknown> {
  read(filePath: string): Promise<TRaw[]>;
}
