/**
 * Spreadsheet Reader — Source File → Raw Records
 * Layer: ETL
 *
 * Reads the bank-code spreadsheet in one pass and returns one RawSwiftCodeRecord
 * per data row, cells as untrimmed strings exactly as they appear. Two
 * formats are accepted:
 *
 *   .xlsx  first worksheet, via ExcelJS (`cell.text` gives the displayed value)
 *   .csv   via csv-parse, comma separated, optional BOM
 *
 * Both paths agree on the layout: a header row first, then data. Columns are
 * located by header text (case and surrounding spaces ignored), so extra
 * columns such as CODE TYPE or TIME ZONE and any column order are fine. A
 * missing required column fails the whole read.
 */
import fs from 'node:fs';
import path from 'node:path';

import type { IDataSourceReader } from '@domain/interfaces/IDataSourceReader';
import { SPREADSHEET_COLUMNS, SUPPORTED_SPREADSHEET_EXTENSIONS } from '@shared/constants';
import { NotFoundError, ValidationError } from '@shared/errors/AppError';
import { parse } from 'csv-parse/sync';
import { Workbook } from 'exceljs';
import { injectable } from 'tsyringe';

export type RawSwiftCodeField = keyof typeof SPREADSHEET_COLUMNS;

/** One spreadsheet row; `rowNumber` is 1-based and counts the header row. */
export type RawSwiftCodeRecord = Record<RawSwiftCodeField, string> & { rowNumber: number };

type ColumnPositions = Record<RawSwiftCodeField, number>;

@injectable()
export class SpreadsheetReader implements IDataSourceReader<RawSwiftCodeRecord> {
  async read(filePath: string): Promise<RawSwiftCodeRecord[]> {
    const absolutePath = path.resolve(filePath);
    if (!fs.existsSync(absolutePath)) {
      throw new NotFoundError('Data file', absolutePath);
    }

    const extension = path.extname(absolutePath).toLowerCase();
    switch (extension) {
      case '.xlsx':
        return readWorkbook(absolutePath);
      case '.csv':
        return readCsv(absolutePath);
      default:
        throw new ValidationError(
          `Unsupported data file type "${extension || '(none)'}": expected ${SUPPORTED_SPREADSHEET_EXTENSIONS.join(' or ')}`,
        );
    }
  }
}

async function readWorkbook(filePath: string): Promise<RawSwiftCodeRecord[]> {
  const workbook = new Workbook();
  await workbook.xlsx.readFile(filePath);

  const sheet = workbook.worksheets[0];
  if (!sheet) {
    throw new ValidationError(`Data file has no worksheet: ${filePath}`);
  }

  const headers = new Map<string, number>();
  sheet.getRow(1).eachCell((cell, colNumber) => {
    headers.set(normalizeHeader(cell.text), colNumber);
  });
  const columns = locateColumns(headers, filePath);

  const records: RawSwiftCodeRecord[] = [];
  sheet.eachRow((row, rowNumber) => {
    if (rowNumber === 1) return;
    const record = buildRecord(rowNumber, columns, (position) => row.getCell(position).text);
    if (record) records.push(record);
  });
  return records;
}

async function readCsv(filePath: string): Promise<RawSwiftCodeRecord[]> {
  const content = await fs.promises.readFile(filePath, 'utf-8');
  const rows: unknown = parse(content, {
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  if (!isStringMatrix(rows)) {
    throw new ValidationError(`Data file could not be parsed as CSV: ${filePath}`);
  }

  const [headerRow, ...dataRows] = rows;
  if (!headerRow) return [];

  const headers = new Map<string, number>();
  headerRow.forEach((header, index) => headers.set(normalizeHeader(header), index));
  const columns = locateColumns(headers, filePath);

  const records: RawSwiftCodeRecord[] = [];
  dataRows.forEach((cells, index) => {
    // +2: 1-based numbering plus the header row
    const record = buildRecord(index + 2, columns, (position) => cells[position] ?? '');
    if (record) records.push(record);
  });
  return records;
}

function normalizeHeader(header: string): string {
  return header.trim().toUpperCase();
}

function locateColumns(headers: Map<string, number>, filePath: string): ColumnPositions {
  const missing: string[] = [];
  const find = (header: string): number => {
    const position = headers.get(header);
    if (position === undefined) {
      missing.push(header);
      return -1;
    }
    return position;
  };

  const columns: ColumnPositions = {
    swiftCode: find(SPREADSHEET_COLUMNS.swiftCode),
    bankName: find(SPREADSHEET_COLUMNS.bankName),
    address: find(SPREADSHEET_COLUMNS.address),
    countryISO2: find(SPREADSHEET_COLUMNS.countryISO2),
    countryName: find(SPREADSHEET_COLUMNS.countryName),
  };

  if (missing.length > 0) {
    throw new ValidationError(`Data file ${filePath} is missing column(s): ${missing.join(', ')}`);
  }
  return columns;
}

/** Null for rows whose required cells are all blank (trailing rows, spacer lines). */
function buildRecord(
  rowNumber: number,
  columns: ColumnPositions,
  cellAt: (position: number) => string,
): RawSwiftCodeRecord | null {
  const record: RawSwiftCodeRecord = {
    rowNumber,
    swiftCode: cellAt(columns.swiftCode),
    bankName: cellAt(columns.bankName),
    address: cellAt(columns.address),
    countryISO2: cellAt(columns.countryISO2),
    countryName: cellAt(columns.countryName),
  };

  const isBlank = [
    record.swiftCode,
    record.bankName,
    record.address,
    record.countryISO2,
    record.countryName,
  ].every((cell) => cell.trim() === '');
  return isBlank ? null : record;
}

function isStringMatrix(value: unknown): value is string[][] {
  return (
    Array.isArray(value) &&
    value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === 'string'))
  );
}
