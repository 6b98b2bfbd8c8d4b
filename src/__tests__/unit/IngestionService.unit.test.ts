/**
 * Unit Tests — IngestionService
 *
 * Repository and reader are mocked; the real adapter normalizes rows so the
 * filtering runs on the same values it sees in production.
 */
import { IngestionService } from '@application/services/IngestionService';
import { config } from '@core/config';
import { logger } from '@core/logger';
import { SpreadsheetDataSourceAdapter } from '@etl/SpreadsheetDataSourceAdapter';
import { NotFoundError } from '@shared/errors/AppError';

import {
  alphaBranchKrakow,
  alphaHeadquarters,
  betaHeadquarters,
  deltaHeadquarters,
  rawRecord,
} from '../helpers/fixtures';
import { createMockRepository, type MockSwiftCodeRepository } from '../helpers/mockRepository';

describe('IngestionService', () => {
  let repo: MockSwiftCodeRepository;
  let reader: { read: jest.Mock };
  let service: IngestionService;

  beforeEach(() => {
    repo = createMockRepository();
    reader = { read: jest.fn() };
    service = new IngestionService(repo, reader, new SpreadsheetDataSourceAdapter(), logger);
    repo.bulkInsert.mockImplementation(async (entries: unknown[]) => entries.length);
  });

  it('should leave a populated table alone and return null', async () => {
    repo.isEmpty.mockResolvedValue(false);

    await expect(service.loadIfEmpty('data/codes.xlsx')).resolves.toBeNull();
    expect(reader.read).not.toHaveBeenCalled();
    expect(repo.bulkInsert).not.toHaveBeenCalled();
  });

  it('should insert every valid row in file order using the configured batch size', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockResolvedValue([
      rawRecord(),
      rawRecord({ rowNumber: 3, swiftCode: 'AAAAPLPW001', address: 'UL. PRZYKLADOWA 5' }),
      rawRecord({
        rowNumber: 4,
        swiftCode: 'dddddeff',
        bankName: 'DELTA BANK AG',
        address: 'TESTSTRASSE 1',
        countryISO2: 'de',
        countryName: 'Germany',
      }),
    ]);

    const result = await service.loadIfEmpty('data/codes.xlsx');

    expect(reader.read).toHaveBeenCalledWith('data/codes.xlsx');
    expect(repo.bulkInsert).toHaveBeenCalledWith(
      [alphaHeadquarters, alphaBranchKrakow, deltaHeadquarters],
      config.loader.batchSize,
    );
    expect(result).toEqual({
      totalRead: 3,
      totalInserted: 3,
      totalSkipped: 0,
      durationMs: expect.any(Number),
    });
  });

  it('should skip rows that break a format rule or lack a bank name', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockResolvedValue([
      rawRecord({ swiftCode: 'BAD!CODE123' }),
      rawRecord({ rowNumber: 3, swiftCode: 'AAAAPLPW1' }),
      rawRecord({ rowNumber: 4, countryISO2: 'P1' }),
      rawRecord({ rowNumber: 5, countryName: ' ' }),
      rawRecord({ rowNumber: 6, bankName: '  ' }),
      rawRecord({ rowNumber: 7, swiftCode: 'BBBBPLPWXXX', bankName: 'BETA BANK', address: 'UL. ZMYSLONA 9' }),
    ]);

    const result = await service.loadIfEmpty('data/codes.xlsx');

    expect(repo.bulkInsert).toHaveBeenCalledWith([betaHeadquarters], config.loader.batchSize);
    expect(result?.totalRead).toBe(6);
    expect(result?.totalInserted).toBe(1);
    expect(result?.totalSkipped).toBe(5);
  });

  it('should keep the first of two rows with the same code', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockResolvedValue([
      rawRecord(),
      rawRecord({ rowNumber: 3, address: 'SOMEWHERE ELSE' }),
    ]);

    await service.loadIfEmpty('data/codes.xlsx');

    expect(repo.bulkInsert).toHaveBeenCalledWith([alphaHeadquarters], config.loader.batchSize);
  });

  it('should treat an 8-character code and its XXX form as the same code', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockResolvedValue([rawRecord(), rawRecord({ rowNumber: 3, swiftCode: 'AAAAPLPW' })]);

    const result = await service.loadIfEmpty('data/codes.xlsx');

    expect(result?.totalInserted).toBe(1);
  });

  it('should skip rows whose country name conflicts with an earlier row', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockResolvedValue([
      rawRecord(),
      rawRecord({ rowNumber: 3, swiftCode: 'AAAAPLPW001', countryName: 'POLSKA' }),
    ]);

    const result = await service.loadIfEmpty('data/codes.xlsx');

    expect(repo.bulkInsert).toHaveBeenCalledWith([alphaHeadquarters], config.loader.batchSize);
    expect(result?.totalSkipped).toBe(1);
  });

  it('should propagate reader failures without inserting', async () => {
    repo.isEmpty.mockResolvedValue(true);
    reader.read.mockRejectedValue(new NotFoundError('Data file', '/missing.xlsx'));

    await expect(service.loadIfEmpty('/missing.xlsx')).rejects.toThrow(NotFoundError);
    expect(repo.bulkInsert).not.toHaveBeenCalled();
  });
});
