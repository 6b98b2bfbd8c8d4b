/**
 * Unit Tests — SwiftCodeService
 *
 * The repository is mocked, so these cover the service's own rules: code
 * canonicalization, branch lookup for headquarters only, 404s, the
 * headquarters-flag check and country-name consistency on create.
 */
import { SwiftCodeService } from '@application/services/SwiftCodeService';
import { logger } from '@core/logger';
import { HEADQUARTERS_MISMATCH_MESSAGE } from '@domain/rules/swiftCodeRules';
import { NotFoundError, ValidationError } from '@shared/errors/AppError';
import type { CreateSwiftCodeInput } from '@shared/types';

import {
  alphaBranchGdansk,
  alphaBranchKrakow,
  alphaHeadquarters,
  betaHeadquarters,
} from '../helpers/fixtures';
import { createMockRepository, type MockSwiftCodeRepository } from '../helpers/mockRepository';

describe('SwiftCodeService', () => {
  let repo: MockSwiftCodeRepository;
  let service: SwiftCodeService;

  beforeEach(() => {
    repo = createMockRepository();
    service = new SwiftCodeService(repo, logger);
  });

  describe('getByCode()', () => {
    it('should return a headquarters with its branches as summaries', async () => {
      repo.findByCode.mockResolvedValue(alphaHeadquarters);
      repo.findBranches.mockResolvedValue([alphaBranchKrakow, alphaBranchGdansk]);

      const result = await service.getByCode('AAAAPLPWXXX');

      expect(repo.findBranches).toHaveBeenCalledWith('AAAAPLPWXXX');
      expect(result).toEqual({
        ...alphaHeadquarters,
        branches: [
          {
            swiftCode: 'AAAAPLPW001',
            bankName: 'ALPHA BANK SA',
            address: 'UL. PRZYKLADOWA 5',
            countryISO2: 'PL',
            isHeadquarters: false,
          },
          {
            swiftCode: 'AAAAPLPW002',
            bankName: 'ALPHA BANK SA',
            address: '',
            countryISO2: 'PL',
            isHeadquarters: false,
          },
        ],
      });
    });

    it('should return an empty branches list for a headquarters without branches', async () => {
      repo.findByCode.mockResolvedValue(betaHeadquarters);
      repo.findBranches.mockResolvedValue([]);

      const result = await service.getByCode('BBBBPLPWXXX');

      expect(result.branches).toEqual([]);
    });

    it('should return a branch alone, without looking up siblings', async () => {
      repo.findByCode.mockResolvedValue(alphaBranchKrakow);

      const result = await service.getByCode('AAAAPLPW001');

      expect(result).toEqual(alphaBranchKrakow);
      expect(result).not.toHaveProperty('branches');
      expect(repo.findBranches).not.toHaveBeenCalled();
    });

    it('should expand an 8-character code before the lookup', async () => {
      repo.findByCode.mockResolvedValue(alphaHeadquarters);
      repo.findBranches.mockResolvedValue([]);

      await service.getByCode('AAAAPLPW');

      expect(repo.findByCode).toHaveBeenCalledWith('AAAAPLPWXXX');
    });

    it('should throw NotFoundError for an unknown code', async () => {
      repo.findByCode.mockResolvedValue(null);

      await expect(service.getByCode('ZZZZPLPWXXX')).rejects.toThrow(
        new NotFoundError('SWIFT code', 'ZZZZPLPWXXX'),
      );
    });
  });

  describe('getByCountry()', () => {
    it('should return the country name and every entry as a summary', async () => {
      repo.findByCountry.mockResolvedValue([alphaBranchKrakow, alphaHeadquarters]);

      const result = await service.getByCountry('PL');

      expect(repo.findByCountry).toHaveBeenCalledWith('PL');
      expect(result.countryISO2).toBe('PL');
      expect(result.countryName).toBe('POLAND');
      expect(result.swiftCodes.map((summary) => summary.swiftCode)).toEqual([
        'AAAAPLPW001',
        'AAAAPLPWXXX',
      ]);
      expect(result.swiftCodes[0]).not.toHaveProperty('countryName');
    });

    it('should throw NotFoundError when the country has no entries', async () => {
      repo.findByCountry.mockResolvedValue([]);

      await expect(service.getByCountry('FR')).rejects.toThrow('Country not found: FR');
    });
  });

  describe('create()', () => {
    const input: CreateSwiftCodeInput = {
      swiftCode: 'AAAABBCCXXX',
      bankName: '  NEW BANK  ',
      address: ' UL. NOWA 1 ',
      countryISO2: 'PL',
      countryName: 'POLAND',
      isHeadquarters: true,
    };

    it('should insert a consistent entry with trimmed text fields', async () => {
      repo.findCountryName.mockResolvedValue('POLAND');
      repo.insert.mockImplementation(async (entry: unknown) => entry);

      const created = await service.create(input);

      const expected = {
        swiftCode: 'AAAABBCCXXX',
        bankName: 'NEW BANK',
        address: 'UL. NOWA 1',
        countryISO2: 'PL',
        countryName: 'POLAND',
        isHeadquarters: true,
      };
      expect(repo.insert).toHaveBeenCalledWith(expected);
      expect(created).toEqual(expected);
    });

    it('should accept a country the store has not seen yet', async () => {
      repo.findCountryName.mockResolvedValue(null);
      repo.insert.mockImplementation(async (entry: unknown) => entry);

      await service.create({ ...input, countryISO2: 'CZ', countryName: 'CZECHIA' });

      expect(repo.insert).toHaveBeenCalledTimes(1);
    });

    it('should store an 8-character code in its 11-character form', async () => {
      repo.findCountryName.mockResolvedValue(null);
      repo.insert.mockImplementation(async (entry: unknown) => entry);

      const created = await service.create({ ...input, swiftCode: 'AAAABBCC' });

      expect(created.swiftCode).toBe('AAAABBCCXXX');
    });

    it('should reject a branch code flagged as headquarters', async () => {
      await expect(
        service.create({ ...input, swiftCode: 'AAAABBCC123', isHeadquarters: true }),
      ).rejects.toThrow(new ValidationError(HEADQUARTERS_MISMATCH_MESSAGE));
      expect(repo.insert).not.toHaveBeenCalled();
    });

    it('should reject a headquarters code flagged as a branch', async () => {
      await expect(service.create({ ...input, isHeadquarters: false })).rejects.toThrow(
        HEADQUARTERS_MISMATCH_MESSAGE,
      );
      expect(repo.insert).not.toHaveBeenCalled();
    });

    it('should reject a country name that disagrees with the stored one', async () => {
      repo.findCountryName.mockResolvedValue('POLAND');

      await expect(service.create({ ...input, countryName: 'POLSKA' })).rejects.toThrow(
        'countryName for countryISO2 PL must be POLAND, got POLSKA.',
      );
      expect(repo.insert).not.toHaveBeenCalled();
    });
  });

  describe('delete()', () => {
    it('should delete exactly the requested code', async () => {
      repo.deleteByCode.mockResolvedValue(1);

      await expect(service.delete('AAAAPLPWXXX')).resolves.toBe('AAAAPLPWXXX');
      expect(repo.deleteByCode).toHaveBeenCalledWith('AAAAPLPWXXX');
    });

    it('should expand an 8-character code', async () => {
      repo.deleteByCode.mockResolvedValue(1);

      await expect(service.delete('AAAAPLPW')).resolves.toBe('AAAAPLPWXXX');
    });

    it('should throw NotFoundError when nothing was deleted', async () => {
      repo.deleteByCode.mockResolvedValue(0);

      await expect(service.delete('ZZZZPLPWXXX')).rejects.toThrow(
        'SWIFT code not found: ZZZZPLPWXXX',
      );
    });
  });
});
