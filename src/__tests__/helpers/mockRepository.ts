/**
 * Mock Repository Factory
 * Layer: Test Helpers
 *
 * An ISwiftCodeRepository whose every method is a fresh `jest.fn()`, so each
 * test configures its own return values and call counts never leak.
 *
 *   const repo = createMockRepository();
 *   repo.findByCode.mockResolvedValue(alphaHeadquarters);
 *   expect(repo.findBranches).toHaveBeenCalledWith('AAAAPLPWXXX');
 */
import type { ISwiftCodeRepository } from '@domain/interfaces/ISwiftCodeRepository';

export type MockSwiftCodeRepository = {
  [K in keyof ISwiftCodeRepository]: jest.Mock;
};

export function createMockRepository(): MockSwiftCodeRepository {
  return {
    findByCode: jest.fn(),
    findBranches: jest.fn(),
    findByCountry: jest.fn(),
    findCountryName: jest.fn(),
    insert: jest.fn(),
    bulkInsert: jest.fn(),
    deleteByCode: jest.fn(),
    isEmpty: jest.fn(),
  };
}
