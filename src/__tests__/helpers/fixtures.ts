/**
 * Shared Test Fixtures
 *
 * Made-up banks in two countries covering the cases the rules care about:
 *   - a headquarters with two branches (ALPHA)
 *   - a headquarters without branches (BETA)
 *   - a branch whose headquarters is absent (GAMMA)
 *   - a headquarters and branch in a second country (DELTA)
 *   - a branch with an empty address
 */
import path from 'node:path';

import type { SwiftCodeEntry } from '@domain/entities/SwiftCode';
import type { RawSwiftCodeRecord } from '@etl/SpreadsheetReader';

/** CSV with the rows above plus a blank line, a duplicate, a country-name conflict and a malformed code. */
export const FIXTURE_CSV_PATH = path.join(__dirname, '..', 'fixtures', 'swift_codes.csv');

export const alphaHeadquarters: SwiftCodeEntry = {
  swiftCode: 'AAAAPLPWXXX',
  bankName: 'ALPHA BANK SA',
  address: 'UL. TESTOWA 1, 00-001 WARSZAWA',
  countryISO2: 'PL',
  countryName: 'POLAND',
  isHeadquarters: true,
};

export const alphaBranchKrakow: SwiftCodeEntry = {
  swiftCode: 'AAAAPLPW001',
  bankName: 'ALPHA BANK SA',
  address: 'UL. PRZYKLADOWA 5',
  countryISO2: 'PL',
  countryName: 'POLAND',
  isHeadquarters: false,
};

export const alphaBranchGdansk: SwiftCodeEntry = {
  swiftCode: 'AAAAPLPW002',
  bankName: 'ALPHA BANK SA',
  address: '',
  countryISO2: 'PL',
  countryName: 'POLAND',
  isHeadquarters: false,
};

export const betaHeadquarters: SwiftCodeEntry = {
  swiftCode: 'BBBBPLPWXXX',
  bankName: 'BETA BANK',
  address: 'UL. ZMYSLONA 9',
  countryISO2: 'PL',
  countryName: 'POLAND',
  isHeadquarters: true,
};

export const gammaOrphanBranch: SwiftCodeEntry = {
  swiftCode: 'CCCCPLPW123',
  bankName: 'GAMMA BANK',
  address: 'UL. BOCZNA 2',
  countryISO2: 'PL',
  countryName: 'POLAND',
  isHeadquarters: false,
};

export const deltaHeadquarters: SwiftCodeEntry = {
  swiftCode: 'DDDDDEFFXXX',
  bankName: 'DELTA BANK AG',
  address: 'TESTSTRASSE 1',
  countryISO2: 'DE',
  countryName: 'GERMANY',
  isHeadquarters: true,
};

export const deltaBranch: SwiftCodeEntry = {
  swiftCode: 'DDDDDEFF100',
  bankName: 'DELTA BANK AG',
  address: 'BEISPIELWEG 2',
  countryISO2: 'DE',
  countryName: 'GERMANY',
  isHeadquarters: false,
};

/** Every valid fixture entry, in the order the CSV lists them. */
export const allEntries: SwiftCodeEntry[] = [
  alphaHeadquarters,
  alphaBranchKrakow,
  alphaBranchGdansk,
  betaHeadquarters,
  gammaOrphanBranch,
  deltaHeadquarters,
  deltaBranch,
];

export function rawRecord(overrides: Partial<RawSwiftCodeRecord> = {}): RawSwiftCodeRecord {
  return {
    rowNumber: 2,
    swiftCode: 'AAAAPLPWXXX',
    bankName: 'ALPHA BANK SA',
    address: 'UL. TESTOWA 1, 00-001 WARSZAWA',
    countryISO2: 'PL',
    countryName: 'POLAND',
    ...overrides,
  };
}
