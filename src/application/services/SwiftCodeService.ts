/**
 * SWIFT Code Service — Lookup, Create and Delete
 * Layer: Application
 *
 * Sits between the controller and the repository and owns the rules that need
 * the store to decide:
 *
 *   getByCode()     headquarters come back with their branches; a branch comes
 *                   back alone (never with its siblings).
 *   getByCountry()  every entry of a country; 404 when there are none.
 *   create()        the code's suffix must agree with isHeadquarters, and the
 *                   country name must agree with what the store already holds
 *                   for the ISO2 code.
 *   delete()        removes exactly one row. Headquarters and branches are
 *                   independent rows, so nothing cascades.
 *
 * Codes arrive format-checked by the HTTP layer; 8-character codes are
 * expanded to their 11-character form before touching the store.
 */
import type { Logger } from '@core/logger';
import { TOKENS } from '@core/types';
import {
  toSummary,
  type CountrySwiftCodes,
  type SwiftCodeDetails,
  type SwiftCodeEntry,
} from '@domain/entities/SwiftCode';
import type { ISwiftCodeRepository } from '@domain/interfaces/ISwiftCodeRepository';
import {
  canonicalizeSwiftCode,
  HEADQUARTERS_MISMATCH_MESSAGE,
  headquartersFlagMatches,
} from '@domain/rules/swiftCodeRules';
import { NotFoundError, ValidationError } from '@shared/errors/AppError';
import type { CreateSwiftCodeInput } from '@shared/types';
import { inject, injectable } from 'tsyringe';

@injectable()
export class SwiftCodeService {
  constructor(
    @inject(TOKENS.SwiftCodeRepository) private repo: ISwiftCodeRepository,
    @inject(TOKENS.Logger) private log: Logger,
  ) {}

  async getByCode(code: string): Promise<SwiftCodeDetails> {
    const swiftCode = canonicalizeSwiftCode(code);
    const entry = await this.repo.findByCode(swiftCode);
    if (!entry) throw new NotFoundError('SWIFT code', swiftCode);

    if (!entry.isHeadquarters) return entry;

    const branches = await this.repo.findBranches(swiftCode);
    return { ...entry, branches: branches.map(toSummary) };
  }

  async getByCountry(countryISO2: string): Promise<CountrySwiftCodes> {
    const entries = await this.repo.findByCountry(countryISO2);
    const [first] = entries;
    if (!first) throw new NotFoundError('Country', countryISO2);

    return {
      countryISO2,
      countryName: first.countryName,
      swiftCodes: entries.map(toSummary),
    };
  }

  async create(input: CreateSwiftCodeInput): Promise<SwiftCodeEntry> {
    const swiftCode = canonicalizeSwiftCode(input.swiftCode);

    if (!headquartersFlagMatches(swiftCode, input.isHeadquarters)) {
      throw new ValidationError(HEADQUARTERS_MISMATCH_MESSAGE);
    }

    const countryName = input.countryName.trim();
    const knownCountryName = await this.repo.findCountryName(input.countryISO2);
    if (knownCountryName !== null && knownCountryName !== countryName) {
      throw new ValidationError(
        `countryName for countryISO2 ${input.countryISO2} must be ${knownCountryName}, got ${countryName}.`,
      );
    }

    const created = await this.repo.insert({
      swiftCode,
      bankName: input.bankName.trim(),
      address: input.address.trim(),
      countryISO2: input.countryISO2,
      countryName,
      isHeadquarters: input.isHeadquarters,
    });

    this.log.info({ swiftCode }, 'SWIFT code created');
    return created;
  }

  async delete(code: string): Promise<string> {
    const swiftCode = canonicalizeSwiftCode(code);
    const removed = await this.repo.deleteByCode(swiftCode);
    if (removed === 0) throw new NotFoundError('SWIFT code', swiftCode);

    this.log.info({ swiftCode }, 'SWIFT code deleted');
    return swiftCode;
  }
}
