/**
 * SWIFT Code Rules
 * Layer: Domain
 *
 * Pure functions shared by the HTTP validation schemas, the service and the
 * loader. The `describe*Problem` helpers return the first rule a value breaks
 * (or null), in a fixed order: length, character set, case. Their messages are
 * returned to API clients verbatim.
 */
import {
  BANK_CODE_LENGTH,
  HEADQUARTERS_SUFFIX,
  ISO2_CODE_LENGTH,
  SHORT_SWIFT_CODE_LENGTH,
  SWIFT_CODE_LENGTH,
} from '@shared/constants';

export const HEADQUARTERS_MISMATCH_MESSAGE =
  'Headquarters SWIFT codes must end with XXX and branch codes must not.';

const ALPHANUMERIC = /^[A-Za-z0-9]+$/;
const LETTERS = /^[A-Za-z]+$/;
const HAS_LETTER = /\p{L}/u;

/** Cased like "ABC123": no lowercase and at least one letter, so "12345678" is not uppercase. */
function isUppercase(value: string): boolean {
  return value === value.toUpperCase() && HAS_LETTER.test(value);
}

export function describeSwiftCodeProblem(code: string): string | null {
  if (code.length !== SHORT_SWIFT_CODE_LENGTH && code.length !== SWIFT_CODE_LENGTH) {
    return `SWIFT code should consist of ${SHORT_SWIFT_CODE_LENGTH} or ${SWIFT_CODE_LENGTH} characters.`;
  }
  if (!ALPHANUMERIC.test(code)) {
    return 'All characters in SWIFT code should be alphanumeric.';
  }
  if (!isUppercase(code)) {
    return 'All characters in SWIFT code should be uppercase.';
  }
  return null;
}

export function describeIso2Problem(iso2: string): string | null {
  if (iso2.length !== ISO2_CODE_LENGTH) {
    return `ISO2 code should consist of ${ISO2_CODE_LENGTH} characters.`;
  }
  if (!LETTERS.test(iso2)) {
    return 'All characters in ISO2 code should be letters.';
  }
  if (iso2 !== iso2.toUpperCase()) {
    return 'All characters in ISO2 code should be uppercase.';
  }
  return null;
}

export function describeCountryNameProblem(name: string): string | null {
  if (name.trim().length === 0) {
    return 'countryName is required.';
  }
  if (!isUppercase(name)) {
    return 'All characters in country name should be uppercase.';
  }
  return null;
}

/** "AAAABBCC" → "AAAABBCCXXX"; 11-character codes pass through untouched. */
export function canonicalizeSwiftCode(code: string): string {
  return code.length === SHORT_SWIFT_CODE_LENGTH ? code + HEADQUARTERS_SUFFIX : code;
}

export function isHeadquartersCode(code: string): boolean {
  return canonicalizeSwiftCode(code).endsWith(HEADQUARTERS_SUFFIX);
}

export function bankCodeOf(code: string): string {
  return code.slice(0, BANK_CODE_LENGTH);
}

export function headquartersFlagMatches(code: string, isHeadquarters: boolean): boolean {
  return isHeadquartersCode(code) === isHeadquarters;
}
