/** Branch suffix that marks a head office ("AAAABBCCXXX"). */
export const HEADQUARTERS_SUFFIX = 'XXX';

/** Institution + country + location: the part a branch shares with its headquarters. */
export const BANK_CODE_LENGTH = 8;

/** BIC8 is shorthand for the BIC11 with the headquarters suffix. */
export const SHORT_SWIFT_CODE_LENGTH = BANK_CODE_LENGTH;
export const SWIFT_CODE_LENGTH = BANK_CODE_LENGTH + HEADQUARTERS_SUFFIX.length;

export const ISO2_CODE_LENGTH = 2;

export const SWIFT_CODES_TABLE = 'swift_codes';

/**
 * Header cells the loader looks for in the source spreadsheet, keyed by the
 * raw record field they fill. Matching ignores case and surrounding spaces.
 */
export const SPREADSHEET_COLUMNS = {
  swiftCode: 'SWIFT CODE',
  bankName: 'NAME',
  address: 'ADDRESS',
  countryISO2: 'COUNTRY ISO2 CODE',
  countryName: 'COUNTRY NAME',
} as const;

export const SUPPORTED_SPREADSHEET_EXTENSIONS = ['.xlsx', '.csv'] as const;
