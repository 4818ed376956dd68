/**
 * Enumerated lookup tables mapping source short codes to descriptive values
 */

import { Gender, MaritalStatus, ProductLine } from '../types/index.js';

export interface CodeLookup<T extends string> {
  name: string;
  /** Keys are upper-case codes */
  entries: Readonly<Record<string, T>>;
  defaultValue: T;
  /**
   * Keeps a non-empty unknown code instead of substituting the default.
   * Without it, unknown codes fall back to the default.
   */
  passthroughUnknown?: (code: string) => T;
}

export type CodeLookupStatus = 'mapped' | 'defaulted' | 'unknown' | 'passthrough';

export interface CodeLookupOutcome<T extends string> {
  status: CodeLookupStatus;
  value: T;
}

export const MARITAL_STATUS_CODES: CodeLookup<MaritalStatus> = {
  name: 'marital_status',
  entries: {
    S: 'Single',
    M: 'Married',
    'N/A': 'n/a'
  },
  defaultValue: 'n/a'
};

export const GENDER_CODES: CodeLookup<Gender> = {
  name: 'gender',
  entries: {
    F: 'Female',
    FEMALE: 'Female',
    M: 'Male',
    MALE: 'Male',
    'N/A': 'n/a'
  },
  defaultValue: 'n/a'
};

export const PRODUCT_LINE_CODES: CodeLookup<ProductLine> = {
  name: 'product_line',
  entries: {
    M: 'Mountain',
    R: 'Road',
    S: 'Other Sales',
    T: 'Touring'
  },
  defaultValue: 'n/a'
};

export const COUNTRY_CODES: CodeLookup<string> = {
  name: 'country',
  entries: {
    DE: 'Germany',
    US: 'United States',
    USA: 'United States'
  },
  defaultValue: 'n/a',
  passthroughUnknown: code => code
};

/**
 * Resolve a trimmed code against a lookup table
 */
export function lookupCode<T extends string>(
  lookup: CodeLookup<T>,
  code: string | null
): CodeLookupOutcome<T> {
  if (code === null || code === '') {
    return { status: 'defaulted', value: lookup.defaultValue };
  }

  const mapped = lookup.entries[code.toUpperCase()];
  if (mapped !== undefined) {
    return { status: 'mapped', value: mapped };
  }

  if (lookup.passthroughUnknown) {
    return { status: 'passthrough', value: lookup.passthroughUnknown(code) };
  }
  return { status: 'unknown', value: lookup.defaultValue };
}
