/**
 * Unit tests for code lookup tables
 */

import { describe, it, expect } from 'vitest';
import {
  COUNTRY_CODES,
  GENDER_CODES,
  MARITAL_STATUS_CODES,
  PRODUCT_LINE_CODES,
  lookupCode
} from '../../../config/code-lookups.js';

describe('lookupCode', () => {
  it('should map codes case-insensitively', () => {
    expect(lookupCode(MARITAL_STATUS_CODES, 's')).toEqual({ status: 'mapped', value: 'Single' });
    expect(lookupCode(GENDER_CODES, 'female')).toEqual({ status: 'mapped', value: 'Female' });
    expect(lookupCode(PRODUCT_LINE_CODES, 'T')).toEqual({ status: 'mapped', value: 'Touring' });
  });

  it('should map the explicit n/a code', () => {
    expect(lookupCode(GENDER_CODES, 'N/A')).toEqual({ status: 'mapped', value: 'n/a' });
  });

  it('should default missing codes', () => {
    expect(lookupCode(GENDER_CODES, null)).toEqual({ status: 'defaulted', value: 'n/a' });
    expect(lookupCode(PRODUCT_LINE_CODES, '')).toEqual({ status: 'defaulted', value: 'n/a' });
  });

  it('should fall back to the default for unknown codes', () => {
    expect(lookupCode(MARITAL_STATUS_CODES, 'X')).toEqual({ status: 'unknown', value: 'n/a' });
  });

  it('should pass unknown countries through', () => {
    expect(lookupCode(COUNTRY_CODES, 'USA')).toEqual({ status: 'mapped', value: 'United States' });
    expect(lookupCode(COUNTRY_CODES, 'Australia')).toEqual({ status: 'passthrough', value: 'Australia' });
    expect(lookupCode(COUNTRY_CODES, null)).toEqual({ status: 'defaulted', value: 'n/a' });
  });
});
