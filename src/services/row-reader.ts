/**
 * Field-level readers used by the cleansing stage.
 * Every correction applied to a value is recorded as a quality issue.
 */

import { CodeLookup, lookupCode } from '../config/code-lookups.js';
import { PipelineConfig } from '../config/pipeline-config.js';
import { IsoDate, IssueDetails, RawRow, RawValue } from '../types/index.js';
import { compactToIsoDate, isValidIsoDate } from '../utils/dates.js';
import { IssueRecorder } from './quality-issue-log.js';

export type DateRules = Pick<PipelineConfig, 'referenceDate' | 'minValidDate' | 'maxValidDate'>;

export interface DateReadOptions {
  /** Reject dates later than the configured reference date */
  notAfterReference?: boolean;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;

export class RowReader {
  private businessKey: string | null = null;

  constructor(
    private readonly row: RawRow,
    public readonly rowOffset: number,
    private readonly issues: IssueRecorder,
    private readonly dates: DateRules
  ) {}

  /**
   * Attach the business key to issues recorded from here on
   */
  keyedBy(businessKey: string | null): this {
    this.businessKey = businessKey;
    return this;
  }

  raw(column: string): RawValue {
    const value = this.row[column];
    return value === undefined ? null : value;
  }

  text(column: string): string | null {
    const value = this.raw(column);
    if (value === null) {
      return null;
    }
    if (typeof value === 'number') {
      return String(value);
    }

    const trimmed = value.trim();
    if (trimmed !== value) {
      this.issues.info(
        'whitespace_trimmed',
        'format',
        `Trimmed incidental whitespace in ${column}`,
        this.details(column, value, trimmed)
      );
    }
    return trimmed === '' ? null : trimmed;
  }

  integer(column: string): number | null {
    const value = this.raw(column);
    if (value === null) {
      return null;
    }
    if (typeof value === 'number') {
      return Number.isSafeInteger(value) ? value : this.invalidNumber(column, value);
    }

    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    const parsed = Number(trimmed);
    // ids past 2^53 would round onto a neighbouring id
    return INTEGER_PATTERN.test(trimmed) && Number.isSafeInteger(parsed) ? parsed : this.invalidNumber(column, value);
  }

  decimal(column: string): number | null {
    const value = this.raw(column);
    if (value === null) {
      return null;
    }
    if (typeof value === 'number') {
      return Number.isFinite(value) ? value : this.invalidNumber(column, value);
    }

    const trimmed = value.trim();
    if (trimmed === '') {
      return null;
    }
    return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : this.invalidNumber(column, value);
  }

  /**
   * Map a short code through a lookup table; never fails on unknown codes
   */
  code<T extends string>(column: string, lookup: CodeLookup<T>): T {
    const code = this.text(column);
    const outcome = lookupCode(lookup, code);

    if (outcome.status === 'unknown') {
      this.issues.warning(
        'unknown_code',
        'format',
        `Unrecognized ${lookup.name} code '${code}' mapped to '${outcome.value}'`,
        this.details(column, this.raw(column), outcome.value)
      );
    } else if (outcome.status === 'defaulted') {
      this.issues.info(
        'code_defaulted',
        'completeness',
        `Missing ${lookup.name} code defaulted to '${outcome.value}'`,
        this.details(column, this.raw(column), outcome.value)
      );
    }

    return outcome.value;
  }

  /**
   * Strict YYYY-MM-DD date
   */
  isoDate(column: string, options: DateReadOptions = {}): IsoDate | null {
    const value = this.raw(column);
    if (value === null) {
      return null;
    }

    const text = typeof value === 'number' ? String(value) : value.trim();
    if (text === '') {
      return null;
    }
    if (!isValidIsoDate(text)) {
      return this.invalidDate(column, value);
    }
    return this.withinRange(column, value, text, options);
  }

  /**
   * Compact YYYYMMDD date; zero and values without exactly 8 digits are invalid
   */
  compactDate(column: string, options: DateReadOptions = {}): IsoDate | null {
    const value = this.raw(column);
    if (value === null) {
      return null;
    }

    const text = typeof value === 'number'
      ? (Number.isInteger(value) ? String(value) : '')
      : value.trim();
    if (typeof value === 'string' && text === '') {
      return null;
    }

    const date = compactToIsoDate(text);
    if (date === null) {
      return this.invalidDate(column, value);
    }
    return this.withinRange(column, value, date, options);
  }

  private withinRange(
    column: string,
    original: RawValue,
    date: IsoDate,
    options: DateReadOptions
  ): IsoDate | null {
    const upper = options.notAfterReference && this.dates.referenceDate < this.dates.maxValidDate
      ? this.dates.referenceDate
      : this.dates.maxValidDate;

    if (date < this.dates.minValidDate || date > upper) {
      this.issues.warning(
        'date_out_of_range',
        'format',
        `${column} ${date} is outside ${this.dates.minValidDate}..${upper}`,
        this.details(column, original, null)
      );
      return null;
    }
    return date;
  }

  private invalidDate(column: string, original: RawValue): null {
    this.issues.warning(
      'invalid_date',
      'format',
      `${column} value '${original}' is not a valid date`,
      this.details(column, original, null)
    );
    return null;
  }

  private invalidNumber(column: string, original: RawValue): null {
    this.issues.warning(
      'invalid_number',
      'format',
      `${column} value '${original}' is not numeric`,
      this.details(column, original, null)
    );
    return null;
  }

  private details(field: string, originalValue: RawValue, correctedValue: RawValue): IssueDetails {
    return {
      businessKey: this.businessKey,
      field,
      rowOffset: this.rowOffset,
      originalValue,
      correctedValue
    };
  }
}
