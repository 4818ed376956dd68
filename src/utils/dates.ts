/**
 * Calendar date helpers working on ISO (YYYY-MM-DD) strings in UTC
 */

import { IsoDate } from '../types/index.js';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function isCalendarDate(year: number, month: number, day: number): boolean {
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

function pad(value: number, width: number): string {
  return value.toString().padStart(width, '0');
}

export function isValidIsoDate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  return isCalendarDate(Number(match[1]), Number(match[2]), Number(match[3]));
}

/**
 * Convert a YYYYMMDD value to an ISO date, or null when it is not a calendar date
 */
export function compactToIsoDate(value: string): IsoDate | null {
  const match = COMPACT_DATE_PATTERN.exec(value);
  if (!match) {
    return null;
  }
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  if (!isCalendarDate(year, month, day)) {
    return null;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

function toIsoDate(date: Date): IsoDate {
  return `${pad(date.getUTCFullYear(), 4)}-${pad(date.getUTCMonth() + 1, 2)}-${pad(date.getUTCDate(), 2)}`;
}

export function todayIso(now: Date = new Date()): IsoDate {
  return toIsoDate(now);
}

/**
 * Shift an ISO date by whole days
 */
export function addDays(date: IsoDate, days: number): IsoDate {
  const match = ISO_DATE_PATTERN.exec(date);
  if (!match) {
    throw new RangeError(`Not an ISO date: ${date}`);
  }
  const time = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return toIsoDate(new Date(time + days * DAY_MS));
}

/**
 * Order ISO dates ascending with nulls first
 */
export function compareNullableDates(a: IsoDate | null, b: IsoDate | null): number {
  if (a === b) return 0;
  if (a === null) return -1;
  if (b === null) return 1;
  return a < b ? -1 : 1;
}
