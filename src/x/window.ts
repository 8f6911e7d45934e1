import { InvalidInputError } from '../utils/errors.js';
import type { TimeWindow } from './types.js';

const MONTH_PATTERN = /^(\d{4})-(\d{2})$/;

export interface YearMonth {
  year: number;
  month: number;
}

/**
 * Parse a YYYY-MM string (month 01-12)
 */
export function parseMonth(value: string): YearMonth {
  const match = MONTH_PATTERN.exec(value.trim());
  if (!match) {
    throw InvalidInputError.fromInvalidMonth(value);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  if (month < 1 || month > 12) {
    throw InvalidInputError.fromInvalidMonth(value);
  }

  return { year, month };
}

function utcMidnight(year: number, monthIndex: number): Date {
  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, monthIndex, 1);
  return date;
}

/**
 * UTC bounds of a calendar month: start is 00:00 on the 1st, end is 00:00 on
 * the 1st of the following month. Month 12 rolls over into January.
 */
export function monthBounds(year: number, month: number): TimeWindow {
  const start = utcMidnight(year, month - 1);
  const end = utcMidnight(year, month);
  return Object.freeze({ start, end });
}

/**
 * ISO-8601 with second precision and a Z suffix, e.g. 2024-02-01T00:00:00Z
 */
export function toApiTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function formatMonth({ year, month }: YearMonth): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}
