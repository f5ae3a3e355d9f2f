/**
 * Calendar-date helpers
 *
 * Dates travel through the pipeline as YYYY-MM-DD strings and are interpreted
 * as UTC midnight, so day arithmetic never crosses a DST boundary.
 */

import { MS_PER_DAY } from '../constants.js';
import { InvalidRequestError } from '../errors.js';

const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Parse a YYYY-MM-DD string to a UTC Date
 *
 * @throws InvalidRequestError on malformed or impossible dates (e.g. 2025-02-30)
 */
export function parseIsoDate(value: string, field = 'date'): Date {
  const match = ISO_DATE.exec(value);
  if (!match) {
    throw new InvalidRequestError(`${field} must be YYYY-MM-DD, got "${value}"`, field);
  }

  const [, year, month, day] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  if (formatIsoDate(date) !== value) {
    throw new InvalidRequestError(`${field} is not a calendar date: "${value}"`, field);
  }

  return date;
}

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * MS_PER_DAY);
}

export function minDate(a: Date, b: Date): Date {
  return a.getTime() <= b.getTime() ? a : b;
}
