/**
 * Fixed-size aggregation windows over an analysis range
 */

import { InvalidRequestError } from '../core/errors.js';
import type { AggregationWindow } from '../core/types.js';
import { addDays, formatIsoDate, minDate, parseIsoDate } from '../core/utils/dates.js';

/**
 * Contiguous half-open windows covering [startDate, endDate); the last one is
 * clipped to endDate. Empty when startDate >= endDate.
 *
 * @throws InvalidRequestError for malformed dates or a non-positive windowDays
 */
export function* generateWindows(
  startDate: string,
  endDate: string,
  windowDays: number
): Generator<AggregationWindow, void, undefined> {
  const start = parseIsoDate(startDate, 'startDate');
  const end = parseIsoDate(endDate, 'endDate');

  if (!Number.isInteger(windowDays) || windowDays <= 0) {
    throw new InvalidRequestError(
      `windowDays must be a positive integer, got ${windowDays}`,
      'windowDays'
    );
  }

  let current = start;
  while (current.getTime() < end.getTime()) {
    const windowEnd = minDate(addDays(current, windowDays), end);
    yield { startDate: formatIsoDate(current), endDate: formatIsoDate(windowEnd) };
    current = windowEnd;
  }
}

export function listWindows(startDate: string, endDate: string, windowDays: number): AggregationWindow[] {
  return [...generateWindows(startDate, endDate, windowDays)];
}
