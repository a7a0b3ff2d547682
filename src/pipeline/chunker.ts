import type { DateChunk, DateRange } from "../types.js";

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Parse a `YYYY-MM-DD` string into a Date at noon UTC, which keeps day
 * arithmetic clear of DST shifts. Rolled-over dates such as 2023-02-30 are
 * rejected.
 */
export function parseIsoDate(value: string): Date {
  if (!ISO_DATE.test(value)) {
    throw new RangeError(`Invalid date "${value}": expected YYYY-MM-DD`);
  }
  const date = new Date(`${value}T12:00:00Z`);
  if (isNaN(date.getTime()) || formatIsoDate(date) !== value) {
    throw new RangeError(`Invalid date "${value}": no such calendar day`);
  }
  return date;
}

export function addDays(value: string, days: number): string {
  const date = parseIsoDate(value);
  date.setUTCDate(date.getUTCDate() + days);
  return formatIsoDate(date);
}

/**
 * Move a date forward by whole calendar months. The day of month is clamped
 * to the length of the target month (2024-01-31 + 1 month = 2024-02-29).
 */
export function addMonths(value: string, months: number): string {
  const date = parseIsoDate(value);
  const target = new Date(
    Date.UTC(date.getUTCFullYear(), date.getUTCMonth() + months, 1, 12)
  );
  const lastDay = new Date(
    Date.UTC(target.getUTCFullYear(), target.getUTCMonth() + 1, 0, 12)
  ).getUTCDate();
  target.setUTCDate(Math.min(date.getUTCDate(), lastDay));
  return formatIsoDate(target);
}

export function validateDateRange(range: DateRange): void {
  parseIsoDate(range.startDate);
  parseIsoDate(range.endDate);
  if (range.startDate > range.endDate) {
    throw new RangeError(
      `Start date ${range.startDate} is after end date ${range.endDate}`
    );
  }
}

function monthIndex(value: string): number {
  return Number(value.slice(0, 4)) * 12 + Number(value.slice(5, 7)) - 1;
}

function* iterateChunks(range: DateRange, chunkMonths: number): Generator<DateChunk> {
  let chunkStart = range.startDate;
  for (;;) {
    // An end before the target month closes the last chunk; no later date is built.
    const isLast = monthIndex(range.endDate) - monthIndex(chunkStart) < chunkMonths;
    const boundary = isLast ? range.endDate : addDays(addMonths(chunkStart, chunkMonths), -1);
    const chunkEnd = boundary < range.endDate ? boundary : range.endDate;
    yield { startDate: chunkStart, endDate: chunkEnd };
    if (chunkEnd === range.endDate) return;
    chunkStart = addDays(chunkEnd, 1);
  }
}

/**
 * Split a date range into consecutive chunks of at most `chunkMonths`
 * calendar months. Each chunk ends the day before its own start plus
 * `chunkMonths` months (2023-01-01 → 2023-03-31 for 3), the next one starts
 * the day after, and the last ends exactly on `range.endDate`.
 *
 * Arguments are validated eagerly, chunks are produced lazily.
 */
export function generateDateChunks(
  range: DateRange,
  chunkMonths: number
): Generator<DateChunk> {
  if (!Number.isInteger(chunkMonths) || chunkMonths < 1) {
    throw new RangeError(`chunkMonths must be a positive integer, got ${chunkMonths}`);
  }
  validateDateRange(range);
  return iterateChunks(range, chunkMonths);
}

export function listDateChunks(range: DateRange, chunkMonths: number): DateChunk[] {
  return Array.from(generateDateChunks(range, chunkMonths));
}
