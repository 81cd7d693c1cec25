/**
 * Time utilities for consistent date handling.
 * Dates inside the ingest pipeline are ISO calendar dates (YYYY-MM-DD);
 * provider wire formats (YYYYMMDD) are converted at the client boundary.
 */

import { randomBytes } from 'crypto';
import { addDays, format, isValid, parse, subDays } from 'date-fns';

const INPUT_FORMATS = ['yyyy-MM-dd', 'yyyyMMdd', 'yyyy/MM/dd'];

export function nowIso(now: Date = new Date()): string {
  return now.toISOString();
}

export function formatDate(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

export function parseDate(dateStr: string): Date {
  return parse(dateStr, 'yyyy-MM-dd', new Date(0));
}

/**
 * Accepts YYYY-MM-DD, YYYYMMDD or YYYY/MM/DD and returns YYYY-MM-DD,
 * or null when the value is not a real calendar date.
 */
export function toIsoDate(value: string | null | undefined): string | null {
  if (!value) return null;
  const raw = value.trim();
  for (const pattern of INPUT_FORMATS) {
    if (raw.length !== pattern.length) continue;
    const parsed = parse(raw, pattern, new Date(0));
    if (isValid(parsed) && format(parsed, pattern) === raw) {
      return formatDate(parsed);
    }
  }
  return null;
}

export function toCompactDate(isoDate: string): string {
  return isoDate.replace(/-/g, '');
}

export function shiftDays(isoDate: string, days: number): string {
  const base = parseDate(isoDate);
  return formatDate(days >= 0 ? addDays(base, days) : subDays(base, -days));
}

export function todayIso(now: Date = new Date()): string {
  return formatDate(now);
}

/** Opaque run id: timestamp plus 12 hex chars of entropy. */
export function createRunId(now: Date = new Date(), entropy: string = randomBytes(6).toString('hex')): string {
  return `${format(now, "yyyyMMdd'T'HHmmss")}-${entropy}`;
}
