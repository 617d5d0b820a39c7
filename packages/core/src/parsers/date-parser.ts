/**
 * Due dates arrive as DD-MM-YYYY and are kept as yyyy-MM-dd, which sorts
 * chronologically as a plain string.
 */

import type { CanonicalDate } from '../types/task.js';

/** Literal accepted in place of a date to mean "no due date" */
export const NO_DATE = 'NONE';

const DUE_DATE_RE = /^(\d{2})-(\d{2})-(\d{4})$/;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

export function daysInMonth(year: number, month: number): number {
  switch (month) {
    case 2: return isLeapYear(year) ? 29 : 28;
    case 4: case 6: case 9: case 11: return 30;
    default: return 31;
  }
}

/**
 * Parse a DD-MM-YYYY string into yyyy-MM-dd.
 * Returns null when the text is malformed or names a day that does not
 * exist (31-04-2025, 29-02-2023).
 */
export function parseDueDate(input: string): CanonicalDate | null {
  const m = DUE_DATE_RE.exec(input);
  if (!m) return null;

  const day = parseInt(m[1]!, 10);
  const month = parseInt(m[2]!, 10);
  const year = parseInt(m[3]!, 10);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;

  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/** Format yyyy-MM-dd back to DD-MM-YYYY, or NONE for a missing date */
export function formatDueDate(date: CanonicalDate | null): string {
  if (date == null) return NO_DATE;
  return date.split('-').reverse().join('-');
}

/** A Date truncated to whole seconds since the epoch */
export function toEpochSeconds(d: Date): number {
  return Math.floor(d.getTime() / 1000);
}

/** Format epoch seconds as local DD-MM-YYYY HH:MM:SS */
export function formatTimestamp(epochSeconds: number): string {
  const d = new Date(epochSeconds * 1000);
  const date = `${pad(d.getDate())}-${pad(d.getMonth() + 1)}-${pad(d.getFullYear(), 4)}`;
  const time = `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
  return `${date} ${time}`;
}
