/**
 * Shared helpers
 */

import { v4 as uuidv4 } from 'uuid';

/**
 * Generate a unique run identifier
 */
export function generateId(): string {
  return uuidv4();
}

/**
 * Pad a number to two digits
 */
export function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Format calendar fields as YYYY-MM-DD
 */
export function formatYmd(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;
}

/**
 * Check whether year/month/day name a real calendar date
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (year < 1 || year > 9999 || month < 1 || month > 12 || day < 1) {
    return false;
  }
  const probe = new Date(Date.UTC(2000, month - 1, day));
  probe.setUTCFullYear(year);
  return (
    probe.getUTCFullYear() === year &&
    probe.getUTCMonth() === month - 1 &&
    probe.getUTCDate() === day
  );
}
