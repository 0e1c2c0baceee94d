/**
 * Date normalization for date-like columns
 * Converts date strings, Date objects and spreadsheet serial days to YYYY-MM-DD
 */

import type { CellValue } from '@/lib/types';
import { formatYmd, isValidCalendarDate } from '@/lib/utils';

// ============================================================================
// Configuration
// ============================================================================

/** Header keywords that flag a column as date-like */
export const DEFAULT_DATE_KEYWORDS = ['日期', '时间', 'Date', 'Time'];

/** Serial day 0 (absorbs the 1900 leap-year miscount for modern dates) */
const SERIAL_EPOCH_MS = Date.UTC(1899, 11, 30);

const SECONDS_PER_DAY = 24 * 60 * 60;
const MS_PER_DAY = SECONDS_PER_DAY * 1000;

/** Numeric strings at or below this are treated as codes, not serial days */
const MIN_SERIAL_STRING = 10000;

/** Optional time-of-day suffix after a calendar date */
const TIME_SUFFIX = String.raw`(?:[T ]\s*\d{1,2}:\d{2}(?::\d{2}(?:\.\d+)?)?\s*(?:Z|[+-]\d{2}:?\d{2})?)?`;

const YMD_PATTERN = new RegExp(String.raw`^(\d{4})([-/.])(\d{1,2})\2(\d{1,2})${TIME_SUFFIX}$`);
const CJK_PATTERN = new RegExp(String.raw`^(\d{4})年(\d{1,2})月(\d{1,2})日${TIME_SUFFIX}$`);
const US_PATTERN = new RegExp(String.raw`^(\d{1,2})/(\d{1,2})/(\d{4})${TIME_SUFFIX}$`);

const NUMERIC_STRING_PATTERN = /^\d+(\.\d+)?$/;

// ============================================================================
// Column Detection
// ============================================================================

/**
 * Check if a header names a date-like column (case-sensitive substring match)
 */
export function isDateColumn(
  header: string,
  keywords: readonly string[] = DEFAULT_DATE_KEYWORDS
): boolean {
  return keywords.some((keyword) => keyword !== '' && header.includes(keyword));
}

// ============================================================================
// Main Normalizer
// ============================================================================

/**
 * Normalize a date-like cell to YYYY-MM-DD
 *
 * Tried in order, first success wins:
 * 1. calendar-date string
 * 2. Date object
 * 3. serial day count (numbers, or numeric strings above 10000)
 * 4. original value stringified
 */
export function normalizeDate(value: CellValue): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    const parsed = parseDateString(value.trim());
    if (parsed) return parsed;
  }

  if (value instanceof Date) {
    const formatted = formatDate(value);
    if (formatted) return formatted;
  }

  const serial = toSerialNumber(value);
  if (serial !== null) {
    const formatted = serialToYmd(serial);
    if (formatted) return formatted;
  }

  return String(value);
}

/**
 * Convert a spreadsheet serial day count to YYYY-MM-DD
 * Returns null when the date falls outside years 1..9999
 */
export function serialToYmd(serial: number): string | null {
  if (!Number.isFinite(serial)) return null;

  const date = new Date(SERIAL_EPOCH_MS + Math.floor(serial) * MS_PER_DAY);
  const year = date.getUTCFullYear();
  if (Number.isNaN(year) || year < 1 || year > 9999) {
    return null;
  }

  return formatYmd(year, date.getUTCMonth() + 1, date.getUTCDate());
}

/**
 * Convert a serial day count (with fractional time) to a Date whose local
 * calendar and clock fields show the serial's day and time-of-day
 * Returns null when the date falls outside years 1..9999
 */
export function serialToDate(serial: number): Date | null {
  if (!Number.isFinite(serial)) return null;

  const totalSeconds = Math.round(serial * SECONDS_PER_DAY);
  const days = Math.floor(totalSeconds / SECONDS_PER_DAY);
  const day = new Date(SERIAL_EPOCH_MS + days * MS_PER_DAY);
  const year = day.getUTCFullYear();
  if (Number.isNaN(year) || year < 1 || year > 9999) {
    return null;
  }

  const secondOfDay = totalSeconds - days * SECONDS_PER_DAY;
  const date = new Date(
    2000,
    0,
    1,
    Math.floor(secondOfDay / 3600),
    Math.floor((secondOfDay % 3600) / 60),
    secondOfDay % 60
  );
  // setFullYear keeps years below 100 literal
  date.setFullYear(year, day.getUTCMonth(), day.getUTCDate());
  return date;
}

// ============================================================================
// Helpers
// ============================================================================

function parseDateString(text: string): string | null {
  let match = YMD_PATTERN.exec(text);
  if (match) {
    return buildYmd(match[1], match[3], match[4]);
  }

  match = CJK_PATTERN.exec(text);
  if (match) {
    return buildYmd(match[1], match[2], match[3]);
  }

  match = US_PATTERN.exec(text);
  if (match) {
    return buildYmd(match[3], match[1], match[2]);
  }

  return null;
}

function buildYmd(year: string, month: string, day: string): string | null {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  return isValidCalendarDate(y, m, d) ? formatYmd(y, m, d) : null;
}

function formatDate(date: Date): string | null {
  if (Number.isNaN(date.getTime())) return null;
  return formatYmd(date.getFullYear(), date.getMonth() + 1, date.getDate());
}

function toSerialNumber(value: CellValue): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }

  if (typeof value === 'string') {
    const text = value.trim();
    if (!NUMERIC_STRING_PATTERN.test(text)) return null;

    const num = Number(text);
    return num > MIN_SERIAL_STRING ? num : null;
  }

  return null;
}
