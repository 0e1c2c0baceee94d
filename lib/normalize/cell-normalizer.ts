/**
 * Cell normalization
 * Cleans raw cell values into trimmed strings and repairs numeric rendering artifacts
 */

import type { CellValue, Row } from '@/lib/types';
import { formatYmd, pad2 } from '@/lib/utils';

// ============================================================================
// Configuration
// ============================================================================

/** Strings left behind by tools that stringify missing values */
const MISSING_MARKERS = new Set(['nan', 'NaN']);

/** Scientific notation with a non-negative exponent, e.g. 1.23E+11 */
const SCIENTIFIC_PATTERN = /^([+-]?)(\d+)(?:\.(\d+))?[eE]\+?(\d+)$/;

/** Number#toString output for small magnitudes, e.g. 1.5e-7 */
const NEGATIVE_EXPONENT_PATTERN = /^(-?)(\d)(?:\.(\d+))?e-(\d+)$/;

/** Integer rendered as a float, e.g. 100.0 */
const FLOAT_INTEGER_PATTERN = /^([+-]?\d+)\.0$/;

// ============================================================================
// Main Normalizer
// ============================================================================

/**
 * Normalize a single cell value into a clean string
 * Never throws: values that cannot be cleaned are returned stringified
 */
export function normalizeCell(value: CellValue | undefined): string {
  try {
    if (value === null || value === undefined) return '';
    if (typeof value === 'string') return normalizeText(value);
    if (typeof value === 'number') return normalizeNumber(value);
    if (typeof value === 'boolean') return value ? 'TRUE' : 'FALSE';
    return formatDateTime(value);
  } catch {
    return String(value);
  }
}

/**
 * Check if every cell in a row is empty or whitespace-only
 */
export function isEmptyRow(row: Row | readonly string[]): boolean {
  return Object.values(row).every((value) => value.trim() === '');
}

/**
 * Expand integer-like scientific notation to plain digits
 * Returns null when the value is not integer-like scientific notation
 */
export function expandScientific(text: string): string | null {
  const match = SCIENTIFIC_PATTERN.exec(text);
  if (!match) return null;

  const [, sign, intPart, rawFraction = '', rawExponent] = match;
  const fraction = rawFraction.replace(/0+$/, '');
  const exponent = Number(rawExponent);

  // More fraction digits than the exponent shifts: a true float
  if (fraction.length > exponent) return null;

  const digits = (intPart + fraction + '0'.repeat(exponent - fraction.length)).replace(
    /^0+(?=\d)/,
    ''
  );

  if (digits === '0') return '0';
  return sign === '-' ? `-${digits}` : digits;
}

// ============================================================================
// Helpers
// ============================================================================

function normalizeText(value: string): string {
  const text = value.trim();
  if (MISSING_MARKERS.has(text)) return '';

  const expanded = expandScientific(text);
  if (expanded !== null) return expanded;

  const floatInteger = FLOAT_INTEGER_PATTERN.exec(text);
  if (floatInteger) {
    return floatInteger[1] === '-0' ? '0' : floatInteger[1];
  }

  return text;
}

function normalizeNumber(value: number): string {
  if (Number.isNaN(value)) return '';
  if (Number.isInteger(value)) {
    // Number#toString switches to exponent form from 1e21 up
    return Math.abs(value) < 1e21 ? String(value) : BigInt(value).toString();
  }
  return toPlainDecimal(value);
}

function toPlainDecimal(value: number): string {
  const text = String(value);
  const match = NEGATIVE_EXPONENT_PATTERN.exec(text);
  if (!match) return text;

  const [, sign, intPart, fraction = '', rawExponent] = match;
  return `${sign}0.${'0'.repeat(Number(rawExponent) - 1)}${intPart}${fraction}`;
}

function formatDateTime(date: Date): string {
  if (Number.isNaN(date.getTime())) return String(date);

  const day = formatYmd(date.getFullYear(), date.getMonth() + 1, date.getDate());
  const hours = date.getHours();
  const minutes = date.getMinutes();
  const seconds = date.getSeconds();

  if (hours === 0 && minutes === 0 && seconds === 0) {
    return day;
  }
  return `${day} ${pad2(hours)}:${pad2(minutes)}:${pad2(seconds)}`;
}
