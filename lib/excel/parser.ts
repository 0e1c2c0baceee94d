/**
 * Excel file parser using SheetJS
 * Loads workbooks with raw cell values and extracts one sheet as a table
 */

import * as XLSX from 'xlsx';
import type { CellValue, LoadedTable } from '@/lib/types';
import { ConfigurationError } from '@/lib/config/validator';
import { normalizeCell } from '@/lib/normalize/cell-normalizer';
import { serialToDate } from '@/lib/normalize/date-normalizer';

// ============================================================================
// Types
// ============================================================================

/** Raw parsed sheet from SheetJS */
export interface RawParsedSheet {
  name: string;
  /** 2D array of raw values; row 0 is the first sheet row */
  data: CellValue[][];
}

/** Raw parsed workbook */
export interface RawParsedWorkbook {
  sheets: RawParsedSheet[];
  sheetNames: string[];
}

export interface ExtractOptions {
  /** Sheet to read; defaults to the first sheet */
  sheetName?: string;
  /** 1-based header row */
  headerRow: number;
}

// ============================================================================
// Main Parser
// ============================================================================

/**
 * Parse an Excel (or CSV) buffer into raw sheet data
 * Numbers stay numbers so long identifiers keep every digit
 */
export function parseExcelBuffer(buffer: ArrayBuffer | Uint8Array): RawParsedWorkbook {
  const workbook = readWorkbook(buffer);

  const sheets = workbook.SheetNames.map((sheetName) =>
    parseWorksheet(sheetName, workbook.Sheets[sheetName])
  );

  return {
    sheets,
    sheetNames: workbook.SheetNames,
  };
}

/**
 * List the sheet names of a workbook without extracting cell data
 */
export function listSheetNames(buffer: ArrayBuffer | Uint8Array): string[] {
  return XLSX.read(buffer, { type: 'array', bookSheets: true }).SheetNames;
}

/**
 * Extract one sheet into a header + data rows table
 */
export function extractTable(
  workbook: RawParsedWorkbook,
  options: ExtractOptions
): LoadedTable {
  const sheet = options.sheetName
    ? workbook.sheets.find((s) => s.name === options.sheetName)
    : workbook.sheets[0];

  if (!sheet) {
    throw new ConfigurationError(
      options.sheetName
        ? `Sheet "${options.sheetName}" not found (available: ${workbook.sheetNames.join(', ')})`
        : 'Workbook contains no sheets'
    );
  }

  const headerIndex = options.headerRow - 1;
  const headerCells = sheet.data[headerIndex];
  if (!headerCells) {
    throw new ConfigurationError(
      `Header row ${options.headerRow} is beyond the last row of sheet "${sheet.name}" ` +
        `(${sheet.data.length} rows)`
    );
  }

  const header = uniqueHeaderNames(headerCells.map((cell) => normalizeCell(cell)));
  const width = header.length;

  const rows = sheet.data.slice(headerIndex + 1).map((row) =>
    Array.from({ length: width }, (_, col): CellValue => row[col] ?? null)
  );

  return {
    sheetName: sheet.name,
    headerRow: options.headerRow,
    header,
    rows,
  };
}

/**
 * Make header names unique: blanks become "Unnamed: <index>",
 * repeats get a ".<n>" suffix
 */
export function uniqueHeaderNames(names: readonly string[]): string[] {
  const used = new Set<string>();
  const counts = new Map<string, number>();

  return names.map((raw, index) => {
    const base = raw === '' ? `Unnamed: ${index}` : raw;
    let name = base;
    let count = counts.get(base) ?? 0;

    while (used.has(name)) {
      count++;
      name = `${base}.${count}`;
    }

    counts.set(base, count);
    used.add(name);
    return name;
  });
}

// ============================================================================
// Worksheet Parsing
// ============================================================================

function readWorkbook(buffer: ArrayBuffer | Uint8Array): XLSX.WorkBook {
  return XLSX.read(buffer, {
    type: 'array',
    // Date-formatted cells are converted by serialToDate, not by SheetJS
    cellDates: false,
    cellFormula: false,
    cellNF: true,
    cellStyles: false,
    // Keep CSV text as text so long digit strings are not parsed as floats
    raw: true,
  });
}

/**
 * Parse a single worksheet into raw data
 * Rows are addressed from the first sheet row so header row numbers stay absolute
 */
function parseWorksheet(name: string, worksheet: XLSX.WorkSheet): RawParsedSheet {
  const ref = worksheet['!ref'];
  if (!ref) {
    return { name, data: [] };
  }

  const range = XLSX.utils.decode_range(ref);
  const colCount = range.e.c - range.s.c + 1;

  const data: CellValue[][] = Array.from({ length: range.e.r + 1 }, () =>
    Array<CellValue>(colCount).fill(null)
  );

  for (let row = range.s.r; row <= range.e.r; row++) {
    for (let col = range.s.c; col <= range.e.c; col++) {
      const cell: XLSX.CellObject | undefined = worksheet[XLSX.utils.encode_cell({ r: row, c: col })];
      if (cell) {
        data[row][col - range.s.c] = getCellValue(cell);
      }
    }
  }

  return { name, data };
}

/**
 * Extract typed value from a SheetJS cell
 */
function getCellValue(cell: XLSX.CellObject): CellValue {
  // Error and stub cells carry no usable value
  if (cell.t === 'e' || cell.t === 'z') {
    return null;
  }

  const value = cell.v;
  if (typeof value === 'number' && isDateFormat(cell.z)) {
    return serialToDate(value) ?? value;
  }

  if (
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean' ||
    value instanceof Date
  ) {
    return value;
  }

  return null;
}

/**
 * Check if a cell number format renders a date or time
 */
function isDateFormat(format: unknown): boolean {
  if (typeof format !== 'string') return false;
  const result: unknown = XLSX.SSF.is_date(format);
  return result === true;
}

/**
 * Convert column index to Excel letter (0 -> A, 25 -> Z, 26 -> AA)
 */
export function columnIndexToLetter(index: number): string {
  let letter = '';
  let temp = index;

  while (temp >= 0) {
    letter = String.fromCharCode((temp % 26) + 65) + letter;
    temp = Math.floor(temp / 26) - 1;
  }

  return letter;
}
