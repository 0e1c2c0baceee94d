/**
 * Spreadsheet output
 * Flattens grouped rows into a sheet layout and writes it with exceljs
 */

import ExcelJS from 'exceljs';
import type { GroupedTable, MergeRange, SheetLayout } from '@/lib/types';
import { calculateMergeRanges } from '@/lib/grouping/merge-ranges';
import { outputColumnName } from '@/lib/config/validator';
import type { ResolvedConfig } from '@/lib/config/schema';
import { columnIndexToLetter } from './parser';

// ============================================================================
// Configuration
// ============================================================================

/** The layout always carries exactly one header row */
const HEADER_ROWS = 1;

const MIN_COLUMN_WIDTH = 8;
const MAX_COLUMN_WIDTH = 50;

const CENTERED: Partial<ExcelJS.Alignment> = { horizontal: 'center', vertical: 'middle' };

type LayoutConfig = Pick<
  ResolvedConfig,
  'keyColumns' | 'detailColumns' | 'sequenceHeader' | 'columnRenames'
>;

// ============================================================================
// Layout
// ============================================================================

/**
 * Flatten a grouped table into physical rows with merge instructions
 *
 * Columns: [sequence], key columns, detail columns. Key values repeat on
 * every row of their group; the sequence column and key columns are merged
 * per multi-row group, detail columns never are.
 */
export function buildSheetLayout(table: GroupedTable, config: LayoutConfig): SheetLayout {
  const hasSequence = config.sequenceHeader !== null;
  const keyOffset = hasSequence ? 1 : 0;

  const header = [
    ...(config.sequenceHeader !== null ? [config.sequenceHeader] : []),
    ...config.keyColumns.map((col) => outputColumnName(config, col)),
    ...config.detailColumns.map((col) => outputColumnName(config, col)),
  ];

  const rows: (string | number)[][] = [];
  table.forEach((group, groupIndex) => {
    for (const row of group.rows) {
      rows.push([
        ...(hasSequence ? [groupIndex + 1] : []),
        ...group.key,
        ...config.detailColumns.map((col) => row[col] ?? ''),
      ]);
    }
  });

  const mergedColumns = Array.from(
    { length: keyOffset + config.keyColumns.length },
    (_, index) => index + 1
  );

  return {
    header,
    rows,
    merges: calculateMergeRanges(table, { headerOffset: HEADER_ROWS, columns: mergedColumns }),
    centeredColumns: mergedColumns,
  };
}

/**
 * Render a merge range as an A1-style reference, e.g. "B2:B4"
 */
export function formatMergeRange(range: MergeRange): string {
  const letter = columnIndexToLetter(range.column - 1);
  return `${letter}${range.startRow}:${letter}${range.endRow}`;
}

// ============================================================================
// Writer
// ============================================================================

/**
 * Write a sheet layout to an xlsx buffer
 */
export async function writeWorkbook(layout: SheetLayout, sheetTitle: string): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const worksheet = workbook.addWorksheet(sheetTitle);

  worksheet.addRow(layout.header);
  worksheet.getRow(1).font = { bold: true };
  worksheet.views = [{ state: 'frozen', ySplit: HEADER_ROWS }];

  worksheet.addRows(layout.rows);

  for (const column of layout.centeredColumns) {
    for (let row = HEADER_ROWS + 1; row <= HEADER_ROWS + layout.rows.length; row++) {
      worksheet.getCell(row, column).alignment = CENTERED;
    }
  }

  for (const range of layout.merges) {
    worksheet.mergeCells(formatMergeRange(range));
  }

  layout.header.forEach((label, index) => {
    worksheet.getColumn(index + 1).width = columnWidth(label, layout.rows, index);
  });

  return Buffer.from(await workbook.xlsx.writeBuffer());
}

/**
 * Estimate a column width from its widest cell (CJK characters count double)
 */
function columnWidth(label: string, rows: (string | number)[][], index: number): number {
  let widest = displayWidth(label);
  for (const row of rows) {
    widest = Math.max(widest, displayWidth(String(row[index] ?? '')));
  }
  return Math.min(MAX_COLUMN_WIDTH, Math.max(MIN_COLUMN_WIDTH, widest + 2));
}

function displayWidth(text: string): number {
  let width = 0;
  for (const char of text) {
    width += /[\u2E80-\u9FFF\uFF00-\uFFEF]/.test(char) ? 2 : 1;
  }
  return width;
}
