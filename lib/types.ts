/**
 * Core type definitions for the grouped sheet merger
 */

// ============================================================================
// Cell & Table Types
// ============================================================================

/** Primitive cell value types delivered by a loader */
export type CellValue = string | number | boolean | Date | null;

/** A sheet extracted into header + data rows, before normalization */
export interface LoadedTable {
  sheetName: string;
  /** 1-based row number of the header in the source sheet */
  headerRow: number;
  /** Unique column names, in sheet order */
  header: string[];
  /** Data rows, each exactly `header.length` cells wide */
  rows: CellValue[][];
}

/** A normalized row: column name -> cleaned string value */
export type Row = Readonly<Record<string, string>>;

// ============================================================================
// Grouping Types
// ============================================================================

/** Ordered tuple of a row's key-column values */
export type CompositeKey = readonly string[];

/** Rows sharing one composite key, in source order */
export interface Group {
  readonly key: CompositeKey;
  readonly rows: readonly Row[];
}

/** Groups ordered by first appearance of their composite key */
export type GroupedTable = readonly Group[];

/** A vertical span of one column to merge in the output sheet */
export interface MergeRange {
  /** 1-based physical column */
  readonly column: number;
  /** 1-based physical row, inclusive */
  readonly startRow: number;
  /** 1-based physical row, inclusive; always greater than startRow */
  readonly endRow: number;
}

// ============================================================================
// Output Types
// ============================================================================

/** Flattened spreadsheet ready to be written */
export interface SheetLayout {
  header: string[];
  /** Data rows; the sequence column holds numbers */
  rows: (string | number)[][];
  merges: MergeRange[];
  /** 1-based columns whose cells are centered */
  centeredColumns: number[];
}

/** One detail record of the structured export */
export type DetailRecord = Record<string, string>;

/** Composite key string -> detail records, in first-appearance order */
export type StructuredExport = Map<string, DetailRecord[]>;

export type CollisionPolicy = 'overwrite' | 'error';

// ============================================================================
// Processing Result Types
// ============================================================================

export interface ProcessingStats {
  inputRows: number;
  keptRows: number;
  droppedRows: number;
  groups: number;
  mergedGroups: number;
  mergeRanges: number;
}

/** Complete result of one run over a workbook */
export interface ProcessingResult {
  runId: string;
  fileName: string;
  table: LoadedTable;
  grouped: GroupedTable;
  layout: SheetLayout;
  structured: StructuredExport;
  /** Rendered xlsx file */
  xlsx: Buffer;
  /** Rendered JSON document */
  json: string;
  stats: ProcessingStats;
}
