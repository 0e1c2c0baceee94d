/**
 * Merge range calculation
 * Maps each multi-row group onto its physical rows in the output sheet
 */

import type { GroupedTable, MergeRange } from '@/lib/types';

export interface MergeLayoutOptions {
  /** Rows above the first data row (1 for a single header row) */
  headerOffset: number;
  /** 1-based physical columns to merge per group */
  columns: readonly number[];
}

/**
 * Compute merge ranges for every group spanning more than one row
 *
 * Blocks start at headerOffset + 1 and follow each other in group order.
 * Ranges come out grouped by block, then in the order of `columns`.
 */
export function calculateMergeRanges(
  table: GroupedTable,
  options: MergeLayoutOptions
): MergeRange[] {
  const ranges: MergeRange[] = [];
  let nextRow = options.headerOffset + 1;

  for (const group of table) {
    const startRow = nextRow;
    const endRow = startRow + group.rows.length - 1;
    nextRow = endRow + 1;

    if (endRow <= startRow) continue;

    for (const column of options.columns) {
      ranges.push({ column, startRow, endRow });
    }
  }

  return ranges;
}
