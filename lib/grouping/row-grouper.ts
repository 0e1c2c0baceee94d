/**
 * Row grouping by composite key
 * Partitions normalized rows into groups ordered by first appearance
 */

import type { CompositeKey, Group, GroupedTable, Row } from '@/lib/types';
import { isEmptyRow } from '@/lib/normalize/cell-normalizer';

/**
 * Build a row's composite key from the key columns, in configured order
 */
export function buildCompositeKey(row: Row, keyColumns: readonly string[]): CompositeKey {
  return keyColumns.map((col) => row[col] ?? '');
}

/**
 * Group rows by composite key in a single forward pass
 *
 * Empty rows are dropped. The first row of a key fixes the group's position;
 * later rows with an equal key append to it.
 */
export function groupRows(rows: readonly Row[], keyColumns: readonly string[]): GroupedTable {
  // JSON of the tuple gives value equality without delimiter ambiguity
  const groups = new Map<string, { key: CompositeKey; rows: Row[] }>();

  for (const row of rows) {
    if (isEmptyRow(row)) continue;

    const key = buildCompositeKey(row, keyColumns);
    const mapKey = JSON.stringify(key);

    const existing = groups.get(mapKey);
    if (existing) {
      existing.rows.push(row);
    } else {
      groups.set(mapKey, { key, rows: [row] });
    }
  }

  return Array.from(groups.values(), (group): Group => group);
}

/**
 * Count the rows held by a grouped table
 */
export function countGroupedRows(table: GroupedTable): number {
  return table.reduce((total, group) => total + group.rows.length, 0);
}
