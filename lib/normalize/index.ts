/**
 * Normalization module exports
 */

import type { LoadedTable, Row } from '@/lib/types';
import { normalizeCell } from './cell-normalizer';
import { normalizeDate } from './date-normalizer';

export { normalizeCell, isEmptyRow, expandScientific } from './cell-normalizer';
export {
  normalizeDate,
  isDateColumn,
  serialToYmd,
  DEFAULT_DATE_KEYWORDS,
} from './date-normalizer';

/**
 * Normalize every cell of a loaded table into Rows keyed by column name
 * Date columns go through the date normalizer before cell cleanup
 */
export function normalizeRows(
  table: LoadedTable,
  dateColumns: readonly string[]
): Row[] {
  const dateSet = new Set(dateColumns);

  return table.rows.map((cells) =>
    Object.fromEntries(
      table.header.map((column, index): [string, string] => {
        const raw = cells[index] ?? null;
        return [column, normalizeCell(dateSet.has(column) ? normalizeDate(raw) : raw)];
      })
    )
  );
}
