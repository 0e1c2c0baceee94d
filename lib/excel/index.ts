/**
 * Excel processing module exports
 */

export {
  parseExcelBuffer,
  listSheetNames,
  extractTable,
  uniqueHeaderNames,
  columnIndexToLetter,
} from './parser';
export type { RawParsedSheet, RawParsedWorkbook, ExtractOptions } from './parser';

export { buildSheetLayout, formatMergeRange, writeWorkbook } from './table-writer';

export { processWorkbook, groupTable } from './processor';
export type { GroupingOutcome } from './processor';
