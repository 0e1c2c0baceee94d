/**
 * Main Excel file processor
 * Orchestrates loading, normalization, grouping and both exports
 */

import { parseExcelBuffer, extractTable } from './parser';
import { buildSheetLayout, writeWorkbook } from './table-writer';
import { resolveConfig } from '@/lib/config/validator';
import type { GroupingConfig, ResolvedConfig } from '@/lib/config/schema';
import { normalizeRows } from '@/lib/normalize';
import { groupRows, countGroupedRows } from '@/lib/grouping/row-grouper';
import { exportStructured, serializeStructuredExport } from '@/lib/export/structured-exporter';
import type {
  GroupedTable,
  LoadedTable,
  ProcessingResult,
  ProcessingStats,
  SheetLayout,
  StructuredExport,
} from '@/lib/types';
import { generateId } from '@/lib/utils';

// ============================================================================
// Types
// ============================================================================

/** Output of the in-memory pipeline, before anything is rendered */
export interface GroupingOutcome {
  config: ResolvedConfig;
  grouped: GroupedTable;
  layout: SheetLayout;
  structured: StructuredExport;
  stats: ProcessingStats;
}

// ============================================================================
// Main Processor
// ============================================================================

/**
 * Process a workbook buffer into the merged spreadsheet and JSON document
 *
 * Pipeline:
 * 1. Parse with SheetJS (raw values)
 * 2. Extract the configured sheet and header row
 * 3. Validate column roles against the header
 * 4. Normalize, group, lay out and export
 * 5. Render xlsx (exceljs) and JSON
 */
export async function processWorkbook(
  buffer: ArrayBuffer | Uint8Array,
  fileName: string,
  config: GroupingConfig
): Promise<ProcessingResult> {
  const runId = generateId();

  console.log(`[Processor] Parsing ${fileName}...`);
  const workbook = parseExcelBuffer(buffer);

  const table = extractTable(workbook, {
    sheetName: config.sheetName,
    headerRow: config.headerRow,
  });
  console.log(
    `[Processor] Sheet "${table.sheetName}": header row ${table.headerRow}, ` +
      `${table.header.length} columns, ${table.rows.length} data rows`
  );

  const outcome = groupTable(table, config);

  console.log('[Processor] Rendering outputs...');
  const xlsx = await writeWorkbook(outcome.layout, outcome.config.outputSheetTitle);
  const json = serializeStructuredExport(outcome.structured);

  return {
    runId,
    fileName,
    table,
    grouped: outcome.grouped,
    layout: outcome.layout,
    structured: outcome.structured,
    xlsx,
    json,
    stats: outcome.stats,
  };
}

/**
 * Run the in-memory pipeline over a loaded table
 * Both exports consume the same grouped table
 */
export function groupTable(table: LoadedTable, config: GroupingConfig): GroupingOutcome {
  // Fails fast, before any grouping
  const resolved = resolveConfig(config, table.header);

  if (resolved.dateColumns.length > 0) {
    console.log(`[Processor] Date columns: ${resolved.dateColumns.join(', ')}`);
  }

  const rows = normalizeRows(table, resolved.dateColumns);
  const grouped = groupRows(rows, resolved.keyColumns);
  const layout = buildSheetLayout(grouped, resolved);
  const structured = exportStructured(grouped, {
    delimiter: resolved.jsonKeyDelimiter,
    detailColumns: resolved.detailColumns,
    columnRenames: resolved.columnRenames,
    onCollision: resolved.onKeyCollision,
  });

  const keptRows = countGroupedRows(grouped);
  const stats: ProcessingStats = {
    inputRows: table.rows.length,
    keptRows,
    droppedRows: table.rows.length - keptRows,
    groups: grouped.length,
    mergedGroups: grouped.filter((group) => group.rows.length > 1).length,
    mergeRanges: layout.merges.length,
  };

  console.log(
    `[Processor] Grouped ${stats.keptRows} rows into ${stats.groups} groups ` +
      `(${stats.mergedGroups} merged, ${stats.droppedRows} empty rows dropped)`
  );

  return { config: resolved, grouped, layout, structured, stats };
}
