/**
 * Grouping configuration schema and defaults
 */

import { z } from 'zod';
import { DEFAULT_DATE_KEYWORDS } from '@/lib/normalize/date-normalizer';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_JSON_KEY_DELIMITER = '_';

/** 1-based header row in the source sheet */
export const DEFAULT_HEADER_ROW = 1;

/** Header of the merged group counter column */
export const DEFAULT_SEQUENCE_HEADER = '序号';

export const DEFAULT_OUTPUT_SHEET_TITLE = '处理结果';

// ============================================================================
// Schema
// ============================================================================

const columnName = z.string().min(1, 'Column names must not be empty');

export const groupingConfigSchema = z
  .object({
    keyColumns: z
      .array(columnName)
      .min(1, 'At least one key column is required')
      .refine((cols) => new Set(cols).size === cols.length, 'Key columns must be unique'),
    detailColumns: z
      .array(columnName)
      .refine((cols) => new Set(cols).size === cols.length, 'Detail columns must be unique')
      .optional(),
    dateKeywords: z.array(z.string().min(1)).default(() => [...DEFAULT_DATE_KEYWORDS]),
    jsonKeyDelimiter: z
      .string()
      .min(1, 'JSON key delimiter must not be empty')
      .default(DEFAULT_JSON_KEY_DELIMITER),
    headerRow: z.number().int().positive().default(DEFAULT_HEADER_ROW),
    sheetName: z.string().min(1).optional(),
    sequenceHeader: z.string().min(1).nullable().default(DEFAULT_SEQUENCE_HEADER),
    columnRenames: z.record(z.string().min(1)).default({}),
    outputSheetTitle: z.string().min(1).max(31).default(DEFAULT_OUTPUT_SHEET_TITLE),
    onKeyCollision: z.enum(['overwrite', 'error']).default('overwrite'),
  })
  .strict();

/** Configuration as written in a config file */
export type GroupingConfigInput = z.input<typeof groupingConfigSchema>;

/** Configuration with defaults applied */
export type GroupingConfig = z.output<typeof groupingConfigSchema>;

/** Configuration resolved against a loaded header */
export interface ResolvedConfig extends GroupingConfig {
  detailColumns: string[];
  /** Columns flagged as date-like by dateKeywords */
  dateColumns: string[];
}
