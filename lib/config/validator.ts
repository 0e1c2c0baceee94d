/**
 * Configuration validation
 * Parses config input and checks column roles against a loaded header
 */

import { readFile } from 'fs/promises';
import { isDateColumn } from '@/lib/normalize/date-normalizer';
import {
  groupingConfigSchema,
  type GroupingConfig,
  type ResolvedConfig,
} from './schema';

// ============================================================================
// Errors
// ============================================================================

/** Raised when the configuration cannot be applied; fatal to the run */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

/**
 * Validate raw config input and apply defaults
 */
export function parseGroupingConfig(input: unknown): GroupingConfig {
  const validation = groupingConfigSchema.safeParse(input);
  if (!validation.success) {
    const issue = validation.error.errors[0];
    const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    throw new ConfigurationError(`Invalid configuration: ${path}${issue.message}`);
  }
  return validation.data;
}

/**
 * Read and validate a JSON config file
 */
export async function loadConfigFile(filePath: string): Promise<GroupingConfig> {
  const text = await readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : 'Unknown error';
    throw new ConfigurationError(`Config file ${filePath} is not valid JSON: ${message}`);
  }

  return parseGroupingConfig(parsed);
}

// ============================================================================
// Header Resolution
// ============================================================================

/**
 * Resolve column roles against the loaded header
 * Fails before any grouping if a named column is missing or roles overlap
 */
export function resolveConfig(config: GroupingConfig, header: readonly string[]): ResolvedConfig {
  const headerSet = new Set(header);

  const missing = [...config.keyColumns, ...(config.detailColumns ?? [])].filter(
    (col) => !headerSet.has(col)
  );
  if (missing.length > 0) {
    throw new ConfigurationError(
      `Columns not found in header: ${missing.join(', ')} (available: ${header.join(', ')})`
    );
  }

  const keySet = new Set(config.keyColumns);
  let detailColumns: string[];

  if (config.detailColumns) {
    const overlap = config.detailColumns.filter((col) => keySet.has(col));
    if (overlap.length > 0) {
      throw new ConfigurationError(
        `Columns cannot be both key and detail: ${overlap.join(', ')}`
      );
    }

    const assigned = new Set([...config.keyColumns, ...config.detailColumns]);
    const unassigned = header.filter((col) => !assigned.has(col));
    if (unassigned.length > 0) {
      throw new ConfigurationError(
        `Columns without a key or detail role: ${unassigned.join(', ')}`
      );
    }

    detailColumns = [...config.detailColumns];
  } else {
    detailColumns = header.filter((col) => !keySet.has(col));
  }

  checkOutputHeaders(config, detailColumns);

  return {
    ...config,
    detailColumns,
    dateColumns: header.filter((col) => isDateColumn(col, config.dateKeywords)),
  };
}

/**
 * Output header label for a column, after renames
 */
export function outputColumnName(
  config: Pick<GroupingConfig, 'columnRenames'>,
  column: string
): string {
  return Object.hasOwn(config.columnRenames, column) ? config.columnRenames[column] : column;
}

function checkOutputHeaders(config: GroupingConfig, detailColumns: string[]): void {
  const labels = [
    ...(config.sequenceHeader !== null ? [config.sequenceHeader] : []),
    ...config.keyColumns.map((col) => outputColumnName(config, col)),
    ...detailColumns.map((col) => outputColumnName(config, col)),
  ];

  const seen = new Set<string>();
  const duplicates = new Set<string>();
  for (const label of labels) {
    if (seen.has(label)) duplicates.add(label);
    seen.add(label);
  }

  if (duplicates.size > 0) {
    throw new ConfigurationError(
      `Output headers are not unique after renames: ${[...duplicates].join(', ')}`
    );
  }
}
