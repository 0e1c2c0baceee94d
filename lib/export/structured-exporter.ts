/**
 * Structured (JSON) export
 * Serializes grouped rows as composite key string -> detail records
 *
 * Example output (delimiter "_"):
 * {
 *     "K1_2023-10-21": [
 *         { "Amount": "100" },
 *         { "Amount": "20" }
 *     ]
 * }
 */

import type {
  CollisionPolicy,
  CompositeKey,
  DetailRecord,
  GroupedTable,
  StructuredExport,
} from '@/lib/types';
import { outputColumnName } from '@/lib/config/validator';

// ============================================================================
// Types
// ============================================================================

export interface StructuredExportOptions {
  delimiter: string;
  detailColumns: readonly string[];
  /** Source column -> output field name */
  columnRenames?: Readonly<Record<string, string>>;
  onCollision?: CollisionPolicy;
}

/** Two distinct composite keys rendered to the same key string */
export class KeyCollisionError extends Error {
  constructor(
    readonly renderedKey: string,
    readonly keys: readonly CompositeKey[]
  ) {
    super(
      `Composite keys ${keys.map((key) => JSON.stringify(key)).join(' and ')} ` +
        `both render to "${renderedKey}"`
    );
    this.name = 'KeyCollisionError';
  }
}

// ============================================================================
// Main Exporter
// ============================================================================

/**
 * Render a composite key as a single string
 */
export function renderCompositeKey(key: CompositeKey, delimiter: string): string {
  return key.join(delimiter);
}

/**
 * Build the ordered key-string -> detail-records mapping
 */
export function exportStructured(
  table: GroupedTable,
  options: StructuredExportOptions
): StructuredExport {
  const renames = options.columnRenames ?? {};
  const policy = options.onCollision ?? 'overwrite';

  const exported: StructuredExport = new Map();
  const owners = new Map<string, CompositeKey>();

  for (const group of table) {
    const renderedKey = renderCompositeKey(group.key, options.delimiter);

    const previous = owners.get(renderedKey);
    if (previous) {
      if (policy === 'error') {
        throw new KeyCollisionError(renderedKey, [previous, group.key]);
      }
      console.warn(
        `[Exporter] Key "${renderedKey}" is shared by ${JSON.stringify(previous)} and ` +
          `${JSON.stringify(group.key)}; keeping the later group`
      );
    }

    const records = group.rows.map(
      (row): DetailRecord =>
        Object.fromEntries(
          options.detailColumns.map((col): [string, string] => [
            outputColumnName({ columnRenames: renames }, col),
            row[col] ?? '',
          ])
        )
    );

    owners.set(renderedKey, group.key);
    exported.set(renderedKey, records);
  }

  return exported;
}

// ============================================================================
// Serialization
// ============================================================================

/**
 * Serialize an export to JSON, keeping map order
 * (a plain object would move integer-like keys to the front)
 */
export function serializeStructuredExport(exported: StructuredExport, indent = 4): string {
  if (exported.size === 0) return '{}';

  const pad = ' '.repeat(indent);
  const entries = Array.from(exported, ([key, records]) => {
    const body = JSON.stringify(records, null, indent).replace(/\n/g, `\n${pad}`);
    return `${pad}${JSON.stringify(key)}: ${body}`;
  });

  return `{\n${entries.join(',\n')}\n}`;
}
