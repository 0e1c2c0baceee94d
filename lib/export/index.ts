/**
 * Export module exports
 */

export {
  exportStructured,
  serializeStructuredExport,
  renderCompositeKey,
  KeyCollisionError,
} from './structured-exporter';
export type { StructuredExportOptions } from './structured-exporter';
