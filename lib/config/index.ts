/**
 * Configuration module exports
 */

export {
  groupingConfigSchema,
  DEFAULT_HEADER_ROW,
  DEFAULT_JSON_KEY_DELIMITER,
  DEFAULT_OUTPUT_SHEET_TITLE,
  DEFAULT_SEQUENCE_HEADER,
} from './schema';
export type { GroupingConfig, GroupingConfigInput, ResolvedConfig } from './schema';

export {
  ConfigurationError,
  parseGroupingConfig,
  loadConfigFile,
  resolveConfig,
  outputColumnName,
} from './validator';
