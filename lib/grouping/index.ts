/**
 * Grouping module exports
 */

export { groupRows, buildCompositeKey, countGroupedRows } from './row-grouper';

export { calculateMergeRanges } from './merge-ranges';
export type { MergeLayoutOptions } from './merge-ranges';
