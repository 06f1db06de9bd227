export { RESERVED_HIT_FIELDS, parseHitRow, parseScore } from './hit-parser.js';
export type { ParsedHit } from './hit-parser.js';
export { mergePool, mergePartitionedPool } from './pool-merger.js';
export type {
  PoolMergeOptions,
  PartitionInput,
  PartitionedPoolMergeOptions,
} from './pool-merger.js';
export { computePoolStatistics, formatPoolStatistics } from './pool-statistics.js';
export type {
  PoolStatistics,
  MethodContribution,
  OverlapBucket,
  DocsPerQuery,
} from './pool-statistics.js';
export {
  FOUND_BY_DELIMITER,
  serializePooledTable,
  parsePooledTable,
  toPoolRows,
  writePoolCsv,
} from './pool-table.js';
export type { PoolRowLayout } from './pool-table.js';
