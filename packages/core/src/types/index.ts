export type {
  SearchHit,
  RawHitRow,
  PooledDocument,
  PooledTable,
  PoolMergeReport,
  PoolMergeResult,
} from './pool.js';
export type {
  RelevanceGrade,
  RelevanceJudgment,
  DocumentContent,
  Classification,
  RelevanceJudge,
  JudgmentStore,
} from './judgment.js';
export { RELEVANCE_GRADES, isRelevanceGrade } from './judgment.js';
export type {
  RelpoolConfig,
  PoolingConfig,
  LabelingConfig,
  JudgeConfig,
  MetricsConfig,
} from './config.js';
export {
  ConfigurationError,
  ValidationError,
  ClassificationError,
  DataError,
  JudgmentStoreError,
  LabelingError,
} from './errors.js';
