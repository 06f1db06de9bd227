export type {
  SearchHit,
  RawHitRow,
  PooledDocument,
  PooledTable,
  PoolMergeReport,
  PoolMergeResult,
  RelevanceGrade,
  RelevanceJudgment,
  DocumentContent,
  Classification,
  RelevanceJudge,
  JudgmentStore,
  RelpoolConfig,
  PoolingConfig,
  LabelingConfig,
  JudgeConfig,
  MetricsConfig,
} from './types/index.js';

export {
  RELEVANCE_GRADES,
  isRelevanceGrade,
  ConfigurationError,
  ValidationError,
  ClassificationError,
  DataError,
  JudgmentStoreError,
  LabelingError,
} from './types/index.js';

export {
  loadConfig,
  parseConfig,
  interpolateEnvVars,
  ConfigError,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-parser.js';

export {
  RESERVED_HIT_FIELDS,
  parseHitRow,
  parseScore,
  mergePool,
  mergePartitionedPool,
  computePoolStatistics,
  formatPoolStatistics,
  FOUND_BY_DELIMITER,
  serializePooledTable,
  parsePooledTable,
  toPoolRows,
  writePoolCsv,
} from './pooling/index.js';
export type {
  ParsedHit,
  PoolMergeOptions,
  PartitionInput,
  PartitionedPoolMergeOptions,
  PoolStatistics,
  MethodContribution,
  OverlapBucket,
  DocsPerQuery,
  PoolRowLayout,
} from './pooling/index.js';

export {
  LabelingOrchestrator,
  DEFAULT_CONCURRENCY,
  InMemoryJudgmentStore,
  JsonlJudgmentStore,
  judgmentKey,
  DEFAULT_TITLE_FIELDS,
  DEFAULT_CONTENT_FIELDS,
  extractDocumentContent,
  MANUAL_LABELER,
  attachJudgments,
  summarizeJudgments,
  overrideJudgment,
  relevanceGradeSchema,
  relevanceJudgmentSchema,
} from './labeling/index.js';
export type {
  LabelingOptions,
  LabelingPlan,
  LabelingProgress,
  LabelingProgressCallback,
  LabelingReport,
  ContentFieldOptions,
  JudgmentCoverage,
  ManualJudgmentInput,
} from './labeling/index.js';

export {
  OpenAICompatibleJudge,
  parseJudgeAnswer,
  extractJsonBlock,
  SYSTEM_PROMPT,
  EMPTY_TITLE,
  EMPTY_CONTENT,
  buildRelevancePrompt,
} from './judge/index.js';
export type { OpenAICompatibleJudgeConfig } from './judge/index.js';

export { csvCell, toCsv } from './utils/csv.js';
