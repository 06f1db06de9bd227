export {
  precisionAtK,
  recallAtK,
  dcgAtK,
  idealDcgAtK,
  ndcgAtK,
  reciprocalRank,
  averagePrecision,
} from './graded-metrics.js';

export { computeMetrics, rankedList } from './metrics-engine.js';

export {
  metricLabel,
  parseMetricSelector,
  checkSelector,
  metricValue,
  aggregateValue,
  rankMethods,
  compareMethods,
  extremeQueries,
} from './comparison.js';
export type {
  MetricSelector,
  MethodRanking,
  QueryComparison,
  ExtremeQueries,
} from './comparison.js';

export {
  writeJsonReport,
  writeMarkdownReport,
  writePerQueryCsv,
  writeAggregateCsv,
} from './report-writer.js';

export { CUTOFF_METRICS, LIST_METRICS } from './types.js';
export type {
  CutoffMetric,
  ListMetric,
  MetricName,
  Coverage,
  MetricsOptions,
  CutoffScores,
  QueryMetricsResult,
  MissingCell,
  AggregateRow,
  MetricsReport,
} from './types.js';
