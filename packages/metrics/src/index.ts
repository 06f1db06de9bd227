// @relpool/metrics: graded-relevance metrics over judged evaluation pools

export {
  precisionAtK,
  recallAtK,
  dcgAtK,
  idealDcgAtK,
  ndcgAtK,
  reciprocalRank,
  averagePrecision,
  computeMetrics,
  rankedList,
  metricLabel,
  parseMetricSelector,
  checkSelector,
  metricValue,
  aggregateValue,
  rankMethods,
  compareMethods,
  extremeQueries,
  writeJsonReport,
  writeMarkdownReport,
  writePerQueryCsv,
  writeAggregateCsv,
  CUTOFF_METRICS,
  LIST_METRICS,
} from './metrics/index.js';

export type {
  MetricSelector,
  MethodRanking,
  QueryComparison,
  ExtremeQueries,
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
} from './metrics/index.js';
