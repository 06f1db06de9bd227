/**
 * Metrics engine result types.
 *
 * Results are ephemeral: computed from a judged pooled table on demand and
 * never written back into it.
 */

import type { DataError } from '@relpool/core';

/** Metrics evaluated at every cutoff K. */
export type CutoffMetric = 'ndcg' | 'recall' | 'precision';

/** Metrics computed over the method's whole ranked list. */
export type ListMetric = 'mrr' | 'map';

export type MetricName = CutoffMetric | ListMetric;

export const CUTOFF_METRICS: readonly CutoffMetric[] = ['ndcg', 'recall', 'precision'];
export const LIST_METRICS: readonly ListMetric[] = ['mrr', 'map'];

/**
 * `exact` when K is within the pooling depth. `partial` when K exceeds it:
 * documents ranked below the pool depth were never judged, so the value is a
 * lower bound for nDCG, precision and recall.
 */
export type Coverage = 'exact' | 'partial';

export interface MetricsOptions {
  /** Methods to evaluate; defaults to every method of the table. */
  readonly methods?: readonly string[];
  readonly cutoffs: readonly number[];
  /** Restrict evaluation to documents with this partition tag. */
  readonly partition?: string;
}

export interface CutoffScores {
  readonly k: number;
  readonly coverage: Coverage;
  readonly ndcg: number;
  readonly recall: number;
  readonly precision: number;
}

/** All metric values of one (method, query) cell. */
export interface QueryMetricsResult {
  readonly method: string;
  readonly query: string;
  readonly partition: string | null;
  /** Documents the method ranked for the query within the pool. */
  readonly numResults: number;
  /** Relevant documents in the method's list. */
  readonly numRelevant: number;
  /** Relevant documents judged for the query across the whole pool (recall denominator). */
  readonly poolRelevant: number;
  readonly atK: readonly CutoffScores[];
  readonly mrr: number;
  readonly map: number;
}

/** A (method, query) cell with no ranked documents. Reported, never zeroed. */
export interface MissingCell {
  readonly method: string;
  readonly query: string;
  readonly error: DataError;
}

/**
 * Mean of each metric for one (method, K) over the queries the method could be
 * measured on. Metric values are null when there were no such queries.
 */
export interface AggregateRow {
  readonly method: string;
  readonly k: number;
  readonly coverage: Coverage;
  readonly queryCount: number;
  readonly missingCount: number;
  readonly ndcg: number | null;
  readonly recall: number | null;
  readonly precision: number | null;
  readonly mrr: number | null;
  readonly map: number | null;
  readonly avgNumResults: number | null;
  readonly avgNumRelevant: number | null;
}

export interface MetricsReport {
  readonly depthK: number;
  readonly methods: readonly string[];
  /** Sorted, de-duplicated cutoffs. */
  readonly cutoffs: readonly number[];
  readonly partition: string | null;
  /** Queries with at least one judged document, sorted. */
  readonly evaluatedQueries: readonly string[];
  /** Pooled queries without any judged document; excluded from every mean. */
  readonly unjudgedQueries: readonly string[];
  /** Cutoffs deeper than the pool. */
  readonly partialCutoffs: readonly number[];
  readonly perQuery: readonly QueryMetricsResult[];
  readonly aggregate: readonly AggregateRow[];
  readonly missingCells: readonly MissingCell[];
}
