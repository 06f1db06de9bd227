/**
 * Side-by-side views over a MetricsReport: method ranking, per-query
 * comparison and best/worst queries.
 */

import { ok, err, type Result } from 'neverthrow';
import { ConfigurationError } from '@relpool/core';
import {
  CUTOFF_METRICS,
  LIST_METRICS,
  type AggregateRow,
  type CutoffMetric,
  type MetricName,
  type MetricsReport,
  type QueryMetricsResult,
} from './types.js';

/** One metric, with its cutoff for the cutoff metrics (e.g. nDCG@10). */
export type MetricSelector =
  | { readonly metric: CutoffMetric; readonly k: number }
  | { readonly metric: 'mrr' | 'map' };

export interface MethodRanking {
  readonly method: string;
  readonly value: number | null;
  readonly queryCount: number;
}

export interface QueryComparison {
  readonly query: string;
  /** Value per method; null where the cell is missing. */
  readonly values: Readonly<Record<string, number | null>>;
  /** Methods sharing the highest value; empty when every cell is missing. */
  readonly best: readonly string[];
}

export interface ExtremeQueries {
  readonly top: readonly QueryMetricsResult[];
  readonly bottom: readonly QueryMetricsResult[];
}

function isCutoffMetric(name: string): name is CutoffMetric {
  return CUTOFF_METRICS.some((metric) => metric === name);
}

function isListMetric(name: string): name is 'mrr' | 'map' {
  return LIST_METRICS.some((metric) => metric === name);
}

export function metricLabel(selector: MetricSelector): string {
  return 'k' in selector ? `${selector.metric}@${selector.k}` : selector.metric;
}

/**
 * Parse `ndcg@10`, `recall@5`, `precision@20`, `mrr` or `map`.
 */
export function parseMetricSelector(text: string): Result<MetricSelector, ConfigurationError> {
  const [name = '', cutoff] = text.trim().toLowerCase().split('@');

  if (isListMetric(name)) {
    if (cutoff !== undefined) {
      return err(new ConfigurationError(`Metric ${name} takes no cutoff: ${text}`));
    }
    return ok({ metric: name });
  }

  if (isCutoffMetric(name)) {
    const k = cutoff !== undefined && /^\d+$/.test(cutoff) ? Number(cutoff) : Number.NaN;
    if (!Number.isInteger(k) || k <= 0) {
      return err(new ConfigurationError(`Metric ${name} needs a positive cutoff, e.g. ${name}@10: ${text}`));
    }
    return ok({ metric: name, k });
  }

  const known: MetricName[] = [...CUTOFF_METRICS, ...LIST_METRICS];
  return err(new ConfigurationError(`Unknown metric "${text}"; expected one of: ${known.join(', ')}`));
}

/**
 * Read one metric from a per-query result; undefined when the cutoff was not computed.
 */
export function metricValue(result: QueryMetricsResult, selector: MetricSelector): number | undefined {
  if (!('k' in selector)) {
    return result[selector.metric];
  }
  const scores = result.atK.find((entry) => entry.k === selector.k);
  return scores?.[selector.metric];
}

/**
 * Reject a cutoff metric whose K the report did not compute.
 */
export function checkSelector(
  report: MetricsReport,
  selector: MetricSelector,
): Result<MetricSelector, ConfigurationError> {
  if ('k' in selector && !report.cutoffs.includes(selector.k)) {
    return err(
      new ConfigurationError(
        `Cutoff ${selector.k} was not computed for ${metricLabel(selector)}; available cutoffs: ${report.cutoffs.join(', ')}`,
      ),
    );
  }
  return ok(selector);
}

function aggregateRowFor(
  report: MetricsReport,
  method: string,
  selector: MetricSelector,
): AggregateRow | undefined {
  const rows = report.aggregate.filter((row) => row.method === method);
  return 'k' in selector ? rows.find((row) => row.k === selector.k) : rows[0];
}

export function aggregateValue(
  report: MetricsReport,
  method: string,
  selector: MetricSelector,
): number | null {
  return aggregateRowFor(report, method, selector)?.[selector.metric] ?? null;
}

/**
 * Methods ordered by their mean value, best first. Methods without a value
 * come last; ties keep the report's method order.
 */
export function rankMethods(report: MetricsReport, selector: MetricSelector): MethodRanking[] {
  const rankings = report.methods.map((method) => ({
    method,
    value: aggregateValue(report, method, selector),
    queryCount: aggregateRowFor(report, method, selector)?.queryCount ?? 0,
  }));

  return rankings.sort((a, b) => {
    if (a.value === null) return b.value === null ? 0 : 1;
    if (b.value === null) return -1;
    return b.value - a.value;
  });
}

/**
 * Per-query comparison of every method on one metric, in evaluated-query order.
 */
export function compareMethods(report: MetricsReport, selector: MetricSelector): QueryComparison[] {
  const cells = new Map<string, QueryMetricsResult>();
  for (const result of report.perQuery) {
    cells.set(`${result.method}\u0000${result.query}`, result);
  }

  return report.evaluatedQueries.map((query) => {
    const values: Record<string, number | null> = {};
    let bestValue: number | null = null;
    for (const method of report.methods) {
      const cell = cells.get(`${method}\u0000${query}`);
      const value = cell !== undefined ? metricValue(cell, selector) ?? null : null;
      values[method] = value;
      if (value !== null && (bestValue === null || value > bestValue)) {
        bestValue = value;
      }
    }
    const best = bestValue === null ? [] : report.methods.filter((method) => values[method] === bestValue);
    return { query, values, best };
  });
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * The `n` highest and lowest scoring (method, query) cells on a metric.
 * Ties are broken by method then query so the selection is stable.
 */
export function extremeQueries(
  report: MetricsReport,
  selector: MetricSelector,
  n: number,
): ExtremeQueries {
  const scored = report.perQuery.flatMap((result) => {
    const value = metricValue(result, selector);
    return value !== undefined ? [{ result, value }] : [];
  });

  const byCell = (a: QueryMetricsResult, b: QueryMetricsResult): number =>
    compareText(a.method, b.method) || compareText(a.query, b.query);

  const count = Math.max(0, n);
  const top = [...scored].sort((a, b) => b.value - a.value || byCell(a.result, b.result)).slice(0, count);
  const bottom = [...scored].sort((a, b) => a.value - b.value || byCell(a.result, b.result)).slice(0, count);

  return {
    top: top.map((entry) => entry.result),
    bottom: bottom.map((entry) => entry.result),
  };
}
