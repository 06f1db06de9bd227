/**
 * Scores every method of a judged pooled table.
 *
 * Each (method, query) cell is computed independently from the method's
 * ranked list inside the pool; aggregation walks queries in sorted order so
 * repeated runs produce bit-identical means.
 */

import { ok, err, type Result } from 'neverthrow';
import { ConfigurationError, DataError } from '@relpool/core';
import type { PooledDocument, PooledTable } from '@relpool/core';
import {
  averagePrecision,
  ndcgAtK,
  precisionAtK,
  recallAtK,
  reciprocalRank,
} from './graded-metrics.js';
import type {
  AggregateRow,
  Coverage,
  CutoffScores,
  MetricsOptions,
  MetricsReport,
  MissingCell,
  QueryMetricsResult,
} from './types.js';

/** Judged grade of a document; unjudged and failed judgments grade 0. */
function gradeOf(doc: PooledDocument): number {
  return doc.judgment?.relevance ?? 0;
}

function isJudged(doc: PooledDocument): boolean {
  const relevance = doc.judgment?.relevance;
  return relevance !== undefined && relevance !== null;
}

function validateCutoffs(cutoffs: readonly number[]): Result<number[], ConfigurationError> {
  if (cutoffs.length === 0) {
    return err(new ConfigurationError('At least one cutoff K is required'));
  }
  for (const k of cutoffs) {
    if (!Number.isInteger(k) || k <= 0) {
      return err(new ConfigurationError(`Cutoff K must be a positive integer, got ${k}`));
    }
  }
  return ok([...new Set(cutoffs)].sort((a, b) => a - b));
}

function validateMethods(
  table: PooledTable,
  methods: readonly string[] | undefined,
): Result<string[], ConfigurationError> {
  if (methods === undefined) {
    return ok([...table.methods]);
  }
  if (methods.length === 0) {
    return err(new ConfigurationError('At least one method is required'));
  }
  const known = new Set(table.methods);
  const seen = new Set<string>();
  for (const method of methods) {
    if (!known.has(method)) {
      return err(
        new ConfigurationError(
          `Unknown method "${method}"; the pool holds: ${table.methods.join(', ')}`,
        ),
      );
    }
    if (seen.has(method)) {
      return err(new ConfigurationError(`Duplicate method: ${method}`));
    }
    seen.add(method);
  }
  return ok([...methods]);
}

function groupByQuery(documents: readonly PooledDocument[]): Map<string, PooledDocument[]> {
  const byQuery = new Map<string, PooledDocument[]>();
  for (const doc of documents) {
    const group = byQuery.get(doc.query);
    if (group === undefined) {
      byQuery.set(doc.query, [doc]);
    } else {
      group.push(doc);
    }
  }
  return byQuery;
}

/**
 * The method's ranked list for one query: documents it found within the pool,
 * ordered by rank, ties broken by docId.
 */
export function rankedList(docs: readonly PooledDocument[], method: string): PooledDocument[] {
  const ranked: { doc: PooledDocument; rank: number }[] = [];
  for (const doc of docs) {
    const rank = doc.ranks[method];
    if (rank !== null && rank !== undefined) {
      ranked.push({ doc, rank });
    }
  }
  ranked.sort((a, b) => a.rank - b.rank || (a.doc.docId < b.doc.docId ? -1 : a.doc.docId > b.doc.docId ? 1 : 0));
  return ranked.map((entry) => entry.doc);
}

function coverageFor(k: number, depthK: number): Coverage {
  return k <= depthK ? 'exact' : 'partial';
}

function scoreCell(
  method: string,
  query: string,
  docs: readonly PooledDocument[],
  cutoffs: readonly number[],
  depthK: number,
): QueryMetricsResult | undefined {
  const list = rankedList(docs, method);
  if (list.length === 0) return undefined;

  const grades = list.map(gradeOf);
  const judgedGrades = docs.filter(isJudged).map(gradeOf);
  const poolRelevant = judgedGrades.filter((grade) => grade > 0).length;

  const atK: CutoffScores[] = cutoffs.map((k) => ({
    k,
    coverage: coverageFor(k, depthK),
    ndcg: ndcgAtK(grades, judgedGrades, k),
    recall: recallAtK(grades, poolRelevant, k),
    precision: precisionAtK(grades, k),
  }));

  return {
    method,
    query,
    partition: docs[0]?.partition ?? null,
    numResults: list.length,
    numRelevant: grades.filter((grade) => grade > 0).length,
    poolRelevant,
    atK,
    mrr: reciprocalRank(grades),
    map: averagePrecision(grades),
  };
}

function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

function aggregateMethod(
  method: string,
  results: readonly QueryMetricsResult[],
  missingCount: number,
  cutoffs: readonly number[],
  depthK: number,
): AggregateRow[] {
  const mrr = mean(results.map((r) => r.mrr));
  const map = mean(results.map((r) => r.map));
  const avgNumResults = mean(results.map((r) => r.numResults));
  const avgNumRelevant = mean(results.map((r) => r.numRelevant));

  return cutoffs.map((k, index) => {
    const atK = results.flatMap((r) => {
      const scores = r.atK[index];
      return scores !== undefined ? [scores] : [];
    });
    return {
      method,
      k,
      coverage: coverageFor(k, depthK),
      queryCount: results.length,
      missingCount,
      ndcg: mean(atK.map((s) => s.ndcg)),
      recall: mean(atK.map((s) => s.recall)),
      precision: mean(atK.map((s) => s.precision)),
      mrr,
      map,
      avgNumResults,
      avgNumRelevant,
    };
  });
}

/**
 * Compute per-query and aggregate metrics for the selected methods.
 *
 * Only queries holding at least one judged document are evaluated. A method
 * with no ranked document for such a query yields a missing cell instead of a
 * zero, and that query is left out of the method's means.
 */
export function computeMetrics(
  table: PooledTable,
  options: MetricsOptions,
): Result<MetricsReport, ConfigurationError> {
  const cutoffsResult = validateCutoffs(options.cutoffs);
  if (cutoffsResult.isErr()) return err(cutoffsResult.error);
  const methodsResult = validateMethods(table, options.methods);
  if (methodsResult.isErr()) return err(methodsResult.error);

  const cutoffs = cutoffsResult.value;
  const methods = methodsResult.value;
  const partition = options.partition ?? null;

  const documents =
    partition === null ? table.documents : table.documents.filter((doc) => doc.partition === partition);
  const byQuery = groupByQuery(documents);
  const queries = [...byQuery.keys()].sort();

  const evaluatedQueries: string[] = [];
  const unjudgedQueries: string[] = [];
  for (const query of queries) {
    const docs = byQuery.get(query) ?? [];
    if (docs.some(isJudged)) {
      evaluatedQueries.push(query);
    } else {
      unjudgedQueries.push(query);
    }
  }

  const perQuery: QueryMetricsResult[] = [];
  const missingCells: MissingCell[] = [];
  const aggregate: AggregateRow[] = [];

  for (const method of methods) {
    const results: QueryMetricsResult[] = [];
    let missingCount = 0;

    for (const query of evaluatedQueries) {
      const cell = scoreCell(method, query, byQuery.get(query) ?? [], cutoffs, table.depthK);
      if (cell === undefined) {
        missingCount++;
        missingCells.push({
          method,
          query,
          error: new DataError(`Method "${method}" has no ranked results for query "${query}"`),
        });
      } else {
        results.push(cell);
      }
    }

    perQuery.push(...results);
    aggregate.push(...aggregateMethod(method, results, missingCount, cutoffs, table.depthK));
  }

  return ok({
    depthK: table.depthK,
    methods,
    cutoffs,
    partition,
    evaluatedQueries,
    unjudgedQueries,
    partialCutoffs: cutoffs.filter((k) => k > table.depthK),
    perQuery,
    aggregate,
    missingCells,
  });
}
