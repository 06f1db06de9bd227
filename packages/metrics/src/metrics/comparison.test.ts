import { describe, it, expect } from 'vitest';
import type { PooledDocument, PooledTable, RelevanceGrade } from '@relpool/core';
import { computeMetrics } from './metrics-engine.js';
import {
  checkSelector,
  compareMethods,
  extremeQueries,
  metricLabel,
  metricValue,
  parseMetricSelector,
  rankMethods,
} from './comparison.js';
import type { MetricsReport } from './types.js';

function judgedDoc(
  query: string,
  docId: string,
  ranks: Record<string, number | null>,
  relevance: RelevanceGrade,
): PooledDocument {
  return {
    query,
    docId,
    partition: null,
    foundBy: Object.keys(ranks).filter((m) => ranks[m] !== null),
    ranks,
    scores: {},
    fields: {},
    judgment: { query, docId, relevance, labeledBy: 'ai-judge', labeledAt: '2026-01-01T00:00:00.000Z', notes: '' },
  };
}

// a: bm25 finds the relevant doc first, dense second.
// b: dense finds it first, bm25 second.
// c: only dense ranks anything.
const table: PooledTable = {
  depthK: 2,
  methods: ['bm25', 'dense', 'hybrid'],
  documents: [
    judgedDoc('a', 'a1', { bm25: 1, dense: 2, hybrid: null }, 2),
    judgedDoc('a', 'a2', { bm25: 2, dense: 1, hybrid: null }, 0),
    judgedDoc('b', 'b1', { bm25: 2, dense: 1, hybrid: null }, 1),
    judgedDoc('b', 'b2', { bm25: 1, dense: 2, hybrid: null }, 0),
    judgedDoc('c', 'c1', { bm25: null, dense: 1, hybrid: null }, 1),
  ],
};

function report(): MetricsReport {
  const result = computeMetrics(table, { cutoffs: [1, 2] });
  if (result.isErr()) throw result.error;
  return result.value;
}

describe('parseMetricSelector', () => {
  it('should parse cutoff metrics', () => {
    const result = parseMetricSelector('nDCG@10');

    expect(result.isOk() && result.value).toEqual({ metric: 'ndcg', k: 10 });
  });

  it('should parse list metrics without a cutoff', () => {
    expect(parseMetricSelector('mrr').isOk()).toBe(true);
    expect(parseMetricSelector('map@5').isErr()).toBe(true);
  });

  it('should require a positive cutoff for cutoff metrics', () => {
    expect(parseMetricSelector('recall').isErr()).toBe(true);
    expect(parseMetricSelector('recall@0').isErr()).toBe(true);
    expect(parseMetricSelector('recall@x').isErr()).toBe(true);
  });

  it('should reject unknown metrics', () => {
    const result = parseMetricSelector('f1@5');

    expect(result.isErr() && result.error.message).toBe(
      'Unknown metric "f1@5"; expected one of: ndcg, recall, precision, mrr, map',
    );
  });
});

describe('checkSelector', () => {
  it('should accept computed cutoffs and list metrics', () => {
    expect(checkSelector(report(), { metric: 'ndcg', k: 2 }).isOk()).toBe(true);
    expect(checkSelector(report(), { metric: 'map' }).isOk()).toBe(true);
  });

  it('should reject a cutoff the report did not compute', () => {
    const result = checkSelector(report(), { metric: 'ndcg', k: 7 });

    expect(result.isErr() && result.error.message).toBe(
      'Cutoff 7 was not computed for ndcg@7; available cutoffs: 1, 2',
    );
  });
});

describe('metricLabel', () => {
  it('should include the cutoff only for cutoff metrics', () => {
    expect(metricLabel({ metric: 'precision', k: 5 })).toBe('precision@5');
    expect(metricLabel({ metric: 'map' })).toBe('map');
  });
});

describe('metricValue', () => {
  it('should read cutoff and list metrics from a per-query result', () => {
    const cell = report().perQuery.find((r) => r.method === 'dense' && r.query === 'a');
    if (cell === undefined) throw new Error('missing cell');

    expect(metricValue(cell, { metric: 'precision', k: 1 })).toBe(0);
    expect(metricValue(cell, { metric: 'mrr' })).toBe(0.5);
    expect(metricValue(cell, { metric: 'ndcg', k: 7 })).toBeUndefined();
  });
});

describe('rankMethods', () => {
  it('should order methods by mean value with unmeasured methods last', () => {
    const ranking = rankMethods(report(), { metric: 'mrr' });

    // bm25: (1 + 1/2) / 2; dense: (1/2 + 1 + 1) / 3; hybrid: no queries
    expect(ranking.map((r) => r.method)).toEqual(['dense', 'bm25', 'hybrid']);
    expect(ranking[0]?.value).toBeCloseTo(5 / 6, 10);
    expect(ranking[0]?.queryCount).toBe(3);
    expect(ranking[1]?.value).toBe(0.75);
    expect(ranking[2]).toEqual({ method: 'hybrid', value: null, queryCount: 0 });
  });
});

describe('compareMethods', () => {
  it('should put methods side by side per query with null for missing cells', () => {
    const rows = compareMethods(report(), { metric: 'precision', k: 1 });

    expect(rows).toEqual([
      { query: 'a', values: { bm25: 1, dense: 0, hybrid: null }, best: ['bm25'] },
      { query: 'b', values: { bm25: 0, dense: 1, hybrid: null }, best: ['dense'] },
      { query: 'c', values: { bm25: null, dense: 1, hybrid: null }, best: ['dense'] },
    ]);
  });

  it('should list every method sharing the best value', () => {
    const rows = compareMethods(report(), { metric: 'recall', k: 2 });

    expect(rows[0]?.best).toEqual(['bm25', 'dense']);
  });
});

describe('extremeQueries', () => {
  it('should return the best and worst cells, ties broken by method then query', () => {
    const { top, bottom } = extremeQueries(report(), { metric: 'precision', k: 1 }, 2);

    expect(top.map((r) => `${r.method}/${r.query}`)).toEqual(['bm25/a', 'dense/b']);
    expect(bottom.map((r) => `${r.method}/${r.query}`)).toEqual(['bm25/b', 'dense/a']);
  });

  it('should order tied methods by code unit, not locale', () => {
    const mixedCase: PooledTable = {
      depthK: 1,
      methods: ['a', 'B'],
      documents: [judgedDoc('q', 'd1', { a: 1, B: 1 }, 1)],
    };
    const result = computeMetrics(mixedCase, { cutoffs: [1] });
    if (result.isErr()) throw result.error;

    const { top } = extremeQueries(result.value, { metric: 'precision', k: 1 }, 2);

    expect(top.map((r) => r.method)).toEqual(['B', 'a']);
  });

  it('should return nothing for n <= 0', () => {
    expect(extremeQueries(report(), { metric: 'mrr' }, 0)).toEqual({ top: [], bottom: [] });
  });
});
