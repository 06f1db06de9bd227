import { describe, it, expect } from 'vitest';
import type { PooledDocument, PooledTable, RelevanceGrade } from '@relpool/core';
import { computeMetrics } from './metrics-engine.js';
import {
  writeAggregateCsv,
  writeJsonReport,
  writeMarkdownReport,
  writePerQueryCsv,
} from './report-writer.js';
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

// The worked pool: A ranks d1,d2,d3; B ranks d2,d4,d3; only A answers "r".
const table: PooledTable = {
  depthK: 3,
  methods: ['A', 'B'],
  documents: [
    judgedDoc('q', 'd1', { A: 1, B: null }, 0),
    judgedDoc('q', 'd2', { A: 2, B: 1 }, 2),
    judgedDoc('q', 'd3', { A: 3, B: 3 }, 1),
    judgedDoc('q', 'd4', { A: null, B: 2 }, 0),
    judgedDoc('r', 'r1', { A: 1, B: null }, 1),
  ],
};

function report(): MetricsReport {
  const result = computeMetrics(table, { cutoffs: [3, 5] });
  if (result.isErr()) throw result.error;
  return result.value;
}

describe('writeAggregateCsv', () => {
  it('should write one row per method and cutoff at four decimals', () => {
    const lines = writeAggregateCsv(report()).split('\n');

    expect(lines).toEqual([
      'method,k,coverage,query_count,missing_count,ndcg,recall,precision,mrr,map,avg_num_results,avg_num_relevant',
      'A,3,exact,2,0,0.8295,1.0000,0.5000,0.7500,0.7917,2.0000,1.5000',
      'A,5,partial,2,0,0.8295,1.0000,0.3000,0.7500,0.7917,2.0000,1.5000',
      'B,3,exact,1,1,0.9639,1.0000,0.6667,1.0000,0.8333,3.0000,2.0000',
      'B,5,partial,1,1,0.9639,1.0000,0.4000,1.0000,0.8333,3.0000,2.0000',
    ]);
  });
});

describe('writePerQueryCsv', () => {
  it('should write a column triple per cutoff', () => {
    const lines = writePerQueryCsv(report()).split('\n');

    expect(lines[0]).toBe(
      'method,query,query_set,ndcg@3,recall@3,precision@3,ndcg@5,recall@5,precision@5,mrr,map,num_results,num_relevant',
    );
    expect(lines[2]).toBe('A,r,,1.0000,1.0000,0.3333,1.0000,1.0000,0.2000,1.0000,1.0000,1,1');
    expect(lines).toHaveLength(4);
  });
});

describe('writeJsonReport', () => {
  it('should replace missing-cell errors with their message', () => {
    const parsed: unknown = JSON.parse(writeJsonReport(report()));

    expect(parsed).toMatchObject({
      depthK: 3,
      cutoffs: [3, 5],
      partialCutoffs: [5],
      missingCells: [{ method: 'B', query: 'r', reason: 'Method "B" has no ranked results for query "r"' }],
    });
  });
});

describe('writeMarkdownReport', () => {
  it('should flag partial-coverage cutoffs and list missing cells', () => {
    const lines = writeMarkdownReport(report()).split('\n');

    expect(lines[0]).toBe('# Retrieval Metrics Report');
    expect(lines).toContain('**Evaluated queries**: 2');
    expect(lines).toContain('## @3');
    expect(lines).toContain('## @5 (partial coverage)');
    expect(lines).toContain('> K=5 exceeds the pool depth 3; values are lower bounds.');
    expect(lines).toContain('| A | 0.8295 | 1.0000 | 0.5000 | 2 |');
    expect(lines).toContain('| B | 1.0000 | 0.8333 | 3.0000 | 2.0000 |');
    expect(lines).toContain('- B / r: Method "B" has no ranked results for query "r"');
  });

  it('should show n/a for a method that could not be measured', () => {
    const onlyA: PooledTable = {
      depthK: 1,
      methods: ['A', 'B'],
      documents: [judgedDoc('q', 'd1', { A: 1, B: null }, 1)],
    };
    const result = computeMetrics(onlyA, { cutoffs: [1] });
    if (result.isErr()) throw result.error;

    expect(writeMarkdownReport(result.value, 'Title').split('\n')).toContain('| B | n/a | n/a | n/a | 0 |');
  });
});
