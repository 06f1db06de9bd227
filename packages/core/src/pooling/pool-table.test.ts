import { describe, it, expect } from 'vitest';
import {
  parsePooledTable,
  serializePooledTable,
  toPoolRows,
  writePoolCsv,
} from './pool-table.js';
import type { PooledTable } from '../types/pool.js';

const table: PooledTable = {
  depthK: 3,
  methods: ['bm25', 'dense'],
  documents: [
    {
      query: 'q1',
      docId: 'd1',
      partition: 'head',
      foundBy: ['bm25', 'dense'],
      ranks: { bm25: 1, dense: 2 },
      scores: { bm25: 12.5, dense: 0.8 },
      fields: { title: 'First, with comma' },
    },
    {
      query: 'q1',
      docId: 'd2',
      partition: 'head',
      foundBy: ['dense'],
      ranks: { bm25: null, dense: 1 },
      scores: { bm25: null, dense: null },
      fields: {},
      judgment: {
        query: 'q1',
        docId: 'd2',
        relevance: 2,
        labeledBy: 'ai-judge',
        labeledAt: '2026-01-01T00:00:00.000Z',
        notes: 'exact match',
      },
    },
  ],
};

describe('parsePooledTable', () => {
  it('should accept a serialized table', () => {
    const result = parsePooledTable(JSON.parse(serializePooledTable(table)));

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual(table);
    }
  });

  it('should end serialized output with a newline', () => {
    expect(serializePooledTable(table).endsWith('}\n')).toBe(true);
  });

  it('should reject a document with an empty foundBy', () => {
    const bad = { ...table, documents: [{ ...table.documents[0], foundBy: [] }] };
    const result = parsePooledTable(bad);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe(
        'Invalid pooled table: documents.0.foundBy: foundBy must not be empty',
      );
    }
  });

  it('should reject duplicate (query, docId) rows', () => {
    const first = table.documents[0];
    const result = parsePooledTable({ ...table, documents: [first, first] });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid pooled table: duplicate row for (q1, d1)');
    }
  });

  it('should reject foundBy entries that are not listed methods', () => {
    const bad = { ...table, documents: [{ ...table.documents[0], foundBy: ['sparse'] }] };
    const result = parsePooledTable(bad);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.message).toBe('Invalid pooled table: unknown method "sparse" on d1');
    }
  });

  it('should reject a non-object value', () => {
    expect(parsePooledTable('pool').isErr()).toBe(true);
  });
});

describe('toPoolRows', () => {
  it('should lay out fixed, method, field and judgment columns in order', () => {
    const layout = toPoolRows(table);

    expect(layout.columns).toEqual([
      'query',
      'doc_id',
      'query_set',
      'found_by_methods',
      'num_methods_found',
      'bm25_rank',
      'bm25_score',
      'dense_rank',
      'dense_score',
      'title',
      'relevance',
      'labeled_by',
      'labeled_at',
      'notes',
    ]);
    expect(layout.rows[0]).toMatchObject({
      found_by_methods: 'bm25,dense',
      num_methods_found: 2,
      bm25_rank: 1,
      relevance: null,
    });
    expect(layout.rows[1]).toMatchObject({ bm25_rank: null, relevance: 2, labeled_by: 'ai-judge' });
  });

  it('should omit judgment columns when nothing is judged', () => {
    const unjudged: PooledTable = { ...table, documents: table.documents.slice(0, 1) };

    expect(toPoolRows(unjudged).columns).not.toContain('relevance');
  });
});

describe('writePoolCsv', () => {
  it('should quote cells with commas and leave nulls empty', () => {
    const lines = writePoolCsv(table).split('\n');

    expect(lines).toHaveLength(3);
    expect(lines[1]).toBe('q1,d1,head,"bm25,dense",2,1,12.5,2,0.8,"First, with comma",,,,');
    expect(lines[2]).toBe(
      'q1,d2,head,dense,1,,,1,,,2,ai-judge,2026-01-01T00:00:00.000Z,exact match',
    );
  });
});
