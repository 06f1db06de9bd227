import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import type { PoolMergeReport } from '@relpool/core';
import { formatMergeReport, planRuns } from './pool-cmd.js';
import type { RunSpec } from '../io.js';

beforeAll(() => {
  chalk.level = 0;
});

function run(method: string, path: string, partition: string | null = null): RunSpec {
  return { partition, method, path };
}

describe('planRuns', () => {
  it('should keep untagged runs in one group in method order', () => {
    const result = planRuns([run('bm25', 'a.json'), run('dense', 'b.json')]);

    expect(result.isOk() && result.value).toEqual({
      methods: ['bm25', 'dense'],
      partitions: [{ tag: null, paths: ['a.json', 'b.json'] }],
    });
  });

  it('should align every partition to the first-seen method order', () => {
    const result = planRuns([
      run('bm25', 'h1.json', 'head'),
      run('dense', 'h2.json', 'head'),
      run('dense', 't2.json', 'tail'),
      run('bm25', 't1.json', 'tail'),
    ]);

    expect(result.isOk() && result.value).toEqual({
      methods: ['bm25', 'dense'],
      partitions: [
        { tag: 'head', paths: ['h1.json', 'h2.json'] },
        { tag: 'tail', paths: ['t1.json', 't2.json'] },
      ],
    });
  });

  it('should reject mixing tagged and untagged runs', () => {
    const result = planRuns([run('bm25', 'a.json'), run('dense', 'b.json', 'head')]);

    expect(result.isErr() && result.error.message).toBe(
      'Either every --run names a partition (tag:method=path) or none does',
    );
  });

  it('should reject a partition missing a method', () => {
    const result = planRuns([
      run('bm25', 'h1.json', 'head'),
      run('dense', 'h2.json', 'head'),
      run('bm25', 't1.json', 'tail'),
    ]);

    expect(result.isErr() && result.error.message).toBe('Partition tail has no run for method dense');
  });

  it('should reject a method given twice', () => {
    const result = planRuns([run('bm25', 'a.json'), run('bm25', 'b.json')]);

    expect(result.isErr() && result.error.message).toBe('Method bm25 is given twice');
  });

  it('should require at least one run', () => {
    const result = planRuns([]);

    expect(result.isErr() && result.error.message).toBe('At least one --run is required');
  });
});

describe('formatMergeReport', () => {
  const report: PoolMergeReport = {
    inputRows: 7,
    acceptedHits: 6,
    skippedRows: 1,
    degradedScores: 0,
    beyondDepth: 2,
    duplicateHits: 0,
    sampleErrors: ['row 3: missing doc_id'],
  };

  it('should list counts and sample errors', () => {
    const lines = formatMergeReport(report, 4).split('\n');

    expect(lines[0]).toBe('Pool merge');
    expect(lines).toContain('  Pooled docs:     4');
    expect(lines).toContain('  Beyond depth:    2');
    expect(lines).toContain('  Skipped rows:    1');
    expect(lines[lines.length - 1]).toBe('    - row 3: missing doc_id');
  });
});
