import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { InMemoryJudgmentStore, judgmentKey } from './judgment-store.js';
import { JsonlJudgmentStore } from './jsonl-judgment-store.js';
import type { RelevanceJudgment } from '../types/judgment.js';

function judgment(
  docId: string,
  relevance: RelevanceJudgment['relevance'],
  query = 'q',
): RelevanceJudgment {
  return {
    query,
    docId,
    relevance,
    labeledBy: 'ai-judge',
    labeledAt: '2026-03-01T00:00:00.000Z',
    notes: relevance === null ? 'error: boom' : '',
  };
}

describe('judgmentKey', () => {
  it('should not collide for pairs that concatenate to the same text', () => {
    expect(judgmentKey('ab', 'c')).not.toBe(judgmentKey('a', 'bc'));
  });
});

describe('InMemoryJudgmentStore', () => {
  it('should return the stored grade', async () => {
    const store = new InMemoryJudgmentStore([judgment('d1', 2)]);

    expect(await store.read('q', 'd1')).toBe(2);
    expect(await store.read('q', 'missing')).toBeUndefined();
    expect(store.size).toBe(1);
  });

  it('should treat a failure record as unjudged for read but keep it for get', async () => {
    const store = new InMemoryJudgmentStore();
    await store.write(judgment('d1', null));

    expect(await store.read('q', 'd1')).toBeUndefined();
    expect((await store.get('q', 'd1'))?.notes).toBe('error: boom');
  });

  it('should keep at most one judgment per pair, the latest write winning', async () => {
    const store = new InMemoryJudgmentStore();
    await store.write(judgment('d1', 0));
    await store.write(judgment('d1', 1));

    expect(store.size).toBe(1);
    expect(await store.read('q', 'd1')).toBe(1);
  });

  it('should keep grade 0 distinct from unjudged', async () => {
    const store = new InMemoryJudgmentStore([judgment('d1', 0)]);

    expect(await store.read('q', 'd1')).toBe(0);
  });
});

describe('JsonlJudgmentStore', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'relpool-judgments-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should start empty when the file does not exist', async () => {
    const result = await JsonlJudgmentStore.open(join(tempDir, 'nested', 'judgments.jsonl'));

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.size).toBe(0);
      expect(result.value.malformedLines).toBe(0);
    }
  });

  it('should append one line per write and reload them', async () => {
    const path = join(tempDir, 'judgments.jsonl');
    const opened = await JsonlJudgmentStore.open(path);
    if (opened.isErr()) throw opened.error;
    const store = opened.value;

    await Promise.all([store.write(judgment('d1', 2)), store.write(judgment('d2', null))]);

    const lines = readFileSync(path, 'utf-8').trim().split('\n');
    expect(lines).toHaveLength(2);

    const reopened = await JsonlJudgmentStore.open(path);
    if (reopened.isErr()) throw reopened.error;
    expect(await reopened.value.read('q', 'd1')).toBe(2);
    expect(await reopened.value.read('q', 'd2')).toBeUndefined();
    expect((await reopened.value.get('q', 'd2'))?.relevance).toBeNull();
  });

  it('should let the last line for a pair win on load', async () => {
    const path = join(tempDir, 'judgments.jsonl');
    writeFileSync(
      path,
      [JSON.stringify(judgment('d1', 0)), JSON.stringify(judgment('d1', 2)), ''].join('\n'),
    );

    const result = await JsonlJudgmentStore.open(path);
    if (result.isErr()) throw result.error;

    expect(result.value.size).toBe(1);
    expect(await result.value.read('q', 'd1')).toBe(2);
  });

  it('should skip and count malformed lines', async () => {
    const path = join(tempDir, 'judgments.jsonl');
    writeFileSync(
      path,
      ['{not json', JSON.stringify({ query: 'q', docId: 'd9', relevance: 7 }), JSON.stringify(judgment('d1', 1))].join(
        '\n',
      ),
    );

    const result = await JsonlJudgmentStore.open(path);
    if (result.isErr()) throw result.error;

    expect(result.value.malformedLines).toBe(2);
    expect(result.value.all().map((j) => j.docId)).toEqual(['d1']);
  });

  it('should start a fresh line after a partial last line left by an interrupted run', async () => {
    const path = join(tempDir, 'judgments.jsonl');
    writeFileSync(path, JSON.stringify(judgment('d1', 2)) + '\n{"query":"q","docId":"d2","relev');

    const opened = await JsonlJudgmentStore.open(path);
    if (opened.isErr()) throw opened.error;
    expect(opened.value.malformedLines).toBe(1);
    await opened.value.write(judgment('d3', 1));
    await opened.value.write(judgment('d4', 0));

    const reopened = await JsonlJudgmentStore.open(path);
    if (reopened.isErr()) throw reopened.error;
    expect(await reopened.value.read('q', 'd1')).toBe(2);
    expect(await reopened.value.read('q', 'd3')).toBe(1);
    expect(await reopened.value.read('q', 'd4')).toBe(0);
    expect(reopened.value.malformedLines).toBe(1);
    expect(readFileSync(path, 'utf-8').split('\n')).toHaveLength(5);
  });

  it('should report a write failure as a JudgmentStoreError', async () => {
    const dir = join(tempDir, 'gone');
    const opened = await JsonlJudgmentStore.open(join(dir, 'judgments.jsonl'));
    if (opened.isErr()) throw opened.error;
    rmSync(dir, { recursive: true, force: true });

    const result = await opened.value.write(judgment('d1', 1));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.name).toBe('JudgmentStoreError');
      expect(result.error.message).toContain('Failed to append judgment to');
    }
    expect(opened.value.size).toBe(0);
  });
});
