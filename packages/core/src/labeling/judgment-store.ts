import { ok, type Result } from 'neverthrow';
import type { JudgmentStoreError } from '../types/errors.js';
import type { JudgmentStore, RelevanceGrade, RelevanceJudgment } from '../types/judgment.js';

/** Map key for a (query, docId) pair. */
export function judgmentKey(query: string, docId: string): string {
  return `${query}\u0000${docId}`;
}

/**
 * Judgment store held in memory. Used by tests and as the cache behind the
 * file-backed store.
 */
export class InMemoryJudgmentStore implements JudgmentStore {
  private readonly judgments = new Map<string, RelevanceJudgment>();

  constructor(initial: readonly RelevanceJudgment[] = []) {
    for (const judgment of initial) {
      this.judgments.set(judgmentKey(judgment.query, judgment.docId), judgment);
    }
  }

  get size(): number {
    return this.judgments.size;
  }

  async read(query: string, docId: string): Promise<RelevanceGrade | undefined> {
    return this.judgments.get(judgmentKey(query, docId))?.relevance ?? undefined;
  }

  async get(query: string, docId: string): Promise<RelevanceJudgment | undefined> {
    return this.judgments.get(judgmentKey(query, docId));
  }

  async write(judgment: RelevanceJudgment): Promise<Result<void, JudgmentStoreError>> {
    this.judgments.set(judgmentKey(judgment.query, judgment.docId), judgment);
    return ok(undefined);
  }

  /** All stored judgments in first-write order. */
  all(): RelevanceJudgment[] {
    return [...this.judgments.values()];
  }
}
