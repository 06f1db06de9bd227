import type { Result } from 'neverthrow';
import type { ClassificationError, JudgmentStoreError } from './errors.js';

/** Ordinal relevance: 0 not relevant, 1 partially relevant, 2 highly relevant. */
export type RelevanceGrade = 0 | 1 | 2;

export const RELEVANCE_GRADES: readonly RelevanceGrade[] = [0, 1, 2];

/**
 * A relevance judgment for one (query, docId).
 * `relevance` is null when classification failed; `notes` then carries the error.
 */
export interface RelevanceJudgment {
  readonly query: string;
  readonly docId: string;
  readonly relevance: RelevanceGrade | null;
  readonly labeledBy: string;
  /** ISO-8601 timestamp. */
  readonly labeledAt: string;
  readonly notes: string;
}

export interface DocumentContent {
  readonly docId: string;
  readonly title: string;
  readonly content: string;
}

export interface Classification {
  readonly relevance: RelevanceGrade;
  readonly reason: string;
}

/**
 * External relevance classification capability (LLM judge, human queue, stub).
 */
export interface RelevanceJudge {
  /**
   * `signal` is aborted when the caller gives up on the call (per-call timeout);
   * the judge should stop work and settle promptly.
   */
  classify(
    query: string,
    document: DocumentContent,
    signal?: AbortSignal,
  ): Promise<Result<Classification, ClassificationError>>;
}

/**
 * Judgment persistence capability. At most one judgment is kept per (query, docId);
 * a later write replaces the earlier one.
 */
export interface JudgmentStore {
  /** Returns the stored grade, or undefined when unjudged or the stored judgment failed. */
  read(query: string, docId: string): Promise<RelevanceGrade | undefined>;
  /** Returns the full stored judgment, including failure records. */
  get(query: string, docId: string): Promise<RelevanceJudgment | undefined>;
  write(judgment: RelevanceJudgment): Promise<Result<void, JudgmentStoreError>>;
}

export function isRelevanceGrade(value: unknown): value is RelevanceGrade {
  return value === 0 || value === 1 || value === 2;
}
