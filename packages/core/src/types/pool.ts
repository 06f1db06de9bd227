import type { RelevanceJudgment } from './judgment.js';

/**
 * A single retrieval result for one method, as produced by an external run.
 * `rank` is 1-based; `score` is null when the source omitted it or it was not numeric.
 */
export interface SearchHit {
  readonly query: string;
  readonly docId: string;
  readonly rank: number;
  readonly score: number | null;
  readonly method: string;
  readonly partition: string | null;
  /** Pass-through content fields (title, body, metadata columns, ...). */
  readonly fields: Readonly<Record<string, unknown>>;
}

/** Raw hit row as read from a results file, before validation. */
export type RawHitRow = Readonly<Record<string, unknown>>;

/**
 * One unique (query, docId) entry of an evaluation pool.
 */
export interface PooledDocument {
  readonly query: string;
  readonly docId: string;
  readonly partition: string | null;
  /** Methods whose top-K contained the document, in method-list order. Never empty. */
  readonly foundBy: readonly string[];
  /** Rank per method; null where the method did not find the doc within depth K. */
  readonly ranks: Readonly<Record<string, number | null>>;
  readonly scores: Readonly<Record<string, number | null>>;
  readonly fields: Readonly<Record<string, unknown>>;
  readonly judgment?: RelevanceJudgment;
}

export interface PooledTable {
  readonly depthK: number;
  readonly methods: readonly string[];
  readonly documents: readonly PooledDocument[];
}

/** Row and score issues seen while merging. Row-level problems never abort a merge. */
export interface PoolMergeReport {
  readonly inputRows: number;
  readonly acceptedHits: number;
  readonly skippedRows: number;
  readonly degradedScores: number;
  /** Valid hits that fell outside a method's top-K for their query. */
  readonly beyondDepth: number;
  /** Repeated (query, docId, method) hits that overwrote an earlier one. */
  readonly duplicateHits: number;
  readonly sampleErrors: readonly string[];
}

export interface PoolMergeResult {
  readonly table: PooledTable;
  readonly report: PoolMergeReport;
}
