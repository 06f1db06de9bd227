/**
 * Drives a relevance judge over a pooled document set with bounded concurrency.
 *
 * - Resumable: the pending set is computed once, up front, as
 *   all documents minus those the store already holds a grade for.
 * - Bounded: a fixed pool of workers drains one queue, so at most
 *   `concurrency` classify calls are in flight, timed-out ones included.
 * - Incremental: each judgment is written to the store as soon as its call
 *   settles.
 * - Isolated: a failed, thrown or timed-out call becomes a null-grade judgment
 *   with the error in its notes; the batch carries on.
 *
 * There is no retry or backoff. When the judge pushes back, lower the
 * concurrency and run again; already-judged documents are skipped.
 */

import { ok, err, type Result } from 'neverthrow';
import { ClassificationError, ConfigurationError, LabelingError } from '../types/errors.js';
import type {
  Classification,
  DocumentContent,
  JudgmentStore,
  RelevanceGrade,
  RelevanceJudge,
  RelevanceJudgment,
} from '../types/judgment.js';
import type { PooledDocument } from '../types/pool.js';
import { extractDocumentContent } from './document-content.js';
import { judgmentKey } from './judgment-store.js';

export const DEFAULT_CONCURRENCY = 10;

/** Distinct failure messages retained for the final report. */
const MAX_FAILURE_SAMPLES = 5;

export interface LabelingProgress {
  readonly completed: number;
  readonly total: number;
  readonly failed: number;
}

export type LabelingProgressCallback = (progress: LabelingProgress) => void;

export interface LabelingOptions {
  readonly judge: RelevanceJudge;
  readonly store: JudgmentStore;
  /** Recorded as `labeledBy` on every judgment this run writes. */
  readonly labeledBy: string;
  readonly concurrency?: number;
  /** Skip documents that already hold a grade (default true). */
  readonly skipJudged?: boolean;
  /** Per-call timeout in milliseconds; 0 or undefined disables it. */
  readonly timeoutMs?: number;
  /** Cap on documents classified this run; the rest are reported as deferred. */
  readonly limit?: number;
  readonly titleFields?: readonly string[];
  readonly contentFields?: readonly string[];
  readonly clock?: () => Date;
  readonly onProgress?: LabelingProgressCallback;
}

export interface LabelingPlan {
  readonly alreadyJudged: readonly PooledDocument[];
  readonly pending: readonly PooledDocument[];
  /** Pending documents left out by `limit`. */
  readonly deferred: number;
  /** Repeated (query, docId) entries in the input, scheduled once. */
  readonly duplicates: number;
}

export interface LabelingReport {
  readonly totalDocuments: number;
  readonly duplicates: number;
  readonly alreadyJudged: number;
  readonly pending: number;
  readonly deferred: number;
  readonly processed: number;
  readonly labeled: number;
  readonly failed: number;
  readonly failureSamples: readonly string[];
  readonly gradeDistribution: Readonly<Record<RelevanceGrade, number>>;
  readonly durationMs: number;
}

class RunTally {
  completed = 0;
  labeled = 0;
  failed = 0;
  readonly failureSamples: string[] = [];
  readonly distribution: Record<RelevanceGrade, number> = { 0: 0, 1: 0, 2: 0 };
  fatal: LabelingError | undefined;

  recordFailure(message: string): void {
    this.failed++;
    if (this.failureSamples.length < MAX_FAILURE_SAMPLES && !this.failureSamples.includes(message)) {
      this.failureSamples.push(message);
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class LabelingOrchestrator {
  private readonly options: LabelingOptions;
  private readonly concurrency: number;
  private readonly clock: () => Date;
  private current: LabelingProgress = { completed: 0, total: 0, failed: 0 };

  constructor(options: LabelingOptions) {
    this.options = options;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.clock = options.clock ?? (() => new Date());
  }

  /** Live progress of the current (or last) run. */
  get progress(): LabelingProgress {
    return this.current;
  }

  /**
   * Split documents into already-judged and pending. Computed once per run and
   * never revisited while workers are draining the queue.
   */
  async plan(documents: readonly PooledDocument[]): Promise<LabelingPlan> {
    const skipJudged = this.options.skipJudged ?? true;
    const seen = new Set<string>();
    const alreadyJudged: PooledDocument[] = [];
    const pending: PooledDocument[] = [];
    let duplicates = 0;

    for (const doc of documents) {
      const key = judgmentKey(doc.query, doc.docId);
      if (seen.has(key)) {
        duplicates++;
        continue;
      }
      seen.add(key);

      if (skipJudged && (await this.options.store.read(doc.query, doc.docId)) !== undefined) {
        alreadyJudged.push(doc);
      } else {
        pending.push(doc);
      }
    }

    const limit = this.options.limit;
    const scheduled = limit !== undefined ? pending.slice(0, limit) : pending;

    return {
      alreadyJudged,
      pending: scheduled,
      deferred: pending.length - scheduled.length,
      duplicates,
    };
  }

  async run(
    documents: readonly PooledDocument[],
  ): Promise<Result<LabelingReport, ConfigurationError | LabelingError>> {
    if (!Number.isInteger(this.concurrency) || this.concurrency <= 0) {
      return err(new ConfigurationError(`Concurrency must be a positive integer, got ${this.concurrency}`));
    }
    const limit = this.options.limit;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      return err(new ConfigurationError(`Limit must be a non-negative integer, got ${limit}`));
    }

    const startTime = Date.now();
    const plan = await this.plan(documents);
    const queue = plan.pending;
    const tally = new RunTally();
    this.current = { completed: 0, total: queue.length, failed: 0 };

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (tally.fatal === undefined) {
        const doc = queue[cursor++];
        if (doc === undefined) return;
        await this.labelOne(doc, tally, queue.length);
      }
    };

    const workerCount = Math.min(this.concurrency, queue.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (tally.fatal !== undefined) {
      return err(tally.fatal);
    }

    return ok({
      totalDocuments: documents.length,
      duplicates: plan.duplicates,
      alreadyJudged: plan.alreadyJudged.length,
      pending: queue.length,
      deferred: plan.deferred,
      processed: tally.completed,
      labeled: tally.labeled,
      failed: tally.failed,
      failureSamples: [...tally.failureSamples],
      gradeDistribution: { ...tally.distribution },
      durationMs: Date.now() - startTime,
    });
  }

  private async labelOne(doc: PooledDocument, tally: RunTally, total: number): Promise<void> {
    const content = extractDocumentContent(doc, {
      titleFields: this.options.titleFields,
      contentFields: this.options.contentFields,
    });
    const outcome = await this.classify(doc.query, content);

    const base = {
      query: doc.query,
      docId: doc.docId,
      labeledBy: this.options.labeledBy,
      labeledAt: this.clock().toISOString(),
    };
    const judgment: RelevanceJudgment = outcome.isOk()
      ? { ...base, relevance: outcome.value.relevance, notes: outcome.value.reason }
      : { ...base, relevance: null, notes: `error: ${outcome.error.message}` };

    const written = await this.options.store.write(judgment);
    if (written.isErr()) {
      tally.fatal ??= new LabelingError(
        `Judgment store rejected (${doc.query}, ${doc.docId}): ${written.error.message}`,
      );
      return;
    }

    tally.completed++;
    if (outcome.isOk()) {
      tally.labeled++;
      tally.distribution[outcome.value.relevance]++;
    } else {
      tally.recordFailure(outcome.error.message);
    }

    this.current = { completed: tally.completed, total, failed: tally.failed };
    this.options.onProgress?.(this.current);
  }

  /**
   * Call the judge, folding thrown errors, rejections and the per-call timeout
   * into a ClassificationError result.
   *
   * On timeout the call's signal is aborted, and the worker still waits for
   * the call to settle, so abandoned calls keep counting against `concurrency`.
   */
  private async classify(
    query: string,
    content: DocumentContent,
  ): Promise<Result<Classification, ClassificationError>> {
    const controller = new AbortController();
    let call: Promise<Result<Classification, ClassificationError>>;
    try {
      call = this.options.judge
        .classify(query, content, controller.signal)
        .catch((error: unknown) => err(new ClassificationError(errorMessage(error))));
    } catch (error: unknown) {
      return err(new ClassificationError(errorMessage(error)));
    }

    const timeoutMs = this.options.timeoutMs ?? 0;
    if (timeoutMs <= 0) {
      return call;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), timeoutMs);
    });

    try {
      const first = await Promise.race([call, timeout]);
      if (first !== 'timeout') {
        return first;
      }
    } finally {
      clearTimeout(timer);
    }

    const failure = new ClassificationError(`Classification timed out after ${timeoutMs}ms`);
    controller.abort(failure);
    await call;
    return err(failure);
  }
}
