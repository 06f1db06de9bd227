import { err, type Result } from 'neverthrow';
import { ConfigurationError, JudgmentStoreError } from '../types/errors.js';
import {
  isRelevanceGrade,
  type JudgmentStore,
  type RelevanceGrade,
  type RelevanceJudgment,
} from '../types/judgment.js';
import type { PooledDocument, PooledTable } from '../types/pool.js';

export const MANUAL_LABELER = 'manual';

export interface JudgmentCoverage {
  readonly documents: number;
  readonly judged: number;
  readonly failed: number;
  readonly unjudged: number;
  readonly distribution: Readonly<Record<RelevanceGrade, number>>;
}

/**
 * Return a copy of the table with each document's stored judgment attached,
 * failure records included. Documents the store knows nothing about keep
 * whatever judgment they already carried.
 */
export async function attachJudgments(
  table: PooledTable,
  store: JudgmentStore,
): Promise<PooledTable> {
  const documents: PooledDocument[] = [];
  for (const doc of table.documents) {
    const judgment = await store.get(doc.query, doc.docId);
    documents.push(judgment !== undefined ? { ...doc, judgment } : doc);
  }
  return { ...table, documents };
}

export function summarizeJudgments(table: PooledTable): JudgmentCoverage {
  const distribution: Record<RelevanceGrade, number> = { 0: 0, 1: 0, 2: 0 };
  let judged = 0;
  let failed = 0;

  for (const doc of table.documents) {
    const relevance = doc.judgment?.relevance;
    if (relevance === undefined) continue;
    if (relevance === null) {
      failed++;
    } else {
      judged++;
      distribution[relevance]++;
    }
  }

  return {
    documents: table.documents.length,
    judged,
    failed,
    unjudged: table.documents.length - judged - failed,
    distribution,
  };
}

export interface ManualJudgmentInput {
  readonly query: string;
  readonly docId: string;
  readonly relevance: number;
  readonly notes?: string;
  readonly labeledBy?: string;
}

/**
 * Record a manual judgment, replacing whatever the store held for the pair.
 */
export async function overrideJudgment(
  store: JudgmentStore,
  input: ManualJudgmentInput,
  clock: () => Date = () => new Date(),
): Promise<Result<RelevanceJudgment, ConfigurationError | JudgmentStoreError>> {
  if (!isRelevanceGrade(input.relevance)) {
    return err(new ConfigurationError(`Relevance must be 0, 1 or 2, got ${input.relevance}`));
  }

  const judgment: RelevanceJudgment = {
    query: input.query,
    docId: input.docId,
    relevance: input.relevance,
    labeledBy: input.labeledBy ?? MANUAL_LABELER,
    labeledAt: clock().toISOString(),
    notes: input.notes ?? '',
  };

  const written = await store.write(judgment);
  return written.map(() => judgment);
}
