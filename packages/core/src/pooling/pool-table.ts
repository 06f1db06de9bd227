/**
 * Pooled table persistence: JSON round-trip for the CLI pipeline and the
 * flat column layout used for CSV export.
 */

import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { relevanceJudgmentSchema } from '../labeling/judgment-schema.js';
import { ConfigurationError } from '../types/errors.js';
import type { PooledDocument, PooledTable } from '../types/pool.js';
import { toCsv } from '../utils/csv.js';

/** JSON formatting indentation. */
const JSON_INDENT = 2;

/** Delimiter used for found_by_methods in flat rows. */
export const FOUND_BY_DELIMITER = ',';

const methodRecordSchema = z.record(z.string(), z.number().nullable());

const pooledDocumentSchema = z.object({
  query: z.string().min(1),
  docId: z.string().min(1),
  partition: z.string().nullable(),
  foundBy: z.array(z.string()).min(1, 'foundBy must not be empty'),
  ranks: methodRecordSchema,
  scores: methodRecordSchema,
  fields: z.record(z.string(), z.unknown()),
  judgment: relevanceJudgmentSchema.optional(),
});

const pooledTableSchema = z.object({
  depthK: z.number().int().positive(),
  methods: z.array(z.string().min(1)).min(1),
  documents: z.array(pooledDocumentSchema),
});

export function serializePooledTable(table: PooledTable): string {
  return JSON.stringify(table, null, JSON_INDENT) + '\n';
}

/**
 * Validate a parsed JSON value as a pooled table. Also rejects duplicate
 * (query, docId) rows and foundBy entries that are not listed methods.
 */
export function parsePooledTable(value: unknown): Result<PooledTable, ConfigurationError> {
  const parsed = pooledTableSchema.safeParse(value);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    return err(new ConfigurationError(`Invalid pooled table: ${detail}`));
  }

  const table = parsed.data;
  const methods = new Set(table.methods);
  const keys = new Set<string>();
  for (const doc of table.documents) {
    const key = `${doc.query}\u0000${doc.docId}`;
    if (keys.has(key)) {
      return err(
        new ConfigurationError(`Invalid pooled table: duplicate row for (${doc.query}, ${doc.docId})`),
      );
    }
    keys.add(key);
    const unknown = doc.foundBy.find((method) => !methods.has(method));
    if (unknown !== undefined) {
      return err(
        new ConfigurationError(`Invalid pooled table: unknown method "${unknown}" on ${doc.docId}`),
      );
    }
  }

  return ok(table);
}

function fieldColumns(documents: readonly PooledDocument[], reserved: ReadonlySet<string>): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const doc of documents) {
    for (const key of Object.keys(doc.fields)) {
      if (!seen.has(key) && !reserved.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

export interface PoolRowLayout {
  readonly columns: readonly string[];
  readonly rows: readonly Record<string, unknown>[];
}

/**
 * Flatten a table into rows keyed by column name:
 * query, doc_id, query_set, found_by_methods, num_methods_found,
 * <method>_rank / <method>_score per method, pass-through fields, and the
 * judgment columns when any row carries a judgment.
 */
export function toPoolRows(table: PooledTable): PoolRowLayout {
  const methodColumns = table.methods.flatMap((method) => [`${method}_rank`, `${method}_score`]);
  const judged = table.documents.some((doc) => doc.judgment !== undefined);
  const judgmentColumns = judged ? ['relevance', 'labeled_by', 'labeled_at', 'notes'] : [];
  const leading = ['query', 'doc_id', 'query_set', 'found_by_methods', 'num_methods_found'];
  const reserved = new Set([...leading, ...methodColumns, ...judgmentColumns]);
  const columns = [...leading, ...methodColumns, ...fieldColumns(table.documents, reserved), ...judgmentColumns];

  const rows = table.documents.map((doc) => {
    const row: Record<string, unknown> = {
      query: doc.query,
      doc_id: doc.docId,
      query_set: doc.partition,
      found_by_methods: doc.foundBy.join(FOUND_BY_DELIMITER),
      num_methods_found: doc.foundBy.length,
    };
    for (const method of table.methods) {
      row[`${method}_rank`] = doc.ranks[method] ?? null;
      row[`${method}_score`] = doc.scores[method] ?? null;
    }
    for (const [key, value] of Object.entries(doc.fields)) {
      if (!reserved.has(key)) {
        row[key] = value;
      }
    }
    if (judged) {
      row['relevance'] = doc.judgment?.relevance ?? null;
      row['labeled_by'] = doc.judgment?.labeledBy ?? null;
      row['labeled_at'] = doc.judgment?.labeledAt ?? null;
      row['notes'] = doc.judgment?.notes ?? null;
    }
    return row;
  });

  return { columns, rows };
}

export function writePoolCsv(table: PooledTable): string {
  const layout = toPoolRows(table);
  return toCsv(layout.columns, layout.rows);
}
