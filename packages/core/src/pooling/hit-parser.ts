import { ok, err, type Result } from 'neverthrow';
import { z } from 'zod';
import { ValidationError } from '../types/errors.js';
import type { RawHitRow, SearchHit } from '../types/pool.js';

/**
 * Columns owned by the pooling pipeline. Everything else on an input row is
 * carried through to the pooled document untouched.
 */
export const RESERVED_HIT_FIELDS: ReadonlySet<string> = new Set([
  'experiment_id',
  'experiment_name',
  'query_set',
  'query',
  'rank',
  'index',
  'doc_id',
  'score',
  'method',
]);

const requiredFieldsSchema = z.object({
  query: z.string().refine((value) => value.trim().length > 0, 'query must be a non-empty string'),
  doc_id: z.union([
    z.string().refine((value) => value.trim().length > 0, 'doc_id must not be empty'),
    z.number().finite().transform((value) => String(value)),
  ]),
  rank: z.coerce.number().int('rank must be an integer').positive('rank must be positive'),
});

export interface ParsedHit {
  readonly hit: SearchHit;
  /** True when the score was absent or could not be read as a number. */
  readonly degradedScore: boolean;
}

/**
 * Read a score column. Numbers and numeric strings are accepted; anything
 * else is treated as absent.
 */
export function parseScore(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function extractFields(row: RawHitRow): Record<string, unknown> {
  const fields: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(row)) {
    if (!RESERVED_HIT_FIELDS.has(key)) {
      fields[key] = value;
    }
  }
  return fields;
}

/**
 * Validate a raw result row for `method`. Rows missing query, doc_id or
 * rank fail with a ValidationError; a bad score only degrades to null.
 */
export function parseHitRow(
  row: RawHitRow,
  method: string,
  rowIndex: number,
): Result<ParsedHit, ValidationError> {
  const parsed = requiredFieldsSchema.safeParse(row);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`)
      .join('; ');
    return err(new ValidationError(`[${method}] row ${rowIndex}: ${detail}`, rowIndex));
  }

  const rawScore = row['score'];
  const score = parseScore(rawScore);
  const querySet = row['query_set'];

  return ok({
    hit: {
      query: parsed.data.query,
      docId: parsed.data.doc_id,
      rank: parsed.data.rank,
      score,
      method,
      partition: typeof querySet === 'string' && querySet.length > 0 ? querySet : null,
      fields: extractFields(row),
    },
    degradedScore: score === null,
  });
}
