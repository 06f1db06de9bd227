/**
 * Depth-K pooling (TREC style).
 *
 * Takes the top-K hits of every retrieval method per query and unions them
 * into one pool keyed by (query, docId), recording which methods found each
 * document and at what rank/score.
 */

import { ok, err, type Result } from 'neverthrow';
import { ConfigurationError } from '../types/errors.js';
import type {
  PooledDocument,
  PoolMergeReport,
  PoolMergeResult,
  RawHitRow,
  SearchHit,
} from '../types/pool.js';
import { parseHitRow } from './hit-parser.js';

/** Maximum number of row errors kept verbatim in a merge report. */
const MAX_SAMPLE_ERRORS = 5;

export interface PoolMergeOptions {
  /** Method identifiers, one per input group, in the same order as `inputs`. */
  readonly methods: readonly string[];
  /** Per-method hit rows, each already sorted by rank. */
  readonly inputs: readonly (readonly RawHitRow[])[];
  readonly depthK: number;
  /** Partition tag forced onto every pooled document (overrides row `query_set`). */
  readonly partition?: string;
}

export interface PartitionInput {
  readonly tag: string;
  readonly inputs: readonly (readonly RawHitRow[])[];
}

export interface PartitionedPoolMergeOptions {
  readonly methods: readonly string[];
  readonly depthK: number;
  readonly partitions: readonly PartitionInput[];
}

interface DocumentBuilder {
  readonly query: string;
  readonly docId: string;
  readonly partition: string | null;
  readonly foundBy: string[];
  readonly ranks: Record<string, number | null>;
  readonly scores: Record<string, number | null>;
  readonly fields: Readonly<Record<string, unknown>>;
}

class ReportCounter {
  inputRows = 0;
  acceptedHits = 0;
  skippedRows = 0;
  degradedScores = 0;
  beyondDepth = 0;
  duplicateHits = 0;
  readonly sampleErrors: string[] = [];

  recordError(message: string): void {
    this.skippedRows++;
    if (this.sampleErrors.length < MAX_SAMPLE_ERRORS) {
      this.sampleErrors.push(message);
    }
  }

  toReport(): PoolMergeReport {
    return {
      inputRows: this.inputRows,
      acceptedHits: this.acceptedHits,
      skippedRows: this.skippedRows,
      degradedScores: this.degradedScores,
      beyondDepth: this.beyondDepth,
      duplicateHits: this.duplicateHits,
      sampleErrors: [...this.sampleErrors],
    };
  }
}

function validateMethods(methods: readonly string[]): Result<void, ConfigurationError> {
  if (methods.length === 0) {
    return err(new ConfigurationError('At least one method is required'));
  }
  const seen = new Set<string>();
  for (const method of methods) {
    if (method.trim().length === 0) {
      return err(new ConfigurationError('Method identifiers must not be empty'));
    }
    if (seen.has(method)) {
      return err(new ConfigurationError(`Duplicate method identifier: ${method}`));
    }
    seen.add(method);
  }
  return ok(undefined);
}

function validateDepth(depthK: number): Result<void, ConfigurationError> {
  if (!Number.isInteger(depthK) || depthK <= 0) {
    return err(new ConfigurationError(`Depth K must be a positive integer, got ${depthK}`));
  }
  return ok(undefined);
}

function validateGroupCount(
  methods: readonly string[],
  inputs: readonly (readonly RawHitRow[])[],
  label: string,
): Result<void, ConfigurationError> {
  if (methods.length !== inputs.length) {
    return err(
      new ConfigurationError(
        `${label}: ${inputs.length} input group(s) for ${methods.length} method(s); counts must match`,
      ),
    );
  }
  return ok(undefined);
}

/**
 * Admit each method's top-K hits per query.
 *
 * Hits are walked in input order. A repeated (query, docId, method) hit
 * overwrites the admitted one without using another slot; a new document is
 * admitted only while the method has fewer than K documents for the query.
 */
function admitTopK(
  options: PoolMergeOptions,
  counter: ReportCounter,
): Map<string, Map<string, Map<string, SearchHit>>> {
  const byQuery = new Map<string, Map<string, Map<string, SearchHit>>>();

  options.methods.forEach((method, methodIndex) => {
    const rows = options.inputs[methodIndex] ?? [];

    rows.forEach((row, rowIndex) => {
      counter.inputRows++;
      const parsed = parseHitRow(row, method, rowIndex);
      if (parsed.isErr()) {
        counter.recordError(parsed.error.message);
        return;
      }

      counter.acceptedHits++;
      if (parsed.value.degradedScore) {
        counter.degradedScores++;
      }

      const hit = parsed.value.hit;
      let byMethod = byQuery.get(hit.query);
      if (byMethod === undefined) {
        byMethod = new Map();
        byQuery.set(hit.query, byMethod);
      }
      let admitted = byMethod.get(method);
      if (admitted === undefined) {
        admitted = new Map();
        byMethod.set(method, admitted);
      }

      if (admitted.has(hit.docId)) {
        counter.duplicateHits++;
        admitted.set(hit.docId, hit);
      } else if (admitted.size < options.depthK) {
        admitted.set(hit.docId, hit);
      } else {
        counter.beyondDepth++;
      }
    });
  });

  return byQuery;
}

function emptyMethodRecord(methods: readonly string[]): Record<string, number | null> {
  const record: Record<string, number | null> = {};
  for (const method of methods) {
    record[method] = null;
  }
  return record;
}

function buildDocuments(
  methods: readonly string[],
  byQuery: Map<string, Map<string, Map<string, SearchHit>>>,
  forcedPartition: string | undefined,
): PooledDocument[] {
  const documents: PooledDocument[] = [];
  const queries = [...byQuery.keys()].sort();

  for (const query of queries) {
    const byMethod = byQuery.get(query);
    if (byMethod === undefined) continue;

    const pool = new Map<string, DocumentBuilder>();

    for (const method of methods) {
      const admitted = byMethod.get(method);
      if (admitted === undefined) continue;

      for (const hit of admitted.values()) {
        let doc = pool.get(hit.docId);
        if (doc === undefined) {
          doc = {
            query,
            docId: hit.docId,
            partition: forcedPartition ?? hit.partition,
            foundBy: [],
            ranks: emptyMethodRecord(methods),
            scores: emptyMethodRecord(methods),
            fields: hit.fields,
          };
          pool.set(hit.docId, doc);
        }
        doc.foundBy.push(method);
        doc.ranks[method] = hit.rank;
        doc.scores[method] = hit.score;
      }
    }

    documents.push(...pool.values());
  }

  return documents;
}

/**
 * Merge one homogeneous set of method results into a depth-K pool.
 *
 * Fails only on configuration problems (method/input count mismatch, bad K,
 * bad method identifiers). Malformed rows are skipped and counted in the report.
 */
export function mergePool(options: PoolMergeOptions): Result<PoolMergeResult, ConfigurationError> {
  const check = validateMethods(options.methods)
    .andThen(() => validateDepth(options.depthK))
    .andThen(() => validateGroupCount(options.methods, options.inputs, 'Pool merge'));
  if (check.isErr()) {
    return err(check.error);
  }

  const counter = new ReportCounter();
  const byQuery = admitTopK(options, counter);
  const documents = buildDocuments(options.methods, byQuery, options.partition);

  return ok({
    table: {
      depthK: options.depthK,
      methods: [...options.methods],
      documents,
    },
    report: counter.toReport(),
  });
}

function combineReports(reports: readonly PoolMergeReport[]): PoolMergeReport {
  const sampleErrors: string[] = [];
  for (const report of reports) {
    for (const message of report.sampleErrors) {
      if (sampleErrors.length < MAX_SAMPLE_ERRORS) {
        sampleErrors.push(message);
      }
    }
  }

  return {
    inputRows: reports.reduce((sum, r) => sum + r.inputRows, 0),
    acceptedHits: reports.reduce((sum, r) => sum + r.acceptedHits, 0),
    skippedRows: reports.reduce((sum, r) => sum + r.skippedRows, 0),
    degradedScores: reports.reduce((sum, r) => sum + r.degradedScores, 0),
    beyondDepth: reports.reduce((sum, r) => sum + r.beyondDepth, 0),
    duplicateHits: reports.reduce((sum, r) => sum + r.duplicateHits, 0),
    sampleErrors,
  };
}

/**
 * Merge several input groups (e.g. head and tail query populations)
 * independently and union the pools. Every document keeps its group's tag so
 * metrics can later be sliced without re-pooling.
 *
 * A query present in two groups is rejected: the union would hold two rows for
 * the same (query, docId).
 */
export function mergePartitionedPool(
  options: PartitionedPoolMergeOptions,
): Result<PoolMergeResult, ConfigurationError> {
  if (options.partitions.length === 0) {
    return err(new ConfigurationError('At least one partition is required'));
  }

  const tags = new Set<string>();
  for (const partition of options.partitions) {
    if (partition.tag.trim().length === 0) {
      return err(new ConfigurationError('Partition tags must not be empty'));
    }
    if (tags.has(partition.tag)) {
      return err(new ConfigurationError(`Duplicate partition tag: ${partition.tag}`));
    }
    tags.add(partition.tag);
  }

  const queryOwner = new Map<string, string>();
  const documents: PooledDocument[] = [];
  const reports: PoolMergeReport[] = [];

  for (const partition of options.partitions) {
    const merged = mergePool({
      methods: options.methods,
      inputs: partition.inputs,
      depthK: options.depthK,
      partition: partition.tag,
    });
    if (merged.isErr()) {
      return err(new ConfigurationError(`[${partition.tag}] ${merged.error.message}`));
    }

    for (const doc of merged.value.table.documents) {
      const owner = queryOwner.get(doc.query);
      if (owner !== undefined && owner !== partition.tag) {
        return err(
          new ConfigurationError(
            `Query "${doc.query}" appears in partitions ${owner} and ${partition.tag}`,
          ),
        );
      }
      queryOwner.set(doc.query, partition.tag);
    }

    documents.push(...merged.value.table.documents);
    reports.push(merged.value.report);
  }

  return ok({
    table: {
      depthK: options.depthK,
      methods: [...options.methods],
      documents,
    },
    report: combineReports(reports),
  });
}
