/**
 * Report writers for metrics engine output: JSON for machines, CSV for
 * charting tools, Markdown for human review.
 */

import { toCsv } from '@relpool/core';
import type { MetricsReport } from './types.js';

/** Indentation for JSON output. */
const JSON_INDENT = 2;

/** Decimal precision for numeric values in CSV and Markdown. */
const PRECISION = 4;

/**
 * Serialize a MetricsReport to formatted JSON. Numeric values keep full
 * precision; missing cells carry their DataError message as `reason`.
 */
export function writeJsonReport(report: MetricsReport): string {
  const serializable = {
    ...report,
    missingCells: report.missingCells.map((cell) => ({
      method: cell.method,
      query: cell.query,
      reason: cell.error.message,
    })),
  };
  return JSON.stringify(serializable, null, JSON_INDENT);
}

function fmtNum(value: number | null): string {
  return value === null ? '' : value.toFixed(PRECISION);
}

function fmtCell(value: number | null): string {
  return value === null ? 'n/a' : value.toFixed(PRECISION);
}

/**
 * One row per (method, query); one ndcg/recall/precision column per cutoff.
 */
export function writePerQueryCsv(report: MetricsReport): string {
  const cutoffColumns = report.cutoffs.flatMap((k) => [`ndcg@${k}`, `recall@${k}`, `precision@${k}`]);
  const columns = [
    'method',
    'query',
    'query_set',
    ...cutoffColumns,
    'mrr',
    'map',
    'num_results',
    'num_relevant',
  ];

  const rows = report.perQuery.map((result) => {
    const row: Record<string, unknown> = {
      method: result.method,
      query: result.query,
      query_set: result.partition,
      mrr: fmtNum(result.mrr),
      map: fmtNum(result.map),
      num_results: result.numResults,
      num_relevant: result.numRelevant,
    };
    for (const scores of result.atK) {
      row[`ndcg@${scores.k}`] = fmtNum(scores.ndcg);
      row[`recall@${scores.k}`] = fmtNum(scores.recall);
      row[`precision@${scores.k}`] = fmtNum(scores.precision);
    }
    return row;
  });

  return toCsv(columns, rows);
}

/**
 * One row per (method, K). Empty metric cells mean no query could be measured.
 */
export function writeAggregateCsv(report: MetricsReport): string {
  const columns = [
    'method',
    'k',
    'coverage',
    'query_count',
    'missing_count',
    'ndcg',
    'recall',
    'precision',
    'mrr',
    'map',
    'avg_num_results',
    'avg_num_relevant',
  ];

  const rows = report.aggregate.map((row) => ({
    method: row.method,
    k: row.k,
    coverage: row.coverage,
    query_count: row.queryCount,
    missing_count: row.missingCount,
    ndcg: fmtNum(row.ndcg),
    recall: fmtNum(row.recall),
    precision: fmtNum(row.precision),
    mrr: fmtNum(row.mrr),
    map: fmtNum(row.map),
    avg_num_results: fmtNum(row.avgNumResults),
    avg_num_relevant: fmtNum(row.avgNumRelevant),
  }));

  return toCsv(columns, rows);
}

/**
 * Markdown summary: one table per cutoff plus the list-level metrics, with
 * partial-coverage and missing cells called out.
 */
export function writeMarkdownReport(report: MetricsReport, title = 'Retrieval Metrics Report'): string {
  const lines: string[] = [];

  lines.push(`# ${title}`);
  lines.push('');
  lines.push(`**Pool depth**: ${report.depthK}`);
  if (report.partition !== null) {
    lines.push(`**Query set**: ${report.partition}`);
  }
  lines.push(`**Evaluated queries**: ${report.evaluatedQueries.length}`);
  if (report.unjudgedQueries.length > 0) {
    lines.push(`**Unjudged queries (excluded)**: ${report.unjudgedQueries.length}`);
  }
  lines.push('');

  for (const k of report.cutoffs) {
    const partial = report.partialCutoffs.includes(k);
    lines.push(`## @${k}${partial ? ' (partial coverage)' : ''}`);
    lines.push('');
    if (partial) {
      lines.push(`> K=${k} exceeds the pool depth ${report.depthK}; values are lower bounds.`);
      lines.push('');
    }
    lines.push('| Method | nDCG | Recall | Precision | Queries |');
    lines.push('|--------|------|--------|-----------|---------|');
    for (const row of report.aggregate.filter((r) => r.k === k)) {
      lines.push(
        `| ${row.method} | ${fmtCell(row.ndcg)} | ${fmtCell(row.recall)} | ${fmtCell(row.precision)} | ${row.queryCount} |`,
      );
    }
    lines.push('');
  }

  lines.push('## Rank metrics');
  lines.push('');
  lines.push('| Method | MRR | MAP | Avg results | Avg relevant |');
  lines.push('|--------|-----|-----|-------------|--------------|');
  for (const method of report.methods) {
    const row = report.aggregate.find((r) => r.method === method);
    if (row === undefined) continue;
    lines.push(
      `| ${method} | ${fmtCell(row.mrr)} | ${fmtCell(row.map)} | ${fmtCell(row.avgNumResults)} | ${fmtCell(row.avgNumRelevant)} |`,
    );
  }
  lines.push('');

  if (report.missingCells.length > 0) {
    lines.push('## Missing cells');
    lines.push('');
    for (const cell of report.missingCells) {
      lines.push(`- ${cell.method} / ${cell.query}: ${cell.error.message}`);
    }
    lines.push('');
  }

  return lines.join('\n');
}
