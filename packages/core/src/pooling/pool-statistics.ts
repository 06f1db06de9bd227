/**
 * Derived pool statistics. Everything here is recomputed from the pooled
 * table alone and is never stored as primary state.
 */

import type { PooledTable } from '../types/pool.js';

export interface MethodContribution {
  readonly method: string;
  /** Pool rows this method found within depth K. */
  readonly found: number;
  /** found / (K x queries) x 100. */
  readonly percentOfCapacity: number;
  /** found / pool size x 100. */
  readonly percentOfPool: number;
  readonly avgPerQuery: number;
  /** Rows found by this method and no other. */
  readonly unique: number;
}

export interface OverlapBucket {
  /** Number of methods that found the documents in this bucket. */
  readonly methodsFound: number;
  readonly count: number;
  readonly percent: number;
}

export interface DocsPerQuery {
  readonly min: number;
  readonly max: number;
  readonly mean: number;
  readonly median: number;
}

export interface PoolStatistics {
  readonly depthK: number;
  readonly methodCount: number;
  readonly queryCount: number;
  readonly totalDocuments: number;
  readonly perMethod: readonly MethodContribution[];
  /** Buckets for n = 1..methodCount; counts always sum to totalDocuments. */
  readonly overlap: readonly OverlapBucket[];
  readonly docsPerQuery: DocsPerQuery;
}

function percent(part: number, whole: number): number {
  return whole > 0 ? (part / whole) * 100 : 0;
}

function median(sorted: readonly number[]): number {
  if (sorted.length === 0) return 0;
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  const lower = sorted[mid - 1] ?? 0;
  return (lower + upper) / 2;
}

function summarizeDocsPerQuery(table: PooledTable): DocsPerQuery {
  const counts = new Map<string, number>();
  for (const doc of table.documents) {
    counts.set(doc.query, (counts.get(doc.query) ?? 0) + 1);
  }

  const values = [...counts.values()].sort((a, b) => a - b);
  if (values.length === 0) {
    return { min: 0, max: 0, mean: 0, median: 0 };
  }

  const total = values.reduce((sum, v) => sum + v, 0);
  return {
    min: values[0] ?? 0,
    max: values[values.length - 1] ?? 0,
    mean: total / values.length,
    median: median(values),
  };
}

export function computePoolStatistics(table: PooledTable): PoolStatistics {
  const totalDocuments = table.documents.length;
  const queryCount = new Set(table.documents.map((doc) => doc.query)).size;
  const methodCount = table.methods.length;
  const capacity = table.depthK * queryCount;

  const perMethod: MethodContribution[] = table.methods.map((method) => {
    let found = 0;
    let unique = 0;
    for (const doc of table.documents) {
      if (doc.ranks[method] !== null && doc.ranks[method] !== undefined) {
        found++;
        if (doc.foundBy.length === 1) {
          unique++;
        }
      }
    }
    return {
      method,
      found,
      percentOfCapacity: percent(found, capacity),
      percentOfPool: percent(found, totalDocuments),
      avgPerQuery: queryCount > 0 ? found / queryCount : 0,
      unique,
    };
  });

  const overlapCounts = new Array<number>(methodCount).fill(0);
  for (const doc of table.documents) {
    const n = doc.foundBy.length;
    if (n >= 1 && n <= methodCount) {
      overlapCounts[n - 1] = (overlapCounts[n - 1] ?? 0) + 1;
    }
  }

  const overlap: OverlapBucket[] = overlapCounts.map((count, index) => ({
    methodsFound: index + 1,
    count,
    percent: percent(count, totalDocuments),
  }));

  return {
    depthK: table.depthK,
    methodCount,
    queryCount,
    totalDocuments,
    perMethod,
    overlap,
    docsPerQuery: summarizeDocsPerQuery(table),
  };
}

function overlapLabel(methodsFound: number, methodCount: number): string {
  if (methodsFound === methodCount) return 'all methods';
  return `${methodsFound} method${methodsFound > 1 ? 's' : ''} only`;
}

/**
 * Render the plain-text statistics report written beside a pool file.
 */
export function formatPoolStatistics(stats: PoolStatistics, title = 'Pooling Statistics'): string {
  const rule = '='.repeat(70);
  const thin = '-'.repeat(70);
  const perQuery = (count: number): string =>
    (stats.queryCount > 0 ? count / stats.queryCount : 0).toFixed(1);

  const lines: string[] = [];
  lines.push(rule);
  lines.push(title);
  lines.push(rule);
  lines.push('');
  lines.push(`Depth-K: ${stats.depthK}`);
  lines.push(`Methods: ${stats.methodCount}`);
  lines.push(`Number of queries: ${stats.queryCount}`);
  lines.push(`Total unique documents in pool: ${stats.totalDocuments}`);
  lines.push(`Average documents per query: ${perQuery(stats.totalDocuments)}`);
  lines.push('');

  lines.push(thin);
  lines.push('Documents Found Per Method:');
  lines.push(thin);
  for (const m of stats.perMethod) {
    lines.push(
      `  ${m.method.padEnd(20)}: ${String(m.found).padStart(6)} (${m.percentOfPool.toFixed(1).padStart(5)}% of pool, ${m.percentOfCapacity.toFixed(1)}% of K x queries) - avg ${m.avgPerQuery.toFixed(1)} per query`,
    );
  }
  lines.push('');

  lines.push(thin);
  lines.push('Document Overlap by Number of Methods:');
  lines.push(thin);
  for (const bucket of stats.overlap) {
    const label = overlapLabel(bucket.methodsFound, stats.methodCount);
    lines.push(
      `  Found by ${label.padEnd(20)}: ${String(bucket.count).padStart(6)} (${bucket.percent.toFixed(1).padStart(5)}%) - avg ${perQuery(bucket.count)} per query`,
    );
  }
  lines.push('');

  lines.push(thin);
  lines.push('Unique Contributions (found by only one method):');
  lines.push(thin);
  for (const m of stats.perMethod) {
    lines.push(
      `  ${m.method.padEnd(20)} only: ${String(m.unique).padStart(6)} - avg ${perQuery(m.unique)} per query`,
    );
  }
  lines.push('');

  lines.push(thin);
  lines.push('Query-Level Statistics:');
  lines.push(thin);
  lines.push(`  Min documents per query: ${stats.docsPerQuery.min}`);
  lines.push(`  Max documents per query: ${stats.docsPerQuery.max}`);
  lines.push(`  Mean documents per query: ${stats.docsPerQuery.mean.toFixed(1)}`);
  lines.push(`  Median documents per query: ${stats.docsPerQuery.median.toFixed(1)}`);
  lines.push('');
  lines.push(rule);

  return lines.join('\n');
}
