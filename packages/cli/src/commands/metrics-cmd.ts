import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { join, resolve } from 'node:path';
import { loadConfig, attachJudgments, JsonlJudgmentStore } from '@relpool/core';
import {
  computeMetrics,
  extremeQueries,
  metricLabel,
  metricValue,
  parseMetricSelector,
  checkSelector,
  rankMethods,
  writeAggregateCsv,
  writeJsonReport,
  writeMarkdownReport,
  writePerQueryCsv,
  type MethodRanking,
  type MetricSelector,
  type MetricsReport,
  type QueryMetricsResult,
} from '@relpool/metrics';
import { parseCutoffList, parseNameList, parsePositiveInt, readPooledTable, writeTextFile } from '../io.js';

/** File names written under `--out-dir`. */
export const REPORT_FILES = {
  json: 'metrics.json',
  markdown: 'metrics.md',
  perQuery: 'per_query.csv',
  aggregate: 'aggregate.csv',
} as const;

/**
 * Color a metric value: green >= 0.7, yellow >= 0.4, red below.
 */
export function colorMetric(value: number | null): string {
  if (value === null) return chalk.dim('   n/a');
  const formatted = value.toFixed(4).padStart(6);
  if (value >= 0.7) return chalk.green(formatted);
  if (value >= 0.4) return chalk.yellow(formatted);
  return chalk.red(formatted);
}

/**
 * Format per-cutoff aggregate tables for terminal output.
 */
export function formatMetricsSummary(report: MetricsReport): string {
  const lines: string[] = [];
  const width = Math.max(6, ...report.methods.map((m) => m.length));

  lines.push(chalk.bold('Retrieval metrics'));
  lines.push(`  Pool depth: ${chalk.cyan(String(report.depthK))}`);
  if (report.partition !== null) {
    lines.push(`  Partition:  ${chalk.cyan(report.partition)}`);
  }
  lines.push(`  Evaluated:  ${chalk.cyan(String(report.evaluatedQueries.length))} queries`);
  if (report.unjudgedQueries.length > 0) {
    lines.push(`  Unjudged:   ${chalk.yellow(String(report.unjudgedQueries.length))} queries (not evaluated)`);
  }

  for (const k of report.cutoffs) {
    const partial = report.partialCutoffs.includes(k);
    lines.push('');
    lines.push(chalk.bold(`@${k}`) + (partial ? chalk.yellow(' (partial coverage: lower bounds)') : ''));
    lines.push(`  ${'Method'.padEnd(width)}    nDCG  Recall    Prec     MRR     MAP  Queries`);
    for (const row of report.aggregate) {
      if (row.k !== k) continue;
      const cells = [row.ndcg, row.recall, row.precision, row.mrr, row.map].map(colorMetric).join('  ');
      const missing = row.missingCount > 0 ? chalk.yellow(` (+${row.missingCount} missing)`) : '';
      lines.push(`  ${row.method.padEnd(width)}  ${cells}  ${String(row.queryCount).padStart(7)}${missing}`);
    }
  }

  if (report.missingCells.length > 0) {
    lines.push('');
    lines.push(chalk.yellow(`Missing cells: ${report.missingCells.length}`));
    for (const cell of report.missingCells.slice(0, 5)) {
      lines.push(chalk.dim(`  - ${cell.method} / ${cell.query}: ${cell.error.message}`));
    }
  }

  return lines.join('\n');
}

/**
 * Format a method ranking on one metric.
 */
export function formatRanking(ranking: readonly MethodRanking[], selector: MetricSelector): string {
  const lines: string[] = [];
  lines.push(chalk.bold(`Ranking by ${metricLabel(selector)}`));
  ranking.forEach((entry, index) => {
    lines.push(`  ${index + 1}. ${entry.method}  ${colorMetric(entry.value)}  (${entry.queryCount} queries)`);
  });
  return lines.join('\n');
}

function formatExtremes(report: MetricsReport, selector: MetricSelector, n: number): string {
  const { top, bottom } = extremeQueries(report, selector, n);
  const line = (r: QueryMetricsResult): string =>
    `  ${colorMetric(metricValue(r, selector) ?? null)}  ${r.method}  ${r.query}`;

  return [
    chalk.bold(`Best ${top.length} by ${metricLabel(selector)}`),
    ...top.map(line),
    chalk.bold(`Worst ${bottom.length} by ${metricLabel(selector)}`),
    ...bottom.map(line),
  ].join('\n');
}

export function registerMetricsCommand(program: Command): void {
  program
    .command('metrics')
    .description('Compute nDCG, Recall, Precision, MRR and MAP for every method of a labeled pool')
    .requiredOption('--pool <path>', 'Pooled table JSON (labeled, or joined with --judgments)')
    .option('-j, --judgments <path>', 'Judgments JSONL file to attach first')
    .option('--cutoffs <list>', 'Comma-separated cutoffs K (default from config)')
    .option('--methods <list>', 'Comma-separated methods to evaluate (default: all)')
    .option('-p, --partition <tag>', 'Evaluate only this partition')
    .option('--metric <name>', 'Metric used to rank methods, e.g. ndcg@10 or mrr')
    .option('--top <n>', 'Show the N best and worst query cells for the ranking metric')
    .option('--out-dir <dir>', 'Write JSON, Markdown and CSV reports to this directory')
    .option('--json', 'Print the JSON report instead of tables')
    .option('-c, --config <path>', 'Config file path')
    .action(
      async (options: {
        pool: string;
        judgments?: string;
        cutoffs?: string;
        methods?: string;
        partition?: string;
        metric?: string;
        top?: string;
        outDir?: string;
        json?: boolean;
        config?: string;
      }) => {
        const spinner = ora('Loading configuration...').start();
        try {
          const configResult = await loadConfig(process.cwd(), options.config);
          if (configResult.isErr()) {
            spinner.fail(configResult.error.message);
            process.exit(1);
          }

          let cutoffs = configResult.value.metrics.cutoffs;
          if (options.cutoffs !== undefined) {
            const parsed = parseCutoffList(options.cutoffs);
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            cutoffs = parsed.value;
          }
          let top = 0;
          if (options.top !== undefined) {
            const parsed = parsePositiveInt(options.top, '--top');
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            top = parsed.value;
          }

          spinner.text = 'Loading pool...';
          const tableResult = await readPooledTable(resolve(options.pool));
          if (tableResult.isErr()) {
            spinner.fail(tableResult.error.message);
            process.exit(1);
          }
          let table = tableResult.value;

          if (options.judgments !== undefined) {
            const storeResult = await JsonlJudgmentStore.open(resolve(options.judgments));
            if (storeResult.isErr()) {
              spinner.fail(storeResult.error.message);
              process.exit(1);
            }
            table = await attachJudgments(table, storeResult.value);
          }

          spinner.text = 'Computing metrics...';
          const reportResult = computeMetrics(table, {
            cutoffs,
            methods: options.methods !== undefined ? parseNameList(options.methods) : undefined,
            partition: options.partition,
          });
          if (reportResult.isErr()) {
            spinner.fail(reportResult.error.message);
            process.exit(1);
          }
          const report = reportResult.value;

          const largest = report.cutoffs[report.cutoffs.length - 1] ?? 10;
          const selectorResult = parseMetricSelector(options.metric ?? `ndcg@${largest}`).andThen(
            (parsed) => checkSelector(report, parsed),
          );
          if (selectorResult.isErr()) {
            spinner.fail(selectorResult.error.message);
            process.exit(1);
          }
          const selector = selectorResult.value;

          if (options.outDir !== undefined) {
            const dir = resolve(options.outDir);
            await writeTextFile(join(dir, REPORT_FILES.json), writeJsonReport(report));
            await writeTextFile(join(dir, REPORT_FILES.markdown), writeMarkdownReport(report));
            await writeTextFile(join(dir, REPORT_FILES.perQuery), writePerQueryCsv(report));
            await writeTextFile(join(dir, REPORT_FILES.aggregate), writeAggregateCsv(report));
          }

          if (report.missingCells.length > 0 || report.partialCutoffs.length > 0) {
            spinner.warn(
              `Metrics computed with ${report.missingCells.length} missing cell(s) and ` +
                `${report.partialCutoffs.length} partial cutoff(s)`,
            );
          } else {
            spinner.succeed('Metrics computed');
          }

          if (options.json) {
            // eslint-disable-next-line no-console
            console.log(writeJsonReport(report));
            return;
          }

          // eslint-disable-next-line no-console
          console.log(formatMetricsSummary(report));
          // eslint-disable-next-line no-console
          console.log('');
          // eslint-disable-next-line no-console
          console.log(formatRanking(rankMethods(report, selector), selector));
          if (top > 0) {
            // eslint-disable-next-line no-console
            console.log('');
            // eslint-disable-next-line no-console
            console.log(formatExtremes(report, selector, top));
          }
          if (options.outDir !== undefined) {
            // eslint-disable-next-line no-console
            console.log('');
            // eslint-disable-next-line no-console
            console.log(chalk.dim(`Reports written to ${resolve(options.outDir)}`));
          }
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          spinner.fail('Metrics failed');
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), message);
          process.exit(1);
        }
      },
    );
}
