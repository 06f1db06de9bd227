import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import {
  loadConfig,
  attachJudgments,
  serializePooledTable,
  summarizeJudgments,
  writePoolCsv,
  JsonlJudgmentStore,
  LabelingOrchestrator,
  OpenAICompatibleJudge,
  type JudgeConfig,
  type LabelingReport,
  type OpenAICompatibleJudgeConfig,
} from '@relpool/core';
import { parseNonNegativeInt, parsePositiveInt, readPooledTable, writeTextFile } from '../io.js';
import { formatCoverage } from './attach-cmd.js';

/**
 * Format a labeling run report for terminal output.
 */
export function formatLabelingReport(report: LabelingReport): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Labeling'));
  lines.push(`  Pool documents:  ${chalk.cyan(String(report.totalDocuments))}`);
  lines.push(`  Already judged:  ${String(report.alreadyJudged)}`);
  lines.push(`  Scheduled:       ${String(report.pending)}`);
  if (report.deferred > 0) {
    lines.push(`  Deferred:        ${chalk.yellow(String(report.deferred))}`);
  }
  if (report.duplicates > 0) {
    lines.push(`  Duplicates:      ${chalk.yellow(String(report.duplicates))}`);
  }
  lines.push(`  Labeled:         ${chalk.green(String(report.labeled))}`);

  const failed = String(report.failed);
  lines.push(`  Failed:          ${report.failed > 0 ? chalk.red(failed) : failed}`);
  for (const message of report.failureSamples) {
    lines.push(chalk.dim(`    - ${message}`));
  }

  const dist = report.gradeDistribution;
  lines.push(`  Grades:          0=${dist[0]} 1=${dist[1]} 2=${dist[2]}`);
  lines.push(`  Duration:        ${(report.durationMs / 1000).toFixed(1)}s`);

  return lines.join('\n');
}

/**
 * Judge settings from config, with command-line overrides and the
 * `OPENAI_API_KEY` fallback applied.
 */
export function resolveJudgeConfig(
  judge: JudgeConfig,
  timeoutMs: number,
  overrides: { model?: string; baseUrl?: string },
  env: Record<string, string | undefined> = process.env,
): Partial<OpenAICompatibleJudgeConfig> {
  return {
    baseUrl: overrides.baseUrl ?? judge.baseUrl,
    model: overrides.model ?? judge.model,
    apiKey: judge.apiKey ?? env['OPENAI_API_KEY'],
    timeout: timeoutMs,
    temperature: judge.temperature,
    maxTokens: judge.maxTokens,
    maxContentChars: judge.maxContentChars,
  };
}

export function registerLabelCommand(program: Command): void {
  program
    .command('label')
    .description('Grade every unjudged pool document with an LLM relevance judge')
    .requiredOption('--pool <path>', 'Pooled table JSON')
    .requiredOption('-j, --judgments <path>', 'Judgments JSONL file (created if missing)')
    .option('--concurrency <n>', 'Concurrent judge calls (default from config)')
    .option('--limit <n>', 'Classify at most N documents this run')
    .option('--relabel', 'Re-classify documents that already hold a grade')
    .option('--model <name>', 'Judge model (default from config)')
    .option('--base-url <url>', 'OpenAI-compatible API base URL (default from config)')
    .option('--timeout <ms>', 'Per-call timeout in milliseconds (default from config)')
    .option('-o, --out <path>', 'Write the labeled pool as JSON')
    .option('--csv <path>', 'Write the labeled pool as CSV')
    .option('--dry-run', 'Show what would be labeled without calling the judge')
    .option('-c, --config <path>', 'Config file path')
    .action(
      async (options: {
        pool: string;
        judgments: string;
        concurrency?: string;
        limit?: string;
        relabel?: boolean;
        model?: string;
        baseUrl?: string;
        timeout?: string;
        out?: string;
        csv?: string;
        dryRun?: boolean;
        config?: string;
      }) => {
        const spinner = ora('Loading configuration...').start();
        try {
          const configResult = await loadConfig(process.cwd(), options.config);
          if (configResult.isErr()) {
            spinner.fail(configResult.error.message);
            process.exit(1);
          }
          const config = configResult.value;

          let concurrency = config.labeling.concurrency;
          if (options.concurrency !== undefined) {
            const parsed = parsePositiveInt(options.concurrency, '--concurrency');
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            concurrency = parsed.value;
          }
          let limit: number | undefined;
          if (options.limit !== undefined) {
            const parsed = parseNonNegativeInt(options.limit, '--limit');
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            limit = parsed.value;
          }
          let timeoutMs = config.labeling.timeoutMs;
          if (options.timeout !== undefined) {
            const parsed = parsePositiveInt(options.timeout, '--timeout');
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            timeoutMs = parsed.value;
          }

          spinner.text = 'Loading pool...';
          const tableResult = await readPooledTable(resolve(options.pool));
          if (tableResult.isErr()) {
            spinner.fail(tableResult.error.message);
            process.exit(1);
          }
          const table = tableResult.value;

          const storeResult = await JsonlJudgmentStore.open(resolve(options.judgments));
          if (storeResult.isErr()) {
            spinner.fail(storeResult.error.message);
            process.exit(1);
          }
          const store = storeResult.value;
          if (store.malformedLines > 0) {
            spinner.warn(`Skipped ${store.malformedLines} malformed line(s) in ${options.judgments}`);
            spinner.start();
          }

          const orchestrator = new LabelingOrchestrator({
            judge: new OpenAICompatibleJudge(
              resolveJudgeConfig(config.judge, timeoutMs, {
                model: options.model,
                baseUrl: options.baseUrl,
              }),
            ),
            store,
            labeledBy: config.labeling.labeledBy,
            concurrency,
            skipJudged: options.relabel === true ? false : config.labeling.skipJudged,
            timeoutMs,
            limit,
            titleFields: config.labeling.titleFields,
            contentFields: config.labeling.contentFields,
            onProgress: (progress) => {
              const failed = progress.failed > 0 ? ` (${progress.failed} failed)` : '';
              spinner.text = `Labeling: ${progress.completed}/${progress.total}${failed}`;
            },
          });

          if (options.dryRun === true) {
            const plan = await orchestrator.plan(table.documents);
            spinner.succeed('Dry run complete');
            // eslint-disable-next-line no-console
            console.log(`  Already judged: ${plan.alreadyJudged.length}`);
            // eslint-disable-next-line no-console
            console.log(`  Would label:    ${plan.pending.length}`);
            if (plan.deferred > 0) {
              // eslint-disable-next-line no-console
              console.log(`  Deferred:       ${plan.deferred}`);
            }
            return;
          }

          spinner.text = 'Labeling...';
          const runResult = await orchestrator.run(table.documents);
          if (runResult.isErr()) {
            spinner.fail(runResult.error.message);
            process.exit(1);
          }
          const report = runResult.value;

          if (report.failed > 0) {
            spinner.warn(`Labeled ${report.labeled} document(s), ${report.failed} failed`);
          } else {
            spinner.succeed(`Labeled ${report.labeled} document(s)`);
          }
          // eslint-disable-next-line no-console
          console.log(formatLabelingReport(report));

          if (options.out !== undefined || options.csv !== undefined) {
            const labeled = await attachJudgments(table, store);
            if (options.out !== undefined) {
              await writeTextFile(resolve(options.out), serializePooledTable(labeled));
            }
            if (options.csv !== undefined) {
              await writeTextFile(resolve(options.csv), writePoolCsv(labeled));
            }
            // eslint-disable-next-line no-console
            console.log('');
            // eslint-disable-next-line no-console
            console.log(formatCoverage(summarizeJudgments(labeled)));
          }
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          spinner.fail('Labeling failed');
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), message);
          process.exit(1);
        }
      },
    );
}
