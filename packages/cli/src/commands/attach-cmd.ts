import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import {
  attachJudgments,
  serializePooledTable,
  summarizeJudgments,
  writePoolCsv,
  JsonlJudgmentStore,
  type JudgmentCoverage,
} from '@relpool/core';
import { readPooledTable, writeTextFile } from '../io.js';

/**
 * Format judgment coverage of a pool for terminal output.
 */
export function formatCoverage(coverage: JudgmentCoverage): string {
  const lines: string[] = [];
  const share = (n: number): string =>
    coverage.documents > 0 ? ` (${((n / coverage.documents) * 100).toFixed(1)}%)` : '';

  lines.push(chalk.bold('Judgment coverage'));
  lines.push(`  Documents: ${chalk.cyan(String(coverage.documents))}`);
  lines.push(`  Judged:    ${chalk.green(String(coverage.judged))}${share(coverage.judged)}`);
  const failed = String(coverage.failed);
  lines.push(`  Failed:    ${coverage.failed > 0 ? chalk.red(failed) : failed}${share(coverage.failed)}`);
  const unjudged = String(coverage.unjudged);
  lines.push(`  Unjudged:  ${coverage.unjudged > 0 ? chalk.yellow(unjudged) : unjudged}${share(coverage.unjudged)}`);

  const dist = coverage.distribution;
  lines.push(`  Grades:    0=${dist[0]} 1=${dist[1]} 2=${dist[2]}`);

  return lines.join('\n');
}

export function registerAttachCommand(program: Command): void {
  program
    .command('attach')
    .description('Join stored judgments onto a pool and write the labeled table')
    .requiredOption('--pool <path>', 'Pooled table JSON')
    .requiredOption('-j, --judgments <path>', 'Judgments JSONL file')
    .option('-o, --out <path>', 'Labeled pool JSON output path')
    .option('--csv <path>', 'Labeled pool CSV output path')
    .action(async (options: { pool: string; judgments: string; out?: string; csv?: string }) => {
      try {
        const tableResult = await readPooledTable(resolve(options.pool));
        if (tableResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), tableResult.error.message);
          process.exit(1);
        }

        const storeResult = await JsonlJudgmentStore.open(resolve(options.judgments));
        if (storeResult.isErr()) {
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), storeResult.error.message);
          process.exit(1);
        }

        const labeled = await attachJudgments(tableResult.value, storeResult.value);
        if (options.out !== undefined) {
          await writeTextFile(resolve(options.out), serializePooledTable(labeled));
        }
        if (options.csv !== undefined) {
          await writeTextFile(resolve(options.csv), writePoolCsv(labeled));
        }

        // eslint-disable-next-line no-console
        console.log(formatCoverage(summarizeJudgments(labeled)));
      } catch (error: unknown) {
        const message = error instanceof Error ? error.message : String(error);
        // eslint-disable-next-line no-console
        console.error(chalk.red('Error:'), message);
        process.exit(1);
      }
    });
}
