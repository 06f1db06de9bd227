import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from 'node:path';
import { JsonlJudgmentStore, MANUAL_LABELER, overrideJudgment } from '@relpool/core';

export function registerOverrideCommand(program: Command): void {
  program
    .command('override')
    .description('Record a manual relevance grade, replacing any stored judgment')
    .requiredOption('-j, --judgments <path>', 'Judgments JSONL file')
    .requiredOption('-q, --query <text>', 'Query text')
    .requiredOption('-d, --doc <id>', 'Document id')
    .requiredOption('-g, --grade <n>', 'Relevance grade: 0, 1 or 2')
    .option('--notes <text>', 'Free-text notes stored with the judgment')
    .option('--by <name>', 'Labeler name', MANUAL_LABELER)
    .action(
      async (options: {
        judgments: string;
        query: string;
        doc: string;
        grade: string;
        notes?: string;
        by: string;
      }) => {
        try {
          const storeResult = await JsonlJudgmentStore.open(resolve(options.judgments));
          if (storeResult.isErr()) {
            // eslint-disable-next-line no-console
            console.error(chalk.red('Error:'), storeResult.error.message);
            process.exit(1);
          }
          const store = storeResult.value;
          const previous = await store.get(options.query, options.doc);

          const grade = /^\s*\d+\s*$/.test(options.grade) ? parseInt(options.grade, 10) : NaN;
          const result = await overrideJudgment(store, {
            query: options.query,
            docId: options.doc,
            relevance: grade,
            notes: options.notes,
            labeledBy: options.by,
          });
          if (result.isErr()) {
            // eslint-disable-next-line no-console
            console.error(chalk.red('Error:'), result.error.message);
            process.exit(1);
          }

          const before =
            previous === undefined ? 'unjudged' : previous.relevance === null ? 'failed' : String(previous.relevance);
          // eslint-disable-next-line no-console
          console.log(
            chalk.green('Recorded'),
            `(${options.query}, ${options.doc}): ${before} -> ${String(result.value.relevance)}`,
          );
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), message);
          process.exit(1);
        }
      },
    );
}
