import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { resolve } from 'node:path';
import { ok, err, type Result } from 'neverthrow';
import {
  loadConfig,
  mergePool,
  mergePartitionedPool,
  computePoolStatistics,
  formatPoolStatistics,
  serializePooledTable,
  writePoolCsv,
  ConfigurationError,
  type PartitionInput,
  type PoolMergeReport,
  type PoolMergeResult,
  type RawHitRow,
} from '@relpool/core';
import { parsePositiveInt, parseRunSpec, readHitFile, writeTextFile, type RunSpec } from '../io.js';

/**
 * Runs grouped for merging: one method list, and one input group per
 * partition (a single untagged group when no run names a partition).
 */
export interface RunPlan {
  readonly methods: readonly string[];
  readonly partitions: readonly { readonly tag: string | null; readonly paths: readonly string[] }[];
}

/**
 * Group parsed `--run` specs by partition. Either every run names a partition
 * or none does, and every partition must supply every method exactly once.
 */
export function planRuns(specs: readonly RunSpec[]): Result<RunPlan, ConfigurationError> {
  if (specs.length === 0) {
    return err(new ConfigurationError('At least one --run is required'));
  }

  const tagged = specs.filter((s) => s.partition !== null).length;
  if (tagged > 0 && tagged < specs.length) {
    return err(
      new ConfigurationError('Either every --run names a partition (tag:method=path) or none does'),
    );
  }

  const methods: string[] = [];
  const byPartition = new Map<string | null, Map<string, string>>();
  for (const spec of specs) {
    if (!methods.includes(spec.method)) {
      methods.push(spec.method);
    }
    let group = byPartition.get(spec.partition);
    if (group === undefined) {
      group = new Map();
      byPartition.set(spec.partition, group);
    }
    if (group.has(spec.method)) {
      const where = spec.partition !== null ? ` in partition ${spec.partition}` : '';
      return err(new ConfigurationError(`Method ${spec.method} is given twice${where}`));
    }
    group.set(spec.method, spec.path);
  }

  const partitions: { tag: string | null; paths: string[] }[] = [];
  for (const [tag, group] of byPartition) {
    const paths: string[] = [];
    for (const method of methods) {
      const path = group.get(method);
      if (path === undefined) {
        return err(
          new ConfigurationError(`Partition ${tag ?? '(none)'} has no run for method ${method}`),
        );
      }
      paths.push(path);
    }
    partitions.push({ tag, paths });
  }

  return ok({ methods, partitions });
}

/**
 * Format a merge report for terminal output.
 */
export function formatMergeReport(report: PoolMergeReport, documents: number): string {
  const lines: string[] = [];

  lines.push(chalk.bold('Pool merge'));
  lines.push(`  Input rows:      ${chalk.cyan(String(report.inputRows))}`);
  lines.push(`  Accepted hits:   ${chalk.cyan(String(report.acceptedHits))}`);
  lines.push(`  Pooled docs:     ${chalk.cyan(String(documents))}`);
  lines.push(`  Beyond depth:    ${String(report.beyondDepth)}`);
  lines.push(`  Duplicate hits:  ${String(report.duplicateHits)}`);

  const skipped = String(report.skippedRows);
  lines.push(`  Skipped rows:    ${report.skippedRows > 0 ? chalk.yellow(skipped) : skipped}`);
  const degraded = String(report.degradedScores);
  lines.push(`  Degraded scores: ${report.degradedScores > 0 ? chalk.yellow(degraded) : degraded}`);

  for (const message of report.sampleErrors) {
    lines.push(chalk.dim(`    - ${message}`));
  }

  return lines.join('\n');
}

async function readGroup(paths: readonly string[]): Promise<Result<RawHitRow[][], ConfigurationError>> {
  const inputs: RawHitRow[][] = [];
  for (const path of paths) {
    const rows = await readHitFile(resolve(path));
    if (rows.isErr()) return err(rows.error);
    inputs.push(rows.value);
  }
  return ok(inputs);
}

async function mergeRuns(
  plan: RunPlan,
  depthK: number,
  partition: string | undefined,
): Promise<Result<PoolMergeResult, ConfigurationError>> {
  const first = plan.partitions[0];
  if (plan.partitions.length === 1 && first !== undefined && first.tag === null) {
    const inputs = await readGroup(first.paths);
    if (inputs.isErr()) return err(inputs.error);
    return mergePool({ methods: plan.methods, inputs: inputs.value, depthK, partition });
  }

  const partitions: PartitionInput[] = [];
  for (const group of plan.partitions) {
    const inputs = await readGroup(group.paths);
    if (inputs.isErr()) return err(inputs.error);
    partitions.push({ tag: group.tag ?? '', inputs: inputs.value });
  }
  return mergePartitionedPool({ methods: plan.methods, depthK, partitions });
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerPoolCommand(program: Command): void {
  program
    .command('pool')
    .description('Merge the top-K results of several retrieval runs into one evaluation pool')
    .requiredOption(
      '-r, --run <spec>',
      'Run results as [partition:]method=path.json (repeatable)',
      collect,
      [],
    )
    .requiredOption('-o, --out <path>', 'Pooled table JSON output path')
    .option('-k, --depth <k>', 'Pool depth K (default from config)')
    .option('-p, --partition <tag>', 'Tag every pooled document with this partition')
    .option('--csv <path>', 'Also write the pool as CSV')
    .option('--stats <path>', 'Also write pooling statistics as text')
    .option('-c, --config <path>', 'Config file path')
    .action(
      async (options: {
        run: string[];
        out: string;
        depth?: string;
        partition?: string;
        csv?: string;
        stats?: string;
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

          let depthK = config.pooling.depthK;
          if (options.depth !== undefined) {
            const parsed = parsePositiveInt(options.depth, '--depth');
            if (parsed.isErr()) {
              spinner.fail(parsed.error.message);
              process.exit(1);
            }
            depthK = parsed.value;
          }

          const specs: RunSpec[] = [];
          for (const value of options.run) {
            const spec = parseRunSpec(value);
            if (spec.isErr()) {
              spinner.fail(spec.error.message);
              process.exit(1);
            }
            specs.push(spec.value);
          }
          const plan = planRuns(specs);
          if (plan.isErr()) {
            spinner.fail(plan.error.message);
            process.exit(1);
          }
          if (options.partition !== undefined && plan.value.partitions[0]?.tag !== null) {
            spinner.fail('--partition cannot be combined with partition-tagged runs');
            process.exit(1);
          }

          spinner.text = `Merging ${plan.value.methods.length} method(s) at depth ${depthK}...`;
          const merged = await mergeRuns(plan.value, depthK, options.partition);
          if (merged.isErr()) {
            spinner.fail(merged.error.message);
            process.exit(1);
          }
          const { table, report } = merged.value;

          spinner.text = 'Writing pool...';
          await writeTextFile(resolve(options.out), serializePooledTable(table));
          if (options.csv !== undefined) {
            await writeTextFile(resolve(options.csv), writePoolCsv(table));
          }
          const stats = formatPoolStatistics(computePoolStatistics(table));
          if (options.stats !== undefined) {
            await writeTextFile(resolve(options.stats), stats + '\n');
          }

          spinner.succeed(`Pooled ${table.documents.length} document(s) into ${options.out}`);
          // eslint-disable-next-line no-console
          console.log(formatMergeReport(report, table.documents.length));
          // eslint-disable-next-line no-console
          console.log('');
          // eslint-disable-next-line no-console
          console.log(stats);
        } catch (error: unknown) {
          const message = error instanceof Error ? error.message : String(error);
          spinner.fail('Pooling failed');
          // eslint-disable-next-line no-console
          console.error(chalk.red('Error:'), message);
          process.exit(1);
        }
      },
    );
}
