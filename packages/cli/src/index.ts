import { Command } from 'commander';
import { createRequire } from 'node:module';
import { registerPoolCommand } from './commands/pool-cmd.js';
import { registerLabelCommand } from './commands/label-cmd.js';
import { registerOverrideCommand } from './commands/override-cmd.js';
import { registerAttachCommand } from './commands/attach-cmd.js';
import { registerMetricsCommand } from './commands/metrics-cmd.js';

const require = createRequire(import.meta.url);
const pkg = require('@relpool/cli/package.json') as { version: string };

const program = new Command();
program
  .name('relpool')
  .description('relpool: depth-K pooling, LLM relevance labeling and graded retrieval metrics')
  .version(pkg.version);

registerPoolCommand(program);
registerLabelCommand(program);
registerOverrideCommand(program);
registerAttachCommand(program);
registerMetricsCommand(program);

program.parse();
