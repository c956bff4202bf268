import { Command } from 'commander';
import chalk from 'chalk';
import { CommandError, createCliContext, exitWithError, type GlobalOptions } from '../utils/context.js';

interface StatsCommandOptions {
  json?: boolean;
}

export function createStatsCommand(): Command {
  return new Command('stats')
    .description('Show record counts per namespace')
    .option('--json', 'Output as JSON')
    .action(async (options: StatsCommandOptions, cmd: Command) => {
      const { env } = cmd.optsWithGlobals<GlobalOptions>();

      try {
        const { services } = createCliContext(env);
        const result = await services.index.describeStats();
        if (result.isErr()) {
          throw new CommandError(result.error.code, result.error.message);
        }

        const stats = result.value;
        if (options.json) {
          console.log(JSON.stringify(stats, null, 2));
          return;
        }

        console.log(chalk.bold('Index statistics'));
        console.log(`  Dimension: ${stats.dimension}`);
        console.log(`  Total records: ${stats.totalRecordCount}`);
        for (const [name, summary] of Object.entries(stats.namespaces)) {
          console.log(chalk.gray(`  • ${name === '' ? '(default)' : name}: ${summary.recordCount}`));
        }
      } catch (error) {
        exitWithError('Stats error', error);
      }
    });
}
