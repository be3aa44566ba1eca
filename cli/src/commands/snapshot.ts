import chalk from 'chalk';
import ora from 'ora';
import { describeError, runSnapshot } from '../../../src';

export interface SnapshotCommandOptions {
  brewState: string;
  resolved: string;
  enriched: string;
  output: string;
}

export const snapshot = async (options: SnapshotCommandOptions): Promise<void> => {
  const spinner = ora('Generating snapshot...').start();

  try {
    const summary = await runSnapshot({
      brewState: options.brewState,
      resolved: options.resolved,
      enriched: options.enriched,
      output: options.output,
    });

    spinner.succeed(`Snapshot saved to ${chalk.cyan(options.output)}`);
    console.log(chalk.dim(`  Taps: ${summary.taps}`));
    console.log(chalk.dim(`  Brew-installable: ${summary.installable}`));
    console.log(chalk.dim(`  Manual installs: ${summary.manual}`));
  } catch (e) {
    spinner.fail(chalk.red(`Error: ${describeError(e)}`));
    process.exit(1);
  }
};
