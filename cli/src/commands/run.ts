import chalk from 'chalk';
import ora from 'ora';
import { BrewCatalogSource, describeError, runPipeline } from '../../../src';

export interface RunOptions {
  appsRaw: string;
  brewState: string;
  resolved: string;
  output: string;
  snapshot?: string;
  brew: string;
}

export const run = async (options: RunOptions): Promise<void> => {
  const spinner = ora('Running resolve and enrich...').start();

  try {
    const summary = await runPipeline({
      appsRaw: options.appsRaw,
      brewState: options.brewState,
      resolved: options.resolved,
      output: options.output,
      snapshot: options.snapshot,
      source: new BrewCatalogSource(options.brew),
    });

    spinner.succeed(chalk.green('Pipeline complete'));
    console.log(`  Homebrew installable: ${chalk.cyan(summary.installable)}`);
    console.log(`  Unresolved:           ${chalk.cyan(summary.unresolved)}`);
    console.log(`  Vendor sources found: ${chalk.cyan(summary.vendorMatched)}`);
    console.log(chalk.dim(`\n  Resolved: ${options.resolved}\n  Enriched: ${options.output}`));
    if (options.snapshot) {
      console.log(chalk.dim(`  Snapshot: ${options.snapshot}`));
    }
  } catch (e) {
    spinner.fail(chalk.red(`Error: ${describeError(e)}`));
    process.exit(1);
  }
};
