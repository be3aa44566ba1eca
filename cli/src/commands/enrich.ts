import chalk from 'chalk';
import ora from 'ora';
import { countVendorMatches, describeError, runEnricher } from '../../../src';

export interface EnrichOptions {
  resolved: string;
  output: string;
}

export const enrich = async (options: EnrichOptions): Promise<void> => {
  const spinner = ora('Enriching unresolved applications with vendor sources...').start();

  try {
    const result = await runEnricher({ resolved: options.resolved, output: options.output });
    const matched = countVendorMatches(result);

    spinner.succeed(
      `${chalk.green(matched)} of ${result.unresolved.length} unresolved apps have an official source`
    );
    for (const record of result.unresolved) {
      const icon = record.confidence === 'high' ? chalk.green('✓') : chalk.yellow('?');
      console.log(`  ${icon} ${record.app ?? ''} ${chalk.dim(record.official_download_url)}`);
    }
    console.log(chalk.dim(`  Output: ${options.output}`));
  } catch (e) {
    spinner.fail(chalk.red(`Error: ${describeError(e)}`));
    process.exit(1);
  }
};
