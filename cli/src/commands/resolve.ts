import chalk from 'chalk';
import ora from 'ora';
import { BrewCatalogSource, describeError, runResolver } from '../../../src';

export interface ResolveOptions {
  appsRaw: string;
  brewState: string;
  output: string;
  brew: string;
}

export const resolve = async (options: ResolveOptions): Promise<void> => {
  const spinner = ora('Resolving applications with Homebrew...').start();

  try {
    const result = await runResolver({
      appsRaw: options.appsRaw,
      brewState: options.brewState,
      output: options.output,
      source: new BrewCatalogSource(options.brew),
    });

    spinner.succeed(
      `${chalk.green(result.brew_installable.length)} installable, ` +
        `${chalk.yellow(result.unresolved.length)} unresolved`
    );
    console.log(chalk.dim(`  Output: ${options.output}`));
  } catch (e) {
    spinner.fail(chalk.red(`Error: ${describeError(e)}`));
    process.exit(1);
  }
};
