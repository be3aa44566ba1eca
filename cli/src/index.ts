#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { resolve } from './commands/resolve';
import { enrich } from './commands/enrich';
import { run } from './commands/run';
import { snapshot } from './commands/snapshot';
import { verify } from './commands/verify';
import { describeError } from '../../src';

const program = new Command();

program
  .name('appres')
  .version('1.0.0')
  .description('Resolve application names to Homebrew packages and find vendor downloads for the rest');

program
  .command('resolve')
  .description('Split an app list into Homebrew-installable and unresolved apps')
  .requiredOption('--apps-raw <path>', 'Newline-delimited list of application names')
  .requiredOption('--brew-state <path>', 'Homebrew state snapshot (reserved, not read)')
  .requiredOption('--output <path>', 'Resolved JSON output file')
  .option('--brew <bin>', 'Homebrew binary to query for formulae and casks', 'brew')
  .action(resolve);

program
  .command('enrich')
  .description('Attach official vendor download URLs to unresolved apps')
  .requiredOption('--resolved <path>', 'Resolved JSON from the resolve command')
  .requiredOption('--output <path>', 'Enriched JSON output file')
  .action(enrich);

program
  .command('run')
  .description('Resolve, then enrich, in one invocation')
  .requiredOption('--apps-raw <path>', 'Newline-delimited list of application names')
  .requiredOption('--brew-state <path>', 'Homebrew state JSON (read only when --snapshot is given)')
  .requiredOption('--resolved <path>', 'Intermediate resolved JSON file')
  .requiredOption('--output <path>', 'Enriched JSON output file')
  .option('--snapshot <path>', 'Also render a snapshot file after enrichment')
  .option('--brew <bin>', 'Homebrew binary to query for formulae and casks', 'brew')
  .action(run);

program
  .command('snapshot')
  .description('Render a restore snapshot from brew state, resolved and enriched JSON')
  .requiredOption('--brew-state <path>', 'Homebrew state JSON (taps, formulae, casks)')
  .requiredOption('--resolved <path>', 'Resolved JSON from the resolve command')
  .requiredOption('--enriched <path>', 'Enriched JSON from the enrich command')
  .requiredOption('--output <path>', 'Snapshot text file')
  .action(snapshot);

program
  .command('verify <snapshot>')
  .description('Check that a snapshot file carries the schema header and canonical sections')
  .action(verify);

program.parseAsync().catch((e: unknown) => {
  console.error(chalk.red(`Error: ${describeError(e)}`));
  process.exit(1);
});
