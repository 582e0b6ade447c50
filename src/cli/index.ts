#!/usr/bin/env node
/**
 * grantkb CLI Entry Point
 *
 * Sets up Commander.js with global options and registers all subcommands.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { createRequire } from 'node:module';

import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createAskCommand } from './commands/ask.js';
import { createCacheCommand } from './commands/cache.js';
import { createIngestCommand } from './commands/ingest.js';
import { createListCommand } from './commands/list.js';
import { createRemoveCommand } from './commands/remove.js';
import { createSearchCommand } from './commands/search.js';
import { CLIError, createGlobalErrorHandler, handleError } from '../errors/index.js';

const packageJson: unknown = createRequire(import.meta.url)('../../package.json');
const VERSION =
  typeof packageJson === 'object' && packageJson !== null && 'version' in packageJson && typeof packageJson.version === 'string'
    ? packageJson.version
    : '0.0.0';

const program = new Command();

program
  .name('grantkb')
  .description('Per-project knowledge bases over grant documents: ingest, search and ask')
  .version(VERSION, '-v, --version', 'Display version number')
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)
  .addHelpText(
    'after',
    `
${chalk.dim('Examples:')}
  ${chalk.cyan('grantkb ingest alpha')}                     Ingest projects_dir/alpha
  ${chalk.cyan('grantkb ingest --all')}                     Ingest every project folder
  ${chalk.cyan('grantkb search alpha "indirect costs"')}    Find matching passages
  ${chalk.cyan('grantkb ask alpha "What is the budget?"')}  Answer from the documents
  ${chalk.cyan('grantkb list')}                             List ingested projects
  ${chalk.cyan('grantkb cache clear')}                      Drop cached answers
`
  );

/**
 * Commander stores global options on the root command after parsing.
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

const getContext = () => createContext(getGlobalOptions());

program.addCommand(createIngestCommand(getContext));
program.addCommand(createSearchCommand(getContext));
program.addCommand(createAskCommand(getContext));
program.addCommand(createListCommand(getContext));
program.addCommand(createRemoveCommand(getContext));
program.addCommand(createCacheCommand(getContext));

program.on('command:*', (operands: string[]) => {
  throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: grantkb --help  to see available commands');
});

async function main(): Promise<void> {
  const globalHandler = createGlobalErrorHandler(getGlobalOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getGlobalOptions());
  }
}

void main();
