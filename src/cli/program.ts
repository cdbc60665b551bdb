/**
 * Root Commander program
 *
 * Sets up global options and registers every subcommand. Kept apart from
 * the entry point so tests can build and drive a program without exiting
 * the process.
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { GlobalOptions } from './types.js';
import { createContext } from './context.js';
import { createConfigCommand } from './commands/config.js';
import { createContextCommand } from './commands/context.js';
import { createIngestCommand } from './commands/ingest.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { CLIError } from '../errors/index.js';

// Version injected by the environment when packaged
const VERSION = process.env.CLI_VERSION ?? '0.0.0';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('ragdex')
    .description('Build a dense-vector index over plain-text documents and retrieve context for questions')
    .version(VERSION, '-v, --version', 'Display version number')

    // Global options - available to ALL subcommands
    .option('--verbose', 'Enable verbose output for debugging', false)
    .option('--json', 'Output results as JSON', false)
    .option('-c, --config <path>', 'Config file (default: ./ragdex.toml or RAGDEX_CONFIG)')

    .addHelpText(
      'after',
      `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragdex config init')}                         Write a default ragdex.toml
  ${chalk.cyan('ragdex ingest --docs ./manuals')}             Build the index
  ${chalk.cyan('ragdex search "reset the thermostat"')}       Show the closest chunks
  ${chalk.cyan('ragdex context "How do I reset it?" --prompt')} Print a grounded prompt
`
    );

  /**
   * Commander stores global options on the root command after parsing
   */
  const getGlobalOptions = (): GlobalOptions => {
    const opts = program.opts<Partial<GlobalOptions>>();
    return {
      verbose: opts.verbose ?? false,
      json: opts.json ?? false,
      config: opts.config,
    };
  };
  const getContext = () => createContext(getGlobalOptions());

  program.addCommand(createIngestCommand(getContext));
  program.addCommand(createSearchCommand(getContext));
  program.addCommand(createContextCommand(getContext));
  program.addCommand(createStatusCommand(getContext));
  program.addCommand(createConfigCommand(getContext));

  // Handle unknown commands gracefully
  program.on('command:*', (operands: string[]) => {
    throw new CLIError(`Unknown command: ${operands[0]}`, 'Run: ragdex --help  to see available commands');
  });

  return program;
}
