/**
 * Config Command
 *
 * Inspects and creates ragdex.toml:
 *   ragdex config list            - Show the effective configuration
 *   ragdex config get <key>       - Get a specific value
 *   ragdex config path            - Show the config file location
 *   ragdex config init [--force]  - Write a commented default config file
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandConfig } from '../utils/setup.js';
import {
  getConfigValue,
  listConfig,
  loadEnv,
  resolveConfigLocation,
  writeConfigTemplate,
} from '../../config/index.js';
import { CLIError } from '../../errors/index.js';

/**
 * Format a value for display
 */
export function formatValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean') return value ? 'true' : 'false';
  if (typeof value === 'number') return String(value);
  return JSON.stringify(value);
}

/**
 * Create the config command with all subcommands
 */
export function createConfigCommand(getContext: () => CommandContext): Command {
  const configCmd = new Command('config').description('Inspect or create the configuration file');

  // ragdex config get <key>
  configCmd
    .command('get <key>')
    .description('Get a configuration value (e.g., ragdex config get embedding.model)')
    .action((key: string) => {
      const ctx = getContext();
      const value = getConfigValue(loadCommandConfig(ctx), key);

      if (value === undefined) {
        throw new CLIError(
          `Unknown config key: ${key}`,
          'Run: ragdex config list  to see all available keys'
        );
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ key, value }));
      } else {
        ctx.log(formatValue(value));
      }
    });

  // ragdex config list
  configCmd
    .command('list')
    .alias('ls')
    .description('List the effective configuration (defaults, file, environment)')
    .action(() => {
      const ctx = getContext();
      const entries = listConfig(loadCommandConfig(ctx));

      if (ctx.options.json) {
        console.log(JSON.stringify(Object.fromEntries(entries), null, 2));
        return;
      }

      ctx.log(chalk.bold('Configuration:'));
      ctx.log('');

      // Group by top-level key for readability
      let currentGroup = '';
      for (const [key, value] of entries) {
        const group = key.split('.')[0] ?? '';

        if (group !== currentGroup) {
          if (currentGroup !== '') ctx.log('');
          currentGroup = group;
        }

        ctx.log(`  ${chalk.cyan(key)} = ${chalk.yellow(formatValue(value))}`);
      }
    });

  // ragdex config path
  configCmd
    .command('path')
    .description('Show the config file location')
    .action(() => {
      const ctx = getContext();
      const location = resolveConfigLocation(ctx.options.config, loadEnv().RAGDEX_CONFIG);

      if (ctx.options.json) {
        console.log(JSON.stringify({ path: location.path }));
      } else {
        ctx.log(location.path);
      }
    });

  // ragdex config init
  configCmd
    .command('init')
    .description('Write a commented default ragdex.toml')
    .option('-f, --force', 'Overwrite an existing file')
    .action((options: { force?: boolean }) => {
      const ctx = getContext();
      const location = resolveConfigLocation(ctx.options.config, loadEnv().RAGDEX_CONFIG);

      writeConfigTemplate(location.path, options.force ?? false);

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, path: location.path }));
      } else {
        ctx.log(`${chalk.green('✓')} Wrote ${location.path}`);
      }
    });

  return configCmd;
}
