/**
 * Search Command
 *
 * Dense similarity search over the built index.
 *
 *   ragdex search "reset the thermostat"
 *   ragdex search "warranty" --top 10 --json
 */

import { Command } from 'commander';
import chalk from 'chalk';

import type { CommandContext } from '../types.js';
import { loadCommandConfig, openIndex } from '../utils/setup.js';
import { QueryArgSchema, TopKSchema, parseInput } from '../validation.js';
import { formatResults, formatResultsJSON } from '../../search/index.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface SearchCommandOptions {
  /** Number of results to return (default: search.top_k, max: 100) */
  top?: string;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Display empty results message with helpful tips.
 */
function displayEmptyResults(ctx: CommandContext, query: string): void {
  ctx.log(chalk.yellow(`No results found for "${query}"`));
  ctx.log('');
  ctx.log(chalk.dim('Tips:'));
  ctx.log(chalk.dim('  - Check that the docs directory holds text files'));
  ctx.log(chalk.dim('  - Rebuild the index after adding documents: ragdex ingest'));
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the search command.
 *
 * @param getContext - Factory to get command context with global options
 * @returns Configured Commander command
 */
export function createSearchCommand(getContext: () => CommandContext): Command {
  return new Command('search')
    .argument('<query>', 'Search query text')
    .description('Find the chunks most similar to a query')
    .option('-k, --top <number>', 'Number of results to return (default: search.top_k)')
    .action(async (query: string, cmdOptions: SearchCommandOptions) => {
      const ctx = getContext();

      const trimmedQuery = parseInput(QueryArgSchema, query, 'Invalid search query');
      const config = loadCommandConfig(ctx);
      const topK =
        cmdOptions.top !== undefined
          ? parseInput(TopKSchema, cmdOptions.top, 'Invalid --top value')
          : config.search.top_k;

      ctx.debug(`Query: "${trimmedQuery}"`);
      ctx.debug(`Top-K: ${topK}`);

      const index = openIndex(ctx, config);
      const searchStart = performance.now();
      const results = await index.retrieve(trimmedQuery, topK);
      ctx.debug(`Found ${results.length} results in ${Math.round(performance.now() - searchStart)}ms`);

      if (ctx.options.json) {
        console.log(
          JSON.stringify({ query: trimmedQuery, count: results.length, results: formatResultsJSON(results) }, null, 2)
        );
        return;
      }

      if (results.length === 0) {
        displayEmptyResults(ctx, trimmedQuery);
        return;
      }

      ctx.log(chalk.bold(`Found ${results.length} result${results.length === 1 ? '' : 's'}:`));
      ctx.log('');
      ctx.log(formatResults(results));
    });
}
