/**
 * Context Command
 *
 * Prints the retrieved context for a question, ready to hand to a
 * text-generation model. Only the context (or prompt) goes to stdout.
 *
 *   ragdex context "How long until the thermostat resets?"
 *   ragdex context "warranty length" --prompt | some-llm
 */

import { Command } from 'commander';

import type { CommandContext } from '../types.js';
import { loadCommandConfig, openIndex } from '../utils/setup.js';
import { QueryArgSchema, TopKSchema, parseInput } from '../validation.js';
import { formatContext, formatResultsJSON } from '../../search/index.js';
import { buildPrompt } from '../../agent/index.js';

interface ContextCommandOptions {
  top?: string;
  /** Wrap the context in the grounded-answer prompt */
  prompt?: boolean;
  /** Assistant role used in the prompt */
  role?: string;
}

/**
 * Create the context command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createContextCommand(getContext: () => CommandContext): Command {
  return new Command('context')
    .argument('<question>', 'Question to retrieve context for')
    .description('Print retrieved context (or a full prompt) for a question')
    .option('-k, --top <number>', 'Number of chunks to include (default: search.top_k)')
    .option('-p, --prompt', 'Print a complete grounded-answer prompt instead of bare context')
    .option('--role <text>', 'Assistant role for --prompt')
    .action(async (question: string, cmdOptions: ContextCommandOptions) => {
      const ctx = getContext();

      const trimmedQuestion = parseInput(QueryArgSchema, question, 'Invalid question');
      const config = loadCommandConfig(ctx);
      const topK =
        cmdOptions.top !== undefined
          ? parseInput(TopKSchema, cmdOptions.top, 'Invalid --top value')
          : config.search.top_k;

      const results = await openIndex(ctx, config).retrieve(trimmedQuestion, topK);
      ctx.debug(`Retrieved ${results.length} chunk(s)`);

      if (results.length === 0) {
        ctx.warn('No context retrieved; the index is empty');
      }

      const output = cmdOptions.prompt
        ? buildPrompt(trimmedQuestion, results, { assistantRole: cmdOptions.role })
        : formatContext(results);

      if (ctx.options.json) {
        console.log(
          JSON.stringify(
            {
              question: trimmedQuestion,
              [cmdOptions.prompt ? 'prompt' : 'context']: output,
              results: formatResultsJSON(results),
            },
            null,
            2
          )
        );
        return;
      }

      if (output.length > 0) {
        ctx.log(output);
      }
    });
}
