/**
 * Grounded Prompt Builder
 *
 * Wraps retrieved context and a question into the instruction handed to a
 * text-generation model. The model is told to answer only from the context
 * and to say it does not know otherwise.
 *
 * OUTPUT FORMAT:
 * ```
 * You are a helpful support assistant.
 *
 * You must ONLY use the information in the CONTEXT below to answer the user's question.
 * If the answer is not in the context, say you don't know.
 *
 * CONTEXT:
 * [Source: a.txt | Score: 0.873]
 * The thermostat resets after 10 seconds of no input.
 *
 * QUESTION:
 * How long until the thermostat resets?
 *
 * Answer in a concise, clear way, in at most 6 sentences.
 * If a specific source is important, mention it briefly.
 * ```
 *
 * @example
 * ```typescript
 * const results = await index.retrieve(question, 5);
 * const prompt = buildPrompt(question, results, { assistantRole: 'a support assistant for the X100 router' });
 * ```
 */

import { z } from 'zod';

import { ValidationError } from '../errors/index.js';
import { formatContext } from '../search/formatter.js';
import type { QueryResult } from '../search/types.js';

// ============================================================================
// CONFIGURATION SCHEMA
// ============================================================================

export const PromptOptionsSchema = z.object({
  assistantRole: z.string().trim().min(1, 'assistantRole must not be empty').optional(),

  maxSentences: z
    .number()
    .int('maxSentences must be an integer')
    .min(1, 'maxSentences must be at least 1')
    .max(50, 'maxSentences cannot exceed 50')
    .optional(),
});

export type PromptOptions = z.infer<typeof PromptOptionsSchema>;

export const DEFAULT_PROMPT_OPTIONS = {
  assistantRole: 'a helpful support assistant',
  maxSentences: 6,
} as const satisfies Required<PromptOptions>;

/** Stands in for the CONTEXT section when nothing was retrieved */
export const NO_CONTEXT_PLACEHOLDER = '(no context retrieved)';

// ============================================================================
// BUILDER
// ============================================================================

/**
 * Build the grounded-answer instruction for `question`.
 *
 * @throws ValidationError for an empty question or invalid options
 */
export function buildPrompt(
  question: string,
  results: QueryResult[],
  options: PromptOptions = {}
): string {
  const trimmedQuestion = question.trim();
  if (trimmedQuestion.length === 0) {
    throw new ValidationError('Question must be a non-empty string');
  }

  const parsed = PromptOptionsSchema.safeParse(options);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid prompt options',
      parsed.error.issues.map((issue) => issue.message)
    );
  }

  const assistantRole = parsed.data.assistantRole ?? DEFAULT_PROMPT_OPTIONS.assistantRole;
  const maxSentences = parsed.data.maxSentences ?? DEFAULT_PROMPT_OPTIONS.maxSentences;
  const context = results.length > 0 ? formatContext(results) : NO_CONTEXT_PLACEHOLDER;

  return [
    `You are ${assistantRole}.`,
    '',
    "You must ONLY use the information in the CONTEXT below to answer the user's question.",
    "If the answer is not in the context, say you don't know.",
    '',
    'CONTEXT:',
    context,
    '',
    'QUESTION:',
    trimmedQuestion,
    '',
    `Answer in a concise, clear way, in at most ${maxSentences} sentence${maxSentences === 1 ? '' : 's'}.`,
    'If a specific source is important, mention it briefly.',
  ].join('\n');
}
