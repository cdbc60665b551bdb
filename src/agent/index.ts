export {
  buildPrompt,
  PromptOptionsSchema,
  DEFAULT_PROMPT_OPTIONS,
  NO_CONTEXT_PLACEHOLDER,
  type PromptOptions,
} from './prompt.js';
