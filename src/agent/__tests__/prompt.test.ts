/**
 * Grounded Prompt Builder Tests
 */

import { describe, it, expect } from 'vitest';

import { buildPrompt, NO_CONTEXT_PLACEHOLDER } from '../prompt.js';
import { ValidationError } from '../../errors/index.js';
import type { QueryResult } from '../../search/types.js';

const RESULTS: QueryResult[] = [
  { id: 0, source: 'a.txt', text: 'The thermostat resets after 10 seconds of no input.', score: 0.8731 },
  { id: 5, source: 'b.txt', text: 'Hold the button to pair.', score: 0.5 },
];

describe('buildPrompt', () => {
  it('wraps formatted context and the question in the instruction', () => {
    const prompt = buildPrompt('How long until the thermostat resets?', RESULTS.slice(0, 1));

    expect(prompt).toBe(
      [
        'You are a helpful support assistant.',
        '',
        "You must ONLY use the information in the CONTEXT below to answer the user's question.",
        "If the answer is not in the context, say you don't know.",
        '',
        'CONTEXT:',
        '[Source: a.txt | Score: 0.873]',
        'The thermostat resets after 10 seconds of no input.',
        '',
        'QUESTION:',
        'How long until the thermostat resets?',
        '',
        'Answer in a concise, clear way, in at most 6 sentences.',
        'If a specific source is important, mention it briefly.',
      ].join('\n')
    );
  });

  it('keeps every result block in ranked order', () => {
    const prompt = buildPrompt('pairing?', RESULTS);

    expect(prompt).toContain(
      'CONTEXT:\n[Source: a.txt | Score: 0.873]\nThe thermostat resets after 10 seconds of no input.\n\n' +
        '[Source: b.txt | Score: 0.500]\nHold the button to pair.\n\nQUESTION:'
    );
  });

  it('uses a placeholder when nothing was retrieved', () => {
    const prompt = buildPrompt('Anything?', []);

    expect(prompt).toContain(`CONTEXT:\n${NO_CONTEXT_PLACEHOLDER}\n\nQUESTION:\nAnything?`);
  });

  it('applies the assistant role and sentence limit', () => {
    const prompt = buildPrompt('Q?', RESULTS, {
      assistantRole: 'the support assistant for the X100 router',
      maxSentences: 1,
    });

    expect(prompt.split('\n')[0]).toBe('You are the support assistant for the X100 router.');
    expect(prompt).toContain('Answer in a concise, clear way, in at most 1 sentence.\n');
  });

  it('trims the question', () => {
    expect(buildPrompt('  Q?  \n', [])).toContain('QUESTION:\nQ?\n');
  });

  it('rejects an empty question', () => {
    expect(() => buildPrompt('   ', RESULTS)).toThrow(ValidationError);
  });

  it('rejects invalid options with the issues listed', () => {
    try {
      buildPrompt('Q?', RESULTS, { maxSentences: 0 });
      expect.unreachable('buildPrompt should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      if (error instanceof ValidationError) {
        expect(error.issues).toEqual(['maxSentences must be at least 1']);
      }
    }
  });
});
