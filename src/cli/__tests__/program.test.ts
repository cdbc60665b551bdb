/**
 * Tests for the root program wiring
 */

import { describe, it, expect } from 'vitest';

import { createProgram } from '../program.js';

describe('createProgram', () => {
  it('registers every command', () => {
    const program = createProgram();

    expect(program.name()).toBe('ragdex');
    expect(program.commands.map((cmd) => cmd.name())).toEqual([
      'ingest',
      'search',
      'context',
      'status',
      'config',
    ]);
  });

  it('declares the global options', () => {
    const program = createProgram();

    expect(program.options.map((option) => option.long)).toEqual([
      '--version',
      '--verbose',
      '--json',
      '--config',
    ]);
  });

  it('rejects an unknown command', async () => {
    const program = createProgram();

    await expect(program.parseAsync(['reindex'], { from: 'user' })).rejects.toThrow(
      'Unknown command: reindex'
    );
  });
});
