#!/usr/bin/env node
/**
 * ragdex CLI Entry Point
 *
 * This is the main entry point for the `ragdex` command.
 */

import { createProgram } from './program.js';
import { handleError, createGlobalErrorHandler } from '../errors/index.js';

const program = createProgram();

async function main(): Promise<void> {
  const getErrorOptions = () => {
    const opts = program.opts<{ verbose?: boolean; json?: boolean }>();
    return { verbose: opts.verbose ?? false, json: opts.json ?? false };
  };

  // Catch errors that escape all try/catch blocks
  const globalHandler = createGlobalErrorHandler(getErrorOptions());
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
