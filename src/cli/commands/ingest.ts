/**
 * Ingest Command
 *
 * Rebuilds the index from the docs directory.
 *
 * Usage:
 *   ragdex ingest                          Use configured directories
 *   ragdex ingest --docs ./manuals         Override the corpus directory
 *   ragdex ingest --chunk-size 800         Override chunking for this run
 *   ragdex ingest --json                   Output progress as NDJSON
 *
 * The pipeline:
 * 1. Scanning - Read every matching file in the docs directory
 * 2. Chunking - Split text into overlapping windows
 * 3. Embedding - Compute a unit vector for each chunk
 * 4. Storing - Write a new generation and swap the manifest
 */

import { Command } from 'commander';
import { resolve } from 'node:path';

import type { CommandContext } from '../types.js';
import { createProgressReporter } from '../utils/progress.js';
import { createCommandProvider, loadCommandConfig } from '../utils/setup.js';
import { IngestOptionsSchema, parseInput } from '../validation.js';
import { buildIndex } from '../../indexer/pipeline.js';
import { Embedder } from '../../indexer/embedder/index.js';
import type { PartialConfig } from '../../config/schema.js';

/**
 * Command-specific options, as Commander hands them over.
 */
interface IngestCommandOptions {
  docs?: string;
  data?: string;
  chunkSize?: string;
  chunkOverlap?: string;
}

/**
 * Create the ingest command.
 *
 * @param getContext - Factory function to get the command context
 */
export function createIngestCommand(getContext: () => CommandContext): Command {
  return new Command('ingest')
    .description('Build the index from the docs directory (full rebuild)')
    .option('-d, --docs <dir>', 'Docs directory (overrides paths.docs_dir)')
    .option('-o, --data <dir>', 'Data directory (overrides paths.data_dir)')
    .option('--chunk-size <n>', 'Maximum characters per chunk')
    .option('--chunk-overlap <n>', 'Characters shared by consecutive chunks')
    .action(async (cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();
      const flags = parseInput(IngestOptionsSchema, cmdOptions, 'Invalid ingest options');

      const overrides: PartialConfig = {
        paths: {
          docs_dir: flags.docs !== undefined ? resolve(flags.docs) : undefined,
          data_dir: flags.data !== undefined ? resolve(flags.data) : undefined,
        },
        chunking: {
          chunk_size: flags.chunkSize,
          chunk_overlap: flags.chunkOverlap,
        },
      };
      const config = loadCommandConfig(ctx, overrides);

      ctx.debug(`Docs directory: ${config.paths.docs_dir}`);
      ctx.debug(`Data directory: ${config.paths.data_dir}`);
      ctx.debug(`Chunking: size ${config.chunking.chunk_size}, overlap ${config.chunking.chunk_overlap}`);

      const reporter = createProgressReporter({
        json: ctx.options.json,
        verbose: ctx.options.verbose,
      });

      const provider = createCommandProvider(ctx, config);
      const embedder = new Embedder(provider, {
        batchSize: config.embedding.batch_size,
        logger: ctx,
      });

      try {
        const summary = await buildIndex({
          docsDir: config.paths.docs_dir,
          dataDir: config.paths.data_dir,
          chunkSize: config.chunking.chunk_size,
          chunkOverlap: config.chunking.chunk_overlap,
          embedder,
          extensions: config.corpus.extensions,
          storage: {
            embeddingsFilename: config.storage.embeddings_filename,
            metadataFilename: config.storage.metadata_filename,
            limits: {
              maxSourceLength: config.storage.max_source_length,
              maxTextLength: config.storage.max_text_length,
            },
          },
          logger: ctx,

          // Wire up progress callbacks to the reporter
          onStageStart: (stage, total) => reporter.startStage(stage, total),
          onProgress: (_stage, processed, _total, currentItem) =>
            reporter.updateProgress(processed, currentItem),
          onStageComplete: (_stage, stats) => reporter.completeStage(stats),
        });

        reporter.showSummary(summary);
      } catch (error) {
        reporter.fail('Ingestion failed');
        throw error;
      }
    });
}
