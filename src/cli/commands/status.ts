/**
 * Status Command
 *
 * Displays the current index and the effective embedding settings:
 *   ragdex status         - Show index status
 *   ragdex status --json  - Output as JSON
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, statSync } from 'node:fs';
import { join } from 'node:path';

import type { CommandContext } from '../types.js';
import { loadCommandConfig } from '../utils/setup.js';
import { readManifestIfExists, type IndexManifest } from '../../storage/index.js';

/**
 * Format bytes to human-readable size (e.g., "127.4 KB")
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(1))} ${sizes[i]}`;
}

/**
 * Total size of the current artifacts; missing files count as zero
 */
function getArtifactSize(dataDir: string, manifest: IndexManifest): number {
  let total = 0;
  for (const file of [manifest.embeddingsFile, manifest.metadataFile]) {
    const artifactPath = join(dataDir, file);
    if (existsSync(artifactPath)) {
      total += statSync(artifactPath).size;
    }
  }
  return total;
}

/**
 * Create the status command
 */
export function createStatusCommand(getContext: () => CommandContext): Command {
  return new Command('status')
    .description('Show the current index and embedding settings')
    .action(async () => {
      const ctx = getContext();
      ctx.debug('Reading index manifest...');

      const config = loadCommandConfig(ctx);
      const dataDir = config.paths.data_dir;
      const manifest = await readManifestIfExists(dataDir);
      const size = manifest ? getArtifactSize(dataDir, manifest) : 0;
      const modelMatches = manifest === null || manifest.model === config.embedding.model;

      if (ctx.options.json) {
        const jsonOutput = {
          indexed: manifest !== null,
          index: manifest
            ? {
                buildId: manifest.buildId,
                createdAt: manifest.createdAt,
                documents: manifest.documentCount,
                chunks: manifest.chunkCount,
                model: manifest.model,
                dimensions: manifest.dimensions,
                size,
              }
            : null,
          paths: {
            docs: config.paths.docs_dir,
            data: dataDir,
          },
          embedding: {
            provider: config.embedding.provider,
            model: config.embedding.model,
          },
          modelMatches,
        };
        console.log(JSON.stringify(jsonOutput, null, 2));
        return;
      }

      const lines: string[] = [];

      lines.push(chalk.bold('ragdex status'));
      lines.push(chalk.dim('─'.repeat(35)));

      if (manifest) {
        lines.push(`${chalk.cyan('Build:')}        ${manifest.buildId}`);
        lines.push(`${chalk.cyan('Created:')}      ${manifest.createdAt}`);
        lines.push(`${chalk.cyan('Documents:')}    ${manifest.documentCount.toLocaleString()}`);
        lines.push(`${chalk.cyan('Chunks:')}       ${manifest.chunkCount.toLocaleString()}`);
        lines.push(`${chalk.cyan('Index model:')}  ${manifest.model} (${manifest.dimensions}d)`);
        lines.push(`${chalk.cyan('Size:')}         ${formatBytes(size)}`);
      }

      lines.push('');
      lines.push(`${chalk.cyan('Docs:')}         ${config.paths.docs_dir}`);
      lines.push(`${chalk.cyan('Data:')}         ${dataDir}`);
      lines.push(`${chalk.cyan('Embeddings:')}   ${config.embedding.model} (${config.embedding.provider})`);

      if (!manifest) {
        lines.push('');
        lines.push(chalk.yellow('No index built.'));
        lines.push(`Run ${chalk.cyan('ragdex ingest')} to get started.`);
      } else if (!modelMatches) {
        lines.push('');
        lines.push(chalk.yellow('The index was built with a different embedding model.'));
        lines.push(`Run ${chalk.cyan('ragdex ingest')} to rebuild it.`);
      }

      ctx.log(lines.join('\n'));
    });
}
