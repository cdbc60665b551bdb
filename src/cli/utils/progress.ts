/**
 * Progress Reporter
 *
 * Manages progress display for `ragdex ingest`.
 * Supports multiple output modes:
 * - Interactive: ora spinners with real-time updates
 * - JSON: NDJSON event stream for scripts and CI
 * - Text: Simple text output for non-TTY environments
 *
 * Spinner updates are throttled to 100ms so fast stages do not flicker.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';

import type { IndexingStage, IndexSummary, StageStats } from '../../indexer/types.js';

/**
 * Human-readable labels for each stage.
 */
const STAGE_LABELS: Record<IndexingStage, string> = {
  scanning: 'Scanning',
  chunking: 'Chunking',
  embedding: 'Embedding',
  storing: 'Storing',
};

/**
 * Configuration options for the ProgressReporter.
 */
export interface ProgressReporterOptions {
  /** Output as JSON events instead of human-readable text */
  json: boolean;

  /** Show per-file output and the stage breakdown */
  verbose: boolean;

  /** Disable colors (respects NO_COLOR env) */
  noColor: boolean;

  /** Whether stdout is a TTY (for spinner support) */
  isInteractive: boolean;
}

/**
 * JSON event types for NDJSON output.
 */
export type ProgressEventType =
  | 'stage_start'
  | 'stage_progress'
  | 'stage_complete'
  | 'complete';

/**
 * JSON event emitted in --json mode.
 */
export interface ProgressEvent {
  type: ProgressEventType;
  timestamp: string;
  stage?: IndexingStage;
  data: Record<string, unknown>;
}

/**
 * ProgressReporter manages all progress display during ingestion.
 *
 * Usage:
 * ```typescript
 * const reporter = createProgressReporter({ json: false, verbose: false });
 *
 * reporter.startStage('scanning', 0); // Unknown total
 * reporter.updateProgress(1, 'manual.txt');
 * reporter.completeStage({ stage: 'scanning', processed: 12, total: 12, durationMs: 40 });
 *
 * reporter.showSummary(summary);
 * ```
 */
export class ProgressReporter {
  private options: ProgressReporterOptions;
  private spinner: Ora | null = null;
  private currentStage: IndexingStage | null = null;
  private currentTotal = 0;
  private lastUpdateTime = 0;
  private verboseLines: string[] = [];

  /** Minimum time between spinner updates */
  private static readonly UPDATE_THROTTLE_MS = 100;

  /** Maximum length for file name display */
  private static readonly MAX_PATH_LENGTH = 40;

  constructor(options: ProgressReporterOptions) {
    this.options = options;

    if (options.noColor) {
      chalk.level = 0;
    }
  }

  /**
   * Start a new stage of the pipeline.
   *
   * @param total - Expected total items (0 if unknown, like during scanning)
   */
  startStage(stage: IndexingStage, total = 0): void {
    this.currentStage = stage;
    this.currentTotal = total;
    this.verboseLines = [];

    if (this.options.json) {
      this.emitJson({
        type: 'stage_start',
        timestamp: new Date().toISOString(),
        stage,
        data: { total },
      });
      return;
    }

    if (this.options.isInteractive) {
      this.spinner?.stop();

      const label = STAGE_LABELS[stage];
      this.spinner = ora({
        text: `${label}...`,
        prefixText: chalk.cyan(label.padEnd(12)),
      }).start();
    } else {
      console.log(`${STAGE_LABELS[stage]}...`);
    }
  }

  /**
   * Update progress within the current stage.
   *
   * @param processed - Number of items processed so far
   * @param currentItem - File being processed (optional)
   */
  updateProgress(processed: number, currentItem?: string): void {
    if (!this.currentStage) return;

    // Verbose mode: collect every file, even when the display is throttled
    if (this.options.verbose && currentItem) {
      this.verboseLines.push(`  → ${currentItem}`);
    }

    const now = performance.now();
    if (now - this.lastUpdateTime < ProgressReporter.UPDATE_THROTTLE_MS) {
      return;
    }
    this.lastUpdateTime = now;

    if (this.options.json) {
      this.emitJson({
        type: 'stage_progress',
        timestamp: new Date().toISOString(),
        stage: this.currentStage,
        data: { processed, total: this.currentTotal, currentItem },
      });
      return;
    }

    let progressText: string;
    if (this.currentTotal > 0) {
      const percentage = Math.round((processed / this.currentTotal) * 100);
      progressText = `${processed}/${this.currentTotal} (${percentage}%)`;
    } else {
      progressText = `Found ${processed} files`;
    }

    const truncatedPath = currentItem ? this.truncatePath(currentItem) : '';

    if (this.options.isInteractive && this.spinner) {
      this.spinner.text = truncatedPath
        ? `${progressText.padEnd(25)} ${chalk.dim(truncatedPath)}`
        : progressText;
    }
  }

  /**
   * Mark the current stage as complete.
   */
  completeStage(stats: StageStats): void {
    if (this.options.json) {
      this.emitJson({
        type: 'stage_complete',
        timestamp: new Date().toISOString(),
        stage: stats.stage,
        data: {
          processed: stats.processed,
          total: stats.total,
          durationMs: stats.durationMs,
          details: stats.details,
        },
      });
    } else if (this.options.isInteractive && this.spinner) {
      this.spinner.succeed(`${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`);

      if (this.options.verbose && this.verboseLines.length > 0) {
        for (const line of this.verboseLines.slice(0, 10)) {
          console.log(chalk.dim(line));
        }
        if (this.verboseLines.length > 10) {
          console.log(chalk.dim(`  ... and ${this.verboseLines.length - 10} more`));
        }
      }
    } else {
      console.log(
        `${STAGE_LABELS[stats.stage]} complete: ${stats.processed.toLocaleString()} ${this.getStageUnit(stats.stage)}`
      );
    }

    this.currentStage = null;
    this.spinner = null;
  }

  /**
   * Stop a running spinner after a fatal error.
   */
  fail(message: string): void {
    if (this.spinner) {
      this.spinner.fail(message);
      this.spinner = null;
    }
    this.currentStage = null;
  }

  /**
   * Display the final summary after the index is written.
   */
  showSummary(summary: IndexSummary): void {
    if (this.options.json) {
      this.emitJson({
        type: 'complete',
        timestamp: new Date().toISOString(),
        data: { summary },
      });
      return;
    }

    console.log('');
    console.log(chalk.green.bold('Index Complete ✓'));
    console.log('');
    console.log(`  ${chalk.dim('Documents:')}        ${summary.documentCount.toLocaleString()}`);
    console.log(`  ${chalk.dim('Chunks:')}           ${summary.chunkCount.toLocaleString()}`);
    console.log(`  ${chalk.dim('Model:')}            ${summary.model} (${summary.dimensions}d)`);
    console.log(`  ${chalk.dim('Build:')}            ${summary.buildId}`);
    console.log(`  ${chalk.dim('Location:')}         ${summary.location}`);
    console.log(`  ${chalk.dim('Time elapsed:')}     ${formatDuration(summary.durationMs)}`);

    if (this.options.verbose) {
      const stages = Object.keys(STAGE_LABELS).filter(isIndexingStage);
      console.log('');
      console.log(chalk.dim('  Breakdown:'));
      for (const stage of stages) {
        const durationMs = summary.stageDurations[stage];
        if (durationMs === undefined) continue;
        const stageLabel = STAGE_LABELS[stage];
        console.log(`    ${chalk.dim(stageLabel + ':')}${' '.repeat(12 - stageLabel.length)}${formatDuration(durationMs)}`);
      }
    }

    if (summary.chunkCount === 0) {
      console.log('');
      console.log(chalk.yellow('  The index is empty: no text was found in the docs directory.'));
    }

    console.log('');
  }

  private emitJson(event: ProgressEvent): void {
    console.log(JSON.stringify(event));
  }

  private getStageUnit(stage: IndexingStage): string {
    switch (stage) {
      case 'scanning':
        return 'files';
      case 'chunking':
        return 'chunks';
      case 'embedding':
        return 'chunks embedded';
      case 'storing':
        return 'chunks stored';
    }
  }

  private truncatePath(path: string): string {
    if (path.length <= ProgressReporter.MAX_PATH_LENGTH) {
      return path;
    }
    return '...' + path.slice(-(ProgressReporter.MAX_PATH_LENGTH - 3));
  }
}

function isIndexingStage(value: string): value is IndexingStage {
  return value in STAGE_LABELS;
}

/**
 * Format milliseconds as human-readable duration.
 *
 * @example
 * ```typescript
 * formatDuration(250)    // "250ms"
 * formatDuration(1500)   // "1.5s"
 * formatDuration(125000) // "2m 5s"
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

/**
 * Create a ProgressReporter with defaults taken from the environment.
 */
export function createProgressReporter(
  options: Partial<ProgressReporterOptions> = {}
): ProgressReporter {
  return new ProgressReporter({
    json: options.json ?? false,
    verbose: options.verbose ?? false,
    noColor: options.noColor ?? !!process.env.NO_COLOR,
    isInteractive: options.isInteractive ?? (process.stdout.isTTY ?? false),
  });
}
