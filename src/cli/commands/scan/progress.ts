/**
 * Progress Tracking
 * Turns scan callbacks into spinner state and per-entry lines
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { displayPath, formatBytes, pluralize, truncatePath } from '../../utils.js';
import type { ScanCallbacks, ScanMode } from '../../../core/scanning/index.js';
import type { EntryResult } from '../../../core/orchestration/index.js';
import type { OutputGuard } from '../../../utils/logger.js';

/**
 * Scan progress handler with a spinner for the entry in flight
 */
export class ScanProgressHandler implements OutputGuard {
  private spinner: Ora;

  constructor(
    private readonly rootDir: string,
    verbose: boolean
  ) {
    // Verbose step logs would be interleaved with spinner frames
    this.spinner = ora({
      color: 'cyan',
      stream: process.stdout,
      isEnabled: verbose ? false : undefined,
    });
  }

  /**
   * Get callbacks object for scanDirectory
   */
  public getCallbacks(): ScanCallbacks {
    return {
      onEntryStart: this.onEntryStart.bind(this),
      onEntryComplete: this.onEntryComplete.bind(this),
    };
  }

  private label(path: string): string {
    return truncatePath(displayPath(path, this.rootDir));
  }

  /**
   * Called when an entry is handed to an orchestrator
   */
  private onEntryStart(path: string, mode: ScanMode): void {
    const verb = mode === 'recover' ? 'Recovering' : 'Processing';
    this.spinner.start(chalk.gray(`${verb} `) + chalk.cyan(this.label(path)));
  }

  /**
   * Called with every entry result, in scan order
   */
  private onEntryComplete(result: EntryResult, mode: ScanMode): void {
    switch (result.status) {
      case 'split':
        this.spinner.stopAndPersist({
          symbol: chalk.green('✓'),
          text:
            chalk.white(this.label(result.path)) +
            chalk.gray(` (${formatBytes(result.sourceSize)}) → `) +
            chalk.cyan(pluralize(result.chunks.length, 'chunk')) +
            (result.removedSource ? chalk.gray(' (original removed)') : ''),
        });
        break;

      case 'recovered':
        this.spinner.stopAndPersist({
          symbol: chalk.green('✓'),
          text:
            chalk.white(result.files.map((file) => this.label(file)).join(', ')) +
            chalk.gray(` ← ${pluralize(result.chunkCount, 'chunk')}`) +
            (result.removedChunkDir ? chalk.gray(' (directory removed)') : ''),
        });
        break;

      case 'skipped':
        if (result.reason === 'no-chunks') {
          this.spinner.stopAndPersist({
            symbol: chalk.yellow('⚠'),
            text: chalk.yellow(`Warning: ${result.message}`),
          });
        } else {
          this.spinner.stop();
        }
        break;

      case 'failed': {
        const prefix = mode === 'recover' ? 'Error recovering from' : 'Error processing';
        this.spinner.stopAndPersist({
          symbol: chalk.red('✗'),
          text: chalk.red(`${prefix} ${this.label(result.path)}: ${result.error}`),
        });
        break;
      }
    }
  }

  /**
   * Take the spinner off its line so a log line can be written
   */
  public pause(): void {
    if (this.spinner.isSpinning) {
      this.spinner.clear();
    }
  }

  public resume(): void {
    if (this.spinner.isSpinning) {
      this.spinner.render();
    }
  }

  /**
   * Clear any spinner still running
   */
  public stop(): void {
    this.spinner.stop();
  }
}
