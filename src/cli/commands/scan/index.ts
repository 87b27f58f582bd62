/**
 * Scan Command
 * Splits large files under the working directory, or recovers them with --recover
 */

import chalk from 'chalk';
import type { Command } from 'commander';
import { scanDirectory } from '../../../core/scanning/index.js';
import type { ScanMode, ScanSummary } from '../../../core/scanning/index.js';
import { DEFAULT_CONFIG, resolveConfig } from '../../../config.js';
import { formatError } from '../../../utils/errors.js';
import { error as logError, setOutputGuard, setVerboseMode } from '../../../utils/logger.js';
import { displayBanner, displaySummary } from './display.js';
import { ScanProgressHandler } from './progress.js';

export interface ScanCommandOptions {
  recover?: boolean;
  autoRemove?: boolean;
  verbose?: boolean;
}

/**
 * Run one full scan of `rootDir` and print its progress and summary.
 *
 * Per-entry failures are part of the returned summary; only configuration
 * errors and an unreadable root reject.
 */
export async function runScan(
  rootDir: string,
  options: ScanCommandOptions,
  excludePaths: string[] = []
): Promise<ScanSummary> {
  const verbose = options.verbose ?? DEFAULT_CONFIG.verbose;
  setVerboseMode(verbose);

  const mode: ScanMode = options.recover ? 'recover' : 'split';
  const config = resolveConfig({
    autoRemove: options.autoRemove ?? DEFAULT_CONFIG.autoRemove,
    excludePaths,
  });

  displayBanner(rootDir, mode, config, verbose);

  const progressHandler = new ScanProgressHandler(rootDir, verbose);
  setOutputGuard(progressHandler);
  try {
    const summary = await scanDirectory(rootDir, {
      mode,
      config,
      callbacks: progressHandler.getCallbacks(),
    });
    displaySummary(summary);
    return summary;
  } finally {
    setOutputGuard(undefined);
    progressHandler.stop();
  }
}

/**
 * Register the scan options and action as the program's default command
 */
export function registerScanCommand(program: Command, selfPath?: string): void {
  program
    .option('--recover', 'Recover files from .dir directories', false)
    .option(
      '--auto-remove',
      'Remove originals after splitting, or .dir directories after recovery',
      false
    )
    .option('--verbose', 'Show detailed logging information', false)
    .action(async (options: ScanCommandOptions) => {
      try {
        await runScan(process.cwd(), options, selfPath ? [selfPath] : []);
      } catch (error) {
        logError(chalk.red('\n❌ Scan failed:\n'));
        logError(chalk.red(formatError(error)));
        process.exit(1);
      }
    });
}
