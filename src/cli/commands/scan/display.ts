/**
 * Display Functions
 * Handles banner and summary output for the scan command
 */

import chalk from 'chalk';
import { CLI_CONSTANTS, formatBytes } from '../../utils.js';
import type { ScanMode, ScanSummary } from '../../../core/scanning/index.js';
import type { SplitterConfig } from '../../../config.js';

export function displayDivider(): void {
  console.log(chalk.gray('-'.repeat(CLI_CONSTANTS.DIVIDER_LENGTH)));
}

/**
 * Display the scan header: directory, mode and the options in effect
 */
export function displayBanner(
  rootDir: string,
  mode: ScanMode,
  config: SplitterConfig,
  verbose: boolean
): void {
  console.log(chalk.gray('Scanning directory: ') + chalk.cyan(rootDir));

  if (mode === 'recover') {
    console.log(chalk.gray('Mode: ') + chalk.bold.white('RECOVER'));
    if (config.autoRemove) {
      console.log(
        chalk.yellow('Auto-remove: ENABLED') +
          chalk.gray(' (.dir directories will be deleted after recovery)')
      );
    }
  } else {
    console.log(chalk.gray('Mode: ') + chalk.bold.white('COMPRESS AND SPLIT'));
    console.log(
      chalk.gray('Maximum file size: ') +
        chalk.white(`${config.threshold} bytes (${formatBytes(config.threshold)})`)
    );
    if (config.autoRemove) {
      console.log(
        chalk.yellow('Auto-remove: ENABLED') +
          chalk.gray(' (original files will be deleted after splitting)')
      );
    }
  }

  if (verbose) {
    console.log(chalk.gray('Verbose: ENABLED'));
  }

  displayDivider();
}

/**
 * Summary line with counts per outcome
 */
export function formatSummaryLine(summary: ScanSummary): string {
  const { counts } = summary;
  const processed = summary.mode === 'recover' ? `${counts.recovered} recovered` : `${counts.split} split`;
  return `${processed}, ${counts.skipped} skipped, ${counts.failed} failed`;
}

/**
 * Display the closing divider, the counts and the completion banner
 */
export function displaySummary(summary: ScanSummary): void {
  displayDivider();

  const line = formatSummaryLine(summary);
  console.log(summary.counts.failed > 0 ? chalk.yellow(line) : chalk.gray(line));
  console.log(chalk.bold.green('Done!'));
}
