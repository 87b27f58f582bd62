/**
 * CLI Utility Functions
 * Shared helpers for CLI commands
 */

import { relative } from 'path';

// ============================================================================
// Constants
// ============================================================================

export const CLI_CONSTANTS = {
  // Display formatting
  DIVIDER_LENGTH: 60,
  PATH_MAX_LENGTH: 50,
  PATH_TRUNCATE_PREFIX: '...',
} as const;

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format bytes to human-readable string
 */
export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 B';
  const k = 1024;
  const sizes = ['B', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(k)), sizes.length - 1);
  return parseFloat((bytes / Math.pow(k, i)).toFixed(2)) + ' ' + sizes[i];
}

/**
 * Path relative to the scan root for display; the root itself shows as "."
 */
export function displayPath(path: string, rootDir: string): string {
  const rel = relative(rootDir, path);
  if (rel === '') return '.';
  return rel.startsWith('..') ? path : rel;
}

/**
 * Keep the tail of long paths so the file name stays visible
 */
export function truncatePath(path: string, maxLength: number = CLI_CONSTANTS.PATH_MAX_LENGTH): string {
  if (path.length <= maxLength) return path;
  const keep = maxLength - CLI_CONSTANTS.PATH_TRUNCATE_PREFIX.length;
  return CLI_CONSTANTS.PATH_TRUNCATE_PREFIX + path.slice(path.length - keep);
}

/**
 * "1 chunk" / "3 chunks"
 */
export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}
