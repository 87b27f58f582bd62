import { rm } from 'fs/promises';
import { formatError } from '../../utils/errors.js';
import { warn } from '../../utils/logger.js';

async function discard(path: string, recursive: boolean): Promise<void> {
  try {
    await rm(path, { recursive, force: true });
  } catch (error) {
    warn(`  Warning: could not remove ${path}: ${formatError(error)}`);
  }
}

/**
 * Remove intermediates left by a failed step. Only `directories` are removed
 * recursively. Failures here are reported but never replace the error that
 * caused the cleanup.
 */
export async function discardIntermediates(
  files: string[],
  directories: string[] = []
): Promise<void> {
  for (const path of files) {
    await discard(path, false);
  }
  for (const path of directories) {
    await discard(path, true);
  }
}
