import { rm, unlink } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { RecoveredResult, SkippedResult } from './orchestration.types.js';
import { discardIntermediates } from './cleanup.js';
import { assertContiguous, concatenateChunks, findChunkFiles } from '../chunking/index.js';
import { containerPathFor, extractContainer } from '../container/index.js';
import { resolveConfig, type SplitterConfig } from '../../config.js';
import { CHUNK_DIR_SUFFIX } from '../../utils/constants.js';
import { pathExists, stripSuffix } from '../../utils/helpers.js';
import { createLogger, debug } from '../../utils/logger.js';

const log = createLogger('recover');

/**
 * Rebuild the original file from a `<name>.dir` chunk directory.
 *
 * Chunks are concatenated in numeric order into `<parent>/<name>.zip` (replacing a
 * container left by an interrupted run), the container is extracted into the
 * parent directory and then deleted. An existing file at the target path is
 * replaced. With `config.autoRemove` the chunk directory is deleted afterwards.
 */
export async function recoverFile(
  chunkDir: string,
  config: SplitterConfig = resolveConfig()
): Promise<RecoveredResult | SkippedResult> {
  const originalName = stripSuffix(basename(chunkDir), CHUNK_DIR_SUFFIX);
  if (originalName === undefined) {
    return {
      status: 'skipped',
      path: chunkDir,
      reason: 'not-chunk-dir',
      message: `name does not end in ${CHUNK_DIR_SUFFIX}`,
    };
  }

  const parentDir = dirname(chunkDir);
  const originalPath = join(parentDir, originalName);

  const chunks = await findChunkFiles(chunkDir, originalName);
  if (chunks.length === 0) {
    return {
      status: 'skipped',
      path: chunkDir,
      reason: 'no-chunks',
      message: `No split files found in ${chunkDir}`,
    };
  }
  assertContiguous(chunks, chunkDir);

  const overwritten = await pathExists(originalPath);
  if (overwritten) {
    log.warn(`Replacing existing file ${originalPath}`);
  }

  const containerPath = containerPathFor(originalPath);
  let containerSize: number;
  let files: string[];
  try {
    containerSize = await concatenateChunks(chunks, containerPath);
    debug(`  Created: ${containerPath} (${containerSize} bytes)`);

    const extracted = await extractContainer(containerPath, parentDir);
    files = extracted.map((entry) => entry.path);
    debug(`  Extracted to: ${files.join(', ')}`);

    await unlink(containerPath);
    debug(`  Removed temporary zip: ${containerPath}`);
  } catch (error) {
    await discardIntermediates([containerPath]);
    throw error;
  }

  if (config.autoRemove) {
    await rm(chunkDir, { recursive: true, force: true });
    debug(`  Removed directory: ${chunkDir}`);
  }

  return {
    status: 'recovered',
    path: chunkDir,
    files,
    chunkCount: chunks.length,
    containerSize,
    overwritten,
    removedChunkDir: config.autoRemove,
  };
}
