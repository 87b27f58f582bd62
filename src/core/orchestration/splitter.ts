import { lstat, mkdir, readdir, rename, rm, rmdir, stat, unlink } from 'fs/promises';
import { basename, join } from 'path';
import type { SkippedResult, SplitResult } from './orchestration.types.js';
import { discardIntermediates } from './cleanup.js';
import { findChunkFiles, splitFileIntoChunks, type ChunkFile } from '../chunking/index.js';
import { compressFile, containerPathFor } from '../container/index.js';
import { resolveConfig, type SplitterConfig } from '../../config.js';
import { STAGING_SUFFIX } from '../../utils/constants.js';
import { ChunkDirConflictError, isErrnoCode } from '../../utils/errors.js';
import { chunkDirPathFor } from '../../utils/helpers.js';
import { debug } from '../../utils/logger.js';

async function assertUsableChunkDir(chunkDir: string): Promise<void> {
  try {
    const stats = await lstat(chunkDir);
    if (!stats.isDirectory()) {
      throw new ChunkDirConflictError(chunkDir);
    }
  } catch (error) {
    if (!isErrnoCode(error, 'ENOENT')) throw error;
  }
}

/**
 * Move staged chunks into `chunkDir`, creating it if needed. Other files in
 * the directory are kept; chunks of `originalName` numbered past the new
 * count are removed so the sequence stays contiguous.
 */
async function commitChunks(
  stagingDir: string,
  chunkDir: string,
  originalName: string,
  chunkCount: number
): Promise<void> {
  await mkdir(chunkDir, { recursive: true });

  for (const stale of await findChunkFiles(chunkDir, originalName)) {
    if (stale.index > chunkCount) {
      await unlink(stale.path);
      debug(`  Removed stale chunk: ${stale.path}`);
    }
  }

  for (const name of await readdir(stagingDir)) {
    await rename(join(stagingDir, name), join(chunkDir, name));
  }
  await rmdir(stagingDir);
}

/**
 * Compress a file and split the container into `<file>.dir/<file>.zip.<N>`.
 *
 * Files at or below `config.threshold` are skipped without touching the disk.
 * Chunks are written to `<file>.dir.partial` and moved into `<file>.dir` only
 * once every chunk is on disk. An existing `<file>.dir` keeps its other files;
 * one that is not a directory fails the split before anything is written.
 * The source is deleted last, and only with `config.autoRemove`.
 *
 * Errors propagate; the container and staging directory are removed first.
 */
export async function splitFile(
  filePath: string,
  config: SplitterConfig = resolveConfig()
): Promise<SplitResult | SkippedResult> {
  const { size: sourceSize } = await stat(filePath);

  if (sourceSize <= config.threshold) {
    debug(`Skipping ${filePath} (size: ${sourceSize} bytes <= ${config.threshold})`);
    return {
      status: 'skipped',
      path: filePath,
      reason: 'below-threshold',
      message: `size ${sourceSize} bytes <= ${config.threshold}`,
    };
  }

  const originalName = basename(filePath);
  const chunkDir = chunkDirPathFor(filePath);
  const stagingDir = `${chunkDir}${STAGING_SUFFIX}`;
  const containerPath = containerPathFor(filePath);

  await assertUsableChunkDir(chunkDir);

  let containerSize: number;
  let chunks: ChunkFile[];
  try {
    await rm(stagingDir, { recursive: true, force: true });
    await mkdir(stagingDir, { recursive: true });
    debug(`  Created directory: ${stagingDir}`);

    containerSize = await compressFile(filePath, containerPath);
    debug(`  Compressed to: ${containerPath} (${containerSize} bytes)`);

    chunks = await splitFileIntoChunks(containerPath, stagingDir, config.chunkSize);

    await unlink(containerPath);
    debug(`  Removed temporary zip: ${containerPath}`);

    await commitChunks(stagingDir, chunkDir, originalName, chunks.length);
    debug(`  Committed ${chunks.length} chunk(s) to: ${chunkDir}`);
  } catch (error) {
    await discardIntermediates([containerPath], [stagingDir]);
    throw error;
  }

  if (config.autoRemove) {
    await unlink(filePath);
    debug(`  Removed original file: ${filePath}`);
  }

  return {
    status: 'split',
    path: filePath,
    chunkDir,
    sourceSize,
    containerSize,
    chunks: chunks.map((chunk) => ({ ...chunk, path: join(chunkDir, basename(chunk.path)) })),
    removedSource: config.autoRemove,
  };
}
