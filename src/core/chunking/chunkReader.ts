import { createReadStream, createWriteStream } from 'fs';
import { readdir, stat } from 'fs/promises';
import { join } from 'path';
import { pipeline } from 'stream/promises';
import type { ChunkFile } from './chunking.types.js';
import { CONTAINER_SUFFIX } from '../../utils/constants.js';
import { ChunkSequenceError } from '../../utils/errors.js';
import { debug } from '../../utils/logger.js';

const CHUNK_NUMBER_PATTERN = /^[1-9]\d*$/;

/**
 * Extracts N from `<prefix>.<N>`, or undefined when the name is not a chunk of that prefix.
 *
 * Matching is a literal prefix comparison, so names containing `*`, `?` or `[` are safe.
 */
export function parseChunkIndex(fileName: string, prefix: string): number | undefined {
  if (!fileName.startsWith(`${prefix}.`)) {
    return undefined;
  }

  const suffix = fileName.slice(prefix.length + 1);
  if (!CHUNK_NUMBER_PATTERN.test(suffix)) {
    return undefined;
  }

  const index = Number(suffix);
  return Number.isSafeInteger(index) ? index : undefined;
}

/**
 * Lists the chunk files for `originalName` inside a chunk directory, sorted by chunk number
 * (numerically: `.2` comes before `.10`).
 */
export async function findChunkFiles(chunkDir: string, originalName: string): Promise<ChunkFile[]> {
  const prefix = `${originalName}${CONTAINER_SUFFIX}`;
  const entries = await readdir(chunkDir, { withFileTypes: true });
  const chunks: ChunkFile[] = [];

  for (const entry of entries) {
    if (!entry.isFile()) continue;

    const index = parseChunkIndex(entry.name, prefix);
    if (index === undefined) continue;

    const path = join(chunkDir, entry.name);
    const { size } = await stat(path);
    chunks.push({ index, path, size });
  }

  return chunks.sort((a, b) => a.index - b.index);
}

/**
 * Throws ChunkSequenceError unless the sorted chunks are numbered 1..K with no gaps
 */
export function assertContiguous(chunks: ChunkFile[], chunkDir: string): void {
  chunks.forEach((chunk, position) => {
    const expected = position + 1;
    if (chunk.index !== expected) {
      throw new ChunkSequenceError(chunkDir, expected);
    }
  });
}

/**
 * Concatenates chunks in the given order into `outputPath`, truncating any existing file
 *
 * @returns Total number of bytes written
 */
export async function concatenateChunks(chunks: ChunkFile[], outputPath: string): Promise<number> {
  let totalBytes = 0;

  await pipeline(async function* () {
    for (const chunk of chunks) {
      debug(`  Concatenating ${chunk.path}`);
      for await (const data of createReadStream(chunk.path)) {
        const block: Buffer = data;
        totalBytes += block.length;
        yield block;
      }
    }
  }, createWriteStream(outputPath));

  return totalBytes;
}
