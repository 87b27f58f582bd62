import { createReadStream } from 'fs';
import { writeFile } from 'fs/promises';
import { basename, join } from 'path';
import type { ChunkFile } from './chunking.types.js';
import { DEFAULT_CHUNK_SIZE } from '../../utils/constants.js';
import { debug } from '../../utils/logger.js';

/**
 * Splits a byte stream into sequential chunk files named `<baseName>.1`, `<baseName>.2`, ...
 *
 * Every chunk holds exactly `chunkSize` bytes except possibly the last. A stream
 * whose length is a multiple of `chunkSize` gets no trailing empty chunk, and an
 * empty stream produces no chunks at all.
 *
 * @param source - Byte stream to split (any readable stream works)
 * @param outputDir - Directory the chunk files are written to
 * @param baseName - File name prefix; the chunk number is appended after a dot
 * @param chunkSize - Maximum size of each chunk in bytes
 * @returns Written chunks in order
 */
export async function writeChunks(
  source: AsyncIterable<Uint8Array>,
  outputDir: string,
  baseName: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<ChunkFile[]> {
  const chunks: ChunkFile[] = [];
  let pending: Buffer[] = [];
  let pendingSize = 0;

  const flush = async (): Promise<void> => {
    const index = chunks.length + 1;
    const path = join(outputDir, `${baseName}.${index}`);
    const block = Buffer.concat(pending, pendingSize);

    await writeFile(path, block);
    chunks.push({ index, path, size: block.length });
    debug(`  Created chunk: ${path} (${block.length} bytes)`);

    pending = [];
    pendingSize = 0;
  };

  for await (const data of source) {
    let remaining = Buffer.from(data.buffer, data.byteOffset, data.byteLength);

    while (remaining.length > 0) {
      const take = Math.min(chunkSize - pendingSize, remaining.length);
      pending.push(remaining.subarray(0, take));
      pendingSize += take;
      remaining = remaining.subarray(take);

      if (pendingSize === chunkSize) {
        await flush();
      }
    }
  }

  if (pendingSize > 0) {
    await flush();
  }

  return chunks;
}

/**
 * Splits a file on disk into chunk files named after it (`<file name>.<N>`)
 */
export async function splitFileIntoChunks(
  filePath: string,
  outputDir: string,
  chunkSize: number = DEFAULT_CHUNK_SIZE
): Promise<ChunkFile[]> {
  const stream = createReadStream(filePath, { highWaterMark: Math.min(chunkSize, 1024 * 1024) });
  return writeChunks(stream, outputDir, basename(filePath), chunkSize);
}
