/**
 * Chunking Module
 * Fixed-size chunk files for large containers
 */

export { writeChunks, splitFileIntoChunks } from './chunkWriter.js';
export {
  parseChunkIndex,
  findChunkFiles,
  assertContiguous,
  concatenateChunks,
} from './chunkReader.js';
export type { ChunkFile } from './chunking.types.js';
