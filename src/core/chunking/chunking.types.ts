/**
 * Chunking Types
 * Types for chunk files written by a split and read back by a recovery
 */

/**
 * A single chunk file on disk
 */
export interface ChunkFile {
  /** Chunk sequence number (1, 2, 3, ...) */
  index: number;
  /** Absolute or caller-relative path to the chunk file */
  path: string;
  /** Size of this chunk in bytes */
  size: number;
}
