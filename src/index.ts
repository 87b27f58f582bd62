/**
 * zipsplit
 * Compress large files into fixed-size chunk directories and recover them again
 */

export { writeChunks, splitFileIntoChunks } from './core/chunking/index.js';
export {
  parseChunkIndex,
  findChunkFiles,
  assertContiguous,
  concatenateChunks,
} from './core/chunking/index.js';
export type { ChunkFile } from './core/chunking/index.js';
export { compressFile, containerPathFor, extractContainer } from './core/container/index.js';
export type { ExtractedEntry } from './core/container/index.js';
export { splitFile, recoverFile } from './core/orchestration/index.js';
export type {
  EntryResult,
  EntryStatus,
  SkipReason,
  SplitResult,
  RecoveredResult,
  SkippedResult,
  FailedResult,
} from './core/orchestration/index.js';
export { scanDirectory } from './core/scanning/index.js';
export type { ScanMode, ScanOptions, ScanSummary, ScanCallbacks } from './core/scanning/index.js';
export { DEFAULT_CONFIG, resolveConfig } from './config.js';
export type { SplitterConfig } from './config.js';
export {
  ZipSplitError,
  ZipSplitErrorCode,
  ConfigError,
  ContainerError,
  ChunkSequenceError,
  ChunkDirConflictError,
  formatError,
} from './utils/errors.js';
