/**
 * Scanning Module
 * Directory-tree traversal and per-entry dispatch
 */

export { scanDirectory, isChunkDirName } from './scanner.js';
export type { ScanMode, ScanOptions, ScanSummary, ScanCallbacks } from './scanning.types.js';
