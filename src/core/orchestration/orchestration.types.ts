/**
 * Orchestration Domain Types
 */

import type { ChunkFile } from '../chunking/index.js';

/**
 * Why an entry was left alone
 */
export type SkipReason =
  | 'below-threshold'
  | 'not-chunk-dir'
  | 'chunk-dir-name'
  | 'no-chunks'
  | 'container-temp'
  | 'staging'
  | 'excluded'
  | 'symlink';

/**
 * A file was compressed and written out as chunks
 */
export interface SplitResult {
  status: 'split';
  /** Source file */
  path: string;
  /** Committed chunk directory */
  chunkDir: string;
  /** Source size in bytes */
  sourceSize: number;
  /** Size of the intermediate container in bytes */
  containerSize: number;
  /** Chunk files in order, at their committed location */
  chunks: ChunkFile[];
  /** Source file was deleted afterwards */
  removedSource: boolean;
}

/**
 * A chunk directory was reassembled into its original file
 */
export interface RecoveredResult {
  status: 'recovered';
  /** Chunk directory */
  path: string;
  /** Files written by extraction (normally exactly one) */
  files: string[];
  /** Number of chunks concatenated */
  chunkCount: number;
  /** Size of the reassembled container in bytes */
  containerSize: number;
  /** A file already existed at the target path and was replaced */
  overwritten: boolean;
  /** Chunk directory was deleted afterwards */
  removedChunkDir: boolean;
}

/**
 * Entry left untouched; not an error
 */
export interface SkippedResult {
  status: 'skipped';
  path: string;
  reason: SkipReason;
  message: string;
}

/**
 * Entry processing threw; the scan moved on
 */
export interface FailedResult {
  status: 'failed';
  path: string;
  error: string;
}

export type EntryResult = SplitResult | RecoveredResult | SkippedResult | FailedResult;

export type EntryStatus = EntryResult['status'];
