/**
 * Orchestration Module
 * Split and recovery of a single filesystem entry
 */

export { splitFile } from './splitter.js';
export { recoverFile } from './recoverer.js';

export type {
  EntryResult,
  EntryStatus,
  SkipReason,
  SplitResult,
  RecoveredResult,
  SkippedResult,
  FailedResult,
} from './orchestration.types.js';
