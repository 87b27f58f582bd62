/**
 * Scanning Types
 */

import type { SplitterConfig } from '../../config.js';
import type { EntryResult, EntryStatus } from '../orchestration/index.js';

export type ScanMode = 'split' | 'recover';

/**
 * Progress hooks, called in scan order
 */
export interface ScanCallbacks {
  /** An entry was handed to the split or recovery orchestrator */
  onEntryStart?: (path: string, mode: ScanMode) => void;
  /** An entry produced a result (including skips and failures) */
  onEntryComplete?: (result: EntryResult, mode: ScanMode) => void;
}

export interface ScanOptions {
  mode: ScanMode;
  config: SplitterConfig;
  callbacks?: ScanCallbacks;
}

/**
 * Aggregate outcome of one scan
 */
export interface ScanSummary {
  mode: ScanMode;
  rootDir: string;
  results: EntryResult[];
  counts: Record<EntryStatus, number>;
}
