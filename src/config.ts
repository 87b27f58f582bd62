import { DEFAULT_CHUNK_SIZE, MAX_FILE_SIZE } from './utils/constants.js';
import { ConfigError } from './utils/errors.js';

/**
 * Settings shared by the orchestrators and the tree scanner
 */
export interface SplitterConfig {
  /** Files at or below this many bytes are left untouched */
  threshold: number;
  /** Maximum size of each chunk file in bytes (the last one may be smaller) */
  chunkSize: number;
  /** Delete the source file (split) or chunk directory (recover) after success */
  autoRemove: boolean;
  /** Extra absolute paths the scanner must never split */
  excludePaths: string[];
}

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG = {
  threshold: MAX_FILE_SIZE,
  chunkSize: DEFAULT_CHUNK_SIZE,
  autoRemove: false,
  verbose: false,
} as const;

/**
 * Merge overrides onto the defaults and validate the numeric limits
 */
export function resolveConfig(overrides: Partial<SplitterConfig> = {}): SplitterConfig {
  const config: SplitterConfig = {
    threshold: overrides.threshold ?? DEFAULT_CONFIG.threshold,
    chunkSize: overrides.chunkSize ?? DEFAULT_CONFIG.chunkSize,
    autoRemove: overrides.autoRemove ?? DEFAULT_CONFIG.autoRemove,
    excludePaths: overrides.excludePaths ?? [],
  };

  if (!Number.isSafeInteger(config.threshold) || config.threshold < 0) {
    throw new ConfigError(`Invalid threshold: ${config.threshold}`, {
      threshold: config.threshold,
    });
  }

  if (!Number.isSafeInteger(config.chunkSize) || config.chunkSize <= 0) {
    throw new ConfigError(`Invalid chunk size: ${config.chunkSize}`, {
      chunkSize: config.chunkSize,
    });
  }

  return config;
}
