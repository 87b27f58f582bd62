/**
 * Shared error types and handling utilities
 */

/**
 * Error codes for zipsplit-specific errors
 */
export enum ZipSplitErrorCode {
  CONFIG_INVALID = 'CONFIG_INVALID',
  CONTAINER_INVALID = 'CONTAINER_INVALID',
  CHUNK_SEQUENCE_BROKEN = 'CHUNK_SEQUENCE_BROKEN',
  CHUNK_DIR_CONFLICT = 'CHUNK_DIR_CONFLICT',
}

/**
 * Base error class for all zipsplit errors
 */
export class ZipSplitError extends Error {
  constructor(
    message: string,
    public readonly code: ZipSplitErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ZipSplitError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Invalid threshold, chunk size or other option
 */
export class ConfigError extends ZipSplitError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, ZipSplitErrorCode.CONFIG_INVALID, context);
    this.name = 'ConfigError';
  }
}

/**
 * Container could not be read, or holds an entry we refuse to extract
 */
export class ContainerError extends ZipSplitError {
  constructor(
    message: string,
    public readonly containerPath: string,
    context?: Record<string, unknown>
  ) {
    super(message, ZipSplitErrorCode.CONTAINER_INVALID, { ...context, containerPath });
    this.name = 'ContainerError';
  }
}

/**
 * Chunk files are not numbered 1..K without gaps
 */
export class ChunkSequenceError extends ZipSplitError {
  constructor(
    public readonly chunkDir: string,
    public readonly missingIndex: number
  ) {
    super(
      `Missing chunk ${missingIndex} in ${chunkDir}`,
      ZipSplitErrorCode.CHUNK_SEQUENCE_BROKEN,
      { chunkDir, missingIndex }
    );
    this.name = 'ChunkSequenceError';
  }
}

/**
 * Something other than a directory already sits at the chunk directory path
 */
export class ChunkDirConflictError extends ZipSplitError {
  constructor(public readonly chunkDir: string) {
    super(
      `Cannot use ${chunkDir} as a chunk directory: it exists and is not a directory`,
      ZipSplitErrorCode.CHUNK_DIR_CONFLICT,
      { chunkDir }
    );
    this.name = 'ChunkDirConflictError';
  }
}

/**
 * Formats error message from unknown error type
 */
export function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * True for Node system errors carrying the given errno code (ENOENT, EEXIST, ...)
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}
