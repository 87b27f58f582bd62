import { lstat } from 'fs/promises';
import { isErrnoCode } from './errors.js';
import { CHUNK_DIR_SUFFIX } from './constants.js';

/**
 * True when something (file, directory or link) exists at `path`
 */
export const pathExists = async (path: string): Promise<boolean> => {
  try {
    await lstat(path);
    return true;
  } catch (error) {
    if (isErrnoCode(error, 'ENOENT')) {
      return false;
    }
    throw error;
  }
};

/**
 * Chunk directory for a source file: `<source>.dir`
 */
export const chunkDirPathFor = (sourcePath: string): string => `${sourcePath}${CHUNK_DIR_SUFFIX}`;

/**
 * `name` without `suffix`, or undefined when it does not end with it (or is nothing but it)
 */
export const stripSuffix = (name: string, suffix: string): string | undefined => {
  if (!name.endsWith(suffix) || name.length === suffix.length) {
    return undefined;
  }
  return name.slice(0, -suffix.length);
};
