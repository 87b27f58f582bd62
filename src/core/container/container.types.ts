/**
 * Container Types
 */

/**
 * A file written out of a container
 */
export interface ExtractedEntry {
  /** Entry name as stored in the archive */
  name: string;
  /** Where the entry was written */
  path: string;
  /** Uncompressed size in bytes */
  size: number;
}
