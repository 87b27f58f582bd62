/**
 * Container Module
 * Single-entry ZIP containers wrapping one source file
 */

export { compressFile, containerPathFor } from './compressor.js';
export { extractContainer, resolveEntryPath } from './decompressor.js';
export type { ExtractedEntry } from './container.types.js';
