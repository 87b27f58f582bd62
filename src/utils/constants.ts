/**
 * Shared constants across the application
 */

// ============================================================================
// Size Limits
// ============================================================================

export const MAX_FILE_SIZE = 1024 * 1024; // 1MB - files at or below this are left alone
export const DEFAULT_CHUNK_SIZE = 1024 * 1024; // 1MB per chunk file

// ============================================================================
// Naming
// ============================================================================

export const CHUNK_DIR_SUFFIX = '.dir';
export const CONTAINER_SUFFIX = '.zip';
export const STAGING_SUFFIX = '.partial';

