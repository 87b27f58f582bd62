import { readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { join, resolve } from 'path';
import type { ScanOptions, ScanSummary } from './scanning.types.js';
import { recoverFile, splitFile } from '../orchestration/index.js';
import type { EntryResult, EntryStatus, SkippedResult } from '../orchestration/index.js';
import { CHUNK_DIR_SUFFIX, CONTAINER_SUFFIX, STAGING_SUFFIX } from '../../utils/constants.js';
import { formatError } from '../../utils/errors.js';
import { pathExists, stripSuffix } from '../../utils/helpers.js';
import { debug } from '../../utils/logger.js';

type TreeEntry =
  | { kind: 'file' | 'directory' | 'symlink'; path: string; name: string }
  | { kind: 'unreadable'; path: string; name: string; error: unknown };

const byName = (a: Dirent, b: Dirent): number => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0);

/**
 * Chunk directories (and their staging copies) are never descended into
 */
export function isChunkDirName(name: string): boolean {
  return name.endsWith(CHUNK_DIR_SUFFIX) || name.endsWith(`${CHUNK_DIR_SUFFIX}${STAGING_SUFFIX}`);
}

/**
 * Depth-first walk with each directory's entries sorted by name. Symlinks are
 * reported but never followed; directories named like chunk directories are
 * reported but not entered.
 */
async function* walkTree(dir: string): AsyncGenerator<TreeEntry> {
  const entries = (await readdir(dir, { withFileTypes: true })).sort(byName);

  for (const entry of entries) {
    const path = join(dir, entry.name);

    if (entry.isSymbolicLink()) {
      yield { kind: 'symlink', path, name: entry.name };
    } else if (entry.isDirectory()) {
      yield { kind: 'directory', path, name: entry.name };
      if (isChunkDirName(entry.name)) continue;

      try {
        yield* walkTree(path);
      } catch (error) {
        yield { kind: 'unreadable', path, name: entry.name, error };
      }
    } else if (entry.isFile()) {
      yield { kind: 'file', path, name: entry.name };
    }
  }
}

function skipped(path: string, reason: SkippedResult['reason'], message: string): SkippedResult {
  debug(`Skipping ${path} (${message})`);
  return { status: 'skipped', path, reason, message };
}

/**
 * Decide whether a file in split mode is an intermediate or excluded path
 */
async function classifySplitCandidate(
  entry: TreeEntry,
  excluded: Set<string>
): Promise<SkippedResult | undefined> {
  if (excluded.has(resolve(entry.path))) {
    return skipped(entry.path, 'excluded', 'excluded path');
  }

  if (entry.name.endsWith(CHUNK_DIR_SUFFIX)) {
    return skipped(entry.path, 'chunk-dir-name', `name ends in ${CHUNK_DIR_SUFFIX}`);
  }

  const containerSource = stripSuffix(entry.path, CONTAINER_SUFFIX);
  if (containerSource !== undefined && (await pathExists(containerSource))) {
    return skipped(entry.path, 'container-temp', 'temporary container');
  }

  const stagingTarget = stripSuffix(entry.path, STAGING_SUFFIX);
  if (stagingTarget !== undefined && (await pathExists(stagingTarget))) {
    return skipped(entry.path, 'staging', 'unfinished extraction');
  }

  return undefined;
}

async function processEntry(
  entry: TreeEntry,
  options: ScanOptions,
  excluded: Set<string>
): Promise<EntryResult | undefined> {
  const { mode, config } = options;

  if (entry.kind === 'unreadable') {
    return { status: 'failed', path: entry.path, error: formatError(entry.error) };
  }

  if (mode === 'recover') {
    if (entry.kind !== 'directory' || !entry.name.endsWith(CHUNK_DIR_SUFFIX)) {
      return undefined;
    }
    options.callbacks?.onEntryStart?.(entry.path, mode);
    return recoverFile(entry.path, config);
  }

  if (entry.kind === 'directory') {
    return undefined;
  }
  if (entry.kind === 'symlink') {
    return skipped(entry.path, 'symlink', 'symbolic link');
  }

  const skip = await classifySplitCandidate(entry, excluded);
  if (skip) {
    return skip;
  }

  options.callbacks?.onEntryStart?.(entry.path, mode);
  return splitFile(entry.path, config);
}

/**
 * Walk `rootDir` and split (or recover) every eligible entry, one at a time.
 *
 * Split mode hands every regular file to the split orchestrator except chunk
 * directory contents, files named `*.dir`, `.zip`/`.partial` intermediates
 * whose base file still exists, and `config.excludePaths`. Recover mode hands every `.dir` directory
 * to the recovery orchestrator.
 *
 * A failing entry becomes a `failed` result and the walk continues; only an
 * unreadable root directory rejects.
 */
export async function scanDirectory(rootDir: string, options: ScanOptions): Promise<ScanSummary> {
  const { mode, config } = options;
  const excluded = new Set(config.excludePaths.map((path) => resolve(path)));
  const results: EntryResult[] = [];
  const counts: Record<EntryStatus, number> = { split: 0, recovered: 0, skipped: 0, failed: 0 };

  for await (const entry of walkTree(rootDir)) {
    let result: EntryResult | undefined;
    try {
      result = await processEntry(entry, options, excluded);
    } catch (error) {
      result = { status: 'failed', path: entry.path, error: formatError(error) };
    }

    if (!result) continue;

    results.push(result);
    counts[result.status]++;
    options.callbacks?.onEntryComplete?.(result, mode);
  }

  return { mode, rootDir, results, counts };
}
