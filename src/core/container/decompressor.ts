import { createWriteStream } from 'fs';
import { mkdir, rename, rm } from 'fs/promises';
import { dirname, isAbsolute, relative, resolve, sep } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import yauzl from 'yauzl';
import type { Entry, ZipFile } from 'yauzl';
import type { ExtractedEntry } from './container.types.js';
import { STAGING_SUFFIX } from '../../utils/constants.js';
import { ContainerError, formatError } from '../../utils/errors.js';

/**
 * Resolve where an archive entry lands inside `targetDir`, refusing names that escape it
 */
export function resolveEntryPath(
  targetDir: string,
  entryName: string,
  containerPath: string
): string {
  const root = resolve(targetDir);
  const destination = resolve(root, entryName);
  const rel = relative(root, destination);

  if (rel === '' || isAbsolute(rel) || rel.split(sep)[0] === '..') {
    throw new ContainerError(
      `Refusing to extract entry outside target directory: ${entryName}`,
      containerPath,
      { entryName, targetDir: root }
    );
  }

  return destination;
}

function openContainer(containerPath: string): Promise<ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(containerPath, { lazyEntries: true, autoClose: false }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(
          new ContainerError(
            `Cannot read container ${containerPath}: ${formatError(error ?? 'no archive returned')}`,
            containerPath
          )
        );
        return;
      }
      resolvePromise(zipfile);
    });
  });
}

function openEntryStream(zipfile: ZipFile, entry: Entry, containerPath: string): Promise<Readable> {
  return new Promise((resolvePromise, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(
          new ContainerError(
            `Cannot read entry ${entry.fileName}: ${formatError(error ?? 'no stream returned')}`,
            containerPath
          )
        );
        return;
      }
      resolvePromise(stream);
    });
  });
}

/**
 * Write one entry next to its destination first, then rename it into place
 */
async function extractEntry(
  zipfile: ZipFile,
  entry: Entry,
  targetDir: string,
  containerPath: string
): Promise<ExtractedEntry | undefined> {
  const destination = resolveEntryPath(targetDir, entry.fileName, containerPath);

  if (entry.fileName.endsWith('/')) {
    await mkdir(destination, { recursive: true });
    return undefined;
  }

  await mkdir(dirname(destination), { recursive: true });

  const stagingPath = `${destination}${STAGING_SUFFIX}`;
  try {
    const stream = await openEntryStream(zipfile, entry, containerPath);
    await pipeline(stream, createWriteStream(stagingPath));
    await rename(stagingPath, destination);
  } catch (error) {
    await rm(stagingPath, { force: true });
    throw error;
  }

  return { name: entry.fileName, path: destination, size: entry.uncompressedSize };
}

/**
 * Extracts every entry of a ZIP container into `targetDir`.
 *
 * Existing files at the destination paths are replaced.
 */
export async function extractContainer(
  containerPath: string,
  targetDir: string
): Promise<ExtractedEntry[]> {
  const zipfile = await openContainer(containerPath);
  const extracted: ExtractedEntry[] = [];

  try {
    await new Promise<void>((resolvePromise, reject) => {
      zipfile.on('error', reject);
      zipfile.on('end', () => resolvePromise());
      zipfile.on('entry', (entry: Entry) => {
        extractEntry(zipfile, entry, targetDir, containerPath).then((result) => {
          if (result) {
            extracted.push(result);
          }
          zipfile.readEntry();
        }, reject);
      });
      zipfile.readEntry();
    });
  } finally {
    zipfile.close();
  }

  return extracted;
}
