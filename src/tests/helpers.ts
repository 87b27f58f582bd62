import { randomBytes } from 'crypto';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join } from 'path';

/**
 * Fresh directory under the OS temp dir
 */
export async function createTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'zipsplit-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/**
 * Write `size` random (incompressible) bytes, creating parent directories
 */
export async function writeRandomFile(path: string, size: number): Promise<Buffer> {
  const data = randomBytes(size);
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, data);
  return data;
}

/**
 * Sorted directory listing
 */
export async function listDir(dir: string): Promise<string[]> {
  return (await readdir(dir)).sort();
}

/**
 * Async source yielding the given pieces, for feeding the chunk writer
 */
export async function* piecesOf(...pieces: Buffer[]): AsyncGenerator<Uint8Array> {
  for (const piece of pieces) {
    yield piece;
  }
}
