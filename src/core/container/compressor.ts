import { createWriteStream } from 'fs';
import { stat } from 'fs/promises';
import { basename } from 'path';
import { pipeline } from 'stream/promises';
import yazl from 'yazl';
import { CONTAINER_SUFFIX } from '../../utils/constants.js';

/**
 * Container path used for a source file: `<source>.zip`
 */
export function containerPathFor(sourcePath: string): string {
  return `${sourcePath}${CONTAINER_SUFFIX}`;
}

/**
 * Wraps a single file into a deflate-compressed ZIP container.
 *
 * The entry is stored under the file's base name only, never its parent path.
 * An existing file at `containerPath` is overwritten.
 *
 * @returns Size of the written container in bytes
 */
export async function compressFile(
  sourcePath: string,
  containerPath: string = containerPathFor(sourcePath)
): Promise<number> {
  const zipfile = new yazl.ZipFile();

  // stat/read failures surface on the ZipFile, not on its output stream
  zipfile.once('error', (error: Error) => zipfile.outputStream.destroy(error));

  zipfile.addFile(sourcePath, basename(sourcePath), { compress: true });
  zipfile.end();

  await pipeline(zipfile.outputStream, createWriteStream(containerPath));

  const { size } = await stat(containerPath);
  return size;
}
