import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { mkdir, readFile, unlink, writeFile } from 'fs/promises';
import { join } from 'path';
import { recoverFile, splitFile } from '../core/orchestration/index.js';
import { resolveConfig } from '../config.js';
import { ChunkSequenceError, ContainerError } from '../utils/errors.js';
import { pathExists } from '../utils/helpers.js';
import { createTempDir, listDir, removeTempDir, writeRandomFile } from './helpers.js';

describe('Recovery Orchestrator', () => {
  const config = resolveConfig({ threshold: 1024, chunkSize: 1000 });
  let dir: string;

  beforeEach(async () => {
    dir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  /**
   * Split a random file with auto-remove so only its chunk directory is left
   */
  async function splitAway(name: string, size: number): Promise<Buffer> {
    const data = await writeRandomFile(join(dir, name), size);
    const result = await splitFile(join(dir, name), { ...config, autoRemove: true });
    assert.strictEqual(result.status, 'split');
    return data;
  }

  it('should reproduce the original bytes exactly', async () => {
    const data = await splitAway('video.mp4', 10000);

    const result = await recoverFile(join(dir, 'video.mp4.dir'), config);

    assert.ok(result.status === 'recovered');
    assert.deepStrictEqual(result.files, [join(dir, 'video.mp4')]);
    assert.strictEqual(result.overwritten, false);
    assert.ok((await readFile(join(dir, 'video.mp4'))).equals(data));
  });

  it('should read chunk .10 and later after chunk .9', async () => {
    const data = await splitAway('big.bin', 10000);
    const chunkNames = await listDir(join(dir, 'big.bin.dir'));
    assert.ok(chunkNames.includes('big.bin.zip.10'));

    const result = await recoverFile(join(dir, 'big.bin.dir'), config);

    assert.ok(result.status === 'recovered' && result.chunkCount === chunkNames.length);
    assert.ok((await readFile(join(dir, 'big.bin'))).equals(data));
  });

  it('should leave no container behind', async () => {
    await splitAway('big.bin', 5000);

    await recoverFile(join(dir, 'big.bin.dir'), config);

    assert.deepStrictEqual(await listDir(dir), ['big.bin', 'big.bin.dir']);
  });

  it('should delete the chunk directory only with auto-remove', async () => {
    await splitAway('kept.bin', 5000);
    await splitAway('removed.bin', 5000);

    const kept = await recoverFile(join(dir, 'kept.bin.dir'), config);
    const removed = await recoverFile(join(dir, 'removed.bin.dir'), { ...config, autoRemove: true });

    assert.strictEqual(await pathExists(join(dir, 'kept.bin.dir')), true);
    assert.strictEqual(await pathExists(join(dir, 'removed.bin.dir')), false);
    assert.ok(kept.status === 'recovered' && !kept.removedChunkDir);
    assert.ok(removed.status === 'recovered' && removed.removedChunkDir);
    assert.deepStrictEqual(await listDir(dir), ['kept.bin', 'kept.bin.dir', 'removed.bin']);
  });

  it('should skip directories without the .dir suffix', async () => {
    await mkdir(join(dir, 'plain'));

    const result = await recoverFile(join(dir, 'plain'), config);

    assert.ok(result.status === 'skipped' && result.reason === 'not-chunk-dir');
    assert.deepStrictEqual(await listDir(dir), ['plain']);
  });

  it('should warn and stop when no chunk files exist', async () => {
    const chunkDir = join(dir, 'empty.bin.dir');
    await mkdir(chunkDir);
    await writeFile(join(chunkDir, 'readme.txt'), 'not a chunk');

    const result = await recoverFile(chunkDir, config);

    assert.deepStrictEqual(result, {
      status: 'skipped',
      path: chunkDir,
      reason: 'no-chunks',
      message: `No split files found in ${chunkDir}`,
    });
    assert.deepStrictEqual(await listDir(dir), ['empty.bin.dir']);
  });

  it('should refuse a chunk set with a gap', async () => {
    await splitAway('big.bin', 5000);
    await unlink(join(dir, 'big.bin.dir', 'big.bin.zip.2'));

    await assert.rejects(
      recoverFile(join(dir, 'big.bin.dir'), config),
      (error: unknown) => error instanceof ChunkSequenceError && error.missingIndex === 2
    );
    assert.deepStrictEqual(await listDir(dir), ['big.bin.dir']);
  });

  it('should replace a container left by an interrupted run', async () => {
    const data = await splitAway('big.bin', 5000);
    await writeFile(join(dir, 'big.bin.zip'), 'half-written container from a crash');

    const result = await recoverFile(join(dir, 'big.bin.dir'), config);

    assert.strictEqual(result.status, 'recovered');
    assert.ok((await readFile(join(dir, 'big.bin'))).equals(data));
    assert.deepStrictEqual(await listDir(dir), ['big.bin', 'big.bin.dir']);
  });

  it('should overwrite an existing file at the target path', async () => {
    const data = await splitAway('big.bin', 5000);
    await writeFile(join(dir, 'big.bin'), 'something else');

    const result = await recoverFile(join(dir, 'big.bin.dir'), config);

    assert.ok(result.status === 'recovered' && result.overwritten);
    assert.ok((await readFile(join(dir, 'big.bin'))).equals(data));
  });

  it('should print the overwrite warning on stdout', async () => {
    await splitAway('big.bin', 5000);
    await writeFile(join(dir, 'big.bin'), 'something else');
    const stdout: string[] = [];
    const log = mock.method(console, 'log', (...args: unknown[]) => {
      stdout.push(args.map(String).join(' '));
    });
    const warn = mock.method(console, 'warn', () => undefined);

    try {
      await recoverFile(join(dir, 'big.bin.dir'), config);
    } finally {
      log.mock.restore();
      warn.mock.restore();
    }

    assert.deepStrictEqual(stdout, [`[recover] Replacing existing file ${join(dir, 'big.bin')}`]);
    assert.strictEqual(warn.mock.callCount(), 0);
  });

  it('should fail on corrupt chunks and remove the container', async () => {
    const chunkDir = join(dir, 'bad.bin.dir');
    await mkdir(chunkDir);
    await writeFile(join(chunkDir, 'bad.bin.zip.1'), 'these bytes are not a zip archive');

    await assert.rejects(recoverFile(chunkDir, config), ContainerError);
    assert.deepStrictEqual(await listDir(dir), ['bad.bin.dir']);
  });
});
