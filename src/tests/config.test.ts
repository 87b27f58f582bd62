import { describe, it } from 'node:test';
import assert from 'node:assert';
import { DEFAULT_CONFIG, resolveConfig } from '../config.js';
import { ConfigError, ZipSplitErrorCode } from '../utils/errors.js';

describe('Config', () => {
  describe('resolveConfig', () => {
    it('should use 1MB threshold and chunk size by default', () => {
      assert.deepStrictEqual(resolveConfig(), {
        threshold: 1048576,
        chunkSize: 1048576,
        autoRemove: false,
        excludePaths: [],
      });
    });

    it('should apply overrides on top of the defaults', () => {
      const config = resolveConfig({ chunkSize: 4096, autoRemove: true });

      assert.strictEqual(config.threshold, DEFAULT_CONFIG.threshold);
      assert.strictEqual(config.chunkSize, 4096);
      assert.strictEqual(config.autoRemove, true);
    });

    it('should accept a zero threshold', () => {
      assert.strictEqual(resolveConfig({ threshold: 0 }).threshold, 0);
    });

    it('should reject a negative threshold', () => {
      assert.throws(() => resolveConfig({ threshold: -1 }), ConfigError);
    });

    it('should reject a zero chunk size', () => {
      assert.throws(
        () => resolveConfig({ chunkSize: 0 }),
        (error: unknown) =>
          error instanceof ConfigError &&
          error.code === ZipSplitErrorCode.CONFIG_INVALID &&
          error.message === 'Invalid chunk size: 0'
      );
    });

    it('should reject a fractional chunk size', () => {
      assert.throws(() => resolveConfig({ chunkSize: 1.5 }), ConfigError);
    });
  });
});
