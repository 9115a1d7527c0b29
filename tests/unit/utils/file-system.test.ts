/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Readable } from 'node:stream';
import { mkdirSync, writeFileSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { readFile, fileExists, readStream } from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `layerviz-fs-test-${Date.now()}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile', () => {
    it('should read file contents', async () => {
      const filePath = join(tempDir, 'images.json');
      writeFileSync(filePath, '[]');

      await expect(readFile(filePath)).resolves.toBe('[]');
    });

    it('should reject for a missing file', async () => {
      await expect(readFile(join(tempDir, 'missing.json'))).rejects.toThrow(/ENOENT/);
    });
  });

  describe('fileExists', () => {
    it('should report existing and missing files', async () => {
      const filePath = join(tempDir, 'config.yaml');
      writeFileSync(filePath, 'log_level: info\n');

      await expect(fileExists(filePath)).resolves.toBe(true);
      await expect(fileExists(join(tempDir, 'nope.yaml'))).resolves.toBe(false);
    });
  });

  describe('readStream', () => {
    it('should concatenate string and buffer chunks', async () => {
      const stream = Readable.from(['[{"Id":', Buffer.from('"abc"}]')]);

      await expect(readStream(stream)).resolves.toBe('[{"Id":"abc"}]');
    });

    it('should return an empty string for an empty stream', async () => {
      await expect(readStream(Readable.from([]))).resolves.toBe('');
    });
  });
});
