import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import {
  PathValidationError,
  resolveWithin,
  safeExists,
  safeMkdirp,
  safeReadFile,
  safeWriteFile,
  validatePath,
} from './safe-fs.js';

describe('safe-fs', () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'nodeswap-safe-fs-'));
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe('validatePath', () => {
    it('keeps absolute paths', () => {
      expect(validatePath('/tmp/backup.yaml')).toBe('/tmp/backup.yaml');
    });

    it('resolves relative paths to absolute', () => {
      expect(path.isAbsolute(validatePath('./backup.yaml'))).toBe(true);
    });

    it('rejects empty paths', () => {
      expect(() => validatePath('')).toThrow('Path cannot be empty');
    });

    it('rejects paths with null bytes', () => {
      expect(() => validatePath('/tmp/a\0b')).toThrow(PathValidationError);
    });
  });

  describe('resolveWithin', () => {
    it('joins a bare file name onto the directory', () => {
      expect(resolveWithin('/backups/lab', 'worker-3_bmh.yaml')).toBe(
        '/backups/lab/worker-3_bmh.yaml'
      );
    });

    it('rejects names that climb out of the directory', () => {
      expect(() => resolveWithin('/backups/lab', '../etc/passwd')).toThrow(PathValidationError);
    });

    it('rejects names with a nested directory', () => {
      expect(() => resolveWithin('/backups/lab', 'nested/file.yaml')).toThrow(
        'File name must not leave /backups/lab'
      );
    });
  });

  describe('file operations', () => {
    it('writes, detects and reads back a file', async () => {
      const dir = await safeMkdirp(join(tempDir, 'a', 'b'));
      const file = join(dir, 'node.yaml');

      expect(await safeExists(file)).toBe(false);
      await safeWriteFile(file, 'kind: Secret\n');

      expect(await safeExists(file)).toBe(true);
      expect(await safeReadFile(file)).toBe('kind: Secret\n');
    });

    it('creates directories idempotently', async () => {
      const target = join(tempDir, 'again');

      await safeMkdirp(target);
      const second = await safeMkdirp(target);

      expect(second).toBe(target);
    });
  });
});
