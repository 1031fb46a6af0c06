/**
 * Unit tests for file system utilities
 *
 * Tests path sanitization and the dataset writers.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import {
  sanitizePath,
  ensureDirectory,
  writeJsonFile,
  writeTextFile,
  PathTraversalError,
} from '../../../src/utils/files.js';

describe('File Utilities', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'kb-files-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('sanitizePath', () => {
    it('should accept nested document keys', () => {
      expect(sanitizePath('city/porto.md', testDir)).toBe(path.join(testDir, 'city', 'porto.md'));
    });

    it('should accept the base directory itself', () => {
      expect(sanitizePath('.', testDir)).toBe(testDir);
    });

    it('should reject keys that climb out of the base directory', () => {
      expect(() => sanitizePath('../escape.md', testDir)).toThrow(PathTraversalError);
      expect(() => sanitizePath('city/../../escape.md', testDir)).toThrow(PathTraversalError);
    });

    it('should reject absolute paths outside the base directory', () => {
      expect(() => sanitizePath('/etc/passwd', testDir)).toThrow(/^Path traversal detected: \/etc\/passwd escapes /);
    });

    it('should reject sibling directories sharing a prefix', () => {
      expect(() => sanitizePath(`${testDir}-other/file.md`, testDir)).toThrow(PathTraversalError);
    });
  });

  describe('writers', () => {
    it('should create parent directories for text files', async () => {
      const target = path.join(testDir, 'memory_1', 'documents', 'user.md');
      await writeTextFile(target, '# Ana Ruiz\n');
      expect(await fs.readFile(target, 'utf-8')).toBe('# Ana Ruiz\n');
    });

    it('should pretty-print JSON with a trailing newline', async () => {
      const target = path.join(testDir, 'summary.json');
      await writeJsonFile(target, { status: 'completed', focal_nodes: [] });
      expect(await fs.readFile(target, 'utf-8')).toBe('{\n  "status": "completed",\n  "focal_nodes": []\n}\n');
    });
  });

  describe('ensureDirectory', () => {
    it('should create nested directories idempotently', async () => {
      const nested = path.join(testDir, 'a', 'b');
      await ensureDirectory(nested);
      await ensureDirectory(nested);
      expect((await fs.stat(nested)).isDirectory()).toBe(true);
    });
  });
});
