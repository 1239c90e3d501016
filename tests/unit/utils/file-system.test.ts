/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  readFile,
  readFileSync,
  fileExists,
  globFiles,
  findExecutable,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'platform-meta-fs-test-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  describe('readFile / readFileSync', () => {
    it('should read file contents', async () => {
      const filePath = join(tempDir, 'board.yaml');
      writeFileSync(filePath, 'identifier: board');

      expect(await readFile(filePath)).toBe('identifier: board');
      expect(readFileSync(filePath)).toBe('identifier: board');
    });
  });

  describe('fileExists', () => {
    it('should report existing and missing files', async () => {
      const filePath = join(tempDir, 'present.yaml');
      writeFileSync(filePath, '');

      expect(await fileExists(filePath)).toBe(true);
      expect(await fileExists(join(tempDir, 'absent.yaml'))).toBe(false);
    });
  });

  describe('globFiles', () => {
    it('should return absolute paths and skip ignored directories', async () => {
      mkdirSync(join(tempDir, 'arm'), { recursive: true });
      mkdirSync(join(tempDir, 'node_modules', 'pkg'), { recursive: true });
      writeFileSync(join(tempDir, 'arm', 'board.yaml'), '');
      writeFileSync(join(tempDir, 'arm', 'board.yml'), '');
      writeFileSync(join(tempDir, 'node_modules', 'pkg', 'other.yaml'), '');

      const files = await globFiles('**/*.yaml', { cwd: tempDir });

      expect(files).toEqual([join(tempDir, 'arm', 'board.yaml')]);
    });
  });

  describe('findExecutable', () => {
    let binDir: string;

    beforeEach(() => {
      binDir = join(tempDir, 'bin');
      mkdirSync(binDir);
      writeFileSync(join(binDir, 'renode'), '#!/bin/sh\n');
      chmodSync(join(binDir, 'renode'), 0o755);
      writeFileSync(join(binDir, 'notes.txt'), 'not a program');
      chmodSync(join(binDir, 'notes.txt'), 0o644);
      mkdirSync(join(binDir, 'subdir'));
    });

    it('should find an executable on PATH', () => {
      const env = { PATH: ['/nonexistent-dir', binDir].join(':') };

      expect(findExecutable('renode', env, 'linux')).toBe(join(binDir, 'renode'));
    });

    it('should return null when the command is not on PATH', () => {
      expect(findExecutable('renode', { PATH: '/nonexistent-dir' }, 'linux')).toBeNull();
      expect(findExecutable('renode', {}, 'linux')).toBeNull();
    });

    it('should skip files without execute permission', () => {
      expect(findExecutable('notes.txt', { PATH: binDir }, 'linux')).toBeNull();
    });

    it('should skip directories', () => {
      expect(findExecutable('subdir', { PATH: binDir }, 'linux')).toBeNull();
    });

    it('should check commands containing a slash directly', () => {
      expect(findExecutable(join(binDir, 'renode'), { PATH: '' }, 'linux')).toBe(join(binDir, 'renode'));
      expect(findExecutable(join(binDir, 'missing'), { PATH: binDir }, 'linux')).toBeNull();
    });

    it('should return null for an empty command', () => {
      expect(findExecutable('', { PATH: binDir }, 'linux')).toBeNull();
    });
  });
});
