/**
 * Tests for file system utilities.
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync, rmSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  fileExists,
  globFiles,
  isDirectory,
  listSubdirectories,
  readFile,
} from '../../../src/utils/file-system.js';

describe('file-system utilities', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(tmpdir(), `surveyor-fs-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read files', async () => {
    const filePath = join(tempDir, 'test.txt');
    writeFileSync(filePath, 'Hello, World!');

    expect(await readFile(filePath)).toBe('Hello, World!');
  });

  it('should tell files from directories', async () => {
    writeFileSync(join(tempDir, 'a.txt'), '');

    expect(await fileExists(join(tempDir, 'a.txt'))).toBe(true);
    expect(await fileExists(join(tempDir, 'missing.txt'))).toBe(false);
    expect(await isDirectory(tempDir)).toBe(true);
    expect(await isDirectory(join(tempDir, 'a.txt'))).toBe(false);
    expect(await isDirectory(join(tempDir, 'missing'))).toBe(false);
  });

  it('should list visible subdirectories sorted', async () => {
    mkdirSync(join(tempDir, 'zeta'));
    mkdirSync(join(tempDir, 'alpha'));
    mkdirSync(join(tempDir, '.cache'));
    writeFileSync(join(tempDir, 'file.txt'), '');

    expect(await listSubdirectories(tempDir)).toEqual([join(tempDir, 'alpha'), join(tempDir, 'zeta')]);
  });

  it('should glob files relative to cwd', async () => {
    mkdirSync(join(tempDir, 'src'));
    mkdirSync(join(tempDir, 'node_modules'));
    writeFileSync(join(tempDir, 'src', 'a.ts'), '');
    writeFileSync(join(tempDir, 'node_modules', 'b.ts'), '');

    const files = await globFiles('**/*.ts', { cwd: tempDir, absolute: false });

    expect(files).toEqual(['src/a.ts']);
  });
});
