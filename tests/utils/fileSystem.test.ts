/**
 * @fileoverview Unit tests for atomic file writes.
 * @module tests/utils/fileSystem.test
 */
import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { atomicWriteFile, pathExists } from '@/utils/index.js';

describe('atomicWriteFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'atomic-write-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates parent directories and replaces existing content', async () => {
    const path = join(dir, 'a', 'b', 'file.txt');
    await atomicWriteFile(path, 'first');
    await atomicWriteFile(path, 'second');

    await expect(readFile(path, 'utf8')).resolves.toBe('second');
    expect(await readdir(join(dir, 'a', 'b'))).toEqual(['file.txt']);
  });

  it('leaves no temporary file behind when the rename fails', async () => {
    const target = join(dir, 'occupied');
    await atomicWriteFile(join(target, 'inner.txt'), 'x');

    await expect(atomicWriteFile(target, 'replacement')).rejects.toThrow();
    expect(await readdir(dir)).toEqual(['occupied']);
  });

  it('reports whether a path exists', async () => {
    await writeFile(join(dir, 'present'), '');

    await expect(pathExists(join(dir, 'present'))).resolves.toBe(true);
    await expect(pathExists(join(dir, 'absent'))).resolves.toBe(false);
  });
});
