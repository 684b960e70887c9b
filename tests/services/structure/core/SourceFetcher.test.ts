/**
 * @fileoverview Unit tests for raw structure retrieval with format fallback.
 * @module tests/services/structure/core/SourceFetcher.test
 */
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';

import type { IStructureSource } from '@/services/structure/core/IStructureSource.js';
import { SourceFetcher } from '@/services/structure/core/SourceFetcher.js';
import { StructureFormat } from '@/services/structure/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { testConfig } from '../../../fixtures/structures.js';

describe('SourceFetcher', () => {
  const context = {
    requestId: 'test-req-1',
    timestamp: new Date().toISOString(),
    operation: 'test',
  };

  let dir: string;
  let download: Mock<IStructureSource['download']>;
  let source: IStructureSource;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'source-fetcher-'));
    await mkdir(join(dir, 'raw'));
    download = vi.fn<IStructureSource['download']>();
    source = { name: 'fake', download };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('downloads the primary format and stores it under raw/', async () => {
    download.mockResolvedValue('PDB TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(result).toEqual({
      ok: true,
      value: { path: join(dir, 'raw', '1ABC.pdb'), format: StructureFormat.PDB, skipped: false },
    });
    expect(download).toHaveBeenCalledTimes(1);
    expect(download).toHaveBeenCalledWith('1ABC', StructureFormat.PDB, context);
    await expect(readFile(join(dir, 'raw', '1ABC.pdb'), 'utf8')).resolves.toBe('PDB TEXT');
  });

  it('reuses an existing raw file in incremental mode without calling the source', async () => {
    await writeFile(join(dir, 'raw', '1abc.cif'), 'CIF TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(result).toEqual({
      ok: true,
      value: { path: join(dir, 'raw', '1abc.cif'), format: StructureFormat.MMCIF, skipped: true },
    });
    expect(download).not.toHaveBeenCalled();
  });

  it('downloads again when not incremental', async () => {
    await writeFile(join(dir, 'raw', '1ABC.pdb'), 'OLD');
    download.mockResolvedValue('NEW');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', dir, false, context);

    expect(result).toEqual({
      ok: true,
      value: { path: join(dir, 'raw', '1ABC.pdb'), format: StructureFormat.PDB, skipped: false },
    });
    await expect(readFile(join(dir, 'raw', '1ABC.pdb'), 'utf8')).resolves.toBe('NEW');
  });

  it('falls back to mmCIF after a NotFound without retrying the primary format', async () => {
    download
      .mockRejectedValueOnce(new McpError(JsonRpcErrorCode.NotFound, 'HTTP error! Status: 404'))
      .mockResolvedValueOnce('CIF TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(download.mock.calls.map((call) => call[1])).toEqual([
      StructureFormat.PDB,
      StructureFormat.MMCIF,
    ]);
    expect(result).toEqual({
      ok: true,
      value: { path: join(dir, 'raw', '1ABC.cif'), format: StructureFormat.MMCIF, skipped: false },
    });
  });

  it('retries a timed-out download', async () => {
    download
      .mockRejectedValueOnce(new McpError(JsonRpcErrorCode.Timeout, 'timed out'))
      .mockResolvedValueOnce('PDB TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(download).toHaveBeenCalledTimes(2);
    expect(result.ok && result.value.format).toBe(StructureFormat.PDB);
  });

  it('reports Unavailable with every attempt once both formats are exhausted', async () => {
    download.mockRejectedValue(new McpError(JsonRpcErrorCode.ServiceUnavailable, 'down'));
    const fetcher = new SourceFetcher(source, testConfig({ fetchMaxAttempts: 2 }));

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(download).toHaveBeenCalledTimes(4);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toMatchObject({
      kind: 'FetchError',
      reason: 'Unavailable',
      pdbId: '1ABC',
      detail: '1ABC unavailable in pdb and mmcif format: pdb#1 down; pdb#2 down; mmcif#1 down; mmcif#2 down',
    });
    expect(result.error.attempts).toHaveLength(4);
  });

  it('tries mmCIF first when it is the primary format', async () => {
    download.mockResolvedValue('CIF TEXT');
    const fetcher = new SourceFetcher(source, testConfig({ primaryFormat: 'mmcif' }));

    const result = await fetcher.fetch('1ABC', dir, true, context);

    expect(download).toHaveBeenCalledWith('1ABC', StructureFormat.MMCIF, context);
    expect(result.ok && result.value.path).toBe(join(dir, 'raw', '1ABC.cif'));
  });

  it('reports StorageFailure when the raw directory is unusable', async () => {
    const blocked = join(dir, 'blocked');
    await mkdir(blocked);
    await writeFile(join(blocked, 'raw'), 'not a directory');
    download.mockResolvedValue('PDB TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.fetch('1ABC', blocked, true, context);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.reason).toBe('StorageFailure');
  });

  it('reads a fetched file back with its format', async () => {
    await writeFile(join(dir, 'raw', '1ABC.cif'), 'CIF TEXT');
    const fetcher = new SourceFetcher(source, testConfig());

    const result = await fetcher.readRaw('1ABC', {
      path: join(dir, 'raw', '1ABC.cif'),
      format: StructureFormat.MMCIF,
      skipped: true,
    });

    expect(result).toEqual({ ok: true, value: { format: StructureFormat.MMCIF, text: 'CIF TEXT' } });
  });
});
