/**
 * @fileoverview Unit tests for environment configuration parsing.
 * @module tests/config/config.test
 */
import { describe, expect, it } from 'vitest';

import { parseConfig } from '@/config/index.js';

describe('parseConfig', () => {
  it('applies defaults', () => {
    expect(parseConfig({})).toEqual({
      mcpServerName: 'antibody-complex-mcp-server',
      mcpServerVersion: '1.0.0',
      logLevel: 'info',
      outputDir: 'downloads',
      archiveFilesUrl: 'https://files.rcsb.org/download',
      fetchTimeoutMs: 60000,
      fetchMaxAttempts: 3,
      fetchRetryDelayMs: 2000,
      batchParallelism: 1,
      primaryFormat: 'pdb',
    });
  });

  it('coerces numeric variables and trims trailing slashes from the archive URL', () => {
    const config = parseConfig({
      BATCH_PARALLELISM: '8',
      FETCH_TIMEOUT_MS: '1500',
      ARCHIVE_FILES_URL: 'https://mirror.example.test/files//',
      PRIMARY_FORMAT: 'mmcif',
    });

    expect(config.batchParallelism).toBe(8);
    expect(config.fetchTimeoutMs).toBe(1500);
    expect(config.archiveFilesUrl).toBe('https://mirror.example.test/files');
    expect(config.primaryFormat).toBe('mmcif');
  });

  it('rejects invalid values', () => {
    expect(() => parseConfig({ BATCH_PARALLELISM: '0' })).toThrow(
      /Invalid environment configuration: BATCH_PARALLELISM/,
    );
  });
});
