/**
 * @fileoverview Unit tests for McpError and the server's error codes.
 * @module tests/types-global/errors.test
 */
import { describe, expect, it } from 'vitest';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';

describe('JsonRpcErrorCode', () => {
  it('declares only the codes the server raises', () => {
    const names = Object.keys(JsonRpcErrorCode).filter((key) => Number.isNaN(Number(key)));

    expect(names.sort()).toEqual([
      'ConfigurationError',
      'InternalError',
      'NotFound',
      'SerializationError',
      'ServiceUnavailable',
      'Timeout',
      'ValidationError',
    ]);
  });
});

describe('McpError', () => {
  it('carries its code and data', () => {
    const error = new McpError(JsonRpcErrorCode.NotFound, 'SAbDab file not found: x.tsv', {
      path: 'x.tsv',
    });

    expect(error).toBeInstanceOf(McpError);
    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({
      name: 'McpError',
      code: -32001,
      message: 'SAbDab file not found: x.tsv',
      data: { path: 'x.tsv' },
    });
  });
});
