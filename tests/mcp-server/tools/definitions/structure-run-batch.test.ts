/**
 * @fileoverview Unit tests for the structure_run_batch tool.
 * @module tests/mcp-server/tools/definitions/structure-run-batch.test
 */
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { container } from 'tsyringe';

import { StructurePipelineService } from '@/container/tokens.js';
import { structureRunBatchTool } from '@/mcp-server/tools/definitions/structure-run-batch.tool.js';
import type { StructurePipelineService as StructurePipelineServiceClass } from '@/services/structure/core/StructurePipelineService.js';
import { JsonRpcErrorCode } from '@/types-global/errors.js';
import {
  createAppContext,
  createSdkContext,
  createSummary,
} from '../../../fixtures/toolContext.js';

describe('structure_run_batch tool', () => {
  const context = createAppContext();
  const sdkContext = createSdkContext();

  let mockService: Pick<StructurePipelineServiceClass, 'runBatch' | 'runSabdabTable'>;

  beforeEach(() => {
    mockService = {
      runBatch: vi.fn<StructurePipelineServiceClass['runBatch']>(),
      runSabdabTable: vi.fn<StructurePipelineServiceClass['runSabdabTable']>(),
    };
    container.registerInstance(StructurePipelineService, mockService);
  });

  afterEach(() => {
    container.clearInstances();
    vi.restoreAllMocks();
  });

  describe('Tool Metadata', () => {
    it('should have correct tool name', () => {
      expect(structureRunBatchTool.name).toBe('structure_run_batch');
    });

    it('should have correct annotations', () => {
      expect(structureRunBatchTool.annotations).toEqual({
        readOnlyHint: false,
        idempotentHint: true,
        openWorldHint: true,
      });
    });
  });

  describe('Input Validation', () => {
    it('should default to incremental mode', async () => {
      const parsed = await structureRunBatchTool.inputSchema.parseAsync({
        tsvPath: 'summary.tsv',
      });

      expect(parsed.incremental).toBe(true);
    });

    it('should reject malformed entry identifiers', async () => {
      await expect(
        structureRunBatchTool.inputSchema.parseAsync({
          entries: [{ pdbId: '6OE', antigenChains: ['A'], antibodyChains: ['H'] }],
        }),
      ).rejects.toThrow();
    });

    it('should reject a parallelism of zero', async () => {
      await expect(
        structureRunBatchTool.inputSchema.parseAsync({ tsvPath: 'summary.tsv', parallelism: 0 }),
      ).rejects.toThrow();
    });
  });

  describe('Batch Logic', () => {
    it('should run a SAbDab table with the request signal', async () => {
      const summary = createSummary();
      vi.mocked(mockService.runSabdabTable).mockResolvedValue({
        totalRows: 4,
        validEntries: 3,
        rejectedRows: [{ rowNumber: 5, pdbId: '1ABC', reason: 'EmptyAntigen', detail: 'No antigen chain ids given' }],
        summary,
      });

      const input = await structureRunBatchTool.inputSchema.parseAsync({
        tsvPath: 'summary.tsv',
        limit: 5,
      });
      const result = await structureRunBatchTool.logic(input, context, sdkContext);

      expect(mockService.runSabdabTable).toHaveBeenCalledWith(
        {
          tsvPath: 'summary.tsv',
          outputDir: undefined,
          parallelism: undefined,
          incremental: true,
          limit: 5,
          signal: sdkContext.signal,
        },
        context,
      );
      expect(result).toEqual({
        source: 'table',
        totalRows: 4,
        validEntries: 3,
        rejectedRows: [{ rowNumber: 5, pdbId: '1ABC', reason: 'EmptyAntigen', detail: 'No antigen chain ids given' }],
        summary,
      });
    });

    it('should normalize explicit entries into chain assignments', async () => {
      const summary = createSummary({ total: 1, success: 1, failed: 0 });
      vi.mocked(mockService.runBatch).mockResolvedValue(summary);

      const input = await structureRunBatchTool.inputSchema.parseAsync({
        entries: [{ pdbId: '6oej', antigenChains: ['A'], antibodyChains: ['H', 'L'] }],
        incremental: false,
      });
      const result = await structureRunBatchTool.logic(input, context, sdkContext);

      expect(mockService.runBatch).toHaveBeenCalledWith(
        expect.objectContaining({
          entries: [{ pdbId: '6OEJ', assignment: { antigen: ['A'], antibody: ['H', 'L'] } }],
          incremental: false,
        }),
        context,
      );
      expect(result.source).toBe('entries');
      expect(result.validEntries).toBe(1);
    });

    it('should reject entries whose chains overlap', async () => {
      const input = await structureRunBatchTool.inputSchema.parseAsync({
        entries: [{ pdbId: '6OEJ', antigenChains: ['H'], antibodyChains: ['H', 'L'] }],
      });

      await expect(structureRunBatchTool.logic(input, context, sdkContext)).rejects.toMatchObject({
        code: JsonRpcErrorCode.ValidationError,
      });
      expect(mockService.runBatch).not.toHaveBeenCalled();
    });

    it('should require exactly one of tsvPath and entries', async () => {
      const input = await structureRunBatchTool.inputSchema.parseAsync({});

      await expect(structureRunBatchTool.logic(input, context, sdkContext)).rejects.toMatchObject({
        code: JsonRpcErrorCode.ValidationError,
        message: 'Provide exactly one of tsvPath or entries.',
      });
    });
  });

  describe('Response Formatting', () => {
    it('should summarize counts and failures', () => {
      const formatted = structureRunBatchTool.responseFormatter?.({
        source: 'table',
        totalRows: 4,
        validEntries: 3,
        rejectedRows: [{ rowNumber: 5, pdbId: '1ABC', reason: 'EmptyAntigen', detail: '' }],
        summary: createSummary(),
      });

      expect(formatted).toEqual([
        {
          type: 'text',
          text: [
            'Processed 3 entries in 1.5s',
            'Success: 2',
            'Failed: 1',
            'Raw files reused: 1',
            'Outputs kept: 0',
            'Rejected rows: 1 of 4',
            '',
            'Failures:',
            '• Unavailable: 1',
          ].join('\n'),
        },
      ]);
    });
  });
});
