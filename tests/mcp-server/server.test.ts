/**
 * @fileoverview Unit tests for turning tool definitions into MCP call results.
 * @module tests/mcp-server/server.test
 */
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { executeTool } from '@/mcp-server/server.js';
import { allToolDefinitions } from '@/mcp-server/tools/definitions/index.js';
import type { ToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { createAppContext, createSdkContext } from '../fixtures/toolContext.js';

const InputSchema = z.object({ pdbId: z.string().length(4) });
const OutputSchema = z.object({ pdbId: z.string(), chains: z.number() });

function echoTool(
  logic: ToolDefinition<typeof InputSchema, typeof OutputSchema>['logic'],
): ToolDefinition<typeof InputSchema, typeof OutputSchema> {
  return {
    name: 'echo_tool',
    description: 'Test tool.',
    inputSchema: InputSchema,
    outputSchema: OutputSchema,
    logic,
  };
}

describe('executeTool', () => {
  const context = createAppContext();
  const sdkContext = createSdkContext();

  it('returns structured content and a JSON text block', async () => {
    const tool = echoTool(async (input) => ({ pdbId: input.pdbId, chains: 3 }));

    const result = await executeTool(tool, { pdbId: '6OEJ' }, context, sdkContext);

    expect(result).toEqual({
      structuredContent: { pdbId: '6OEJ', chains: 3 },
      content: [{ type: 'text', text: JSON.stringify({ pdbId: '6OEJ', chains: 3 }, null, 2) }],
    });
  });

  it('uses the response formatter when there is one', async () => {
    const tool = {
      ...echoTool(async (input) => ({ pdbId: input.pdbId, chains: 2 })),
      responseFormatter: (output: z.infer<typeof OutputSchema>) => [
        { type: 'text' as const, text: `${output.pdbId} has ${output.chains} chains` },
      ],
    };

    const result = await executeTool(tool, { pdbId: '6OEJ' }, context, sdkContext);

    expect(result.content).toEqual([{ type: 'text', text: '6OEJ has 2 chains' }]);
  });

  it('reports thrown errors as error results', async () => {
    const logic = vi.fn(async () => {
      throw new McpError(JsonRpcErrorCode.NotFound, 'Structure not found');
    });

    const result = await executeTool(echoTool(logic), { pdbId: '0XXX' }, context, sdkContext);

    expect(result).toEqual({
      isError: true,
      content: [{ type: 'text', text: 'Error: Structure not found' }],
    });
  });

  it('reports invalid arguments without calling the logic', async () => {
    const logic = vi.fn(async () => ({ pdbId: 'XXXX', chains: 0 }));

    const result = await executeTool(echoTool(logic), { pdbId: 'TOO-LONG' }, context, sdkContext);

    expect(result.isError).toBe(true);
    expect(logic).not.toHaveBeenCalled();
  });
});

describe('allToolDefinitions', () => {
  it('registers every pipeline tool under a unique name', () => {
    expect(allToolDefinitions.map((tool) => tool.name)).toEqual([
      'structure_run_batch',
      'structure_process_entry',
      'structure_retry_failed',
      'structure_inspect_chains',
    ]);
  });
});
