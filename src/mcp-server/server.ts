/**
 * @fileoverview Creates the MCP server and registers every tool definition.
 * Tool logic throws on failure; this layer turns throws into `isError` results
 * and validates successful output against the tool's output schema.
 * @module src/mcp-server/server
 */
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import type { ZodObject, ZodRawShape } from 'zod';

import { config } from '@/config/index.js';
import {
  allToolDefinitions,
  structureInspectChainsTool,
  structureProcessEntryTool,
  structureRetryFailedTool,
  structureRunBatchTool,
} from '@/mcp-server/tools/definitions/index.js';
import type { SdkContext, ToolDefinition } from '@/mcp-server/tools/utils/toolDefinition.js';
import { McpError } from '@/types-global/errors.js';
import {
  type RequestContext,
  logger,
  requestContextService,
} from '@/utils/index.js';

function toStructuredContent(value: unknown): Record<string, unknown> | undefined {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(value));
}

/**
 * Runs a tool definition for one call and shapes the MCP result.
 */
export async function executeTool<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
>(
  definition: ToolDefinition<TInputSchema, TOutputSchema>,
  args: unknown,
  appContext: RequestContext,
  sdkContext: SdkContext,
): Promise<CallToolResult> {
  try {
    const input = await definition.inputSchema.parseAsync(args);
    const result = await definition.logic(input, appContext, sdkContext);
    const output = await definition.outputSchema.parseAsync(result);

    return {
      structuredContent: toStructuredContent(output),
      content: definition.responseFormatter
        ? definition.responseFormatter(output)
        : [{ type: 'text', text: JSON.stringify(output, null, 2) }],
    };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error(`Tool ${definition.name} failed`, {
      ...appContext,
      error: message,
      code: error instanceof McpError ? error.code : undefined,
    });

    return {
      isError: true,
      content: [{ type: 'text', text: `Error: ${message}` }],
    };
  }
}

function registerTool<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
>(server: McpServer, definition: ToolDefinition<TInputSchema, TOutputSchema>): void {
  server.registerTool(
    definition.name,
    {
      title: definition.title,
      description: definition.description,
      inputSchema: definition.inputSchema.shape,
      outputSchema: definition.outputSchema.shape,
      annotations: definition.annotations,
    },
    async (args, sdkContext) => {
      const appContext = requestContextService.createRequestContext({
        operation: `tool:${definition.name}`,
        additionalContext: { toolName: definition.name },
      });
      return executeTool(definition, args, appContext, sdkContext);
    },
  );
  logger.debug(`Registered tool ${definition.name}`);
}

/**
 * Builds a server with all tools registered. Transport wiring is left to the caller.
 */
export function createMcpServer(): McpServer {
  const server = new McpServer(
    { name: config.mcpServerName, version: config.mcpServerVersion },
    { capabilities: { logging: {}, tools: { listChanged: true } } },
  );

  registerTool(server, structureRunBatchTool);
  registerTool(server, structureProcessEntryTool);
  registerTool(server, structureRetryFailedTool);
  registerTool(server, structureInspectChainsTool);

  logger.info('MCP server created', {
    name: config.mcpServerName,
    version: config.mcpServerVersion,
    tools: allToolDefinitions.map((tool) => tool.name),
  });

  return server;
}
