/**
 * @fileoverview Shape of a declarative tool definition. Definitions are plain
 * objects; `server.ts` turns them into registered MCP tools.
 * @module src/mcp-server/tools/utils/toolDefinition
 */
import type { RequestHandlerExtra } from '@modelcontextprotocol/sdk/shared/protocol.js';
import type {
  ContentBlock,
  ServerNotification,
  ServerRequest,
} from '@modelcontextprotocol/sdk/types.js';
import type { ZodObject, ZodRawShape, z } from 'zod';

import type { RequestContext } from '@/utils/index.js';

/** Request-scoped handle the SDK passes to every tool call. */
export type SdkContext = RequestHandlerExtra<ServerRequest, ServerNotification>;

export interface ToolAnnotations {
  [key: string]: unknown;
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
}

export interface ToolDefinition<
  TInputSchema extends ZodObject<ZodRawShape>,
  TOutputSchema extends ZodObject<ZodRawShape>,
> {
  /** Programmatic name, snake_case. */
  name: string;
  title?: string;
  description: string;
  inputSchema: TInputSchema;
  outputSchema: TOutputSchema;
  annotations?: ToolAnnotations;
  /**
   * Pure business logic. Throws `McpError` on failure; the server turns the throw
   * into an error result.
   */
  logic: (
    input: z.infer<TInputSchema>,
    appContext: RequestContext,
    sdkContext: SdkContext,
  ) => Promise<z.infer<TOutputSchema>>;
  /** Formats the successful result for the client; defaults to pretty JSON. */
  responseFormatter?: (result: z.infer<TOutputSchema>) => ContentBlock[];
}
