/**
 * @fileoverview Tool definition for re-running the entries recorded in the failure ledger.
 * @module src/mcp-server/tools/definitions/structure-retry-failed.tool
 */
import type { ContentBlock } from '@modelcontextprotocol/sdk/types.js';
import { container } from 'tsyringe';
import { z } from 'zod';

import { StructurePipelineService } from '@/container/tokens.js';
import type {
  SdkContext,
  ToolAnnotations,
  ToolDefinition,
} from '@/mcp-server/tools/utils/toolDefinition.js';
import type { StructurePipelineService as StructurePipelineServiceClass } from '@/services/structure/core/StructurePipelineService.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'structure_retry_failed';
const TOOL_TITLE = 'Retry Failed Structures';
const TOOL_DESCRIPTION =
  'Re-run every entry listed in failed_entries.json under the output directory. Entries that now succeed are removed from the ledger; entries that fail again keep their latest failure.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: false,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    outputDir: z
      .string()
      .min(1)
      .optional()
      .describe('Output root holding the ledger (defaults to STRUCTURE_OUTPUT_DIR).'),
    limit: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe('Retry at most this many entries, in identifier order.'),
    parallelism: z
      .number()
      .int()
      .min(1)
      .max(64)
      .optional()
      .describe('Number of entries processed concurrently.'),
  })
  .describe('Parameters for retrying failed entries.');

const OutputSchema = z
  .object({
    total: z.number().describe('Entries retried.'),
    success: z.number().describe('Entries that succeeded this time.'),
    failed: z.number().describe('Entries that failed again.'),
    failure_breakdown: z.record(z.number()).describe('Failures by status.'),
    by_status: z.record(z.number()),
    raw_reused: z.number(),
    outputs_reused: z.number(),
    started_at: z.string(),
    finished_at: z.string(),
    duration_seconds: z.number(),
  })
  .describe('Summary of the retry run.');

type RetryFailedInput = z.infer<typeof InputSchema>;
type RetryFailedOutput = z.infer<typeof OutputSchema>;

async function structureRetryFailedLogic(
  input: RetryFailedInput,
  appContext: RequestContext,
  sdkContext: SdkContext,
): Promise<RetryFailedOutput> {
  logger.debug('Retrying failed structures', {
    ...appContext,
    toolInput: input,
  });

  const service = container.resolve<StructurePipelineServiceClass>(
    StructurePipelineService,
  );
  const summary = await service.retryFailed(
    {
      outputDir: input.outputDir,
      limit: input.limit,
      parallelism: input.parallelism,
      signal: sdkContext.signal,
    },
    appContext,
  );

  logger.info('Retry of failed structures completed', {
    ...appContext,
    total: summary.total,
    success: summary.success,
    failed: summary.failed,
  });

  return summary;
}

function responseFormatter(result: RetryFailedOutput): ContentBlock[] {
  if (result.total === 0) {
    return [{ type: 'text', text: 'No failed entries to retry.' }];
  }

  return [
    {
      type: 'text',
      text: `Retried ${result.total} entries: ${result.success} recovered, ${result.failed} still failing.`,
    },
  ];
}

export const structureRetryFailedTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureRetryFailedLogic,
  responseFormatter,
};
