/**
 * @fileoverview Tool definition for batch-splitting antibody–antigen complexes,
 * either from a SAbDab summary table or from an explicit list of entries.
 * @module src/mcp-server/tools/definitions/structure-run-batch.tool
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
import {
  createChainAssignment,
  isValidPdbId,
  normalizePdbId,
} from '@/services/structure/chainAssignment.js';
import type { BatchEntry } from '@/services/structure/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'structure_run_batch';
const TOOL_TITLE = 'Run Structure Batch';
const TOOL_DESCRIPTION =
  'Download antibody–antigen complexes from the RCSB PDB and split each into an antigen file and an antibody file. Takes a SAbDab summary TSV (columns pdb, Hchain, Lchain, antigen_chain) or an explicit entry list. Failures are recorded in failed_entries.json under the output directory.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const EntrySchema = z.object({
  pdbId: z
    .string()
    .regex(/^[0-9A-Z]{4}$/i, 'PDB ID must be 4 alphanumeric characters.')
    .describe('4-character PDB identifier.'),
  antigenChains: z
    .array(z.string().min(1))
    .min(1)
    .describe('Chain ids that make up the antigen, in output order.'),
  antibodyChains: z
    .array(z.string().min(1))
    .min(1)
    .describe('Chain ids that make up the antibody (heavy first, then light).'),
});

const InputSchema = z
  .object({
    tsvPath: z
      .string()
      .min(1)
      .optional()
      .describe('Path to a SAbDab summary TSV. Mutually exclusive with entries.'),
    entries: z
      .array(EntrySchema)
      .min(1)
      .optional()
      .describe('Explicit entries to process. Mutually exclusive with tsvPath.'),
    outputDir: z
      .string()
      .min(1)
      .optional()
      .describe('Output root (defaults to STRUCTURE_OUTPUT_DIR).'),
    parallelism: z
      .number()
      .int()
      .min(1)
      .max(64)
      .optional()
      .describe('Number of entries processed concurrently.'),
    incremental: z
      .boolean()
      .default(true)
      .describe('Reuse raw files already on disk instead of downloading again.'),
    limit: z
      .number()
      .int()
      .min(0)
      .optional()
      .describe('Process at most this many entries (after removing duplicates).'),
  })
  .describe('Parameters for a batch run.');

const SummarySchema = z
  .object({
    total: z.number(),
    success: z.number(),
    failed: z.number(),
    failure_breakdown: z.record(z.number()),
    by_status: z.record(z.number()),
    raw_reused: z.number(),
    outputs_reused: z.number(),
    started_at: z.string(),
    finished_at: z.string(),
    duration_seconds: z.number(),
  })
  .describe('Counts for this run.');

const OutputSchema = z
  .object({
    source: z.enum(['table', 'entries']).describe('Where the entries came from.'),
    totalRows: z.number().describe('Rows read from the table, or entries given.'),
    validEntries: z.number().describe('Entries handed to the pipeline.'),
    rejectedRows: z
      .array(
        z.object({
          rowNumber: z.number(),
          pdbId: z.string(),
          reason: z.string(),
          detail: z.string(),
        }),
      )
      .describe('Table rows that could not become entries.'),
    summary: SummarySchema,
  })
  .describe('Batch run result.');

type RunBatchInput = z.infer<typeof InputSchema>;
type RunBatchOutput = z.infer<typeof OutputSchema>;

function toBatchEntries(entries: NonNullable<RunBatchInput['entries']>): BatchEntry[] {
  return entries.map((entry, index) => {
    const assignment = createChainAssignment(entry.antigenChains, entry.antibodyChains);
    if (!isValidPdbId(entry.pdbId) || !assignment.ok) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Entry ${index + 1} (${entry.pdbId}) is invalid: ${assignment.ok ? 'bad PDB ID' : assignment.error.detail}`,
        { index, pdbId: entry.pdbId },
      );
    }
    return { pdbId: normalizePdbId(entry.pdbId), assignment: assignment.value };
  });
}

async function structureRunBatchLogic(
  input: RunBatchInput,
  appContext: RequestContext,
  sdkContext: SdkContext,
): Promise<RunBatchOutput> {
  logger.debug('Starting structure batch', {
    ...appContext,
    toolInput: input,
  });

  if ((input.tsvPath === undefined) === (input.entries === undefined)) {
    throw new McpError(
      JsonRpcErrorCode.ValidationError,
      'Provide exactly one of tsvPath or entries.',
    );
  }

  const service = container.resolve<StructurePipelineServiceClass>(
    StructurePipelineService,
  );
  const options = {
    outputDir: input.outputDir,
    parallelism: input.parallelism,
    incremental: input.incremental,
    limit: input.limit,
    signal: sdkContext.signal,
  };

  let result: RunBatchOutput;
  if (input.tsvPath !== undefined) {
    const run = await service.runSabdabTable(
      { ...options, tsvPath: input.tsvPath },
      appContext,
    );
    result = { source: 'table', ...run };
  } else {
    const entries = toBatchEntries(input.entries ?? []);
    const summary = await service.runBatch({ ...options, entries }, appContext);
    result = {
      source: 'entries',
      totalRows: entries.length,
      validEntries: entries.length,
      rejectedRows: [],
      summary,
    };
  }

  logger.info('Structure batch completed', {
    ...appContext,
    total: result.summary.total,
    success: result.summary.success,
    failed: result.summary.failed,
    rejected: result.rejectedRows.length,
  });

  return result;
}

function responseFormatter(result: RunBatchOutput): ContentBlock[] {
  const { summary } = result;
  const breakdown = Object.entries(summary.failure_breakdown)
    .map(([status, count]) => `• ${status}: ${count}`)
    .join('\n');

  const lines = [
    `Processed ${summary.total} entries in ${summary.duration_seconds.toFixed(1)}s`,
    `Success: ${summary.success}`,
    `Failed: ${summary.failed}`,
    `Raw files reused: ${summary.raw_reused}`,
    `Outputs kept: ${summary.outputs_reused}`,
    result.rejectedRows.length > 0
      ? `Rejected rows: ${result.rejectedRows.length} of ${result.totalRows}`
      : '',
  ]
    .filter(Boolean)
    .join('\n');

  return [
    {
      type: 'text',
      text: breakdown ? `${lines}\n\nFailures:\n${breakdown}` : lines,
    },
  ];
}

export const structureRunBatchTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureRunBatchLogic,
  responseFormatter,
};
