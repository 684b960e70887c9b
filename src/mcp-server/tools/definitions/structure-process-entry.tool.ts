/**
 * @fileoverview Tool definition for splitting a single complex into antigen and
 * antibody files.
 * @module src/mcp-server/tools/definitions/structure-process-entry.tool
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
import { OutcomeStatus } from '@/services/structure/types.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'structure_process_entry';
const TOOL_TITLE = 'Process Structure Entry';
const TOOL_DESCRIPTION =
  'Download one PDB entry and write its antigen chains and antibody chains to separate PDB files. Chain ids are case-sensitive and written in the order given. The failure ledger is not updated.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: false,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    pdbId: z
      .string()
      .length(4, 'PDB ID must be exactly 4 characters.')
      .regex(/^[0-9A-Z]{4}$/i, 'PDB ID must be alphanumeric.')
      .describe('4-character PDB identifier (e.g., "6OEJ").'),
    antigenChains: z
      .array(z.string().min(1))
      .min(1)
      .describe('Antigen chain ids, e.g. ["A"].'),
    antibodyChains: z
      .array(z.string().min(1))
      .min(1)
      .describe('Antibody chain ids, e.g. ["H", "L"].'),
    outputDir: z
      .string()
      .min(1)
      .optional()
      .describe('Output root (defaults to STRUCTURE_OUTPUT_DIR).'),
    force: z
      .boolean()
      .default(false)
      .describe('Process the entry again and re-download its raw file, even if outputs exist.'),
  })
  .describe('Parameters for processing one entry.');

const OutputFileSchema = z.object({
  path: z.string().describe('Written file.'),
  chainIds: z.array(z.string()).describe('Chains in the file, in order.'),
  residueCount: z
    .number()
    .optional()
    .describe('Residues across those chains; absent when an existing file was kept.'),
});

const OutputSchema = z
  .object({
    pdbId: z.string().describe('Normalized PDB identifier.'),
    status: z.nativeEnum(OutcomeStatus).describe('Terminal status of the entry.'),
    reason: z.string().optional().describe('Failure sub-reason.'),
    detail: z.string().optional().describe('Failure detail.'),
    antigenChains: z.array(z.string()),
    antibodyChains: z.array(z.string()),
    rawReused: z.boolean().describe('Raw file came from an earlier run.'),
    outputsReused: z.boolean().describe('Output files from an earlier run were kept.'),
    startedAt: z.string(),
    finishedAt: z.string(),
    antigen: OutputFileSchema.optional(),
    antibody: OutputFileSchema.optional(),
  })
  .describe('Outcome of processing one entry.');

type ProcessEntryInput = z.infer<typeof InputSchema>;
type ProcessEntryOutput = z.infer<typeof OutputSchema>;

async function structureProcessEntryLogic(
  input: ProcessEntryInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<ProcessEntryOutput> {
  logger.debug('Processing structure entry', {
    ...appContext,
    toolInput: input,
  });

  const service = container.resolve<StructurePipelineServiceClass>(
    StructurePipelineService,
  );
  const outcome = await service.processOne(
    {
      pdbId: input.pdbId,
      antigenChains: input.antigenChains,
      antibodyChains: input.antibodyChains,
      outputDir: input.outputDir,
      force: input.force,
    },
    appContext,
  );

  logger.info('Structure entry processed', {
    ...appContext,
    pdbId: outcome.pdbId,
    status: outcome.status,
  });

  return {
    pdbId: outcome.pdbId,
    status: outcome.status,
    reason: outcome.reason,
    detail: outcome.detail,
    antigenChains: [...outcome.assignment.antigen],
    antibodyChains: [...outcome.assignment.antibody],
    rawReused: outcome.rawReused,
    outputsReused: outcome.outputsReused,
    startedAt: outcome.startedAt,
    finishedAt: outcome.finishedAt,
    antigen: outcome.antigen,
    antibody: outcome.antibody,
  };
}

function reuseNote(result: ProcessEntryOutput): string {
  if (result.outputsReused) return ' (existing outputs kept)';
  return result.rawReused ? ' (raw file reused)' : '';
}

function responseFormatter(result: ProcessEntryOutput): ContentBlock[] {
  if (result.status !== OutcomeStatus.SUCCESS) {
    return [
      {
        type: 'text',
        text: `${result.pdbId}: ${result.status}${result.reason ? ` (${result.reason})` : ''}\n${result.detail ?? ''}`.trimEnd(),
      },
    ];
  }

  const files = [result.antigen, result.antibody]
    .flatMap((file) =>
      file
        ? [
            `• ${file.path}: chains ${file.chainIds.join(', ')}${
              file.residueCount === undefined ? '' : ` (${file.residueCount} residues)`
            }`,
          ]
        : [],
    )
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.pdbId}: ${result.status}${reuseNote(result)}\n${files}`,
    },
  ];
}

export const structureProcessEntryTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureProcessEntryLogic,
  responseFormatter,
};
