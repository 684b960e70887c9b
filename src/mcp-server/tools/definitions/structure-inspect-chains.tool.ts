/**
 * @fileoverview Tool definition for listing the chains of a PDB entry, used to
 * choose antigen and antibody chain ids before processing.
 * @module src/mcp-server/tools/definitions/structure-inspect-chains.tool
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
import { residueLabel } from '@/services/structure/parsing/structureParser.js';
import type { FetchError, ParseError } from '@/services/structure/types.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { type RequestContext, logger } from '@/utils/index.js';

const TOOL_NAME = 'structure_inspect_chains';
const TOOL_TITLE = 'Inspect Structure Chains';
const TOOL_DESCRIPTION =
  'List the chains of a PDB entry with residue and atom counts and the first and last residue numbers. Reuses a raw file already downloaded to the output directory.';

const TOOL_ANNOTATIONS: ToolAnnotations = {
  readOnlyHint: true,
  idempotentHint: true,
  openWorldHint: true,
};

const InputSchema = z
  .object({
    pdbId: z
      .string()
      .length(4, 'PDB ID must be exactly 4 characters.')
      .regex(/^[0-9A-Z]{4}$/i, 'PDB ID must be alphanumeric.')
      .describe('4-character PDB identifier.'),
    outputDir: z
      .string()
      .min(1)
      .optional()
      .describe('Output root whose raw/ directory caches downloads.'),
  })
  .describe('Parameters for inspecting chains.');

const OutputSchema = z
  .object({
    pdbId: z.string().describe('Normalized PDB identifier.'),
    chains: z
      .array(
        z.object({
          id: z.string().describe('Author chain id.'),
          residueCount: z.number(),
          atomCount: z.number(),
          firstResidue: z.string().describe('First residue number with insertion code.'),
          lastResidue: z.string().describe('Last residue number with insertion code.'),
        }),
      )
      .describe('Chains in file order.'),
  })
  .describe('Chains of one PDB entry.');

type InspectChainsInput = z.infer<typeof InputSchema>;
type InspectChainsOutput = z.infer<typeof OutputSchema>;

function toMcpError(error: FetchError | ParseError, pdbId: string): McpError {
  if (error.kind === 'FetchError') {
    return new McpError(
      error.reason === 'StorageFailure'
        ? JsonRpcErrorCode.InternalError
        : JsonRpcErrorCode.ServiceUnavailable,
      `Could not fetch ${pdbId}: ${error.detail}`,
      { pdbId, reason: error.reason, attempts: error.attempts.length },
    );
  }
  return new McpError(
    JsonRpcErrorCode.ValidationError,
    `Could not parse ${pdbId}: ${error.detail}`,
    { pdbId, reason: error.reason, line: error.line },
  );
}

async function structureInspectChainsLogic(
  input: InspectChainsInput,
  appContext: RequestContext,
  _sdkContext: SdkContext,
): Promise<InspectChainsOutput> {
  logger.debug('Inspecting structure chains', {
    ...appContext,
    toolInput: input,
  });

  const pdbId = input.pdbId.toUpperCase();
  const service = container.resolve<StructurePipelineServiceClass>(
    StructurePipelineService,
  );
  const result = await service.inspectChains(pdbId, input.outputDir, appContext);
  if (!result.ok) {
    throw toMcpError(result.error, pdbId);
  }

  const chains = result.value.map((chain) => {
    const first = chain.residues[0];
    const last = chain.residues[chain.residues.length - 1];
    return {
      id: chain.id,
      residueCount: chain.residueCount,
      atomCount: chain.residues.reduce((sum, residue) => sum + residue.atoms.length, 0),
      firstResidue: first ? residueLabel(first) : '',
      lastResidue: last ? residueLabel(last) : '',
    };
  });

  logger.info('Structure chains inspected', {
    ...appContext,
    pdbId,
    chainCount: chains.length,
  });

  return { pdbId, chains };
}

function responseFormatter(result: InspectChainsOutput): ContentBlock[] {
  const chains = result.chains
    .map(
      (c) =>
        `• Chain ${c.id}: ${c.residueCount} residues, ${c.atomCount} atoms (${c.firstResidue}–${c.lastResidue})`,
    )
    .join('\n');

  return [
    {
      type: 'text',
      text: `${result.pdbId}: ${result.chains.length} chains\n${chains}`,
    },
  ];
}

export const structureInspectChainsTool: ToolDefinition<
  typeof InputSchema,
  typeof OutputSchema
> = {
  name: TOOL_NAME,
  title: TOOL_TITLE,
  description: TOOL_DESCRIPTION,
  inputSchema: InputSchema,
  outputSchema: OutputSchema,
  annotations: TOOL_ANNOTATIONS,
  logic: structureInspectChainsLogic,
  responseFormatter,
};
