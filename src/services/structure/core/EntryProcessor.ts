/**
 * @fileoverview Runs one entry through Fetch → Parse → Split → Write.
 * Every failure short-circuits into a terminal, immutable OutcomeRecord; nothing
 * is thrown to the caller.
 * @module src/services/structure/core/EntryProcessor
 */
import { rm } from 'node:fs/promises';
import { join } from 'node:path';

import { inject, injectable } from 'tsyringe';

import { logger, pathExists, type RequestContext } from '@/utils/index.js';
import { parseStructure } from '../parsing/structureParser.js';
import { splitStructure } from '../splitting/chainSplitter.js';
import type {
  ChainAssignment,
  FailureReason,
  OutcomeRecord,
  OutputSummary,
  PdbId,
  ProcessEntryOptions,
} from '../types.js';
import { OutcomeStatus } from '../types.js';
import { StructureWriter } from '../writing/StructureWriter.js';
import { SourceFetcher } from './SourceFetcher.js';

export const ANTIGENS_DIR = join('processed', 'antigens');
export const ANTIBODIES_DIR = join('processed', 'antibodies');

export function antigenPath(outputDir: string, pdbId: PdbId): string {
  return join(outputDir, ANTIGENS_DIR, `${pdbId}_antigen.pdb`);
}

export function antibodyPath(outputDir: string, pdbId: PdbId): string {
  return join(outputDir, ANTIBODIES_DIR, `${pdbId}_antibody.pdb`);
}

type Stage = 'Fetching' | 'Parsing' | 'Splitting' | 'Writing';

const STAGE_FAILURE: Record<Stage, OutcomeStatus> = {
  Fetching: OutcomeStatus.DOWNLOAD_FAILED,
  Parsing: OutcomeStatus.PARSE_FAILED,
  Splitting: OutcomeStatus.CHAIN_NOT_FOUND,
  Writing: OutcomeStatus.WRITE_FAILED,
};

@injectable()
export class EntryProcessor {
  constructor(
    @inject(SourceFetcher) private readonly fetcher: SourceFetcher,
    @inject(StructureWriter) private readonly writer: StructureWriter,
  ) {}

  /**
   * Processes one entry. Without `force`, an entry whose antigen and antibody
   * files both exist succeeds without any work; `force` also re-downloads the
   * raw file.
   */
  async process(
    pdbId: PdbId,
    assignment: ChainAssignment,
    options: ProcessEntryOptions,
    context: RequestContext,
  ): Promise<OutcomeRecord> {
    const startedAt = new Date().toISOString();
    let stage: Stage = 'Fetching';
    let rawReused = false;
    let outputsReused = false;

    const finish = (
      status: OutcomeStatus,
      extra: {
        reason?: FailureReason;
        detail?: string;
        antigen?: OutputSummary;
        antibody?: OutputSummary;
      } = {},
    ): OutcomeRecord => {
      const outcome: OutcomeRecord = Object.freeze({
        pdbId,
        status,
        assignment,
        startedAt,
        finishedAt: new Date().toISOString(),
        rawReused,
        outputsReused,
        ...extra,
      });
      const logContext = { ...context, pdbId, status, reason: extra.reason, detail: extra.detail };
      if (status === OutcomeStatus.SUCCESS) {
        logger.info(`Entry ${pdbId} processed`, logContext);
      } else {
        logger.warning(`Entry ${pdbId} failed: ${status}`, logContext);
      }
      return outcome;
    };

    try {
      const agPath = antigenPath(options.outputDir, pdbId);
      const abPath = antibodyPath(options.outputDir, pdbId);
      if (options.force !== true && (await pathExists(agPath)) && (await pathExists(abPath))) {
        outputsReused = true;
        return finish(OutcomeStatus.SUCCESS, {
          antigen: { path: agPath, chainIds: [...assignment.antigen] },
          antibody: { path: abPath, chainIds: [...assignment.antibody] },
        });
      }

      const fetched = await this.fetcher.fetch(
        pdbId,
        options.outputDir,
        options.force !== true,
        context,
      );
      if (!fetched.ok) {
        return finish(OutcomeStatus.DOWNLOAD_FAILED, {
          reason: fetched.error.reason,
          detail: fetched.error.detail,
        });
      }
      rawReused = fetched.value.skipped;

      const raw = await this.fetcher.readRaw(pdbId, fetched.value);
      if (!raw.ok) {
        return finish(OutcomeStatus.DOWNLOAD_FAILED, {
          reason: raw.error.reason,
          detail: raw.error.detail,
        });
      }

      stage = 'Parsing';
      const parsed = parseStructure(pdbId, raw.value);
      if (!parsed.ok) {
        return finish(OutcomeStatus.PARSE_FAILED, {
          reason: parsed.error.reason,
          detail: parsed.error.detail,
        });
      }

      stage = 'Splitting';
      const split = splitStructure(parsed.value, assignment);
      if (!split.ok) {
        const detail =
          split.error.reason === 'ChainNotFound'
            ? `Missing chains: ${split.error.missing.join(', ')} (available: ${split.error.available.join(', ')})`
            : `Chains on both sides: ${split.error.overlapping.join(', ')}`;
        return finish(OutcomeStatus.CHAIN_NOT_FOUND, { reason: split.error.reason, detail });
      }

      stage = 'Writing';
      const antigen = await this.writer.write(split.value.antigen, agPath, context);
      if (!antigen.ok) {
        return finish(OutcomeStatus.WRITE_FAILED, {
          reason: antigen.error.reason,
          detail: antigen.error.detail,
        });
      }
      const antibody = await this.writer.write(
        split.value.antibody,
        abPath,
        context,
      );
      if (!antibody.ok) {
        // Do not leave half of the entry's output behind
        await rm(agPath, { force: true });
        return finish(OutcomeStatus.WRITE_FAILED, {
          reason: antibody.error.reason,
          detail: antibody.error.detail,
        });
      }

      return finish(OutcomeStatus.SUCCESS, {
        antigen: {
          path: antigen.value.path,
          chainIds: antigen.value.chainIds,
          residueCount: antigen.value.residueCount,
        },
        antibody: {
          path: antibody.value.path,
          chainIds: antibody.value.chainIds,
          residueCount: antibody.value.residueCount,
        },
      });
    } catch (error) {
      logger.error(`Unexpected error while ${stage.toLowerCase()} ${pdbId}`, {
        ...context,
        pdbId,
        stage,
        error: error instanceof Error ? error.message : String(error),
      });
      return finish(STAGE_FAILURE[stage], {
        reason: 'UnexpectedError',
        detail: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
