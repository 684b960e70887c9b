/**
 * @fileoverview Entry point for the pipeline operations exposed to tools:
 * batch runs, single entries, retry of the failure ledger and chain inspection.
 * Input validation happens here; invalid input throws before any work starts.
 * @module src/services/structure/core/StructurePipelineService
 */
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import { type RejectedRow, SabdabTableReader } from '@/services/sabdab/index.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import {
  createChainAssignment,
  isValidPdbId,
  normalizePdbId,
  parseChainIds,
} from '../chainAssignment.js';
import { parseStructure } from '../parsing/structureParser.js';
import type {
  BatchEntry,
  ChainRecord,
  FetchError,
  OutcomeRecord,
  ParseError,
  PdbId,
  Result,
  SummaryReport,
} from '../types.js';
import { ok } from '../types.js';
import { BatchOrchestrator } from './BatchOrchestrator.js';
import { EntryProcessor } from './EntryProcessor.js';
import { RAW_DIR, SourceFetcher } from './SourceFetcher.js';

export interface RunBatchParams {
  entries: readonly BatchEntry[];
  outputDir?: string | undefined;
  parallelism?: number | undefined;
  incremental?: boolean | undefined;
  limit?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface RunSabdabTableParams extends Omit<RunBatchParams, 'entries'> {
  tsvPath: string;
}

export interface SabdabRunResult {
  totalRows: number;
  validEntries: number;
  rejectedRows: RejectedRow[];
  summary: SummaryReport;
}

export interface ProcessOneParams {
  pdbId: string;
  /** Chain ids, or one string such as `"A|B"` or `"H,L"` */
  antigenChains: string | readonly string[];
  antibodyChains: string | readonly string[];
  outputDir?: string | undefined;
  force?: boolean | undefined;
}

export interface RetryFailedParams {
  outputDir?: string | undefined;
  limit?: number | undefined;
  parallelism?: number | undefined;
  signal?: AbortSignal | undefined;
}

function toChainList(chains: string | readonly string[]): string[] {
  return typeof chains === 'string' ? parseChainIds(chains) : [...chains];
}

@injectable()
export class StructurePipelineService {
  constructor(
    @inject(BatchOrchestrator) private readonly orchestrator: BatchOrchestrator,
    @inject(EntryProcessor) private readonly processor: EntryProcessor,
    @inject(SourceFetcher) private readonly fetcher: SourceFetcher,
    @inject(SabdabTableReader) private readonly tableReader: SabdabTableReader,
    @inject(AppConfig) private readonly config: AppConfigType,
  ) {}

  private requirePdbId(pdbId: string): PdbId {
    if (!isValidPdbId(pdbId)) {
      throw new McpError(
        JsonRpcErrorCode.ValidationError,
        `Invalid PDB ID format: ${pdbId}. Must be 4 alphanumeric characters.`,
        { pdbId },
      );
    }
    return normalizePdbId(pdbId);
  }

  /**
   * Runs already-validated entries through the pipeline.
   */
  async runBatch(params: RunBatchParams, context: RequestContext): Promise<SummaryReport> {
    return this.orchestrator.run(
      params.entries,
      {
        outputDir: params.outputDir ?? this.config.outputDir,
        parallelism: params.parallelism,
        incremental: params.incremental,
        limit: params.limit,
        signal: params.signal,
      },
      context,
    );
  }

  /**
   * Reads a SAbDab summary table and runs its valid rows as a batch.
   */
  async runSabdabTable(
    params: RunSabdabTableParams,
    context: RequestContext,
  ): Promise<SabdabRunResult> {
    const table = await this.tableReader.read(params.tsvPath, context);
    const summary = await this.runBatch({ ...params, entries: table.entries }, context);
    return {
      totalRows: table.totalRows,
      validEntries: table.entries.length,
      rejectedRows: table.rejected,
      summary,
    };
  }

  /**
   * Processes a single entry with explicitly supplied chains.
   * @throws {McpError} `ValidationError` for a bad identifier or chain assignment
   */
  async processOne(params: ProcessOneParams, context: RequestContext): Promise<OutcomeRecord> {
    const pdbId = this.requirePdbId(params.pdbId);
    const assignment = createChainAssignment(
      toChainList(params.antigenChains),
      toChainList(params.antibodyChains),
    );
    if (!assignment.ok) {
      throw new McpError(JsonRpcErrorCode.ValidationError, assignment.error.detail, {
        pdbId,
        reason: assignment.error.reason,
      });
    }

    const outputDir = params.outputDir ?? this.config.outputDir;
    await this.orchestrator.prepareOutputDir(outputDir);

    return this.processor.process(
      pdbId,
      assignment.value,
      { outputDir, force: params.force },
      context,
    );
  }

  /**
   * Re-runs every entry in the failure ledger of `outputDir`.
   */
  async retryFailed(params: RetryFailedParams, context: RequestContext): Promise<SummaryReport> {
    return this.orchestrator.retry(
      {
        outputDir: params.outputDir ?? this.config.outputDir,
        limit: params.limit,
        parallelism: params.parallelism,
        signal: params.signal,
      },
      context,
    );
  }

  /**
   * Fetches (reusing a cached raw file) and parses an entry without splitting it.
   */
  async inspectChains(
    pdbIdInput: string,
    outputDirInput: string | undefined,
    context: RequestContext,
  ): Promise<Result<ChainRecord[], FetchError | ParseError>> {
    const pdbId = this.requirePdbId(pdbIdInput);
    const outputDir = outputDirInput ?? this.config.outputDir;
    await mkdir(join(outputDir, RAW_DIR), { recursive: true });

    const fetched = await this.fetcher.fetch(pdbId, outputDir, true, context);
    if (!fetched.ok) return fetched;

    const raw = await this.fetcher.readRaw(pdbId, fetched.value);
    if (!raw.ok) return raw;

    const parsed = parseStructure(pdbId, raw.value);
    if (!parsed.ok) return parsed;

    logger.debug('Inspected structure chains', {
      ...context,
      pdbId,
      chains: parsed.value.chains.map((chain) => chain.id),
    });
    return ok(parsed.value.chains);
  }
}
