/**
 * @fileoverview Drives the EntryProcessor over many entries with a bounded worker pool.
 * Outcomes go through a single OutcomeAggregator; the failure ledger and run summary
 * are persisted under the output directory.
 * @module src/services/structure/core/BatchOrchestrator
 */
import { constants } from 'node:fs';
import { access, mkdir } from 'node:fs/promises';
import { join } from 'node:path';

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger, type RequestContext } from '@/utils/index.js';
import { createChainAssignment, normalizePdbId } from '../chainAssignment.js';
import type {
  BatchEntry,
  BatchRunOptions,
  RetryOptions,
  SummaryReport,
} from '../types.js';
import { ANTIBODIES_DIR, ANTIGENS_DIR, EntryProcessor } from './EntryProcessor.js';
import { FailureLedgerStore } from './FailureLedgerStore.js';
import { OutcomeAggregator } from './OutcomeAggregator.js';
import { RAW_DIR } from './SourceFetcher.js';

/**
 * Keeps the first entry of each identifier, then the first `limit` entries.
 */
export function selectEntries(
  entries: readonly BatchEntry[],
  limit?: number,
): { selected: BatchEntry[]; duplicates: BatchEntry[] } {
  const seen = new Set<string>();
  const selected: BatchEntry[] = [];
  const duplicates: BatchEntry[] = [];

  for (const entry of entries) {
    const pdbId = normalizePdbId(entry.pdbId);
    if (seen.has(pdbId)) {
      duplicates.push(entry);
      continue;
    }
    seen.add(pdbId);
    selected.push({ ...entry, pdbId });
  }

  return {
    selected: limit !== undefined && limit >= 0 ? selected.slice(0, limit) : selected,
    duplicates,
  };
}

@injectable()
export class BatchOrchestrator {
  constructor(
    @inject(EntryProcessor) private readonly processor: EntryProcessor,
    @inject(FailureLedgerStore) private readonly store: FailureLedgerStore,
    @inject(AppConfig) private readonly config: AppConfigType,
  ) {}

  /**
   * Creates the output tree and checks that it is writable.
   * @throws {McpError} `ConfigurationError` before anything is dispatched
   */
  async prepareOutputDir(outputDir: string): Promise<void> {
    try {
      for (const directory of [RAW_DIR, ANTIGENS_DIR, ANTIBODIES_DIR]) {
        await mkdir(join(outputDir, directory), { recursive: true });
      }
      await access(outputDir, constants.W_OK);
    } catch (error) {
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `Output directory ${outputDir} is not writable: ${error instanceof Error ? error.message : String(error)}`,
        { outputDir },
      );
    }
  }

  /**
   * Processes `entries` and returns the summary of this run.
   *
   * Workers take entries in input order; outcomes may complete in any order.
   * When `signal` aborts, no further entries are dispatched and in-flight entries
   * finish normally.
   */
  async run(
    entries: readonly BatchEntry[],
    options: BatchRunOptions,
    context: RequestContext,
  ): Promise<SummaryReport> {
    const { outputDir, signal } = options;
    const incremental = options.incremental ?? true;

    await this.prepareOutputDir(outputDir);

    const { selected, duplicates } = selectEntries(entries, options.limit);
    if (duplicates.length > 0) {
      logger.warning('Dropped duplicate identifiers from batch', {
        ...context,
        duplicates: duplicates.map((entry) => entry.pdbId),
      });
    }

    const ledger = await this.store.loadLedger(outputDir);
    const aggregator = new OutcomeAggregator(
      ledger,
      (snapshot) => this.store.saveLedger(outputDir, snapshot),
      context,
    );

    const width = Math.max(
      1,
      Math.min(options.parallelism ?? this.config.batchParallelism, selected.length || 1),
    );

    logger.info('Starting batch run', {
      ...context,
      outputDir,
      entries: selected.length,
      parallelism: width,
      incremental,
    });

    let cursor = 0;
    const worker = async (): Promise<void> => {
      while (cursor < selected.length && signal?.aborted !== true) {
        const entry = selected[cursor++];
        if (!entry) break;
        const outcome = await this.processor.process(
          entry.pdbId,
          entry.assignment,
          { outputDir, force: !incremental },
          context,
        );
        await aggregator.submit(outcome);
      }
    };
    await Promise.all(Array.from({ length: width }, () => worker()));

    if (cursor < selected.length) {
      logger.notice('Batch run stopped before all entries were dispatched', {
        ...context,
        dispatched: cursor,
        remaining: selected.length - cursor,
      });
    }

    await aggregator.flush();
    const summary = aggregator.summary();
    await this.store.saveSummary(outputDir, summary);

    logger.info('Batch run finished', {
      ...context,
      total: summary.total,
      success: summary.success,
      failed: summary.failed,
      failureBreakdown: summary.failure_breakdown,
    });

    return summary;
  }

  /**
   * Re-runs the entries currently recorded in the failure ledger, in identifier
   * order. Entries that are not in the ledger are not touched.
   */
  async retry(options: RetryOptions, context: RequestContext): Promise<SummaryReport> {
    await this.prepareOutputDir(options.outputDir);
    const ledger = await this.store.loadLedger(options.outputDir);

    const entries: BatchEntry[] = [];
    for (const pdbId of Object.keys(ledger).sort()) {
      const record = ledger[pdbId];
      if (!record) continue;
      const assignment = createChainAssignment(record.antigenChains, record.antibodyChains);
      if (!assignment.ok) {
        logger.warning('Skipping ledger entry with an invalid chain assignment', {
          ...context,
          pdbId,
          reason: assignment.error.detail,
        });
        continue;
      }
      entries.push({ pdbId, assignment: assignment.value });
    }

    logger.info('Retrying failed entries', {
      ...context,
      failed: entries.length,
      limit: options.limit,
    });

    return this.run(
      entries,
      {
        outputDir: options.outputDir,
        parallelism: options.parallelism,
        incremental: true,
        limit: options.limit,
        signal: options.signal,
      },
      context,
    );
  }
}
