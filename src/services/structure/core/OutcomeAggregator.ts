/**
 * @fileoverview Single aggregation point for a batch run.
 * Owns the failure ledger and the summary counters; outcomes are applied one at a
 * time through a promise queue, so concurrent workers never interleave updates.
 * @module src/services/structure/core/OutcomeAggregator
 */
import { logger, type RequestContext } from '@/utils/index.js';
import type { FailureLedger, OutcomeRecord, SummaryReport } from '../types.js';
import { OutcomeStatus } from '../types.js';

export type LedgerPersister = (ledger: FailureLedger) => Promise<void>;

function emptyStatusCounts(): Record<OutcomeStatus, number> {
  return {
    [OutcomeStatus.SUCCESS]: 0,
    [OutcomeStatus.DOWNLOAD_FAILED]: 0,
    [OutcomeStatus.PARSE_FAILED]: 0,
    [OutcomeStatus.CHAIN_NOT_FOUND]: 0,
    [OutcomeStatus.WRITE_FAILED]: 0,
  };
}

export class OutcomeAggregator {
  private queue: Promise<void> = Promise.resolve();
  private readonly ledger: FailureLedger;
  private readonly byStatus = emptyStatusCounts();
  private readonly failureBreakdown: Record<string, number> = {};
  private readonly startedAt = new Date();
  private total = 0;
  private rawReused = 0;
  private outputsReused = 0;
  private dirty = false;

  constructor(
    ledger: FailureLedger,
    private readonly persist: LedgerPersister,
    private readonly context: RequestContext,
  ) {
    this.ledger = { ...ledger };
  }

  /**
   * Queues an outcome. The returned promise settles once this outcome, and every
   * outcome submitted before it, has been applied.
   */
  submit(outcome: OutcomeRecord): Promise<void> {
    const applied = this.queue.then(() => this.apply(outcome));
    this.queue = applied;
    return applied;
  }

  private async apply(outcome: OutcomeRecord): Promise<void> {
    this.total++;
    this.byStatus[outcome.status]++;
    if (outcome.rawReused) this.rawReused++;
    if (outcome.outputsReused) this.outputsReused++;

    let changed: boolean;
    if (outcome.status === OutcomeStatus.SUCCESS) {
      changed = outcome.pdbId in this.ledger;
      delete this.ledger[outcome.pdbId];
    } else {
      const reason = outcome.reason ?? 'UnexpectedError';
      this.failureBreakdown[reason] = (this.failureBreakdown[reason] ?? 0) + 1;
      this.ledger[outcome.pdbId] = {
        status: outcome.status,
        reason,
        detail: outcome.detail ?? '',
        timestamp: outcome.finishedAt,
        antigenChains: [...outcome.assignment.antigen],
        antibodyChains: [...outcome.assignment.antibody],
      };
      changed = true;
    }

    if (!changed) return;
    try {
      await this.persist(this.snapshot());
      this.dirty = false;
    } catch (error) {
      // The ledger stays in memory and is written again by flush()
      this.dirty = true;
      logger.error('Failed to persist failure ledger', {
        ...this.context,
        pdbId: outcome.pdbId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Waits for queued outcomes and writes the ledger if the last write failed.
   * @throws the persistence error if the ledger still cannot be written
   */
  async flush(): Promise<FailureLedger> {
    await this.queue;
    if (this.dirty) {
      await this.persist(this.snapshot());
      this.dirty = false;
    }
    return this.snapshot();
  }

  snapshot(): FailureLedger {
    return { ...this.ledger };
  }

  /**
   * Summary of the outcomes applied so far in this run.
   */
  summary(): SummaryReport {
    const finishedAt = new Date();
    const success = this.byStatus[OutcomeStatus.SUCCESS];
    return {
      total: this.total,
      success,
      failed: this.total - success,
      failure_breakdown: { ...this.failureBreakdown },
      by_status: { ...this.byStatus },
      raw_reused: this.rawReused,
      outputs_reused: this.outputsReused,
      started_at: this.startedAt.toISOString(),
      finished_at: finishedAt.toISOString(),
      duration_seconds: (finishedAt.getTime() - this.startedAt.getTime()) / 1000,
    };
  }
}
