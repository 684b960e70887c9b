/**
 * @fileoverview Persistence of the failure ledger and the run summary.
 * @module src/services/structure/core/FailureLedgerStore
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';

import { injectable } from 'tsyringe';
import { z } from 'zod';

import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { atomicWriteFile } from '@/utils/index.js';
import type { FailureLedger, SummaryReport } from '../types.js';
import { OutcomeStatus } from '../types.js';

export const LEDGER_FILE = 'failed_entries.json';
export const SUMMARY_FILE = 'processing_summary.json';

const LedgerEntrySchema = z.object({
  status: z.enum([
    OutcomeStatus.DOWNLOAD_FAILED,
    OutcomeStatus.PARSE_FAILED,
    OutcomeStatus.CHAIN_NOT_FOUND,
    OutcomeStatus.WRITE_FAILED,
  ]),
  reason: z.enum([
    'Unavailable',
    'StorageFailure',
    'MalformedResidueNumbering',
    'MalformedRecord',
    'Empty',
    'ChainNotFound',
    'OverlappingChains',
    'IOFailure',
    'ChainIdTooLong',
    'ResidueNumberOutOfRange',
    'ResidueNameTooLong',
    'UnexpectedError',
  ]),
  detail: z.string(),
  timestamp: z.string(),
  antigenChains: z.array(z.string()),
  antibodyChains: z.array(z.string()),
});

const LedgerSchema = z.record(z.string(), LedgerEntrySchema);

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

@injectable()
export class FailureLedgerStore {
  ledgerPath(outputDir: string): string {
    return join(outputDir, LEDGER_FILE);
  }

  summaryPath(outputDir: string): string {
    return join(outputDir, SUMMARY_FILE);
  }

  /**
   * Loads the ledger; a missing file is an empty ledger.
   * @throws {McpError} `SerializationError` when the file is not a valid ledger
   */
  async loadLedger(outputDir: string): Promise<FailureLedger> {
    const path = this.ledgerPath(outputDir);
    let text: string;
    try {
      text = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return {};
      throw new McpError(
        JsonRpcErrorCode.ConfigurationError,
        `Cannot read failure ledger ${path}: ${error instanceof Error ? error.message : String(error)}`,
        { path },
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(text);
    } catch (error) {
      throw new McpError(
        JsonRpcErrorCode.SerializationError,
        `Failure ledger ${path} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
        { path },
      );
    }

    const parsed = LedgerSchema.safeParse(json);
    if (!parsed.success) {
      throw new McpError(
        JsonRpcErrorCode.SerializationError,
        `Failure ledger ${path} has an unexpected shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        { path },
      );
    }
    return parsed.data;
  }

  /**
   * Writes the ledger with keys in sorted order, so the file reflects the set of
   * failing identifiers and not the order in which they failed.
   */
  async saveLedger(outputDir: string, ledger: FailureLedger): Promise<void> {
    const sorted: FailureLedger = {};
    for (const pdbId of Object.keys(ledger).sort()) {
      const entry = ledger[pdbId];
      if (entry) sorted[pdbId] = entry;
    }
    await atomicWriteFile(this.ledgerPath(outputDir), `${JSON.stringify(sorted, null, 2)}\n`);
  }

  async saveSummary(outputDir: string, summary: SummaryReport): Promise<void> {
    await atomicWriteFile(this.summaryPath(outputDir), `${JSON.stringify(summary, null, 2)}\n`);
  }
}
