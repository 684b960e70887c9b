/**
 * @fileoverview Retrieves raw structure files into `<outputDir>/raw`.
 * Tries the primary format, then the fallback; reuses existing files in incremental mode.
 * @module src/services/structure/core/SourceFetcher
 */
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig, StructureSource } from '@/container/tokens.js';
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import {
  atomicWriteFile,
  logger,
  pathExists,
  type RequestContext,
} from '@/utils/index.js';
import type {
  FetchAttempt,
  FetchError,
  FetchResult,
  PdbId,
  RawStructure,
  Result,
} from '../types.js';
import { FORMAT_EXTENSIONS, StructureFormat, err, ok } from '../types.js';
import type { IStructureSource } from './IStructureSource.js';

export const RAW_DIR = 'raw';

export function rawFilePath(outputDir: string, pdbId: PdbId, format: StructureFormat): string {
  return join(outputDir, RAW_DIR, `${pdbId}.${FORMAT_EXTENSIONS[format]}`);
}

@injectable()
export class SourceFetcher {
  constructor(
    @inject(StructureSource) private readonly source: IStructureSource,
    @inject(AppConfig) private readonly config: AppConfigType,
  ) {}

  /**
   * Formats in the order they are tried
   */
  get formatOrder(): StructureFormat[] {
    return this.config.primaryFormat === 'mmcif'
      ? [StructureFormat.MMCIF, StructureFormat.PDB]
      : [StructureFormat.PDB, StructureFormat.MMCIF];
  }

  /**
   * Finds a previously fetched raw file for `pdbId`, in either format and with
   * either an upper- or lower-case file stem.
   */
  async findExisting(
    pdbId: PdbId,
    outputDir: string,
  ): Promise<{ path: string; format: StructureFormat } | undefined> {
    for (const format of this.formatOrder) {
      const extension = FORMAT_EXTENSIONS[format];
      for (const stem of new Set([pdbId, pdbId.toLowerCase()])) {
        const path = join(outputDir, RAW_DIR, `${stem}.${extension}`);
        if (await pathExists(path)) return { path, format };
      }
    }
    return undefined;
  }

  /**
   * Fetches the raw file for `pdbId`.
   *
   * With `incremental` set, an existing raw file is returned without any network
   * call. Otherwise each format is tried up to `fetchMaxAttempts` times; a
   * `NotFound` answer moves on to the next format immediately.
   */
  async fetch(
    pdbId: PdbId,
    outputDir: string,
    incremental: boolean,
    context: RequestContext,
  ): Promise<Result<FetchResult, FetchError>> {
    if (incremental) {
      const existing = await this.findExisting(pdbId, outputDir);
      if (existing) {
        logger.debug('Reusing existing raw structure file', {
          ...context,
          pdbId,
          path: existing.path,
        });
        return ok({ ...existing, skipped: true });
      }
    }

    const attempts: FetchAttempt[] = [];

    for (const format of this.formatOrder) {
      for (let attempt = 1; attempt <= this.config.fetchMaxAttempts; attempt++) {
        let text: string;
        try {
          text = await this.source.download(pdbId, format, context);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          attempts.push({ format, attempt, message });
          logger.warning('Structure download attempt failed', {
            ...context,
            pdbId,
            format,
            attempt,
            error: message,
          });

          const notFound =
            error instanceof McpError && error.code === JsonRpcErrorCode.NotFound;
          if (notFound) break;
          if (attempt < this.config.fetchMaxAttempts && this.config.fetchRetryDelayMs > 0) {
            await delay(this.config.fetchRetryDelayMs);
          }
          continue;
        }

        const path = rawFilePath(outputDir, pdbId, format);
        try {
          await atomicWriteFile(path, text);
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error);
          logger.error('Failed to store downloaded structure', {
            ...context,
            pdbId,
            path,
            error: message,
          });
          return err({
            kind: 'FetchError',
            reason: 'StorageFailure',
            pdbId,
            detail: `Could not save ${path}: ${message}`,
            attempts,
          });
        }

        logger.info('Downloaded structure file', { ...context, pdbId, format, path });
        return ok({ path, format, skipped: false });
      }
    }

    return err({
      kind: 'FetchError',
      reason: 'Unavailable',
      pdbId,
      detail: `${pdbId} unavailable in ${this.formatOrder.join(' and ')} format: ${attempts
        .map((a) => `${a.format}#${a.attempt} ${a.message}`)
        .join('; ')}`,
      attempts,
    });
  }

  /**
   * Reads a fetched file back as a format-tagged raw structure.
   */
  async readRaw(
    pdbId: PdbId,
    fetched: FetchResult,
  ): Promise<Result<RawStructure, FetchError>> {
    try {
      const text = await readFile(fetched.path, 'utf8');
      return ok({ format: fetched.format, text });
    } catch (error) {
      return err({
        kind: 'FetchError',
        reason: 'StorageFailure',
        pdbId,
        detail: `Could not read ${fetched.path}: ${error instanceof Error ? error.message : String(error)}`,
        attempts: [],
      });
    }
  }
}
