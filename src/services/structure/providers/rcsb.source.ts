/**
 * @fileoverview RCSB PDB file archive source.
 * Downloads raw PDB and mmCIF files from the RCSB file service.
 * @module src/services/structure/providers/rcsb.source
 */
import { inject, injectable } from 'tsyringe';

import type { AppConfig as AppConfigType } from '@/config/index.js';
import { AppConfig } from '@/container/tokens.js';
import {
  fetchTextWithTimeout,
  logger,
  type RequestContext,
} from '@/utils/index.js';
import type { IStructureSource } from '../core/IStructureSource.js';
import type { PdbId, StructureFormat } from '../types.js';
import { RCSB_FILES_URL, buildFileUrl } from './rcsb/config.js';

@injectable()
export class RcsbStructureSource implements IStructureSource {
  public readonly name = 'RCSB PDB';

  constructor(@inject(AppConfig) private readonly config: AppConfigType) {}

  async download(
    pdbId: PdbId,
    format: StructureFormat,
    context: RequestContext,
  ): Promise<string> {
    const url = buildFileUrl(this.config.archiveFilesUrl || RCSB_FILES_URL, pdbId, format);

    logger.debug('Downloading structure file from RCSB', {
      ...context,
      pdbId,
      format,
      url,
    });

    return fetchTextWithTimeout(
      url,
      { method: 'GET', timeout: this.config.fetchTimeoutMs },
      context,
    );
  }
}
