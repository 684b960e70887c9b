/**
 * @fileoverview Contract for remote archives that serve raw structure files.
 * @module src/services/structure/core/IStructureSource
 */
import type { RequestContext } from '@/utils/index.js';
import type { PdbId, StructureFormat } from '../types.js';

export interface IStructureSource {
  /**
   * Human-readable source name
   */
  readonly name: string;

  /**
   * Download one raw structure file
   * @param pdbId - Normalized 4-character PDB identifier
   * @param format - File format to request
   * @param context - Request context for tracing and logging
   * @returns The file contents
   * @throws {McpError} `NotFound` when the archive has no file in this format,
   *   `ServiceUnavailable` or `Timeout` on transport failures
   */
  download(pdbId: PdbId, format: StructureFormat, context: RequestContext): Promise<string>;
}
