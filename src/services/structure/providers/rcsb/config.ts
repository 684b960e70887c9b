/**
 * @fileoverview RCSB PDB file archive configuration constants.
 * @module src/services/structure/providers/rcsb/config
 */
import { FORMAT_EXTENSIONS, type PdbId, type StructureFormat } from '../../types.js';

/**
 * RCSB Files download URL
 */
export const RCSB_FILES_URL = 'https://files.rcsb.org/download';

/**
 * Builds the download URL of one entry file, e.g. `.../6OEJ.cif`
 */
export function buildFileUrl(
  baseUrl: string,
  pdbId: PdbId,
  format: StructureFormat,
): string {
  return `${baseUrl}/${pdbId}.${FORMAT_EXTENSIONS[format]}`;
}
