/**
 * @fileoverview Single parse entry point for both raw formats.
 * Format readers produce atom sites; grouping into residues and chains is shared.
 * @module src/services/structure/parsing/structureParser
 */
import type {
  ChainRecord,
  ParseError,
  ParsedStructure,
  PdbId,
  RawStructure,
  ResidueRecord,
  Result,
} from '../types.js';
import { StructureFormat, err, ok } from '../types.js';
import type { AtomSite } from './atomSite.js';
import { readMmcifAtomSites } from './mmcifReader.js';
import { readPdbAtomSites } from './pdbReader.js';

/**
 * Author-facing residue label, e.g. `52A`.
 */
export function residueLabel(residue: Pick<ResidueRecord, 'number' | 'insertionCode'>): string {
  return `${residue.number}${residue.insertionCode}`;
}

/**
 * Builds a chain record, deriving its residue count.
 */
export function createChain(id: string, residues: ResidueRecord[]): ChainRecord {
  return { id, residues, residueCount: residues.length };
}

/**
 * Groups atom sites by chain id, then by (residue number, insertion code).
 * Chains and residues keep the order in which they are first seen.
 */
export function groupAtomSites(sites: readonly AtomSite[]): ChainRecord[] {
  const chains = new Map<string, { residues: ResidueRecord[]; byKey: Map<string, ResidueRecord> }>();

  for (const site of sites) {
    let chain = chains.get(site.chainId);
    if (!chain) {
      chain = { residues: [], byKey: new Map() };
      chains.set(site.chainId, chain);
    }

    const key = `${site.residueNumber}|${site.insertionCode}`;
    let residue = chain.byKey.get(key);
    if (!residue) {
      residue = {
        number: site.residueNumber,
        insertionCode: site.insertionCode,
        name: site.residueName,
        atoms: [],
      };
      chain.byKey.set(key, residue);
      chain.residues.push(residue);
    }
    residue.atoms.push(site.atom);
  }

  return [...chains].map(([id, chain]) => createChain(id, chain.residues));
}

/**
 * Parses raw structure text into the normalized chain/residue model.
 *
 * @returns `Empty` when the file holds no atom records,
 *   `MalformedResidueNumbering` when a residue number cannot be read.
 */
export function parseStructure(
  pdbId: PdbId,
  raw: RawStructure,
): Result<ParsedStructure, ParseError> {
  const sites =
    raw.format === StructureFormat.PDB
      ? readPdbAtomSites(raw.text)
      : readMmcifAtomSites(raw.text);
  if (!sites.ok) return sites;

  if (sites.value.length === 0) {
    return err({
      kind: 'ParseError',
      reason: 'Empty',
      detail: `No atom records found in ${raw.format} file for ${pdbId}`,
    });
  }

  return ok({
    pdbId,
    format: raw.format,
    chains: groupAtomSites(sites.value),
  });
}
