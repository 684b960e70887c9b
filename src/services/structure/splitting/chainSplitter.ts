/**
 * @fileoverview Extracts the antigen and antibody chain subsets of a parsed structure.
 * @module src/services/structure/splitting/chainSplitter
 */
import type {
  ChainAssignment,
  ChainRecord,
  ParsedStructure,
  Result,
  SplitError,
  SplitStructures,
} from '../types.js';
import { err, ok } from '../types.js';

function selectChains(
  structure: ParsedStructure,
  byId: ReadonlyMap<string, ChainRecord>,
  ids: readonly string[],
): ParsedStructure {
  const chains: ChainRecord[] = [];
  for (const id of ids) {
    const chain = byId.get(id);
    if (chain) chains.push(chain);
  }
  return { pdbId: structure.pdbId, format: structure.format, chains };
}

/**
 * Splits a structure into antigen and antibody structures.
 *
 * Output chains follow the requested id order; residues, numbering and insertion
 * codes are carried over untouched. The split is all-or-nothing: if any requested
 * id is absent, `ChainNotFound` lists every missing id (antigen ids first).
 */
export function splitStructure(
  structure: ParsedStructure,
  assignment: ChainAssignment,
): Result<SplitStructures, SplitError> {
  const overlapping = assignment.antigen.filter((id) => assignment.antibody.includes(id));
  if (overlapping.length > 0) {
    return err({ kind: 'SplitError', reason: 'OverlappingChains', overlapping });
  }

  const byId = new Map(structure.chains.map((chain) => [chain.id, chain]));
  const missing = [...assignment.antigen, ...assignment.antibody].filter(
    (id) => !byId.has(id),
  );
  if (missing.length > 0) {
    return err({
      kind: 'SplitError',
      reason: 'ChainNotFound',
      missing,
      available: structure.chains.map((chain) => chain.id),
    });
  }

  return ok({
    antigen: selectChains(structure, byId, assignment.antigen),
    antibody: selectChains(structure, byId, assignment.antibody),
  });
}
