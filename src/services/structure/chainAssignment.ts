/**
 * @fileoverview Identifier normalization and construction of validated chain assignments.
 * @module src/services/structure/chainAssignment
 */
import type { ChainAssignment, PdbId, Result } from './types.js';
import { err, ok } from './types.js';

const PDB_ID_PATTERN = /^[0-9A-Z]{4}$/;

export function normalizePdbId(pdbId: string): PdbId {
  return pdbId.trim().toUpperCase();
}

export function isValidPdbId(pdbId: string): boolean {
  return PDB_ID_PATTERN.test(normalizePdbId(pdbId));
}

/**
 * Splits a chain field into ids. `|` takes precedence over `,` as separator and
 * `NA` (any case) means "no chain".
 *
 * @example
 * parseChainIds('A | B') // ['A', 'B']
 * parseChainIds('H,L')   // ['H', 'L']
 * parseChainIds('NA')    // []
 */
export function parseChainIds(field: string | undefined): string[] {
  if (!field) return [];
  const separator = field.includes('|') ? '|' : ',';
  return field
    .split(separator)
    .map((part) => part.trim())
    .filter((part) => part.length > 0 && part.toUpperCase() !== 'NA');
}

export interface ChainAssignmentError {
  reason: 'EmptyAntigen' | 'EmptyAntibody' | 'OverlappingChains';
  detail: string;
}

function dedupe(ids: readonly string[]): string[] {
  return [...new Set(ids.map((id) => id.trim()).filter(Boolean))];
}

/**
 * Builds a {@link ChainAssignment}. Both sides must be non-empty after removing
 * blanks and duplicates, and no id may appear on both sides. Request order is kept.
 */
export function createChainAssignment(
  antigen: readonly string[],
  antibody: readonly string[],
): Result<ChainAssignment, ChainAssignmentError> {
  const antigenIds = dedupe(antigen);
  const antibodyIds = dedupe(antibody);

  if (antigenIds.length === 0) {
    return err({ reason: 'EmptyAntigen', detail: 'No antigen chain ids given' });
  }
  if (antibodyIds.length === 0) {
    return err({ reason: 'EmptyAntibody', detail: 'No antibody chain ids given' });
  }

  const overlapping = antigenIds.filter((id) => antibodyIds.includes(id));
  if (overlapping.length > 0) {
    return err({
      reason: 'OverlappingChains',
      detail: `Chains assigned to both antigen and antibody: ${overlapping.join(', ')}`,
    });
  }

  return ok(Object.freeze({ antigen: antigenIds, antibody: antibodyIds }));
}
