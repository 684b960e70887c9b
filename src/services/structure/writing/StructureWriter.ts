/**
 * @fileoverview Serializes parsed structures to the legacy fixed-column PDB format.
 * Output is always PDB regardless of the format the structure was parsed from.
 * @module src/services/structure/writing/StructureWriter
 */
import { injectable } from 'tsyringe';

import { atomicWriteFile, logger, type RequestContext } from '@/utils/index.js';
import type {
  AtomRecord,
  ChainRecord,
  ParsedStructure,
  ResidueRecord,
  Result,
  WriteError,
  WriteSummary,
} from '../types.js';
import { err, ok } from '../types.js';

/** Readers take the chain id from column 22 alone */
const MAX_CHAIN_ID_LENGTH = 1;
const MAX_RESIDUE_NAME_LENGTH = 3;
/** Residue numbers occupy columns 23-26 */
const MIN_RESIDUE_NUMBER = -999;
const MAX_RESIDUE_NUMBER = 9999;

/**
 * Finds the first chain or residue field that the fixed-column layout cannot hold.
 */
export function findUnrepresentable(
  structure: ParsedStructure,
): Pick<WriteError, 'reason' | 'detail'> | undefined {
  for (const chain of structure.chains) {
    if (chain.id.length > MAX_CHAIN_ID_LENGTH) {
      return {
        reason: 'ChainIdTooLong',
        detail: `Chain id "${chain.id}" does not fit the PDB chain column`,
      };
    }
    for (const residue of chain.residues) {
      if (residue.number < MIN_RESIDUE_NUMBER || residue.number > MAX_RESIDUE_NUMBER) {
        return {
          reason: 'ResidueNumberOutOfRange',
          detail: `Residue number ${residue.number} in chain ${chain.id} does not fit the PDB residue column`,
        };
      }
      if (residue.name.length > MAX_RESIDUE_NAME_LENGTH) {
        return {
          reason: 'ResidueNameTooLong',
          detail: `Residue name "${residue.name}" in chain ${chain.id} does not fit the PDB residue name column`,
        };
      }
    }
  }
  return undefined;
}

function formatAtomName(name: string, element: string): string {
  if (name.length >= 4) return name.slice(0, 4);
  // One-letter elements start in column 14
  return element.length === 1 ? ` ${name}`.padEnd(4) : name.padEnd(4);
}

function formatResidueFields(chain: ChainRecord, residue: ResidueRecord): string {
  return (
    residue.name.padStart(3) +
    chain.id.padStart(2) +
    String(residue.number).padStart(4) +
    (residue.insertionCode || ' ')
  );
}

function formatAtomLine(
  serial: number,
  atom: AtomRecord,
  chain: ChainRecord,
  residue: ResidueRecord,
): string {
  return (
    atom.kind.padEnd(6) +
    String(serial % 100000).padStart(5) +
    ' ' +
    formatAtomName(atom.name, atom.element) +
    (atom.altLoc || ' ').slice(0, 1) +
    formatResidueFields(chain, residue) +
    '   ' +
    atom.x.toFixed(3).padStart(8) +
    atom.y.toFixed(3).padStart(8) +
    atom.z.toFixed(3).padStart(8) +
    atom.occupancy.toFixed(2).padStart(6) +
    atom.tempFactor.toFixed(2).padStart(6) +
    ' '.repeat(10) +
    atom.element.slice(0, 2).padStart(2) +
    atom.charge.slice(0, 2).padEnd(2)
  );
}

/**
 * Renders a structure as PDB text: chains and residues in stored order,
 * a TER record after each chain and a closing END. Atom serials restart at 1.
 * Callers check {@link findUnrepresentable} first; fields that do not fit shift
 * the columns after them.
 */
export function formatPdb(structure: ParsedStructure): string {
  const lines: string[] = [
    `REMARK 999 SOURCE ${structure.pdbId} CHAINS ${structure.chains.map((c) => c.id).join(',')}`,
  ];
  let serial = 1;

  for (const chain of structure.chains) {
    let last: ResidueRecord | undefined;
    for (const residue of chain.residues) {
      for (const atom of residue.atoms) {
        lines.push(formatAtomLine(serial, atom, chain, residue));
        serial++;
      }
      last = residue;
    }
    if (last) {
      lines.push(
        `TER   ${String(serial % 100000).padStart(5)}      ${formatResidueFields(chain, last)}`,
      );
      serial++;
    }
  }

  lines.push('END');
  return `${lines.join('\n')}\n`;
}

/**
 * Writes structures to disk with temp-then-rename semantics.
 */
@injectable()
export class StructureWriter {
  async write(
    structure: ParsedStructure,
    path: string,
    context?: RequestContext,
  ): Promise<Result<WriteSummary, WriteError>> {
    const unrepresentable = findUnrepresentable(structure);
    if (unrepresentable) {
      return err({ kind: 'WriteError', path, ...unrepresentable });
    }

    try {
      await atomicWriteFile(path, formatPdb(structure));
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      logger.error('Failed to write structure file', {
        ...context,
        pdbId: structure.pdbId,
        path,
        error: detail,
      });
      return err({ kind: 'WriteError', reason: 'IOFailure', path, detail });
    }

    let residueCount = 0;
    let atomCount = 0;
    for (const chain of structure.chains) {
      residueCount += chain.residueCount;
      for (const residue of chain.residues) atomCount += residue.atoms.length;
    }

    logger.debug('Structure file written', {
      ...context,
      pdbId: structure.pdbId,
      path,
      residueCount,
    });

    return ok({
      path,
      chainIds: structure.chains.map((chain) => chain.id),
      residueCount,
      atomCount,
    });
  }
}
