/**
 * @fileoverview Reader for the legacy fixed-column PDB format.
 * Only ATOM/HETATM records of the first model are read.
 * @module src/services/structure/parsing/pdbReader
 */
import type { AtomRecordKind, ParseError, Result } from '../types.js';
import { err, ok } from '../types.js';
import {
  type AtomSite,
  inferElement,
  malformedRecord,
  parseNumber,
  parseResidueNumbering,
} from './atomSite.js';

/**
 * Reads atom sites from PDB text.
 * Column ranges (1-based, inclusive): serial 7-11, name 13-16, altLoc 17,
 * resName 18-20, chain 22, resSeq 23-26, iCode 27, x/y/z 31-54,
 * occupancy 55-60, B-factor 61-66, element 77-78, charge 79-80.
 */
export function readPdbAtomSites(text: string): Result<AtomSite[], ParseError> {
  const sites: AtomSite[] = [];
  const lines = text.split(/\r?\n/);

  for (let index = 0; index < lines.length; index++) {
    const line = lines[index] ?? '';
    const lineNumber = index + 1;
    const record = line.slice(0, 6).trim();

    if (record === 'ENDMDL' || record === 'END') {
      if (sites.length > 0) break;
      continue;
    }
    if (record !== 'ATOM' && record !== 'HETATM') continue;

    const numbering = parseResidueNumbering(
      line.slice(22, 26),
      line.slice(26, 27),
      lineNumber,
    );
    if (!numbering.ok) return numbering;

    const x = parseNumber(line.slice(30, 38));
    const y = parseNumber(line.slice(38, 46));
    const z = parseNumber(line.slice(46, 54));
    if (x === undefined || y === undefined || z === undefined) {
      return err(
        malformedRecord(`Cannot read coordinates on line ${lineNumber}`, lineNumber),
      );
    }

    const name = line.slice(12, 16).trim();
    const element = line.slice(76, 78).trim();
    const kind: AtomRecordKind = record;

    sites.push({
      chainId: line.charAt(21) || ' ',
      residueNumber: numbering.value.number,
      insertionCode: numbering.value.insertionCode,
      residueName: line.slice(17, 20).trim(),
      line: lineNumber,
      atom: {
        kind,
        serial: parseNumber(line.slice(6, 11)) ?? sites.length + 1,
        name,
        altLoc: line.slice(16, 17).trim(),
        x,
        y,
        z,
        occupancy: parseNumber(line.slice(54, 60)) ?? 1,
        tempFactor: parseNumber(line.slice(60, 66)) ?? 0,
        element: element || inferElement(name),
        charge: line.slice(78, 80).trim(),
      },
    });
  }

  return ok(sites);
}
