/**
 * @fileoverview Reader for the PDBx/mmCIF tagged-field format.
 * Reads the `_atom_site` loop of the first data block using author numbering.
 * @module src/services/structure/parsing/mmcifReader
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

interface CifToken {
  value: string;
  line: number;
}

const ATOM_SITE_PREFIX = '_atom_site.';

/** `?` (unknown) and `.` (inapplicable) both mean "no value" */
function present(value: string | undefined): string | undefined {
  return value === undefined || value === '?' || value === '.' ? undefined : value;
}

/**
 * Splits one line into CIF tokens. A quote opens a value only at the start of a
 * token and closes only when followed by whitespace, so `O5'` stays one token.
 */
export function tokenizeCifLine(text: string, line: number): CifToken[] {
  const tokens: CifToken[] = [];
  let i = 0;

  while (i < text.length) {
    const char = text.charAt(i);
    if (char === ' ' || char === '\t') {
      i++;
      continue;
    }
    if (char === '#') break;

    if (char === "'" || char === '"') {
      let end = i + 1;
      while (end < text.length) {
        const next = text.charAt(end + 1);
        if (text.charAt(end) === char && (next === '' || next === ' ' || next === '\t')) {
          break;
        }
        end++;
      }
      tokens.push({ value: text.slice(i + 1, end), line });
      i = end + 1;
      continue;
    }

    let end = i;
    while (end < text.length && text.charAt(end) !== ' ' && text.charAt(end) !== '\t') {
      end++;
    }
    tokens.push({ value: text.slice(i, end), line });
    i = end;
  }

  return tokens;
}

/**
 * Locates the `_atom_site` loop and returns its column names and value tokens.
 */
function readAtomSiteLoop(
  lines: string[],
): { columns: string[]; tokens: CifToken[] } | undefined {
  let seenDataBlock = false;

  for (let index = 0; index < lines.length; index++) {
    const trimmed = (lines[index] ?? '').trim();
    if (trimmed.startsWith('data_')) {
      if (seenDataBlock) return undefined;
      seenDataBlock = true;
      continue;
    }
    if (trimmed !== 'loop_') continue;

    let cursor = index + 1;
    const columns: string[] = [];
    while ((lines[cursor] ?? '').trim().startsWith(ATOM_SITE_PREFIX)) {
      columns.push((lines[cursor] ?? '').trim().slice(ATOM_SITE_PREFIX.length));
      cursor++;
    }
    if (columns.length === 0) continue;

    const tokens: CifToken[] = [];
    for (; cursor < lines.length; cursor++) {
      const raw = lines[cursor] ?? '';
      const lineTrimmed = raw.trim();
      if (
        lineTrimmed.startsWith('loop_') ||
        lineTrimmed.startsWith('_') ||
        lineTrimmed.startsWith('data_') ||
        lineTrimmed.startsWith('#')
      ) {
        break;
      }
      if (raw.startsWith(';')) {
        // Semicolon-delimited text field
        const startLine = cursor + 1;
        const parts = [raw.slice(1)];
        cursor++;
        while (cursor < lines.length && !(lines[cursor] ?? '').startsWith(';')) {
          parts.push(lines[cursor] ?? '');
          cursor++;
        }
        tokens.push({ value: parts.join('\n').trim(), line: startLine });
        continue;
      }
      tokens.push(...tokenizeCifLine(raw, cursor + 1));
    }

    return { columns, tokens };
  }

  return undefined;
}

function formatCharge(value: string | undefined): string {
  const charge = value === undefined ? undefined : Number.parseInt(value, 10);
  if (charge === undefined || Number.isNaN(charge) || charge === 0) return '';
  return `${Math.abs(charge)}${charge > 0 ? '+' : '-'}`;
}

/**
 * Reads atom sites from mmCIF text. Rows belonging to any model other than the
 * first one encountered are skipped.
 */
export function readMmcifAtomSites(text: string): Result<AtomSite[], ParseError> {
  const loop = readAtomSiteLoop(text.split(/\r?\n/));
  if (!loop || loop.tokens.length === 0) return ok([]);

  const { columns, tokens } = loop;
  const column = (name: string): number => columns.indexOf(name);
  const idx = {
    group: column('group_PDB'),
    serial: column('id'),
    element: column('type_symbol'),
    labelAtom: column('label_atom_id'),
    authAtom: column('auth_atom_id'),
    altLoc: column('label_alt_id'),
    labelComp: column('label_comp_id'),
    authComp: column('auth_comp_id'),
    labelAsym: column('label_asym_id'),
    authAsym: column('auth_asym_id'),
    labelSeq: column('label_seq_id'),
    authSeq: column('auth_seq_id'),
    insCode: column('pdbx_PDB_ins_code'),
    x: column('Cartn_x'),
    y: column('Cartn_y'),
    z: column('Cartn_z'),
    occupancy: column('occupancy'),
    bFactor: column('B_iso_or_equiv'),
    charge: column('pdbx_formal_charge'),
    model: column('pdbx_PDB_model_num'),
  };

  const firstLine = tokens[0]?.line ?? 0;
  if (idx.x < 0 || idx.y < 0 || idx.z < 0) {
    return err(malformedRecord('_atom_site loop has no Cartn_x/y/z columns', firstLine));
  }
  if (tokens.length % columns.length !== 0) {
    return err(
      malformedRecord(
        `_atom_site loop has ${tokens.length} values for ${columns.length} columns`,
        firstLine,
      ),
    );
  }

  const sites: AtomSite[] = [];
  let firstModel: string | undefined;

  for (let start = 0; start < tokens.length; start += columns.length) {
    const row = tokens.slice(start, start + columns.length);
    const lineNumber = row[0]?.line ?? firstLine;
    const value = (i: number): string | undefined => (i < 0 ? undefined : row[i]?.value);

    const model = present(value(idx.model));
    firstModel ??= model;
    if (model !== firstModel) continue;

    const numberToken = present(value(idx.authSeq)) ?? present(value(idx.labelSeq)) ?? '';
    const numbering = parseResidueNumbering(
      numberToken,
      present(value(idx.insCode)) ?? '',
      lineNumber,
    );
    if (!numbering.ok) return numbering;

    const x = parseNumber(value(idx.x) ?? '');
    const y = parseNumber(value(idx.y) ?? '');
    const z = parseNumber(value(idx.z) ?? '');
    if (x === undefined || y === undefined || z === undefined) {
      return err(
        malformedRecord(`Cannot read coordinates on line ${lineNumber}`, lineNumber),
      );
    }

    const name = present(value(idx.authAtom)) ?? present(value(idx.labelAtom)) ?? '';
    const kind: AtomRecordKind = value(idx.group) === 'HETATM' ? 'HETATM' : 'ATOM';
    const element = present(value(idx.element));

    sites.push({
      chainId: present(value(idx.authAsym)) ?? present(value(idx.labelAsym)) ?? ' ',
      residueNumber: numbering.value.number,
      insertionCode: numbering.value.insertionCode,
      residueName: present(value(idx.authComp)) ?? present(value(idx.labelComp)) ?? '',
      line: lineNumber,
      atom: {
        kind,
        serial: parseNumber(value(idx.serial) ?? '') ?? sites.length + 1,
        name,
        altLoc: present(value(idx.altLoc)) ?? '',
        x,
        y,
        z,
        occupancy: parseNumber(present(value(idx.occupancy)) ?? '') ?? 1,
        tempFactor: parseNumber(present(value(idx.bFactor)) ?? '') ?? 0,
        element: element ?? inferElement(name),
        charge: formatCharge(present(value(idx.charge))),
      },
    });
  }

  return ok(sites);
}
