/**
 * @fileoverview Unit tests for structure parsing of PDB and mmCIF text.
 * @module tests/services/structure/parsing/structureParser.test
 */
import { describe, expect, it } from 'vitest';

import { tokenizeCifLine } from '@/services/structure/parsing/mmcifReader.js';
import {
  parseStructure,
  residueLabel,
} from '@/services/structure/parsing/structureParser.js';
import { StructureFormat } from '@/services/structure/types.js';
import { atomLine, buildPdb } from '../../../fixtures/structures.js';

const MMCIF_TEXT = [
  'data_1ABC',
  '#',
  'loop_',
  '_atom_site.group_PDB',
  '_atom_site.id',
  '_atom_site.type_symbol',
  '_atom_site.label_atom_id',
  '_atom_site.label_comp_id',
  '_atom_site.label_asym_id',
  '_atom_site.label_seq_id',
  '_atom_site.pdbx_PDB_ins_code',
  '_atom_site.Cartn_x',
  '_atom_site.Cartn_y',
  '_atom_site.Cartn_z',
  '_atom_site.occupancy',
  '_atom_site.B_iso_or_equiv',
  '_atom_site.pdbx_formal_charge',
  '_atom_site.auth_seq_id',
  '_atom_site.auth_asym_id',
  '_atom_site.pdbx_PDB_model_num',
  'ATOM 1 N N ALA A 1 ? 1.0 2.0 3.0 1.00 10.0 ? 10 H 1',
  'ATOM 2 C CA ALA A 1 ? 1.5 2.5 3.5 1.00 10.0 ? 10 H 1',
  'ATOM 3 C CA GLY A 2 A 4.0 5.0 6.0 1.00 10.0 ? 10 H 1',
  'HETATM 4 ZN ZN ZN B . ? 7.0 8.0 9.0 0.50 30.0 2 501 Z 1',
  'ATOM 5 C CA ALA A 1 ? 1.0 2.0 3.0 1.00 10.0 ? 10 H 2',
  '#',
  '',
].join('\n');

describe('parseStructure', () => {
  describe('PDB format', () => {
    it('groups atoms into chains and residues in file order', () => {
      const result = parseStructure('1ABC', {
        format: StructureFormat.PDB,
        text: buildPdb([
          { id: 'A', residues: 3 },
          { id: 'B', residues: 2 },
        ]),
      });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.pdbId).toBe('1ABC');
      expect(result.value.format).toBe(StructureFormat.PDB);
      expect(result.value.chains.map((c) => [c.id, c.residueCount])).toEqual([
        ['A', 3],
        ['B', 2],
      ]);
    });

    it('keeps insertion codes and first-seen residue order', () => {
      const text = [
        atomLine({ chain: 'H', resSeq: 1, serial: 1 }),
        atomLine({ chain: 'H', resSeq: 2, serial: 2 }),
        atomLine({ chain: 'H', resSeq: 2, iCode: 'A', serial: 3 }),
        atomLine({ chain: 'H', resSeq: 3, serial: 4 }),
        atomLine({ chain: 'H', resSeq: 5, serial: 5 }),
        'END',
      ].join('\n');

      const result = parseStructure('1ABC', { format: StructureFormat.PDB, text });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.chains[0]?.residues.map(residueLabel)).toEqual([
        '1',
        '2',
        '2A',
        '3',
        '5',
      ]);
    });

    it('groups several atoms of one residue together', () => {
      const text = [
        atomLine({ chain: 'A', resSeq: 7, name: 'N', element: 'N', serial: 1 }),
        atomLine({ chain: 'A', resSeq: 7, name: 'CA', serial: 2 }),
        atomLine({ chain: 'A', resSeq: 8, name: 'N', element: 'N', serial: 3 }),
      ].join('\n');

      const result = parseStructure('1ABC', { format: StructureFormat.PDB, text });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const residues = result.value.chains[0]?.residues ?? [];
      expect(residues).toHaveLength(2);
      expect(residues[0]?.atoms.map((a) => a.name)).toEqual(['N', 'CA']);
      expect(residues[0]?.atoms[0]).toEqual({
        kind: 'ATOM',
        serial: 1,
        name: 'N',
        altLoc: '',
        x: 1,
        y: 2,
        z: 3,
        occupancy: 1,
        tempFactor: 20,
        element: 'N',
        charge: '',
      });
    });

    it('reads only the first model', () => {
      const text = [
        'MODEL        1',
        atomLine({ chain: 'A', resSeq: 1, serial: 1 }),
        'ENDMDL',
        'MODEL        2',
        atomLine({ chain: 'A', resSeq: 1, serial: 2 }),
        atomLine({ chain: 'B', resSeq: 1, serial: 3 }),
        'ENDMDL',
        'END',
      ].join('\n');

      const result = parseStructure('1ABC', { format: StructureFormat.PDB, text });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.chains.map((c) => c.id)).toEqual(['A']);
      expect(result.value.chains[0]?.residues[0]?.atoms).toHaveLength(1);
    });

    it('reports Empty when there are no atom records', () => {
      const result = parseStructure('1ABC', {
        format: StructureFormat.PDB,
        text: 'HEADER    NOTHING HERE\nEND\n',
      });

      expect(result).toEqual({
        ok: false,
        error: {
          kind: 'ParseError',
          reason: 'Empty',
          detail: 'No atom records found in pdb file for 1ABC',
        },
      });
    });

    it('fails the entry on a malformed residue number', () => {
      const good = atomLine({ chain: 'A', resSeq: 1 });
      const bad = `${good.slice(0, 22)} 1B2${good.slice(26)}`;

      const result = parseStructure('1ABC', {
        format: StructureFormat.PDB,
        text: ['HEADER    BAD NUMBERING', bad].join('\n'),
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toMatchObject({
        kind: 'ParseError',
        reason: 'MalformedResidueNumbering',
        line: 2,
      });
    });

    it('fails on unreadable coordinates', () => {
      const good = atomLine({ chain: 'A', resSeq: 1 });
      const bad = `${good.slice(0, 30)}   x.xxx${good.slice(38)}`;

      const result = parseStructure('1ABC', { format: StructureFormat.PDB, text: bad });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.reason).toBe('MalformedRecord');
      expect(result.error.line).toBe(1);
    });
  });

  describe('mmCIF format', () => {
    it('uses author chain ids and numbering', () => {
      const result = parseStructure('1ABC', { format: StructureFormat.MMCIF, text: MMCIF_TEXT });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const [heavy, zinc] = result.value.chains;
      expect(result.value.chains.map((c) => c.id)).toEqual(['H', 'Z']);
      expect(heavy?.residues.map(residueLabel)).toEqual(['10', '10A']);
      expect(heavy?.residues[0]?.atoms.map((a) => a.name)).toEqual(['N', 'CA']);
      expect(heavy?.residues[1]?.name).toBe('GLY');
      expect(zinc?.residues.map(residueLabel)).toEqual(['501']);
    });

    it('reads HETATM records with charge and occupancy', () => {
      const result = parseStructure('1ABC', { format: StructureFormat.MMCIF, text: MMCIF_TEXT });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      expect(result.value.chains[1]?.residues[0]?.atoms[0]).toEqual({
        kind: 'HETATM',
        serial: 4,
        name: 'ZN',
        altLoc: '',
        x: 7,
        y: 8,
        z: 9,
        occupancy: 0.5,
        tempFactor: 30,
        element: 'ZN',
        charge: '2+',
      });
    });

    it('skips rows from later models', () => {
      const result = parseStructure('1ABC', { format: StructureFormat.MMCIF, text: MMCIF_TEXT });

      expect(result.ok).toBe(true);
      if (!result.ok) return;
      const atomCount = result.value.chains.reduce(
        (sum, c) => sum + c.residues.reduce((n, r) => n + r.atoms.length, 0),
        0,
      );
      expect(atomCount).toBe(4);
    });

    it('reports MalformedRecord when a row is short', () => {
      const text = MMCIF_TEXT.replace('ATOM 5 C CA ALA A 1 ? 1.0 2.0 3.0 1.00 10.0 ? 10 H 2', 'ATOM 5 C');

      const result = parseStructure('1ABC', { format: StructureFormat.MMCIF, text });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.reason).toBe('MalformedRecord');
    });

    it('reports Empty for a file without an atom_site loop', () => {
      const result = parseStructure('1ABC', {
        format: StructureFormat.MMCIF,
        text: 'data_1ABC\n_entry.id 1ABC\n',
      });

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error.reason).toBe('Empty');
    });
  });
});

describe('tokenizeCifLine', () => {
  it('handles quoted values and primes inside names', () => {
    const tokens = tokenizeCifLine(`ATOM O5' "C A" 'x y' # trailing`, 3);

    expect(tokens.map((t) => t.value)).toEqual(['ATOM', "O5'", 'C A', 'x y']);
    expect(tokens.every((t) => t.line === 3)).toBe(true);
  });
});
