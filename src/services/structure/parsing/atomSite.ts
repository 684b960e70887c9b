/**
 * @fileoverview Format-neutral atom site produced by the format readers and consumed
 * by residue/chain grouping.
 * @module src/services/structure/parsing/atomSite
 */
import type { AtomRecord, ParseError, Result } from '../types.js';
import { err, ok } from '../types.js';

export interface AtomSite {
  chainId: string;
  residueNumber: number;
  insertionCode: string;
  residueName: string;
  atom: AtomRecord;
  /** 1-based source line */
  line: number;
}

const RESIDUE_NUMBER_PATTERN = /^-?\d+$/;

/**
 * Validates a residue number and insertion code pair.
 * The number must be a plain integer; the insertion code at most one character.
 */
export function parseResidueNumbering(
  numberToken: string,
  insertionCode: string,
  line: number,
): Result<{ number: number; insertionCode: string }, ParseError> {
  const numberText = numberToken.trim();
  const code = insertionCode.trim();

  if (!RESIDUE_NUMBER_PATTERN.test(numberText) || code.length > 1) {
    return err({
      kind: 'ParseError',
      reason: 'MalformedResidueNumbering',
      detail: `Cannot read residue number "${numberText}${code}" on line ${line}`,
      line,
    });
  }

  return ok({ number: Number.parseInt(numberText, 10), insertionCode: code });
}

/**
 * Parses a required numeric field; `undefined` when it is not a finite number.
 */
export function parseNumber(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === '') return undefined;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

/**
 * Element symbol guessed from an atom name when the element column is blank.
 */
export function inferElement(atomName: string): string {
  const match = /[A-Za-z]/.exec(atomName);
  return match ? match[0].toUpperCase() : '';
}

export function malformedRecord(detail: string, line: number): ParseError {
  return { kind: 'ParseError', reason: 'MalformedRecord', detail, line };
}
