/**
 * @fileoverview Types for SAbDab summary tables.
 * @module src/services/sabdab/types
 */
import type { BatchEntry } from '@/services/structure/types.js';

export const REQUIRED_COLUMNS = ['pdb', 'Hchain', 'antigen_chain'] as const;

export type RejectionReason =
  | 'MalformedRow'
  | 'InvalidIdentifier'
  | 'EmptyAntigen'
  | 'EmptyAntibody'
  | 'OverlappingChains';

export interface RejectedRow {
  /** 1-based line number in the file, counting the header as line 1 */
  rowNumber: number;
  pdbId: string;
  reason: RejectionReason;
  detail: string;
}

export interface SabdabTable {
  totalRows: number;
  entries: BatchEntry[];
  rejected: RejectedRow[];
}
