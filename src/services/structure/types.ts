/**
 * @fileoverview Type definitions for the structure acquisition and splitting pipeline.
 * Defines the chain/residue model, the per-stage result and error values, and the
 * batch bookkeeping records.
 * @module src/services/structure/types
 */

/**
 * 4-character PDB identifier, always upper case once normalized (e.g., "6OEJ")
 */
export type PdbId = string;

/**
 * Raw structure file formats served by the archive
 */
export enum StructureFormat {
  /** Legacy fixed-column format */
  PDB = 'pdb',
  /** Tagged-field PDBx/mmCIF format */
  MMCIF = 'mmcif',
}

/**
 * File extension used for each format, both remotely and under `raw/`
 */
export const FORMAT_EXTENSIONS: Readonly<Record<StructureFormat, string>> = {
  [StructureFormat.PDB]: 'pdb',
  [StructureFormat.MMCIF]: 'cif',
};

/**
 * Either a success value or a typed failure. Every pipeline stage returns one.
 */
export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export const ok = <T>(value: T): { ok: true; value: T } => ({ ok: true, value });
export const err = <E>(error: E): { ok: false; error: E } => ({
  ok: false,
  error,
});

/**
 * Raw file contents tagged with the format they were fetched in
 */
export type RawStructure =
  | { format: StructureFormat.PDB; text: string }
  | { format: StructureFormat.MMCIF; text: string };

export type AtomRecordKind = 'ATOM' | 'HETATM';

/**
 * One atom site. Carried from parser to writer without modification.
 */
export interface AtomRecord {
  kind: AtomRecordKind;
  serial: number;
  name: string;
  altLoc: string;
  x: number;
  y: number;
  z: number;
  occupancy: number;
  tempFactor: number;
  element: string;
  charge: string;
}

export interface ResidueRecord {
  /** Author residue number; may be negative or non-contiguous */
  number: number;
  /** Insertion code, empty string when absent */
  insertionCode: string;
  name: string;
  atoms: AtomRecord[];
}

export interface ChainRecord {
  id: string;
  residues: ResidueRecord[];
  residueCount: number;
}

/**
 * Parsed structure, owned by the invocation that created it
 */
export interface ParsedStructure {
  pdbId: PdbId;
  format: StructureFormat;
  chains: ChainRecord[];
}

/**
 * Antigen and antibody chain ids for one entry. Build with
 * `createChainAssignment`, which enforces non-empty, de-duplicated, disjoint sides.
 */
export interface ChainAssignment {
  readonly antigen: readonly string[];
  readonly antibody: readonly string[];
}

export interface BatchEntry {
  pdbId: PdbId;
  assignment: ChainAssignment;
}

// ---------------------------------------------------------------------------
// Stage results and errors
// ---------------------------------------------------------------------------

export interface FetchAttempt {
  format: StructureFormat;
  attempt: number;
  message: string;
}

export interface FetchResult {
  path: string;
  format: StructureFormat;
  /** True when an existing raw file was reused without a network call */
  skipped: boolean;
}

export interface FetchError {
  kind: 'FetchError';
  reason: 'Unavailable' | 'StorageFailure';
  pdbId: PdbId;
  detail: string;
  attempts: FetchAttempt[];
}

export interface ParseError {
  kind: 'ParseError';
  reason: 'MalformedResidueNumbering' | 'MalformedRecord' | 'Empty';
  detail: string;
  /** 1-based line of the offending record, when known */
  line?: number | undefined;
}

export interface SplitStructures {
  antigen: ParsedStructure;
  antibody: ParsedStructure;
}

export type SplitError =
  | { kind: 'SplitError'; reason: 'ChainNotFound'; missing: string[]; available: string[] }
  | { kind: 'SplitError'; reason: 'OverlappingChains'; overlapping: string[] };

export interface WriteSummary {
  path: string;
  chainIds: string[];
  residueCount: number;
  atomCount: number;
}

export interface WriteError {
  kind: 'WriteError';
  reason:
    | 'IOFailure'
    | 'ChainIdTooLong'
    | 'ResidueNumberOutOfRange'
    | 'ResidueNameTooLong';
  path: string;
  detail: string;
}

// ---------------------------------------------------------------------------
// Outcomes and batch bookkeeping
// ---------------------------------------------------------------------------

export enum OutcomeStatus {
  SUCCESS = 'Success',
  DOWNLOAD_FAILED = 'DownloadFailed',
  PARSE_FAILED = 'ParseFailed',
  CHAIN_NOT_FOUND = 'ChainNotFound',
  WRITE_FAILED = 'WriteFailed',
}

export type FailureStatus = Exclude<OutcomeStatus, OutcomeStatus.SUCCESS>;

/**
 * Failure sub-reason: the `reason` of the stage error that ended the entry
 */
export type FailureReason =
  | FetchError['reason']
  | ParseError['reason']
  | SplitError['reason']
  | WriteError['reason']
  | 'UnexpectedError';

export interface OutputSummary {
  path: string;
  chainIds: string[];
  /** Not known when an existing output file was kept */
  residueCount?: number | undefined;
}

/**
 * Result of one EntryProcessor run. Frozen on creation.
 */
export interface OutcomeRecord {
  readonly pdbId: PdbId;
  readonly status: OutcomeStatus;
  readonly reason?: FailureReason | undefined;
  readonly detail?: string | undefined;
  readonly assignment: ChainAssignment;
  readonly startedAt: string;
  readonly finishedAt: string;
  /** True when the raw file was reused from a previous run */
  readonly rawReused: boolean;
  /** True when both output files existed and the entry was not processed again */
  readonly outputsReused: boolean;
  readonly antigen?: OutputSummary | undefined;
  readonly antibody?: OutputSummary | undefined;
}

export interface LedgerEntry {
  status: FailureStatus;
  reason: FailureReason;
  detail: string;
  timestamp: string;
  antigenChains: string[];
  antibodyChains: string[];
}

/**
 * Persisted mapping of identifier to its last failing outcome
 */
export type FailureLedger = Record<PdbId, LedgerEntry>;

/**
 * Aggregate of one run. Serialized with snake_case keys.
 */
export interface SummaryReport {
  total: number;
  success: number;
  failed: number;
  failure_breakdown: Record<string, number>;
  by_status: Record<OutcomeStatus, number>;
  raw_reused: number;
  outputs_reused: number;
  started_at: string;
  finished_at: string;
  duration_seconds: number;
}

export interface BatchRunOptions {
  outputDir: string;
  parallelism?: number | undefined;
  incremental?: boolean | undefined;
  limit?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface RetryOptions {
  outputDir: string;
  parallelism?: number | undefined;
  limit?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface ProcessEntryOptions {
  outputDir: string;
  force?: boolean | undefined;
}
