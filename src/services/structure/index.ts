/**
 * @fileoverview Barrel export for the structure pipeline domain.
 * @module src/services/structure/index
 */

// Core
export type { IStructureSource } from './core/IStructureSource.js';
export { SourceFetcher, RAW_DIR, rawFilePath } from './core/SourceFetcher.js';
export {
  EntryProcessor,
  ANTIGENS_DIR,
  ANTIBODIES_DIR,
  antigenPath,
  antibodyPath,
} from './core/EntryProcessor.js';
export { FailureLedgerStore, LEDGER_FILE, SUMMARY_FILE } from './core/FailureLedgerStore.js';
export { OutcomeAggregator } from './core/OutcomeAggregator.js';
export { BatchOrchestrator, selectEntries } from './core/BatchOrchestrator.js';
export { StructurePipelineService } from './core/StructurePipelineService.js';
export type {
  ProcessOneParams,
  RetryFailedParams,
  RunBatchParams,
  RunSabdabTableParams,
  SabdabRunResult,
} from './core/StructurePipelineService.js';

// Stages
export { parseStructure, residueLabel } from './parsing/structureParser.js';
export { splitStructure } from './splitting/chainSplitter.js';
export { StructureWriter, formatPdb } from './writing/StructureWriter.js';
export {
  createChainAssignment,
  isValidPdbId,
  normalizePdbId,
  parseChainIds,
} from './chainAssignment.js';

// Providers
export { RcsbStructureSource } from './providers/rcsb.source.js';

// Types
export * from './types.js';
