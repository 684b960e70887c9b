/**
 * @fileoverview Barrel export for the SAbDab table domain.
 * @module src/services/sabdab/index
 */
export { SabdabTableReader, convertRow, normalizeChainId } from './SabdabTableReader.js';
export type * from './types.js';
