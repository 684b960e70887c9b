/**
 * @fileoverview Dependency injection tokens.
 * @module src/container/tokens
 */

export const AppConfig = Symbol.for('AppConfig');
export const StructureSource = Symbol.for('StructureSource');
export const StructurePipelineService = Symbol.for('StructurePipelineService');
