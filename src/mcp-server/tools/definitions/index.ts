/**
 * @fileoverview Barrel file for all tool definitions.
 * This file re-exports all tool definitions for easy import and registration.
 * It also exports an array of all definitions for automated registration.
 * @module src/mcp-server/tools/definitions
 */

import { structureInspectChainsTool } from './structure-inspect-chains.tool.js';
import { structureProcessEntryTool } from './structure-process-entry.tool.js';
import { structureRetryFailedTool } from './structure-retry-failed.tool.js';
import { structureRunBatchTool } from './structure-run-batch.tool.js';

/**
 * An array containing all tool definitions for easy iteration.
 */
export const allToolDefinitions = [
  structureRunBatchTool,
  structureProcessEntryTool,
  structureRetryFailedTool,
  structureInspectChainsTool,
];

export {
  structureInspectChainsTool,
  structureProcessEntryTool,
  structureRetryFailedTool,
  structureRunBatchTool,
};
