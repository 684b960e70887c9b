/**
 * @fileoverview Barrel export for shared utilities.
 * @module src/utils/index
 */
export { logger, Logger, type LogContext } from './internal/logger.js';
export {
  requestContextService,
  type CreateRequestContextParams,
  type RequestContext,
} from './internal/requestContext.js';
export { atomicWriteFile, pathExists } from './internal/fileSystem.js';
export {
  fetchTextWithTimeout,
  fetchWithTimeout,
  type FetchWithTimeoutOptions,
} from './network/fetchWithTimeout.js';
