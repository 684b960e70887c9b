/**
 * @fileoverview Creation of request contexts used for log correlation.
 * @module src/utils/internal/requestContext
 */
import { randomUUID } from 'node:crypto';

/**
 * Context threaded through service calls and attached to every log line.
 */
export interface RequestContext {
  requestId: string;
  timestamp: string;
  operation?: string;
  [key: string]: unknown;
}

export interface CreateRequestContextParams {
  operation: string;
  parentContext?: RequestContext | undefined;
  additionalContext?: Record<string, unknown>;
}

export const requestContextService = {
  /**
   * Builds a new context. A parent context keeps its `requestId` so that
   * nested operations stay correlated.
   */
  createRequestContext(params: CreateRequestContextParams): RequestContext {
    const { operation, parentContext, additionalContext } = params;
    return {
      ...parentContext,
      ...additionalContext,
      requestId: parentContext?.requestId ?? randomUUID(),
      timestamp: new Date().toISOString(),
      operation,
    };
  },
};
