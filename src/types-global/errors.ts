/**
 * @fileoverview Error codes and the shared error class used across the server.
 * Codes follow JSON-RPC 2.0; the -32000 range carries server-defined failures.
 * @module src/types-global/errors
 */

/**
 * JSON-RPC error codes used by the server.
 */
export enum JsonRpcErrorCode {
  // Standard JSON-RPC 2.0
  InternalError = -32603,

  // Server-defined
  ServiceUnavailable = -32000,
  NotFound = -32001,
  Timeout = -32004,
  ValidationError = -32007,
  ConfigurationError = -32008,
  SerializationError = -32070,
}

/**
 * Error carrying a {@link JsonRpcErrorCode} and optional structured data.
 */
export class McpError extends Error {
  public readonly code: JsonRpcErrorCode;
  public readonly data?: Record<string, unknown> | undefined;

  constructor(
    code: JsonRpcErrorCode,
    message: string,
    data?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'McpError';
    this.code = code;
    this.data = data;
    Object.setPrototypeOf(this, McpError.prototype);
  }
}
