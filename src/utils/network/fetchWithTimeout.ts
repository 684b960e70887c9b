/**
 * @fileoverview Provides utility functions to make fetch requests with a specified timeout.
 * @module src/utils/network/fetchWithTimeout
 */
import { JsonRpcErrorCode, McpError } from '@/types-global/errors.js';
import { logger } from '@/utils/internal/logger.js';
import type { RequestContext } from '@/utils/internal/requestContext.js';

/**
 * Options for the fetchWithTimeout utility.
 * Extends standard RequestInit and includes timeout.
 */
export interface FetchWithTimeoutOptions extends Omit<RequestInit, 'signal'> {
  timeout?: number;
}

const DEFAULT_TIMEOUT_MS = 30000;

function networkError(
  operationDescription: string,
  urlString: string,
  error: unknown,
  context?: RequestContext,
): McpError {
  const errorMessage = error instanceof Error ? error.message : String(error);
  logger.warning(`Network error during ${operationDescription}: ${errorMessage}`, {
    ...context,
    originalErrorName: error instanceof Error ? error.name : 'UnknownError',
    errorSource: 'FetchNetworkError',
  });
  return new McpError(
    JsonRpcErrorCode.ServiceUnavailable,
    `Network error during ${operationDescription}: ${errorMessage}`,
    { requestId: context?.requestId, url: urlString, errorSource: 'FetchNetworkError' },
  );
}

function assertOk(response: Response, urlString: string, context?: RequestContext): void {
  if (response.ok) return;

  const notFound = response.status === 404;
  logger.warning(`Fetch failed for ${urlString} with status ${response.status}.`, {
    ...context,
    errorSource: 'FetchHttpError',
    statusCode: response.status,
    statusText: response.statusText,
  });
  throw new McpError(
    notFound ? JsonRpcErrorCode.NotFound : JsonRpcErrorCode.ServiceUnavailable,
    `HTTP error! Status: ${response.status} ${response.statusText}`.trim(),
    {
      requestId: context?.requestId,
      url: urlString,
      errorSource: 'FetchHttpError',
      statusCode: response.status,
    },
  );
}

/**
 * Runs the request and `read` under one timer. The timer is cleared only after
 * `read` settles, so a body that stalls mid-transfer still times out.
 */
async function fetchAndRead<T>(
  url: string | URL,
  options: FetchWithTimeoutOptions,
  context: RequestContext | undefined,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const { timeout, ...fetchOptions } = options;
  const timeoutMs = timeout ?? DEFAULT_TIMEOUT_MS;
  const urlString = url.toString();
  const operationDescription = `fetch ${fetchOptions.method ?? 'GET'} ${urlString}`;

  const controller = new AbortController();
  const timedOut = new Promise<never>((_resolve, reject) => {
    controller.signal.addEventListener(
      'abort',
      () => {
        logger.warning(`${operationDescription} timed out after ${timeoutMs}ms.`, {
          ...context,
          errorSource: 'FetchTimeout',
        });
        reject(
          new McpError(
            JsonRpcErrorCode.Timeout,
            `${operationDescription} timed out after ${timeoutMs}ms.`,
            { requestId: context?.requestId, url: urlString, errorSource: 'FetchTimeout' },
          ),
        );
      },
      { once: true },
    );
  });
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  logger.debug(`Attempting ${operationDescription} with ${timeoutMs}ms timeout.`, {
    ...context,
  });

  // After a timeout the race has already settled; later failures are not reported
  const fail = (error: unknown): unknown =>
    controller.signal.aborted
      ? error
      : networkError(operationDescription, urlString, error, context);

  const exchange = async (): Promise<T> => {
    let response: Response;
    try {
      response = await fetch(url, { ...fetchOptions, signal: controller.signal });
    } catch (error) {
      throw fail(error);
    }

    logger.debug(`Fetched ${urlString}. Status: ${response.status}`, { ...context });
    assertOk(response, urlString, context);

    try {
      return await read(response);
    } catch (error) {
      throw fail(error);
    }
  };

  try {
    return await Promise.race([exchange(), timedOut]);
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Fetches a resource, aborting if the response headers do not arrive within
 * `options.timeout` milliseconds. Reading the returned body is not timed; use
 * {@link fetchTextWithTimeout} when the whole transfer must be bounded.
 *
 * @returns The response; only 2xx responses are returned.
 * @throws {McpError} `NotFound` for HTTP 404, `ServiceUnavailable` for any other
 *   non-2xx status or network failure, `Timeout` when the request is aborted.
 */
export async function fetchWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {},
  context?: RequestContext,
): Promise<Response> {
  return fetchAndRead(url, options, context, async (response) => response);
}

/**
 * Fetches a resource and reads its body as text, with the timeout covering
 * the whole transfer.
 *
 * @throws {McpError} as {@link fetchWithTimeout}; a body that fails or stalls
 *   gives `ServiceUnavailable` or `Timeout`.
 */
export async function fetchTextWithTimeout(
  url: string | URL,
  options: FetchWithTimeoutOptions = {},
  context?: RequestContext,
): Promise<string> {
  return fetchAndRead(url, options, context, (response) => response.text());
}
