/**
 * Error classification for capability calls
 *
 * retryable: connection failures, timeouts, HTTP 429 and 5xx
 * permanent: every other failure (4xx, malformed payloads, programming errors)
 */

import { isAxiosError } from 'axios';
import { PipelineError } from '../errors';

export type ErrorClassification = 'retryable' | 'permanent';

const RETRYABLE_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ESOCKETTIMEDOUT',
  'EPIPE',
  'EAI_AGAIN',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
  'UND_ERR_HEADERS_TIMEOUT',
]);

// Connection-level errors thrown by the SDKs behind LangChain and Qdrant
const CONNECTION_ERROR_NAMES = new Set([
  'APIConnectionError',
  'APIConnectionTimeoutError',
  'AbortError',
  'TimeoutError',
  'ConnectTimeoutError',
  'FetchError',
]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * HTTP status carried by an upstream error, if any
 */
export function extractStatus(error: unknown): number | undefined {
  if (isAxiosError(error)) {
    return error.response?.status;
  }
  if (!isRecord(error)) {
    return undefined;
  }
  for (const key of ['status', 'statusCode']) {
    const value = error[key];
    if (typeof value === 'number') {
      return value;
    }
  }
  const response = error.response;
  if (isRecord(response) && typeof response.status === 'number') {
    return response.status;
  }
  return undefined;
}

function isConnectionFailure(error: unknown, depth = 0): boolean {
  if (!isRecord(error) || depth > 2) {
    return false;
  }
  if (typeof error.code === 'string' && RETRYABLE_ERROR_CODES.has(error.code)) {
    return true;
  }
  if (typeof error.name === 'string' && CONNECTION_ERROR_NAMES.has(error.name)) {
    return true;
  }
  // fetch() reports socket failures as TypeError with the errno on `cause`
  return isConnectionFailure(error.cause, depth + 1);
}

export function classifyError(error: unknown): ErrorClassification {
  if (error instanceof PipelineError) {
    return error.retryable ? 'retryable' : 'permanent';
  }

  const status = extractStatus(error);
  if (status !== undefined) {
    return status === 429 || status >= 500 ? 'retryable' : 'permanent';
  }

  return isConnectionFailure(error) ? 'retryable' : 'permanent';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
