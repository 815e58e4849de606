import axios from 'axios';
import { ExternalApiException } from '../../utils/exceptions';
import { FetchErrorKind } from './stats-provider.types';

/** Axios/Node error codes for timeouts */
const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

/** Network error codes that indicate the connection itself failed */
const CONNECTION_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EHOSTUNREACH',
  'EAI_AGAIN',
  'ERR_NETWORK',
]);

/**
 * Determines which fetch failure class an error belongs to.
 * Any response from the upstream (even a 5xx) is an HTTP error; only
 * failures with no response at all are timeouts or connection errors.
 */
export function classifyFetchError(error: unknown): FetchErrorKind {
  if (error instanceof StatsFetchError) return error.kind;
  if (!axios.isAxiosError(error)) return 'unexpected';

  if (error.response) return 'http';

  if (error.code && TIMEOUT_CODES.has(error.code)) return 'timeout';
  if (error.message?.toLowerCase().includes('timeout')) return 'timeout';
  if (error.code && CONNECTION_CODES.has(error.code)) return 'connection';

  // Request went out but nothing came back
  if (error.request) return 'connection';

  return 'unexpected';
}

/**
 * Thrown by career stats providers. The kind drives the retry decision.
 */
export class StatsFetchError extends ExternalApiException {
  constructor(
    public readonly kind: FetchErrorKind,
    apiName: string,
    operation: string,
    message: string,
    statusCode?: number,
    originalError?: Error
  ) {
    super(apiName, operation, message, statusCode, originalError);
  }

  /**
   * Wraps a caught error, classifying it on the way.
   */
  static fromError(apiName: string, operation: string, error: unknown): StatsFetchError {
    if (error instanceof StatsFetchError) return error;

    const originalError = error instanceof Error ? error : new Error(String(error));
    const statusCode = axios.isAxiosError(error) ? error.response?.status : undefined;
    const fetchError = new StatsFetchError(
      classifyFetchError(error),
      apiName,
      operation,
      originalError.message || 'Unknown error',
      statusCode,
      originalError
    );
    // Keep the root cause's trace for the error log
    if (originalError.stack) {
      fetchError.stack = `${fetchError.stack}\nCaused by: ${originalError.stack}`;
    }
    return fetchError;
  }
}
