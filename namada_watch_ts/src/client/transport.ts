import { TransportError } from '../types';
import { maybeCoerceError } from '../utils/helpers';

/** The raw ABCI query capability the client is handed. */
export interface AbciTransport {
  rawQuery(path: string, data: Uint8Array, height?: number): Promise<Uint8Array>;
}

const RETRYABLE_PATTERN =
  /timeout|timed out|ETIMEDOUT|ECONNRESET|ECONNREFUSED|ECONNABORTED|EAI_AGAIN|ENOTFOUND|EPIPE|socket hang up|network|fetch failed|status code (429|5\d\d)|bad status on response: (429|5\d\d)/i;

function describeError(error: unknown): string {
  const parts = [maybeCoerceError(error).message];
  if (typeof error === 'object' && error !== null) {
    if ('code' in error && typeof error.code === 'string') parts.push(error.code);
    if ('cause' in error && error.cause !== undefined) parts.push(describeError(error.cause));
  }
  return parts.join(' ');
}

/**
 * Maps anything the RPC stack throws onto a `TransportError`. Network
 * failures, timeouts and overloaded nodes are retryable; everything else
 * (JSON-RPC errors, malformed requests) is not.
 */
export function classifyTransportError(error: unknown): TransportError {
  if (error instanceof TransportError) return error;
  const description = describeError(error);
  return new TransportError(
    maybeCoerceError(error).message,
    RETRYABLE_PATTERN.test(description)
  );
}
