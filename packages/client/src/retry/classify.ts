/**
 * Classification of catalog call failures.
 *
 * A failure is transient when any error in its cause chain names a transport
 * or protocol failure. Everything else, a failed catalog command included, is
 * a logical failure and is never retried.
 */

import { isTransientRpcError, QueryExecutionError } from '../errors.js';

/** Markers of transport-level failures, matched against messages and codes. */
export const TRANSIENT_FAILURE_MARKERS: readonly string[] = [
  'TTransportException',
  'TProtocolException',
  'TApplicationException',
  'ECONNRESET',
  'ECONNREFUSED',
  'EPIPE',
  'ETIMEDOUT',
  'socket hang up',
  'fetch failed',
  'RPC session failed',
];

const TRANSIENT_PATTERN = new RegExp(
  TRANSIENT_FAILURE_MARKERS.map((marker) => marker.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')).join('|')
);

const MAX_CAUSE_DEPTH = 32;

/**
 * Returns the error followed by its causes, outermost first. Cycles end the chain.
 */
export function causeChain(error: unknown): unknown[] {
  const chain: unknown[] = [];
  const seen = new Set<unknown>();
  let current: unknown = error;
  while (current !== undefined && current !== null && !seen.has(current) && chain.length < MAX_CAUSE_DEPTH) {
    chain.push(current);
    seen.add(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

function describe(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? `${error.name} ${code} ${error.message}` : `${error.name} ${error.message}`;
}

/**
 * Whether a failure should be retried after reconnecting.
 */
export function isTransientFailure(error: unknown): boolean {
  if (isTransientRpcError(error)) {
    return true;
  }
  // The command ran; its message is the catalog's, not the transport's
  if (error instanceof QueryExecutionError) {
    return false;
  }
  return causeChain(error).some((link) => TRANSIENT_PATTERN.test(describe(link)));
}

/**
 * One-line summary of a failure and its causes.
 */
export function summarizeFailure(error: unknown): string {
  return causeChain(error)
    .map((link) => (link instanceof Error ? `${link.name}: ${link.message}` : String(link)))
    .join(' <- ');
}
