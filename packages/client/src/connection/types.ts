/**
 * @metabridge/client - Connection Types
 *
 * @packageDocumentation
 * @stability stable
 */

import type { ExecutionContext } from '../context/execution-context.js';
import type { MetastoreApi } from '../native.js';

// =============================================================================
// Handles
// =============================================================================

/**
 * An open connection to the metastore service.
 *
 * @description Handles are never mutated. Reconnecting produces a new handle
 * and the previous one is closed.
 *
 * @public
 * @stability stable
 */
export interface ConnectionHandle {
  /** Sequence number, unique per factory */
  readonly id: number;
  /** Session identifier assigned by the service at handshake */
  readonly sessionId: string;
  readonly serverVersion: string;
  /** Epoch milliseconds */
  readonly openedAt: number;
  readonly api: MetastoreApi;
  close(): Promise<void>;
}

/**
 * Opens a new connection for an execution context. The caller owns the
 * returned handle and closes it.
 *
 * @public
 * @stability stable
 */
export type ConnectionFactory = (context: ExecutionContext) => Promise<ConnectionHandle>;

/**
 * Transport half of a connection: an API surface and a way to release it.
 */
export interface OpenedApi {
  api: MetastoreApi;
  close?(): void | Promise<void>;
}

export type ApiOpener = (context: ExecutionContext) => Promise<OpenedApi>;

// =============================================================================
// Events
// =============================================================================

/**
 * Events emitted by the metastore client.
 *
 * @public
 * @stability stable
 */
export type ClientEventType = 'connected' | 'reconnecting' | 'reconnected' | 'error';

export interface ClientEventMap {
  connected: { connectionId: number; sessionId: string };
  reconnecting: { attempt: number; delay: number };
  reconnected: { attempts: number; connectionId: number };
  error: Error;
}

export type ClientEventHandler<E extends ClientEventType> = (event: ClientEventMap[E]) => void;
