/**
 * @metabridge/client - Connection Factory
 *
 * Turns an API opener into a {@link ConnectionFactory}: opens the transport
 * and performs the handshake. Every call yields a new handle owned by the
 * caller, so clients sharing an execution context never share a connection.
 *
 * @packageDocumentation
 * @stability stable
 */

import { ConnectionError } from '../errors.js';
import type { NativeHandshake } from '../native.js';
import type { ApiOpener, ConnectionFactory, ConnectionHandle, OpenedApi } from './types.js';

let nextConnectionId = 1;

function createHandle(opened: OpenedApi, sessionId: string, serverVersion: string): ConnectionHandle {
  let closed = false;
  return {
    id: nextConnectionId++,
    sessionId,
    serverVersion,
    openedAt: Date.now(),
    api: opened.api,
    async close(): Promise<void> {
      if (closed) {
        return;
      }
      closed = true;
      await opened.close?.();
    },
  };
}

/**
 * Creates a connection factory over an API opener.
 *
 * @example
 * ```typescript
 * const catalog = new InMemoryCatalog();
 * const factory = createConnectionFactory(async () => ({ api: catalog }));
 * ```
 *
 * @public
 * @stability stable
 */
export function createConnectionFactory(open: ApiOpener): ConnectionFactory {
  return async (context) => {
    const opened = await open(context);
    let handshake: NativeHandshake;
    try {
      handshake = await opened.api.handshake(context.configEntries());
    } catch (error) {
      await opened.close?.();
      throw error;
    }
    if (!handshake.sessionId) {
      await opened.close?.();
      throw ConnectionError.failed('Metastore handshake returned no session id');
    }

    return createHandle(opened, handshake.sessionId, handshake.serverVersion);
  };
}
