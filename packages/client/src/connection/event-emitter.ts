/**
 * @metabridge/client - Client Event Emitter
 *
 * @packageDocumentation
 * @stability stable
 */

import type { ClientEventHandler, ClientEventMap, ClientEventType } from './types.js';

type ListenerTable = { [E in ClientEventType]?: Set<ClientEventHandler<E>> };

/**
 * Typed event emitter for the metastore client.
 *
 * @example
 * ```typescript
 * const emitter = new ClientEventEmitter();
 *
 * emitter.on('reconnecting', ({ attempt, delay }) => console.log(attempt, delay));
 * emitter.emit('reconnecting', { attempt: 1, delay: 1000 });
 * ```
 *
 * @public
 * @stability stable
 */
export class ClientEventEmitter {
  private listeners: ListenerTable = {};

  /**
   * Registers an event listener for the specified event type.
   */
  on<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    const listeners: { [K in E]?: Set<ClientEventHandler<K>> } = this.listeners;
    const handlers: Set<ClientEventHandler<E>> = listeners[event] ?? new Set<ClientEventHandler<E>>();
    handlers.add(handler);
    listeners[event] = handlers;
  }

  /**
   * Removes an event listener. Unknown handlers are ignored.
   */
  off<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    const handlers: Set<ClientEventHandler<E>> | undefined = this.listeners[event];
    handlers?.delete(handler);
  }

  /**
   * Registers a listener that is removed after its first call.
   */
  once<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    const onceHandler: ClientEventHandler<E> = (data) => {
      this.off(event, onceHandler);
      handler(data);
    };
    this.on(event, onceHandler);
  }

  /**
   * Emits an event to all registered listeners. A throwing listener does not
   * stop the others.
   */
  emit<E extends ClientEventType>(event: E, data: ClientEventMap[E]): void {
    const handlers: Set<ClientEventHandler<E>> | undefined = this.listeners[event];
    if (!handlers) {
      return;
    }
    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error) {
        console.error(`Error in ${event} event handler:`, error);
      }
    }
  }

  /**
   * Removes all listeners for an event, or all listeners if no event specified.
   */
  clear(event?: ClientEventType): void {
    if (event) {
      delete this.listeners[event];
    } else {
      this.listeners = {};
    }
  }

  listenerCount(event: ClientEventType): number {
    return this.listeners[event]?.size ?? 0;
  }
}
