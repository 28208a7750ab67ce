/**
 * Retry-Reconnect Coordinator
 *
 * Serializes catalog calls of one client and retries transient failures
 * after replacing the connection. A call gets `retryLimit` retries and must
 * start its last retry before `retryLimit * retryDelay` has elapsed.
 *
 * @packageDocumentation
 */

import type { ClientEventEmitter } from '../connection/event-emitter.js';
import type { ConnectionFactory, ConnectionHandle } from '../connection/types.js';
import type { ExecutionContext } from '../context/execution-context.js';
import { runInSession, withResolutionScope, type CatalogSession } from '../context/session-scope.js';
import { ConnectionError, TransientRpcError } from '../errors.js';
import type { StructuredLogger } from '../logging/index.js';
import { isTransientFailure, summarizeFailure } from './classify.js';
import { AsyncMutex } from './mutex.js';

export type Sleep = (ms: number) => Promise<void>;
export type Clock = () => number;

export const defaultSleep: Sleep = (ms) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export interface RetryCoordinatorOptions {
  context: ExecutionContext;
  connection: ConnectionHandle;
  connectionFactory: ConnectionFactory;
  /** Retries after the first attempt */
  retryLimit: number;
  /** Milliseconds between attempts */
  retryDelay: number;
  logger: StructuredLogger;
  events: ClientEventEmitter;
  sleep?: Sleep;
  clock?: Clock;
}

/**
 * Counters across every call of a client.
 *
 * @public
 * @stability stable
 */
export interface RetryStats {
  /** Attempts made, first tries included */
  attempts: number;
  /** Attempts that followed a transient failure */
  retries: number;
  /** Connections that replaced a failed one */
  reconnects: number;
  /** Summary of the most recent transient failure */
  lastFailure?: string;
}

export class RetryCoordinator {
  readonly retryLimit: number;
  readonly retryDelay: number;

  private connection: ConnectionHandle;
  private closed = false;
  private readonly mutex = new AsyncMutex();
  private readonly counters: RetryStats = { attempts: 0, retries: 0, reconnects: 0 };
  private readonly context: ExecutionContext;
  private readonly connectionFactory: ConnectionFactory;
  private readonly logger: StructuredLogger;
  private readonly events: ClientEventEmitter;
  private readonly sleep: Sleep;
  private readonly clock: Clock;

  constructor(options: RetryCoordinatorOptions) {
    this.context = options.context;
    this.connection = options.connection;
    this.connectionFactory = options.connectionFactory;
    this.retryLimit = options.retryLimit;
    this.retryDelay = options.retryDelay;
    this.logger = options.logger;
    this.events = options.events;
    this.sleep = options.sleep ?? defaultSleep;
    this.clock = options.clock ?? Date.now;
  }

  /** The connection the next attempt will use. */
  get currentConnection(): ConnectionHandle {
    return this.connection;
  }

  stats(): RetryStats {
    return { ...this.counters };
  }

  /**
   * Runs an operation exclusively, inside the client's session and format
   * resolution scope, retrying it on transient failures.
   *
   * @throws {TransientRpcError} When transient failures outlast the retry budget or deadline
   * @throws {ConnectionError} When the client is closed
   */
  async withClient<T>(operation: (session: CatalogSession) => Promise<T>): Promise<T> {
    return this.mutex.runExclusive(async () => {
      if (this.closed) {
        throw ConnectionError.closed();
      }
      return this.retryLoop(operation);
    });
  }

  /**
   * Closes the current connection once in-flight calls have finished.
   */
  async close(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      if (this.closed) {
        return;
      }
      this.closed = true;
      await this.connection.close();
    });
  }

  private async retryLoop<T>(operation: (session: CatalogSession) => Promise<T>): Promise<T> {
    const deadline = this.clock() + this.retryLimit * this.retryDelay;
    let attempts = 0;

    for (;;) {
      attempts++;
      this.counters.attempts++;
      if (attempts > 1) {
        this.counters.retries++;
      }

      const session: CatalogSession = { context: this.context, connection: this.connection };
      try {
        return await runInSession(session, () =>
          withResolutionScope(this.context.resolver, () => operation(session))
        );
      } catch (error) {
        if (!isTransientFailure(error)) {
          throw error;
        }
        this.counters.lastFailure = summarizeFailure(error);

        const now = this.clock();
        if (attempts <= this.retryLimit && now < deadline) {
          this.logger.warn(
            'Catalog call failed, retrying ({remaining} of {retryLimit} retries left)',
            { remaining: this.retryLimit - attempts, retryLimit: this.retryLimit, attempt: attempts },
            error
          );
          this.events.emit('reconnecting', { attempt: attempts, delay: this.retryDelay });
          await this.sleep(this.retryDelay);
          await this.reconnect(attempts);
          continue;
        }

        if (now >= deadline) {
          this.logger.warn('Deadline for catalog call passed after {attempts} attempts', { attempts });
        }
        const failure =
          error instanceof TransientRpcError
            ? error
            : new TransientRpcError(
                `Catalog call failed after ${attempts} attempt(s): ${summarizeFailure(error)}`,
                attempts,
                error
              );
        this.events.emit('error', failure);
        throw failure;
      }
    }
  }

  private async reconnect(attempt: number): Promise<void> {
    const previous = this.connection;
    let replacement: ConnectionHandle;
    try {
      replacement = await this.connectionFactory(this.context);
    } catch (error) {
      if (!isTransientFailure(error)) {
        throw error;
      }
      this.logger.warn('Reconnect after attempt {attempt} failed', { attempt }, error);
      return;
    }

    this.connection = replacement;
    this.counters.reconnects++;
    this.events.emit('connected', { connectionId: replacement.id, sessionId: replacement.sessionId });
    this.events.emit('reconnected', { attempts: attempt, connectionId: replacement.id });
    this.logger.debug('Replaced connection {previousId} with {connectionId}', {
      previousId: previous.id,
      connectionId: replacement.id,
    });

    try {
      await previous.close();
    } catch (error) {
      this.logger.warn('Failed to close connection {connectionId}', { connectionId: previous.id }, error);
    }
  }
}
