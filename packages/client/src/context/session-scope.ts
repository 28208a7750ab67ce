/**
 * Ambient session scope.
 *
 * Catalog calls run with a session (execution context plus connection) and a
 * format resolution scope bound through AsyncLocalStorage. Scopes are entered
 * with `run()`, so the caller's scope is back in place however the callback exits.
 *
 * @packageDocumentation
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { ConnectionHandle } from '../connection/types.js';
import type { ExecutionContext } from './execution-context.js';
import { defaultFormatResolver, type FormatResolver } from './format-resolver.js';

/**
 * What a catalog call runs against.
 */
export interface CatalogSession {
  readonly context: ExecutionContext;
  readonly connection: ConnectionHandle;
}

const sessionStorage = new AsyncLocalStorage<CatalogSession>();
const resolverStorage = new AsyncLocalStorage<FormatResolver>();
const sharedContextStorage = new AsyncLocalStorage<ExecutionContext>();

export function runInSession<T>(session: CatalogSession, fn: () => T): T {
  return sessionStorage.run(session, fn);
}

export function currentSession(): CatalogSession | undefined {
  return sessionStorage.getStore();
}

export function withResolutionScope<T>(resolver: FormatResolver, fn: () => T): T {
  return resolverStorage.run(resolver, fn);
}

/**
 * The resolver of the innermost resolution scope, or the built-in one.
 */
export function currentResolver(): FormatResolver {
  return resolverStorage.getStore() ?? defaultFormatResolver();
}

export function runWithSharedContext<T>(context: ExecutionContext, fn: () => T): T {
  return sharedContextStorage.run(context, fn);
}

export function activeSharedContext(): ExecutionContext | undefined {
  return sharedContextStorage.getStore();
}
