/**
 * Execution Context
 *
 * Per-façade configuration, format resolution scope, current database and
 * output streams. Everything the catalog prints lands in the context's
 * {@link OutputBuffer} unless the caller redirects a stream.
 *
 * @packageDocumentation
 */

import { userInfo } from 'node:os';
import type { Writable } from 'node:stream';
import { ConfigKey, DEFAULT_DATABASE } from '../constants.js';
import type { StructuredLogger } from '../logging/index.js';
import type { FormatResolver } from './format-resolver.js';
import { OutputBuffer } from './output-buffer.js';
import { activeSharedContext, currentResolver, withResolutionScope } from './session-scope.js';

export interface ExecutionContextOptions {
  config: Readonly<Record<string, string>>;
  logger: StructuredLogger;
  /** Parent resolution scope; a child scope is created for the context */
  resolver?: FormatResolver;
  outputBufferSize?: number;
}

const REDACTED = 'xxx';

function isSecretKey(key: string): boolean {
  return key.toLowerCase().includes('password');
}

function osUser(): string {
  try {
    return userInfo().username;
  } catch {
    // userInfo() throws when the uid has no passwd entry
    return process.env.USER ?? process.env.USERNAME ?? 'unknown';
  }
}

export class ExecutionContext {
  /** Whether the context was started outside any façade and is shared by several */
  readonly isShared: boolean;
  readonly resolver: FormatResolver;
  readonly outputBuffer: OutputBuffer;

  private readonly config: Map<string, string>;
  private database: string;
  private out: Writable;
  private err: Writable;
  private diagnostic: Writable;

  private constructor(options: ExecutionContextOptions, isShared: boolean) {
    this.isShared = isShared;
    this.config = new Map(Object.entries(options.config));
    this.resolver = (options.resolver ?? currentResolver()).extend();
    this.outputBuffer = new OutputBuffer(options.outputBufferSize);
    this.out = this.outputBuffer;
    this.err = this.outputBuffer;
    this.diagnostic = this.outputBuffer;
    this.database = this.config.get(ConfigKey.CURRENT_DATABASE) ?? DEFAULT_DATABASE;

    for (const [key, value] of Object.entries(this.redactedConfig())) {
      options.logger.debug('Catalog configuration: {key}={value}', { key, value });
    }
  }

  /**
   * Returns the shared context active in the current async scope, or builds a
   * fresh one. The fresh context is built with the given resolver as the
   * ambient resolution scope; the previous scope is restored afterwards.
   */
  static open(options: ExecutionContextOptions): ExecutionContext {
    const shared = activeSharedContext();
    if (shared) {
      options.logger.debug('Reusing shared execution context');
      return shared;
    }
    const build = (): ExecutionContext => new ExecutionContext(options, false);
    return options.resolver ? withResolutionScope(options.resolver, build) : build();
  }

  /**
   * Creates a context meant to be activated with `runWithSharedContext` and
   * reused by every façade created inside it.
   */
  static shared(options: ExecutionContextOptions): ExecutionContext {
    return new ExecutionContext(options, true);
  }

  configValue(key: string, defaultValue: string): string;
  configValue(key: string): string | undefined;
  configValue(key: string, defaultValue?: string): string | undefined {
    return this.config.get(key) ?? defaultValue;
  }

  setConfigValue(key: string, value: string): void {
    this.config.set(key, value);
  }

  /** Snapshot of every configuration entry. */
  configEntries(): Record<string, string> {
    return Object.fromEntries(this.config);
  }

  /** Configuration with password values replaced. */
  redactedConfig(): Record<string, string> {
    const redacted: Record<string, string> = {};
    for (const [key, value] of this.config) {
      redacted[key] = isSecretKey(key) ? REDACTED : value;
    }
    return redacted;
  }

  currentDatabase(): string {
    return this.database;
  }

  setCurrentDatabase(name: string): void {
    this.database = name;
  }

  /** Identity recorded as owner of created tables. */
  get user(): string {
    return this.config.get(ConfigKey.USER_NAME) ?? osUser();
  }

  get outputStream(): Writable {
    return this.out;
  }

  get errorStream(): Writable {
    return this.err;
  }

  get diagnosticStream(): Writable {
    return this.diagnostic;
  }

  setOutputStream(stream: Writable): void {
    this.out = stream;
  }

  setErrorStream(stream: Writable): void {
    this.err = stream;
  }

  setDiagnosticStream(stream: Writable): void {
    this.diagnostic = stream;
  }

  /** Writes a line to the output stream. */
  print(line: string): void {
    this.out.write(`${line}\n`);
  }

  /** Writes a line to the error stream. */
  printError(line: string): void {
    this.err.write(`${line}\n`);
  }

  /**
   * Relays what a catalog command printed: output, errors and progress
   * notices each to their own stream.
   */
  relay(printed: { output?: string | null; errorOutput?: string | null; info?: string | null }): void {
    if (printed.output) {
      this.out.write(printed.output);
    }
    if (printed.errorOutput) {
      this.err.write(printed.errorOutput);
    }
    if (printed.info) {
      this.diagnostic.write(printed.info);
    }
  }
}
