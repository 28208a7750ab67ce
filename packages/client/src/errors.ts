/**
 * @metabridge/client - Error Classes
 *
 * All errors raised by the client façade extend {@link CatalogError}, which
 * carries a machine-readable code, a category and, for failures of catalog
 * commands, the output the catalog printed before failing.
 *
 * @packageDocumentation
 * @stability stable
 */

import { ErrorCode } from './constants.js';

// =============================================================================
// URL Masking Utility
// =============================================================================

/**
 * Masks credentials in a URL for safe logging and error messages.
 *
 * @internal
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    const sensitiveParams = ['token', 'key', 'secret', 'password', 'auth', 'api_key', 'apikey', 'access_token'];
    for (const param of sensitiveParams) {
      if (parsed.searchParams.has(param)) {
        parsed.searchParams.set(param, '***');
      }
    }
    return parsed.toString();
  } catch {
    const match = url.match(/^(\w+:\/\/)([^/?#]+)/);
    if (match) {
      return `${match[1]}${match[2]}/***`;
    }
    return '[invalid-url]';
  }
}

// =============================================================================
// Error Categories
// =============================================================================

/**
 * High-level error categories for consistent handling by callers.
 */
export enum ErrorCategory {
  /** Transport and connection failures */
  CONNECTION = 'CONNECTION',
  /** Catalog command failures */
  EXECUTION = 'EXECUTION',
  /** Invalid requests */
  VALIDATION = 'VALIDATION',
  /** Missing databases, tables or classes */
  RESOURCE = 'RESOURCE',
  /** Bad client setup */
  CONFIGURATION = 'CONFIGURATION',
  /** Metadata that breaks an invariant the client relies on */
  INTERNAL = 'INTERNAL',
}

/**
 * Serialized error format for logs and RPC responses.
 */
export interface SerializedCatalogError {
  name: string;
  code: string;
  category: ErrorCategory;
  message: string;
  timestamp: number;
  details?: unknown;
  diagnostics?: string;
  cause?: { name: string; message: string };
}

interface CatalogErrorOptions {
  cause?: unknown;
  details?: unknown;
}

// =============================================================================
// Base Error Class
// =============================================================================

/**
 * Base error thrown by the metastore client.
 *
 * @example
 * ```typescript
 * try {
 *   await client.runCommand('SELECT * FROM missing');
 * } catch (error) {
 *   if (error instanceof CatalogError) {
 *     console.error(`[${error.code}] ${error.message}`);
 *     if (error.diagnostics) {
 *       console.error(error.diagnostics);
 *     }
 *   }
 * }
 * ```
 *
 * @public
 * @stability stable
 */
export class CatalogError extends Error {
  /** Machine-readable error code */
  readonly code: string;
  /** Error category */
  readonly category: ErrorCategory;
  /** Timestamp when the error was created */
  readonly timestamp: number;
  /** Additional error context */
  readonly details?: unknown;
  /** Output the catalog printed while the failing command ran */
  diagnostics?: string;

  constructor(code: string, category: ErrorCategory, message: string, options: CatalogErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CatalogError';
    this.code = code;
    this.category = category;
    this.timestamp = Date.now();
    this.details = options.details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Whether the client retries this error by itself.
   */
  isRetryable(): boolean {
    return false;
  }

  /**
   * Attaches captured catalog output.
   */
  withDiagnostics(output: string): this {
    this.diagnostics = output;
    return this;
  }

  toJSON(): SerializedCatalogError {
    const result: SerializedCatalogError = {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
    };
    if (this.details !== undefined) {
      result.details = this.details;
    }
    if (this.diagnostics !== undefined) {
      result.diagnostics = this.diagnostics;
    }
    if (this.cause instanceof Error) {
      result.cause = { name: this.cause.name, message: this.cause.message };
    }
    return result;
  }
}

// =============================================================================
// Connection Errors
// =============================================================================

/**
 * A failure of the RPC transport that survived every retry.
 *
 * @description The client retries transport failures itself, reconnecting
 * between attempts. This error reaches callers only once the retry budget or
 * the deadline is used up; `cause` holds the last failure.
 *
 * @public
 * @stability stable
 */
export class TransientRpcError extends CatalogError {
  /** Attempts made before giving up */
  readonly attempts: number;

  constructor(message: string, attempts: number, cause?: unknown) {
    super(ErrorCode.TRANSIENT_RPC_FAILURE, ErrorCategory.CONNECTION, message, {
      cause,
      details: { attempts },
    });
    this.name = 'TransientRpcError';
    this.attempts = attempts;
  }

  override isRetryable(): boolean {
    return true;
  }
}

/**
 * Error thrown when a connection cannot be opened or is used after close.
 *
 * @public
 * @stability stable
 */
export class ConnectionError extends CatalogError {
  /** The masked URL the connection was attempted to */
  readonly url?: string;

  constructor(code: string, message: string, url?: string, cause?: unknown) {
    const maskedUrl = url ? maskUrl(url) : undefined;
    super(code, ErrorCategory.CONNECTION, maskedUrl ? `${message} (url: ${maskedUrl})` : message, { cause });
    this.name = 'ConnectionError';
    if (maskedUrl) {
      this.url = maskedUrl;
    }
  }

  static closed(message = 'Metastore client is closed', url?: string): ConnectionError {
    return new ConnectionError(ErrorCode.CONNECTION_CLOSED, message, url);
  }

  static failed(message = 'Connection failed', url?: string, cause?: unknown): ConnectionError {
    return new ConnectionError(ErrorCode.CONNECTION_ERROR, message, url, cause);
  }
}

// =============================================================================
// Command Errors
// =============================================================================

/**
 * A catalog command ran and reported a non-zero response code.
 *
 * @public
 * @stability stable
 */
export class QueryExecutionError extends CatalogError {
  /** Response code reported by the catalog */
  readonly responseCode: number;

  constructor(message: string, responseCode: number, sqlState?: string) {
    super(ErrorCode.QUERY_EXECUTION_FAILED, ErrorCategory.EXECUTION, message, {
      details: sqlState === undefined ? { responseCode } : { responseCode, sqlState },
    });
    this.name = 'QueryExecutionError';
    this.responseCode = responseCode;
  }
}

/**
 * `runQuery` got exactly as many rows as its ceiling and cannot tell whether
 * the result was cut off.
 *
 * @public
 * @stability stable
 */
export class TruncationAmbiguityError extends CatalogError {
  readonly maxRows: number;

  constructor(maxRows: number) {
    super(ErrorCode.RESULTS_POSSIBLY_TRUNCATED, ErrorCategory.EXECUTION, 'RESULTS POSSIBLY TRUNCATED', {
      details: { maxRows },
    });
    this.name = 'TruncationAmbiguityError';
    this.maxRows = maxRows;
  }
}

// =============================================================================
// Metadata Errors
// =============================================================================

/**
 * A configured format or serde class name could not be resolved.
 *
 * @public
 * @stability stable
 */
export class ClassResolutionError extends CatalogError {
  readonly className: string;

  constructor(className: string, reason?: string) {
    super(
      ErrorCode.CLASS_NOT_FOUND,
      ErrorCategory.RESOURCE,
      reason ? `Cannot load class ${className}: ${reason}` : `Class not found: ${className}`,
      { details: { className } }
    );
    this.name = 'ClassResolutionError';
    this.className = className;
  }
}

/**
 * The requested table does not exist.
 *
 * @public
 * @stability stable
 */
export class TableNotFoundError extends CatalogError {
  constructor(database: string, table: string) {
    super(ErrorCode.TABLE_NOT_FOUND, ErrorCategory.RESOURCE, `Table ${database}.${table} not found`, {
      details: { database, table },
    });
    this.name = 'TableNotFoundError';
  }
}

/**
 * The requested database does not exist.
 *
 * @public
 * @stability stable
 */
export class DatabaseNotFoundError extends CatalogError {
  constructor(database: string) {
    super(ErrorCode.DATABASE_NOT_FOUND, ErrorCategory.RESOURCE, `Database ${database} not found`, {
      details: { database },
    });
    this.name = 'DatabaseNotFoundError';
  }
}

/**
 * A request failed validation before reaching the catalog.
 *
 * @public
 * @stability stable
 */
export class InvalidArgumentError extends CatalogError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.INVALID_ARGUMENT, ErrorCategory.VALIDATION, message, { details });
    this.name = 'InvalidArgumentError';
  }
}

/**
 * The catalog returned metadata that breaks an invariant of the client.
 *
 * @public
 * @stability stable
 */
export class CatalogConsistencyError extends CatalogError {
  constructor(message: string, details?: unknown) {
    super(ErrorCode.INCONSISTENT_METADATA, ErrorCategory.INTERNAL, message, { details });
    this.name = 'CatalogConsistencyError';
  }
}

// =============================================================================
// Configuration Errors
// =============================================================================

/**
 * The client was set up with an unsupported version or invalid settings.
 *
 * @public
 * @stability stable
 */
export class ConfigurationError extends CatalogError {
  constructor(message: string, code: string = ErrorCode.INVALID_CONFIGURATION, details?: unknown) {
    super(code, ErrorCategory.CONFIGURATION, message, { details });
    this.name = 'ConfigurationError';
  }

  static unsupportedVersion(version: unknown): ConfigurationError {
    return new ConfigurationError(
      `Unsupported catalog version: ${String(version)}`,
      ErrorCode.UNSUPPORTED_VERSION,
      { version }
    );
  }
}

// =============================================================================
// Type Guards
// =============================================================================

export function isCatalogError(error: unknown): error is CatalogError {
  return error instanceof CatalogError;
}

export function isTransientRpcError(error: unknown): error is TransientRpcError {
  return error instanceof TransientRpcError;
}
