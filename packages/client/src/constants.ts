/**
 * @metabridge/client - Constants
 *
 * Named constants for configuration keys, defaults and error codes.
 *
 * @packageDocumentation
 * @stability stable
 */

// =============================================================================
// Configuration Keys
// =============================================================================

/**
 * Keys read from the execution context configuration.
 *
 * @public
 * @stability stable
 */
export const ConfigKey = {
  /** Number of retries after a transient metastore failure */
  FAILURE_RETRIES: 'metastore.failure.retries',
  /** Delay between reconnect attempts; unit depends on the catalog version */
  CONNECT_RETRY_DELAY: 'metastore.client.connect.retry.delay',
  /** Identity recorded as owner of created tables */
  USER_NAME: 'user.name',
  /** Database selected when a session starts */
  CURRENT_DATABASE: 'metastore.current.database',
} as const;

export type ConfigKey = typeof ConfigKey[keyof typeof ConfigKey];

// =============================================================================
// Default Configuration Values
// =============================================================================

/** Retries after the first attempt when none are configured. */
export const DEFAULT_FAILURE_RETRIES = 1;

/** Reconnect delay when none is configured. */
export const DEFAULT_CONNECT_RETRY_DELAY = '1s';

/** Default row ceiling for {@link MetastoreClient.runCommand}. */
export const DEFAULT_MAX_ROWS = 1000;

/** Row ceiling used by `runQuery`; a result of exactly this size is ambiguous. */
export const MAX_QUERY_RESULTS = 100000;

/** Capacity in bytes of the buffer capturing catalog command output. */
export const DEFAULT_OUTPUT_BUFFER_SIZE = 10240;

/** Maximum number of indexes fetched per table during `reset()`. */
export const MAX_INDEXES_PER_TABLE = 255;

/** Name of the database every catalog has. */
export const DEFAULT_DATABASE = 'default';

/** Environment variables overlaid on the client configuration. */
export const ENV_PREFIX = 'METABRIDGE_';

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Error codes for client errors.
 *
 * @public
 * @stability stable
 */
export const ErrorCode = {
  // Connection errors
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  CONNECTION_CLOSED: 'CONNECTION_CLOSED',
  TRANSIENT_RPC_FAILURE: 'TRANSIENT_RPC_FAILURE',

  // Command errors
  QUERY_EXECUTION_FAILED: 'QUERY_EXECUTION_FAILED',
  RESULTS_POSSIBLY_TRUNCATED: 'RESULTS_POSSIBLY_TRUNCATED',

  // Metadata errors
  CLASS_NOT_FOUND: 'CLASS_NOT_FOUND',
  TABLE_NOT_FOUND: 'TABLE_NOT_FOUND',
  DATABASE_NOT_FOUND: 'DATABASE_NOT_FOUND',
  INVALID_ARGUMENT: 'INVALID_ARGUMENT',
  INCONSISTENT_METADATA: 'INCONSISTENT_METADATA',

  // Setup errors
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  UNSUPPORTED_VERSION: 'UNSUPPORTED_VERSION',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];
