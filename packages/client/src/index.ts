/**
 * @metabridge/client - Version-portable metastore client
 *
 * @description One caller-facing API over several incompatible releases of
 * a metastore client protocol. Calls on a client are serialized, run inside
 * the client's own execution context and are retried with a fresh connection
 * after transient RPC failures.
 *
 * ## Stability
 *
 * - **stable**: No breaking changes in minor versions.
 * - **experimental**: May change in any version.
 *
 * ## Quick Start
 *
 * @example
 * ```typescript
 * import { CatalogVersion } from '@metabridge/catalog-types';
 * import { createMetastoreClient, createRpcConnectionFactory } from '@metabridge/client';
 *
 * const client = await createMetastoreClient({
 *   version: CatalogVersion.v13,
 *   config: { 'metastore.failure.retries': '3', 'metastore.client.connect.retry.delay': '500ms' },
 *   connectionFactory: createRpcConnectionFactory({ url: 'https://metastore.example.com/rpc' }),
 * });
 *
 * await client.runCommand('use analytics');
 * const tables = await client.listTables(client.currentDatabase());
 * await client.close();
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Client
// =============================================================================

export {
  MetastoreClient,
  createMetastoreClient,
  type MetastoreClientOptions,
  type CatalogTable,
  type CatalogTableLookup,
} from './client.js';

// =============================================================================
// Configuration
// =============================================================================

export {
  resolveClientConfig,
  readRetryLimit,
  EnvVar,
  type ClientConfigOptions,
  type ResolvedClientConfig,
} from './config.js';

export {
  ConfigKey,
  ErrorCode,
  DEFAULT_FAILURE_RETRIES,
  DEFAULT_CONNECT_RETRY_DELAY,
  DEFAULT_MAX_ROWS,
  MAX_QUERY_RESULTS,
  DEFAULT_OUTPUT_BUFFER_SIZE,
  MAX_INDEXES_PER_TABLE,
  DEFAULT_DATABASE,
} from './constants.js';

// =============================================================================
// Protocol Adapters
// =============================================================================

export {
  selectAdapter,
  buildPartitionFilter,
  toLocationUri,
  parseTimeValue,
  CatalogAdapterV0_12,
  CatalogAdapterV0_13,
  CatalogAdapterV0_14,
  CatalogAdapterV1_0,
  CatalogAdapterV1_1,
  CatalogAdapterV1_2,
  type CatalogAdapter,
  type CommandProcessor,
  type LoadPartitionRequest,
  type LoadTableRequest,
  type LoadDynamicPartitionsRequest,
} from './adapters/index.js';

// =============================================================================
// Execution Context
// =============================================================================

export { ExecutionContext, type ExecutionContextOptions } from './context/execution-context.js';
export { OutputBuffer } from './context/output-buffer.js';
export {
  FormatResolver,
  defaultFormatResolver,
  type FormatClass,
  type FormatKind,
} from './context/format-resolver.js';
export {
  runInSession,
  currentSession,
  withResolutionScope,
  currentResolver,
  runWithSharedContext,
  type CatalogSession,
} from './context/session-scope.js';

// =============================================================================
// Connections
// =============================================================================

export { createConnectionFactory } from './connection/handle.js';
export {
  createRpcConnectionFactory,
  createRpcApi,
  DriverExecutionSchema,
  type MetastoreRpcService,
  type DriverExecution,
  type RpcConnectionOptions,
} from './connection/rpc.js';
export { ClientEventEmitter } from './connection/event-emitter.js';
export type {
  ConnectionHandle,
  ConnectionFactory,
  ApiOpener,
  OpenedApi,
  ClientEventType,
  ClientEventMap,
  ClientEventHandler,
} from './connection/types.js';

// =============================================================================
// Retry
// =============================================================================

export { RetryCoordinator, type RetryStats, type Sleep, type Clock } from './retry/coordinator.js';
export { isTransientFailure, causeChain, TRANSIENT_FAILURE_MARKERS } from './retry/classify.js';

// =============================================================================
// Translation and Commands
// =============================================================================

export {
  toDatabase,
  toNativeDatabase,
  toTable,
  toNativeTable,
  toPartition,
  toNativePartitionSpec,
  type NativeTableOptions,
} from './translator/index.js';
export { CommandRunner, parseCommand, type ParsedCommand } from './command/runner.js';

// =============================================================================
// Native Records
// =============================================================================

export {
  NativeTableType,
  formatResultRow,
  parseReply,
  NativeDatabaseSchema,
  NativeTableSchema,
  NativePartitionSchema,
  NativeIndexSchema,
  NativeCommandResponseSchema,
  NativeHandshakeSchema,
  type MetastoreApi,
  type NativeDatabase,
  type NativeTable,
  type NativePartition,
  type NativeStorageDescriptor,
  type NativeIndex,
  type NativeDriver,
  type NativeCommandResponse,
  type NativeResultRow,
  type NativeField,
  type NativeHandshake,
  type FieldSchema,
  type SerDeInfo,
} from './native.js';

// =============================================================================
// Errors
// =============================================================================

export {
  CatalogError,
  ErrorCategory,
  TransientRpcError,
  ConnectionError,
  QueryExecutionError,
  TruncationAmbiguityError,
  ClassResolutionError,
  TableNotFoundError,
  DatabaseNotFoundError,
  InvalidArgumentError,
  CatalogConsistencyError,
  ConfigurationError,
  isCatalogError,
  isTransientRpcError,
  type SerializedCatalogError,
} from './errors.js';

// =============================================================================
// Logging
// =============================================================================

export {
  createLogger,
  withTraceContext,
  ConsoleSink,
  JsonSink,
  MemorySink,
  NoOpSink,
  type StructuredLogger,
  type LoggerConfig,
  type LogEntry,
  type LogSink,
  type LogLevel,
} from './logging/index.js';
