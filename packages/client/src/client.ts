/**
 * @metabridge/client - Metastore client façade
 *
 * One catalog version, one execution context and one connection per client.
 * Every call is serialized, runs inside the client's session and is retried
 * with a fresh connection after transient RPC failures.
 *
 * @packageDocumentation
 * @stability stable
 */

import type { Writable } from 'node:stream';
import {
  qualifiedName,
  type CatalogVersion,
  type Database,
  type Partition,
  type PartitionPredicate,
  type PartitionSpec,
  type Table,
} from '@metabridge/catalog-types';
import { selectAdapter } from './adapters/index.js';
import type {
  CatalogAdapter,
  LoadDynamicPartitionsRequest,
  LoadPartitionRequest,
  LoadTableRequest,
} from './adapters/types.js';
import { CommandRunner } from './command/runner.js';
import { readRetryLimit, resolveClientConfig } from './config.js';
import { ClientEventEmitter } from './connection/event-emitter.js';
import type { ClientEventHandler, ClientEventType, ConnectionFactory } from './connection/types.js';
import { ExecutionContext } from './context/execution-context.js';
import type { FormatResolver } from './context/format-resolver.js';
import { DEFAULT_DATABASE, DEFAULT_MAX_ROWS, MAX_INDEXES_PER_TABLE, MAX_QUERY_RESULTS } from './constants.js';
import { DatabaseNotFoundError, TableNotFoundError, TruncationAmbiguityError } from './errors.js';
import { createLogger, type StructuredLogger } from './logging/index.js';
import { NativeTableType, type NativeTable } from './native.js';
import { RetryCoordinator, type Clock, type RetryStats, type Sleep } from './retry/coordinator.js';
import {
  toDatabase,
  toNativeDatabase,
  toNativePartitionSpec,
  toNativeTable,
  toPartition,
  toTable,
} from './translator/index.js';

// =============================================================================
// Options and Result Types
// =============================================================================

/**
 * Options for {@link createMetastoreClient}.
 *
 * @public
 * @stability stable
 */
export interface MetastoreClientOptions {
  /** Catalog release; falls back to `METABRIDGE_VERSION` */
  version?: CatalogVersion | string;
  /** Catalog configuration entries */
  config?: Readonly<Record<string, string>>;
  connectionFactory: ConnectionFactory;
  /** Parent format resolution scope */
  resolver?: FormatResolver;
  logger?: StructuredLogger;
  /** Waits between retries; defaults to a timer */
  sleep?: Sleep;
  /** Epoch milliseconds; defaults to `Date.now` */
  clock?: Clock;
  /** Capacity of the buffer capturing catalog output */
  outputBufferSize?: number;
  /** Environment overlay; defaults to `process.env` */
  env?: Readonly<Record<string, string | undefined>>;
}

/**
 * Partition lookups for a table read through a client.
 *
 * @description The table does not own the client; calls go through the
 * client that returned it and fail once that client is closed.
 *
 * @public
 * @stability stable
 */
export interface CatalogTableLookup {
  getAllPartitions(): Promise<Partition[]>;
  getPartitionsByFilter(predicates: ReadonlyArray<PartitionPredicate>): Promise<Partition[]>;
}

/**
 * A table together with a lookup for its partitions.
 *
 * @public
 * @stability stable
 */
export interface CatalogTable extends Table {
  readonly catalog: CatalogTableLookup;
}

interface MetastoreClientParts {
  version: CatalogVersion;
  adapter: CatalogAdapter;
  context: ExecutionContext;
  coordinator: RetryCoordinator;
  events: ClientEventEmitter;
  logger: StructuredLogger;
  clock: Clock;
}

// =============================================================================
// Client
// =============================================================================

/**
 * Version-portable client for a remote metastore.
 *
 * @example
 * ```typescript
 * const client = await createMetastoreClient({
 *   version: CatalogVersion.v1_2,
 *   connectionFactory: createRpcConnectionFactory({ url: 'https://metastore.example.com/rpc' }),
 * });
 *
 * const table = await client.getTableOption('default', 'events');
 * if (table) {
 *   const partitions = await table.catalog.getPartitionsByFilter([
 *     { column: 'ds', operator: '>=', value: '2024-01-01' },
 *   ]);
 * }
 * await client.close();
 * ```
 *
 * @public
 * @stability stable
 */
export class MetastoreClient {
  readonly version: CatalogVersion;

  private readonly adapter: CatalogAdapter;
  private readonly context: ExecutionContext;
  private readonly coordinator: RetryCoordinator;
  private readonly events: ClientEventEmitter;
  private readonly logger: StructuredLogger;
  private readonly runner: CommandRunner;
  private readonly clock: Clock;

  /** @internal Use {@link createMetastoreClient}. */
  constructor(parts: MetastoreClientParts) {
    this.version = parts.version;
    this.adapter = parts.adapter;
    this.context = parts.context;
    this.coordinator = parts.coordinator;
    this.events = parts.events;
    this.logger = parts.logger;
    this.clock = parts.clock;
    this.runner = new CommandRunner(parts.adapter, parts.logger);
  }

  // ===========================================================================
  // Databases
  // ===========================================================================

  async createDatabase(database: Database, ignoreIfExists = false): Promise<void> {
    const native = toNativeDatabase(database);
    await this.coordinator.withClient(({ connection }) => connection.api.createDatabase(native, ignoreIfExists));
  }

  /**
   * @throws {DatabaseNotFoundError} When the database does not exist
   */
  async getDatabase(name: string): Promise<Database> {
    const database = await this.getDatabaseOption(name);
    if (!database) {
      throw new DatabaseNotFoundError(name);
    }
    return database;
  }

  async getDatabaseOption(name: string): Promise<Database | undefined> {
    const native = await this.coordinator.withClient(({ connection }) => connection.api.getDatabase(name));
    return native ? toDatabase(native) : undefined;
  }

  async listDatabases(): Promise<string[]> {
    return this.coordinator.withClient(({ connection }) => connection.api.getAllDatabases());
  }

  // ===========================================================================
  // Tables
  // ===========================================================================

  /**
   * @throws {TableNotFoundError} When the table does not exist
   */
  async getTable(database: string, name: string): Promise<CatalogTable> {
    const table = await this.getTableOption(database, name);
    if (!table) {
      throw new TableNotFoundError(database, name);
    }
    return table;
  }

  async getTableOption(database: string, name: string): Promise<CatalogTable | undefined> {
    this.logger.debug('Looking up table {database}.{table}', { database, table: name });
    const native = await this.coordinator.withClient(({ connection }) => connection.api.getTable(database, name));
    if (!native) {
      return undefined;
    }
    const table = toTable(native, this.adapter);
    return { ...table, catalog: this.lookupFor(table) };
  }

  async listTables(database: string): Promise<string[]> {
    return this.coordinator.withClient(({ connection }) => connection.api.getAllTables(database));
  }

  async createTable(table: Table): Promise<void> {
    const native = this.toNative(table);
    await this.coordinator.withClient(({ connection }) => connection.api.createTable(native));
  }

  /**
   * Replaces the definition of a table, addressed by the table's own
   * qualified name or by an explicit one.
   */
  async alterTable(table: Table): Promise<void>;
  async alterTable(tableName: string, table: Table): Promise<void>;
  async alterTable(tableOrName: Table | string, maybeTable?: Table): Promise<void> {
    const table = typeof tableOrName === 'string' ? maybeTable : tableOrName;
    if (table === undefined) {
      throw new TypeError('alterTable(tableName, table) requires a table');
    }
    const native = this.toNative(table);
    const name = typeof tableOrName === 'string' ? tableOrName : qualifiedName(table);
    await this.coordinator.withClient(({ connection }) => connection.api.alterTable(name, native));
  }

  // ===========================================================================
  // Partitions
  // ===========================================================================

  async getPartitionOption(table: Table, spec: PartitionSpec): Promise<Partition | undefined> {
    const native = this.toNative(table);
    const nativeSpec = toNativePartitionSpec(table, spec);
    const partition = await this.coordinator.withClient(({ connection }) =>
      connection.api.getPartition(native, nativeSpec, false)
    );
    return partition ? toPartition(partition, table) : undefined;
  }

  async getAllPartitions(table: Table): Promise<Partition[]> {
    const native = this.toNative(table);
    const partitions = await this.coordinator.withClient(({ connection }) =>
      this.adapter.listAllPartitions(connection, native)
    );
    return partitions.map((partition) => toPartition(partition, table));
  }

  /**
   * Returns the partitions matching the predicates the catalog can evaluate.
   * The result may include partitions that fail other predicates.
   */
  async getPartitionsByFilter(table: Table, predicates: ReadonlyArray<PartitionPredicate>): Promise<Partition[]> {
    const native = this.toNative(table);
    const partitions = await this.coordinator.withClient(({ connection }) =>
      this.adapter.listPartitionsByFilter(connection, native, predicates)
    );
    return partitions.map((partition) => toPartition(partition, table));
  }

  // ===========================================================================
  // Loads
  // ===========================================================================

  async loadPartition(request: LoadPartitionRequest): Promise<void> {
    await this.coordinator.withClient(({ connection }) => this.adapter.loadPartition(connection, request));
  }

  async loadTable(request: LoadTableRequest): Promise<void> {
    await this.coordinator.withClient(({ connection }) => this.adapter.loadTable(connection, request));
  }

  async loadDynamicPartitions(request: LoadDynamicPartitionsRequest): Promise<void> {
    await this.coordinator.withClient(({ connection }) => this.adapter.loadDynamicPartitions(connection, request));
  }

  // ===========================================================================
  // Reset
  // ===========================================================================

  /**
   * Drops every index and table of the default database, then every other
   * database with its data. Meant for resetting test sessions.
   */
  async reset(): Promise<void> {
    await this.coordinator.withClient(async ({ connection }) => {
      const api = connection.api;
      for (const tableName of await api.getAllTables(DEFAULT_DATABASE)) {
        this.logger.debug('Deleting table {table}', { table: tableName });
        const table = await api.getTable(DEFAULT_DATABASE, tableName);
        if (!table) {
          throw new TableNotFoundError(DEFAULT_DATABASE, tableName);
        }
        for (const index of await api.getIndexes(DEFAULT_DATABASE, tableName, MAX_INDEXES_PER_TABLE)) {
          await this.adapter.dropIndex(connection, DEFAULT_DATABASE, tableName, index.indexName);
        }
        if (!isIndexTable(table)) {
          await api.dropTable(DEFAULT_DATABASE, tableName);
        }
      }

      for (const database of await api.getAllDatabases()) {
        if (database === DEFAULT_DATABASE) {
          continue;
        }
        this.logger.debug('Dropping database {database}', { database });
        await api.dropDatabase(database, true, false, true);
      }
    });
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  /**
   * Runs a catalog command and returns up to `maxRows` result rows. Commands
   * without results return their response code as the single row.
   *
   * @throws {QueryExecutionError} When the command fails; `diagnostics` holds the catalog output
   */
  async runCommand(text: string, maxRows: number = DEFAULT_MAX_ROWS): Promise<string[]> {
    return this.coordinator.withClient((session) => this.runner.run(session, text, maxRows));
  }

  /**
   * Runs a query with a row ceiling of {@link MAX_QUERY_RESULTS}.
   *
   * @throws {TruncationAmbiguityError} When exactly the ceiling is returned
   */
  async runQuery(text: string): Promise<string[]> {
    const rows = await this.runCommand(text, MAX_QUERY_RESULTS);
    if (rows.length === MAX_QUERY_RESULTS) {
      throw new TruncationAmbiguityError(MAX_QUERY_RESULTS);
    }
    return rows;
  }

  /**
   * Registers a jar with the catalog session.
   */
  async addJar(path: string): Promise<void> {
    await this.runCommand(`ADD JAR ${path}`);
  }

  // ===========================================================================
  // Context
  // ===========================================================================

  currentDatabase(): string {
    return this.context.currentDatabase();
  }

  /**
   * @throws {DatabaseNotFoundError} When the database does not exist
   */
  async setCurrentDatabase(name: string): Promise<void> {
    await this.getDatabase(name);
    this.context.setCurrentDatabase(name);
  }

  configValue(key: string, defaultValue: string): string {
    return this.context.configValue(key, defaultValue);
  }

  /**
   * Redirects catalog output once in-flight calls have finished.
   */
  async setOutputStream(stream: Writable): Promise<void> {
    await this.coordinator.withClient(async ({ context }) => context.setOutputStream(stream));
  }

  async setErrorStream(stream: Writable): Promise<void> {
    await this.coordinator.withClient(async ({ context }) => context.setErrorStream(stream));
  }

  async setDiagnosticStream(stream: Writable): Promise<void> {
    await this.coordinator.withClient(async ({ context }) => context.setDiagnosticStream(stream));
  }

  /** Catalog output captured since the client was created, oldest bytes dropped first. */
  capturedOutput(): string {
    return this.context.outputBuffer.toString();
  }

  // ===========================================================================
  // Events and Lifecycle
  // ===========================================================================

  on<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    this.events.on(event, handler);
  }

  off<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    this.events.off(event, handler);
  }

  once<E extends ClientEventType>(event: E, handler: ClientEventHandler<E>): void {
    this.events.once(event, handler);
  }

  stats(): RetryStats {
    return this.coordinator.stats();
  }

  /**
   * Closes the connection after in-flight calls finish. Later calls fail
   * with a {@link ConnectionError}.
   */
  async close(): Promise<void> {
    await this.coordinator.close();
    this.logger.debug('Metastore client closed');
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private toNative(table: Table): NativeTable {
    return toNativeTable(table, {
      adapter: this.adapter,
      resolver: this.context.resolver,
      owner: this.context.user,
      now: this.clock(),
    });
  }

  private lookupFor(table: Table): CatalogTableLookup {
    return {
      getAllPartitions: () => this.getAllPartitions(table),
      getPartitionsByFilter: (predicates) => this.getPartitionsByFilter(table, predicates),
    };
  }
}

function isIndexTable(table: NativeTable): boolean {
  return table.tableType === NativeTableType.INDEX_TABLE;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Creates a client and opens its first connection.
 *
 * @throws {ConfigurationError} When the version or configuration is invalid
 *
 * @public
 * @stability stable
 */
export async function createMetastoreClient(options: MetastoreClientOptions): Promise<MetastoreClient> {
  const resolved = resolveClientConfig(options);
  const adapter = selectAdapter(resolved.version);
  const logger = (options.logger ?? createLogger()).child({
    component: 'metastore-client',
    version: resolved.version,
  });

  const context = ExecutionContext.open({
    config: resolved.config,
    logger,
    resolver: options.resolver,
    outputBufferSize: resolved.outputBufferSize,
  });
  const config = context.configEntries();
  const retryLimit = readRetryLimit(config);
  const retryDelay = adapter.getConnectRetryDelay(config);

  const connection = await options.connectionFactory(context);
  logger.debug('Connected to metastore session {sessionId} (server {serverVersion})', {
    sessionId: connection.sessionId,
    serverVersion: connection.serverVersion,
  });

  const events = new ClientEventEmitter();
  const clock = options.clock ?? Date.now;
  const coordinator = new RetryCoordinator({
    context,
    connection,
    connectionFactory: options.connectionFactory,
    retryLimit,
    retryDelay,
    logger,
    events,
    sleep: options.sleep,
    clock,
  });

  return new MetastoreClient({ version: resolved.version, adapter, context, coordinator, events, logger, clock });
}
