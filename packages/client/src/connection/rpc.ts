/**
 * @metabridge/client - CapnWeb RPC transport
 *
 * Connects to a metastore service over CapnWeb HTTP batch sessions. Every
 * call opens its own batch, so a handle holds no socket and survives server
 * restarts; the retry coordinator only has to replace it after a failure.
 *
 * @packageDocumentation
 * @stability stable
 */

import { newHttpBatchRpcSession, type RpcStub } from 'capnweb';
import { z } from 'zod';
import { ConfigurationError, maskUrl } from '../errors.js';
import {
  formatResultRow,
  parseReply,
  NativeCommandResponseSchema,
  NativeDatabaseSchema,
  NativeHandshakeSchema,
  NativeIndexSchema,
  NativePartitionSchema,
  NativeResultRowSchema,
  NativeTableSchema,
  type MetastoreApi,
  type NativeCommandResponse,
  type NativeDriver,
  type NativeResultRow,
} from '../native.js';
import { createConnectionFactory } from './handle.js';
import type { ConnectionFactory } from './types.js';

// =============================================================================
// Wire Interface
// =============================================================================

/**
 * Outcome of running a command through a driver on the service.
 */
export const DriverExecutionSchema = z.object({
  response: NativeCommandResponseSchema,
  /** Empty when the command failed */
  rows: z.array(NativeResultRowSchema),
});

export type DriverExecution = z.infer<typeof DriverExecutionSchema>;

const NamesSchema = z.array(z.string());
const PartitionsSchema = z.array(NativePartitionSchema);

/**
 * Service surface exposed over RPC.
 *
 * @description Drivers are stateful and cannot live across HTTP batches, so
 * the wire carries a single `executeDriver` call in place of `openDriver`.
 *
 * @public
 * @stability stable
 */
export interface MetastoreRpcService extends Omit<MetastoreApi, 'openDriver'> {
  executeDriver(config: Record<string, string>, command: string): Promise<DriverExecution>;
}

export interface RpcConnectionOptions {
  /** Service endpoint (http:// or https://) */
  url: string;
  /** Extra request headers, e.g. authorization */
  headers?: Record<string, string>;
}

// =============================================================================
// Driver
// =============================================================================

/**
 * Client-side driver: runs the command remotely and serves results locally.
 */
class BatchDriver implements NativeDriver {
  private rows: NativeResultRow[] = [];
  private maxRows = Number.POSITIVE_INFINITY;

  constructor(
    private readonly service: () => RpcStub<MetastoreRpcService>,
    private readonly config: Record<string, string>
  ) {}

  async run(command: string): Promise<NativeCommandResponse> {
    const execution = parseReply(
      DriverExecutionSchema,
      'executeDriver',
      await this.service().executeDriver(this.config, command)
    );
    this.rows = execution.rows;
    return execution.response;
  }

  async setMaxRows(maxRows: number): Promise<void> {
    this.maxRows = maxRows;
  }

  async getResults(): Promise<string[]> {
    return this.visibleRows().map(formatResultRow);
  }

  async getResultRows(): Promise<NativeResultRow[]> {
    return this.visibleRows();
  }

  async close(): Promise<void> {
    this.rows = [];
  }

  private visibleRows(): NativeResultRow[] {
    return this.rows.slice(0, this.maxRows);
  }
}

// =============================================================================
// Factory
// =============================================================================

function validateEndpoint(url: string): URL {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch (error) {
    throw new ConfigurationError(`Invalid metastore URL: ${maskUrl(url)}`, undefined, {
      reason: error instanceof Error ? error.message : String(error),
    });
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported metastore URL scheme ${parsed.protocol} in ${maskUrl(url)}`);
  }
  return parsed;
}

/**
 * Adapts a CapnWeb stub factory to the {@link MetastoreApi} surface. Every
 * reply is checked against its schema before it reaches the client.
 *
 * @throws {CatalogConsistencyError} From any call whose reply is malformed
 */
export function createRpcApi(service: () => RpcStub<MetastoreRpcService>): MetastoreApi {
  return {
    handshake: async (config) => parseReply(NativeHandshakeSchema, 'handshake', await service().handshake(config)),

    createDatabase: async (database, ignoreIfExists) => await service().createDatabase(database, ignoreIfExists),
    getDatabase: async (name) =>
      parseReply(NativeDatabaseSchema.nullable(), 'getDatabase', await service().getDatabase(name)),
    getAllDatabases: async () => parseReply(NamesSchema, 'getAllDatabases', await service().getAllDatabases()),
    dropDatabase: async (name, deleteData, ignoreUnknownDb, cascade) =>
      await service().dropDatabase(name, deleteData, ignoreUnknownDb, cascade),

    getTable: async (dbName, tableName) =>
      parseReply(NativeTableSchema.nullable(), 'getTable', await service().getTable(dbName, tableName)),
    getAllTables: async (dbName) => parseReply(NamesSchema, 'getAllTables', await service().getAllTables(dbName)),
    createTable: async (table) => await service().createTable(table),
    alterTable: async (name, table) => await service().alterTable(name, table),
    dropTable: async (dbName, tableName) => await service().dropTable(dbName, tableName),

    getIndexes: async (dbName, tableName, max) =>
      parseReply(z.array(NativeIndexSchema), 'getIndexes', await service().getIndexes(dbName, tableName, max)),
    dropIndex: async (args) => await service().dropIndex(args),

    getPartition: async (table, partSpec, forceCreate) =>
      parseReply(
        NativePartitionSchema.nullable(),
        'getPartition',
        await service().getPartition(table, partSpec, forceCreate)
      ),
    getAllPartitionsForPruner: async (table) =>
      parseReply(PartitionsSchema, 'getAllPartitionsForPruner', await service().getAllPartitionsForPruner(table)),
    getAllPartitionsOf: async (table) =>
      parseReply(PartitionsSchema, 'getAllPartitionsOf', await service().getAllPartitionsOf(table)),
    getPartitionsByFilter: async (table, filter) =>
      parseReply(PartitionsSchema, 'getPartitionsByFilter', await service().getPartitionsByFilter(table, filter)),

    loadPartition: async (args) => await service().loadPartition(args),
    loadTable: async (args) => await service().loadTable(args),
    loadDynamicPartitions: async (args) => await service().loadDynamicPartitions(args),

    openDriver: async (config) => new BatchDriver(service, config),
    runProcessor: async (processor, args, config) =>
      parseReply(NativeCommandResponseSchema, 'runProcessor', await service().runProcessor(processor, args, config)),
  };
}

/**
 * Creates a connection factory that talks to a metastore service over
 * CapnWeb HTTP batches.
 *
 * @example
 * ```typescript
 * const client = await createMetastoreClient({
 *   version: CatalogVersion.v1_2,
 *   config: { 'metastore.failure.retries': '3' },
 *   connectionFactory: createRpcConnectionFactory({
 *     url: 'https://metastore.example.com/rpc',
 *     headers: { authorization: 'Bearer test-secret' },
 *   }),
 * });
 * ```
 *
 * @throws {ConfigurationError} When the URL is not an http(s) URL
 *
 * @public
 * @stability stable
 */
export function createRpcConnectionFactory(options: RpcConnectionOptions): ConnectionFactory {
  const endpoint = validateEndpoint(options.url).href;
  const headers = options.headers ?? {};

  const service = (): RpcStub<MetastoreRpcService> =>
    newHttpBatchRpcSession<MetastoreRpcService>(new Request(endpoint, { headers }));

  return createConnectionFactory(async () => ({ api: createRpcApi(service) }));
}
