/**
 * Adapter for 0.12 catalogs, and the base every later release overrides.
 */

import { pathToFileURL } from 'node:url';
import { CatalogVersion, type PartitionPredicate } from '@metabridge/catalog-types';
import { ConfigKey, DEFAULT_CONNECT_RETRY_DELAY } from '../constants.js';
import type { ConnectionHandle } from '../connection/types.js';
import { InvalidArgumentError } from '../errors.js';
import type {
  NativeDriver,
  NativeDropIndexArgs,
  NativeLoadDynamicPartitionsArgs,
  NativeLoadPartitionArgs,
  NativeLoadTableArgs,
  NativePartition,
  NativeTable,
} from '../native.js';
import { parseSeconds, parseTimeValue } from './duration.js';
import type {
  CatalogAdapter,
  CommandProcessor,
  LoadDynamicPartitionsRequest,
  LoadPartitionRequest,
  LoadTableRequest,
} from './types.js';

const URI_SCHEME = /^[a-z][a-z0-9+.-]*:/i;
const NOT_IN_URI = /[\s<>"{}|\\^`]/;

/**
 * Normalizes a location to an absolute URI. Bare paths become `file:` URIs.
 * Used for database locations.
 */
export function toLocationUri(location: string): string {
  if (URI_SCHEME.test(location)) {
    return new URL(location).href;
  }
  return pathToFileURL(location).href;
}

function isUriReference(location: string): boolean {
  if (location === '' || NOT_IN_URI.test(location)) {
    return false;
  }
  return !URI_SCHEME.test(location) || URL.canParse(location);
}

export class CatalogAdapterV0_12 implements CatalogAdapter {
  readonly version: CatalogVersion = CatalogVersion.v12;

  /** Verbs served by a simple processor instead of a driver */
  protected readonly simpleVerbs: ReadonlySet<string> = new Set(['set', 'reset', 'dfs', 'add', 'delete', 'list']);

  getConnectRetryDelay(config: Readonly<Record<string, string>>): number {
    const configured = config[ConfigKey.CONNECT_RETRY_DELAY];
    if (configured === undefined) {
      return parseTimeValue(ConfigKey.CONNECT_RETRY_DELAY, DEFAULT_CONNECT_RETRY_DELAY);
    }
    return parseSeconds(ConfigKey.CONNECT_RETRY_DELAY, configured);
  }

  async listAllPartitions(connection: ConnectionHandle, table: NativeTable): Promise<NativePartition[]> {
    return connection.api.getAllPartitionsForPruner(table);
  }

  // No filter pushdown before 0.13
  async listPartitionsByFilter(
    connection: ConnectionHandle,
    table: NativeTable,
    _predicates: ReadonlyArray<PartitionPredicate>
  ): Promise<NativePartition[]> {
    return this.listAllPartitions(connection, table);
  }

  getDataLocation(table: NativeTable): string | undefined {
    return table.sd.location ?? undefined;
  }

  /**
   * Stores the location as given once it parses as a URI reference.
   *
   * @throws {InvalidArgumentError} When the location is not a URI
   */
  setDataLocation(table: NativeTable, location: string): void {
    if (!isUriReference(location)) {
      throw new InvalidArgumentError(`Table location is not a valid URI: ${location}`);
    }
    table.sd.location = location;
  }

  async loadPartition(connection: ConnectionHandle, request: LoadPartitionRequest): Promise<void> {
    await connection.api.loadPartition(this.loadPartitionArgs(request));
  }

  async loadTable(connection: ConnectionHandle, request: LoadTableRequest): Promise<void> {
    await connection.api.loadTable(this.loadTableArgs(request));
  }

  async loadDynamicPartitions(connection: ConnectionHandle, request: LoadDynamicPartitionsRequest): Promise<void> {
    await connection.api.loadDynamicPartitions(this.loadDynamicPartitionsArgs(request));
  }

  async dropIndex(connection: ConnectionHandle, dbName: string, tableName: string, indexName: string): Promise<void> {
    await connection.api.dropIndex(this.dropIndexArgs(dbName, tableName, indexName));
  }

  async getCommandProcessor(
    verb: string,
    config: Readonly<Record<string, string>>,
    connection: ConnectionHandle
  ): Promise<CommandProcessor> {
    const normalized = verb.toLowerCase();
    if (this.simpleVerbs.has(normalized)) {
      return {
        kind: 'simple',
        verb: normalized,
        run: (args) => connection.api.runProcessor(normalized, args, { ...config }),
      };
    }
    return { kind: 'driver', driver: await connection.api.openDriver({ ...config }) };
  }

  async getCommandResults(driver: NativeDriver): Promise<string[]> {
    return driver.getResults();
  }

  // ---------------------------------------------------------------------------
  // Native argument sets
  // ---------------------------------------------------------------------------

  protected loadPartitionArgs(request: LoadPartitionRequest): NativeLoadPartitionArgs {
    return {
      loadPath: request.loadPath,
      tableName: request.tableName,
      partSpec: { ...request.partitionSpec },
      replace: request.replace,
      holdDDLTime: request.holdDDLTime,
      inheritTableSpecs: request.inheritTableSpecs,
      isSkewedStoreAsSubdir: request.isSkewedStoreAsSubdir,
    };
  }

  protected loadTableArgs(request: LoadTableRequest): NativeLoadTableArgs {
    return {
      loadPath: request.loadPath,
      tableName: request.tableName,
      replace: request.replace,
      holdDDLTime: request.holdDDLTime,
    };
  }

  protected loadDynamicPartitionsArgs(request: LoadDynamicPartitionsRequest): NativeLoadDynamicPartitionsArgs {
    return {
      loadPath: request.loadPath,
      tableName: request.tableName,
      partSpec: { ...request.partitionSpec },
      replace: request.replace,
      numDP: request.numDynamicPartitions,
      holdDDLTime: request.holdDDLTime,
      listBucketingEnabled: request.listBucketingEnabled,
    };
  }

  protected dropIndexArgs(dbName: string, tableName: string, indexName: string): NativeDropIndexArgs {
    return { dbName, tableName, indexName, deleteData: true };
  }
}
