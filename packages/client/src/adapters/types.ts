/**
 * @metabridge/client - Protocol adapter contract
 *
 * @packageDocumentation
 * @stability stable
 */

import type { CatalogVersion, PartitionPredicate, PartitionSpec } from '@metabridge/catalog-types';
import type { ConnectionHandle } from '../connection/types.js';
import type {
  NativeCommandResponse,
  NativeDriver,
  NativePartition,
  NativeTable,
} from '../native.js';

// =============================================================================
// Load Requests
// =============================================================================

/**
 * Moves files at `loadPath` into one partition of a table.
 *
 * @public
 * @stability stable
 */
export interface LoadPartitionRequest {
  loadPath: string;
  /** Qualified or bare table name */
  tableName: string;
  partitionSpec: PartitionSpec;
  replace: boolean;
  holdDDLTime: boolean;
  inheritTableSpecs: boolean;
  isSkewedStoreAsSubdir: boolean;
}

/**
 * Moves files at `loadPath` into an unpartitioned table.
 *
 * @public
 * @stability stable
 */
export interface LoadTableRequest {
  loadPath: string;
  tableName: string;
  replace: boolean;
  holdDDLTime: boolean;
}

/**
 * Loads files at `loadPath` into partitions derived from their directory names.
 *
 * @public
 * @stability stable
 */
export interface LoadDynamicPartitionsRequest {
  loadPath: string;
  tableName: string;
  /** Static part of the partition spec; dynamic columns map to empty strings */
  partitionSpec: PartitionSpec;
  replace: boolean;
  /** Number of dynamic partition columns */
  numDynamicPartitions: number;
  holdDDLTime: boolean;
  listBucketingEnabled: boolean;
}

// =============================================================================
// Command Processors
// =============================================================================

/**
 * A processor for one command verb.
 *
 * - `driver`: query-capable; runs the full command text and produces rows.
 * - `simple`: runs the argument text after the verb and reports a code.
 */
export type CommandProcessor =
  | { kind: 'driver'; driver: NativeDriver }
  | { kind: 'simple'; verb: string; run(args: string): Promise<NativeCommandResponse> };

// =============================================================================
// Adapter
// =============================================================================

/**
 * Operations whose native form differs between catalog releases.
 *
 * @description Adapters hold no state beyond per-release constants; one
 * instance per version is shared by every client.
 *
 * @public
 * @stability stable
 */
export interface CatalogAdapter {
  readonly version: CatalogVersion;

  /** Delay between reconnect attempts, in milliseconds */
  getConnectRetryDelay(config: Readonly<Record<string, string>>): number;

  listAllPartitions(connection: ConnectionHandle, table: NativeTable): Promise<NativePartition[]>;
  listPartitionsByFilter(
    connection: ConnectionHandle,
    table: NativeTable,
    predicates: ReadonlyArray<PartitionPredicate>
  ): Promise<NativePartition[]>;

  getDataLocation(table: NativeTable): string | undefined;
  setDataLocation(table: NativeTable, location: string): void;

  loadPartition(connection: ConnectionHandle, request: LoadPartitionRequest): Promise<void>;
  loadTable(connection: ConnectionHandle, request: LoadTableRequest): Promise<void>;
  loadDynamicPartitions(connection: ConnectionHandle, request: LoadDynamicPartitionsRequest): Promise<void>;

  dropIndex(connection: ConnectionHandle, dbName: string, tableName: string, indexName: string): Promise<void>;

  getCommandProcessor(
    verb: string,
    config: Readonly<Record<string, string>>,
    connection: ConnectionHandle
  ): Promise<CommandProcessor>;
  getCommandResults(driver: NativeDriver): Promise<string[]>;
}
