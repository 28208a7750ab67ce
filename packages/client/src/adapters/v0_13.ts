/**
 * Adapter for 0.13 catalogs: partition filter pushdown, time-unit retry
 * delays, verbatim locations and row-object results.
 */

import { CatalogVersion, type PartitionPredicate } from '@metabridge/catalog-types';
import { ConfigKey, DEFAULT_CONNECT_RETRY_DELAY } from '../constants.js';
import type { ConnectionHandle } from '../connection/types.js';
import { formatResultRow, type NativeDriver, type FieldSchema, type NativePartition, type NativeTable } from '../native.js';
import { parseTimeValue } from './duration.js';
import { CatalogAdapterV0_12 } from './v0_12.js';

function isVarchar(column: FieldSchema): boolean {
  return column.type.trim().toLowerCase().startsWith('varchar');
}

function formatLiteral(value: string | number): string | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : undefined;
  }
  // The filter grammar has no escape for embedded quotes
  return value.includes('"') ? undefined : `"${value}"`;
}

/**
 * Builds a catalog filter expression from the predicates the catalog can
 * evaluate. Predicates it cannot evaluate are left out, which widens the
 * result; callers still apply every predicate themselves.
 */
export function buildPartitionFilter(
  partitionKeys: ReadonlyArray<FieldSchema>,
  predicates: ReadonlyArray<PartitionPredicate>
): string {
  const filterable = new Map<string, FieldSchema>();
  for (const key of partitionKeys) {
    if (!isVarchar(key)) {
      filterable.set(key.name.toLowerCase(), key);
    }
  }

  const clauses: string[] = [];
  for (const predicate of predicates) {
    const key = filterable.get(predicate.column.toLowerCase());
    const literal = formatLiteral(predicate.value);
    if (key && literal !== undefined) {
      clauses.push(`${key.name} ${predicate.operator} ${literal}`);
    }
  }
  return clauses.join(' and ');
}

export class CatalogAdapterV0_13 extends CatalogAdapterV0_12 {
  override readonly version: CatalogVersion = CatalogVersion.v13;

  protected override readonly simpleVerbs: ReadonlySet<string> = new Set([
    'set',
    'reset',
    'dfs',
    'add',
    'delete',
    'list',
    'compile',
  ]);

  override getConnectRetryDelay(config: Readonly<Record<string, string>>): number {
    return parseTimeValue(
      ConfigKey.CONNECT_RETRY_DELAY,
      config[ConfigKey.CONNECT_RETRY_DELAY] ?? DEFAULT_CONNECT_RETRY_DELAY
    );
  }

  override async listAllPartitions(connection: ConnectionHandle, table: NativeTable): Promise<NativePartition[]> {
    return connection.api.getAllPartitionsOf(table);
  }

  override async listPartitionsByFilter(
    connection: ConnectionHandle,
    table: NativeTable,
    predicates: ReadonlyArray<PartitionPredicate>
  ): Promise<NativePartition[]> {
    const filter = buildPartitionFilter(table.partitionKeys, predicates);
    if (filter === '') {
      return this.listAllPartitions(connection, table);
    }
    return connection.api.getPartitionsByFilter(table, filter);
  }

  override setDataLocation(table: NativeTable, location: string): void {
    table.sd.location = location;
  }

  override async getCommandResults(driver: NativeDriver): Promise<string[]> {
    const rows = await driver.getResultRows();
    return rows.map(formatResultRow);
  }
}
