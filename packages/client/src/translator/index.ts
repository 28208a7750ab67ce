/**
 * Metadata Translator
 *
 * Conversions between the catalog's native records and the domain model.
 * Domain values are built fresh on every call and never hold a connection.
 *
 * @packageDocumentation
 */

import {
  TableType,
  validateTable,
  type Column,
  type Database,
  type Partition,
  type PartitionSpec,
  type Table,
} from '@metabridge/catalog-types';
import { toLocationUri } from '../adapters/v0_12.js';
import type { CatalogAdapter } from '../adapters/types.js';
import type { FormatResolver } from '../context/format-resolver.js';
import { CatalogConsistencyError, InvalidArgumentError } from '../errors.js';
import {
  NativeTableType,
  type FieldSchema,
  type NativeDatabase,
  type NativePartition,
  type NativeTable,
} from '../native.js';

// =============================================================================
// Databases
// =============================================================================

export function toDatabase(native: NativeDatabase): Database {
  return { name: native.name, location: native.locationUri };
}

export function toNativeDatabase(database: Database): NativeDatabase {
  return {
    name: database.name,
    description: '',
    locationUri: toLocationUri(database.location),
    parameters: {},
  };
}

// =============================================================================
// Columns
// =============================================================================

function toColumn(field: FieldSchema): Column {
  const column: Column = { name: field.name, type: field.type };
  if (field.comment !== null) {
    column.comment = field.comment;
  }
  return column;
}

function toFieldSchema(column: Column): FieldSchema {
  return { name: column.name, type: column.type, comment: column.comment ?? null };
}

// =============================================================================
// Tables
// =============================================================================

function toTableType(native: NativeTable): TableType {
  switch (native.tableType) {
    case NativeTableType.MANAGED_TABLE:
      return TableType.MANAGED;
    case NativeTableType.EXTERNAL_TABLE:
      return TableType.EXTERNAL;
    case NativeTableType.VIRTUAL_VIEW:
      return TableType.VIEW;
    case NativeTableType.INDEX_TABLE:
      return TableType.INDEX;
    default:
      throw new CatalogConsistencyError(
        `Unknown table type ${native.tableType} for table ${native.dbName}.${native.tableName}`,
        { tableType: native.tableType }
      );
  }
}

function toNativeTableType(tableType: TableType): NativeTableType {
  switch (tableType) {
    case TableType.MANAGED:
      return NativeTableType.MANAGED_TABLE;
    case TableType.EXTERNAL:
      return NativeTableType.EXTERNAL_TABLE;
    case TableType.VIEW:
      return NativeTableType.VIRTUAL_VIEW;
    case TableType.INDEX:
      return NativeTableType.INDEX_TABLE;
  }
}

/**
 * Converts a native table. Location is read through the adapter.
 *
 * @throws {CatalogConsistencyError} When the table type is unknown
 */
export function toTable(native: NativeTable, adapter: CatalogAdapter): Table {
  const table: Table = {
    name: native.tableName,
    specifiedDatabase: native.dbName,
    schema: native.sd.cols.map(toColumn),
    partitionColumns: native.partitionKeys.map(toColumn),
    properties: { ...native.parameters },
    serdeProperties: { ...native.sd.serdeInfo.parameters },
    tableType: toTableType(native),
  };

  const location = adapter.getDataLocation(native);
  if (location !== undefined) {
    table.location = location;
  }
  if (native.sd.inputFormat !== null) {
    table.inputFormat = native.sd.inputFormat;
  }
  if (native.sd.outputFormat !== null) {
    table.outputFormat = native.sd.outputFormat;
  }
  if (native.sd.serdeInfo.serializationLib !== null) {
    table.serde = native.sd.serdeInfo.serializationLib;
  }
  if (native.viewExpandedText !== null) {
    table.viewText = native.viewExpandedText;
  }
  return table;
}

export interface NativeTableOptions {
  adapter: CatalogAdapter;
  resolver: FormatResolver;
  /** Recorded as the table owner */
  owner: string;
  /** Epoch milliseconds */
  now: number;
}

/**
 * Builds the native record for creating or altering a table.
 *
 * @throws {InvalidArgumentError} When the table breaks a structural invariant
 * @throws {ClassResolutionError} When a format class cannot be resolved
 */
export function toNativeTable(table: Table, options: NativeTableOptions): NativeTable {
  const problems = validateTable(table);
  if (table.specifiedDatabase === undefined || table.specifiedDatabase === '') {
    problems.push(`Database not resolved for table ${table.name}`);
  }
  if (problems.length > 0) {
    throw new InvalidArgumentError(`Invalid table ${table.name}: ${problems.join('; ')}`, { problems });
  }

  const inputFormat = table.inputFormat === undefined ? null : options.resolver.resolve(table.inputFormat, 'input').name;
  const outputFormat =
    table.outputFormat === undefined ? null : options.resolver.resolve(table.outputFormat, 'output').name;

  const native: NativeTable = {
    tableName: table.name,
    dbName: table.specifiedDatabase ?? '',
    owner: options.owner,
    createTime: Math.floor(options.now / 1000),
    tableType: toNativeTableType(table.tableType),
    partitionKeys: table.partitionColumns.map(toFieldSchema),
    parameters: { ...table.properties },
    viewOriginalText: table.viewText ?? null,
    viewExpandedText: table.viewText ?? null,
    sd: {
      cols: table.schema.map(toFieldSchema),
      location: null,
      inputFormat,
      outputFormat,
      serdeInfo: {
        name: null,
        serializationLib: table.serde ?? null,
        parameters: { ...table.serdeProperties },
      },
    },
  };

  if (table.location !== undefined) {
    options.adapter.setDataLocation(native, table.location);
  }
  return native;
}

// =============================================================================
// Partitions
// =============================================================================

/**
 * Converts a native partition. When the owning table is given, the number of
 * values must match its partition columns.
 *
 * @throws {CatalogConsistencyError} When the value count does not match
 */
export function toPartition(native: NativePartition, table?: Table): Partition {
  const values = native.values ?? [];
  if (table && values.length !== table.partitionColumns.length) {
    throw new CatalogConsistencyError(
      `Partition of ${native.dbName}.${native.tableName} has ${values.length} values for ${table.partitionColumns.length} partition columns`,
      { values }
    );
  }
  return {
    values: [...values],
    storage: {
      location: native.sd.location ?? '',
      inputFormat: native.sd.inputFormat ?? '',
      outputFormat: native.sd.outputFormat ?? '',
      serde: native.sd.serdeInfo.serializationLib ?? '',
      serdeProperties: { ...native.sd.serdeInfo.parameters },
    },
  };
}

/**
 * Orders a partition spec by the table's partition columns, using the
 * table's spelling of each column name.
 *
 * @throws {InvalidArgumentError} When a key is not a partition column of the table
 */
export function toNativePartitionSpec(table: Table, spec: PartitionSpec): Record<string, string> {
  const given = new Map<string, string>();
  for (const [key, value] of Object.entries(spec)) {
    given.set(key.toLowerCase(), value);
  }

  const ordered: Record<string, string> = {};
  for (const column of table.partitionColumns) {
    const key = column.name.toLowerCase();
    const value = given.get(key);
    if (value !== undefined) {
      ordered[column.name] = value;
      given.delete(key);
    }
  }

  if (given.size > 0) {
    const unknown = [...given.keys()];
    throw new InvalidArgumentError(
      `Not partition columns of ${table.name}: ${unknown.join(', ')}`,
      { columns: unknown }
    );
  }
  return ordered;
}
