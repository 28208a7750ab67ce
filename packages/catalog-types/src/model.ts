/**
 * @metabridge/catalog-types - Catalog domain model
 *
 * Value objects produced by the client façade for databases, tables and
 * partitions. They are created fresh for every call and never hold the
 * connection they were read through.
 *
 * @module model
 */

// =============================================================================
// Columns and Table Kinds
// =============================================================================

/**
 * A column of a table or one of its partition keys.
 *
 * @public
 * @stability stable
 */
export interface Column {
  name: string;
  /** Catalog type name, e.g. `string`, `int`, `varchar(32)` */
  type: string;
  comment?: string;
}

/**
 * Kind of a catalog table. Exactly one of the four applies.
 *
 * @public
 * @stability stable
 */
export const TableType = {
  MANAGED: 'MANAGED',
  EXTERNAL: 'EXTERNAL',
  VIEW: 'VIEW',
  INDEX: 'INDEX',
} as const;

export type TableType = typeof TableType[keyof typeof TableType];

/**
 * Type guard for {@link TableType}.
 */
export function isTableType(value: unknown): value is TableType {
  return (
    value === TableType.MANAGED ||
    value === TableType.EXTERNAL ||
    value === TableType.VIEW ||
    value === TableType.INDEX
  );
}

// =============================================================================
// Databases
// =============================================================================

/**
 * A catalog database.
 *
 * @public
 * @stability stable
 */
export interface Database {
  name: string;
  /** Location URI of the database directory */
  location: string;
}

// =============================================================================
// Tables
// =============================================================================

/**
 * A catalog table as seen by callers.
 *
 * @description Data columns and partition columns are disjoint. `specifiedDatabase`
 * is the explicit database qualifier; operations that need the owning database
 * fail when it is absent.
 *
 * @public
 * @stability stable
 */
export interface Table {
  name: string;
  specifiedDatabase?: string;
  /** Data columns, in declaration order */
  schema: Column[];
  /** Partition columns, in declaration order */
  partitionColumns: Column[];
  properties: Record<string, string>;
  serdeProperties: Record<string, string>;
  tableType: TableType;
  location?: string;
  inputFormat?: string;
  outputFormat?: string;
  serde?: string;
  /** Expanded text of a view definition */
  viewText?: string;
}

/**
 * Returns the database a table belongs to.
 *
 * @throws {Error} When the table carries no database qualifier
 */
export function tableDatabase(table: Pick<Table, 'name' | 'specifiedDatabase'>): string {
  if (table.specifiedDatabase === undefined || table.specifiedDatabase === '') {
    throw new Error(`Database not resolved for table ${table.name}`);
  }
  return table.specifiedDatabase;
}

/**
 * Returns `<database>.<table>`.
 */
export function qualifiedName(table: Pick<Table, 'name' | 'specifiedDatabase'>): string {
  return `${tableDatabase(table)}.${table.name}`;
}

/**
 * Splits a qualified name into database and table.
 *
 * A name without a dot belongs to `defaultDatabase`.
 */
export function splitQualifiedName(
  name: string,
  defaultDatabase = 'default'
): { database: string; table: string } {
  const dot = name.indexOf('.');
  if (dot === -1) {
    return { database: defaultDatabase, table: name };
  }
  return { database: name.slice(0, dot), table: name.slice(dot + 1) };
}

/**
 * Checks the structural invariants of a table.
 *
 * @returns One message per violation; empty when the table is valid
 */
export function validateTable(table: Table): string[] {
  const problems: string[] = [];

  if (table.name.trim() === '') {
    problems.push('Table name must not be empty');
  }
  if (!isTableType(table.tableType)) {
    problems.push(`Unknown table type: ${String(table.tableType)}`);
  }

  const dataNames = new Set<string>();
  for (const column of table.schema) {
    const key = column.name.toLowerCase();
    if (dataNames.has(key)) {
      problems.push(`Duplicate column: ${column.name}`);
    }
    dataNames.add(key);
  }

  const partitionNames = new Set<string>();
  for (const column of table.partitionColumns) {
    const key = column.name.toLowerCase();
    if (partitionNames.has(key)) {
      problems.push(`Duplicate partition column: ${column.name}`);
    }
    if (dataNames.has(key)) {
      problems.push(`Partition column ${column.name} is also a data column`);
    }
    partitionNames.add(key);
  }

  return problems;
}

// =============================================================================
// Partitions
// =============================================================================

/**
 * Physical storage of a partition.
 *
 * @public
 * @stability stable
 */
export interface StorageDescriptor {
  location: string;
  inputFormat: string;
  outputFormat: string;
  serde: string;
  serdeProperties: Record<string, string>;
}

/**
 * A table partition.
 *
 * @description `values` are positional and follow the owning table's
 * partition column order.
 *
 * @public
 * @stability stable
 */
export interface Partition {
  values: string[];
  storage: StorageDescriptor;
}

/**
 * Partition column name to value, in partition column order.
 */
export type PartitionSpec = Record<string, string>;

/**
 * Comparison operators usable in partition pruning predicates.
 */
export type PredicateOperator = '=' | '<>' | '<' | '<=' | '>' | '>=';

/**
 * A comparison of a partition column against a literal.
 *
 * @example
 * ```typescript
 * const predicates: PartitionPredicate[] = [
 *   { column: 'ds', operator: '>=', value: '2024-01-01' },
 *   { column: 'hr', operator: '<', value: 12 },
 * ];
 * ```
 *
 * @public
 * @stability stable
 */
export interface PartitionPredicate {
  column: string;
  operator: PredicateOperator;
  value: string | number;
}
