/**
 * @metabridge/catalog-types - Collaborator interfaces
 *
 * Contracts for subsystems that consume the value types produced by the
 * client façade without touching catalog state.
 *
 * @module collaborators
 */

import type { Database, Partition, Table } from './model.js';

/**
 * Catalog entities a query resolved to.
 *
 * @public
 * @stability experimental
 */
export interface ResolvedCatalogEntities {
  /** Entities the query reads */
  inputs: ReadonlyArray<ResolvedEntity>;
  /** Entities the query writes */
  outputs: ReadonlyArray<ResolvedEntity>;
}

/**
 * One resolved entity. `overwrite` marks outputs that replace existing data.
 */
export type ResolvedEntity =
  | { kind: 'database'; database: Readonly<Database> }
  | { kind: 'table'; table: Readonly<Table>; overwrite?: boolean }
  | { kind: 'partition'; table: Readonly<Table>; partition: Readonly<Partition>; overwrite?: boolean };

/**
 * Derives access-control objects from resolved catalog entities.
 *
 * Implementations only read the entities they are given.
 *
 * @public
 * @stability experimental
 */
export interface PrivilegeDeriver<TPrivilege> {
  derive(entities: ResolvedCatalogEntities): TPrivilege[];
}
