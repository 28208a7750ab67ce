/**
 * @metabridge/catalog-types - Shared catalog types
 *
 * Canonical value types for the metastore client façade and the components
 * that consume what it returns (planners, privilege derivation).
 *
 * ## Stability
 *
 * - **stable**: No breaking changes in minor versions.
 * - **experimental**: May change in any version.
 *
 * @packageDocumentation
 */

// =============================================================================
// Versions
// =============================================================================

export {
  CatalogVersion,
  type CatalogVersionKey,
  SUPPORTED_CATALOG_VERSIONS,
  isCatalogVersion,
  parseCatalogVersion,
  compareCatalogVersions,
} from './versions.js';

// =============================================================================
// Domain Model
// =============================================================================

export {
  type Column,
  TableType,
  isTableType,
  type Database,
  type Table,
  tableDatabase,
  qualifiedName,
  splitQualifiedName,
  validateTable,
  type StorageDescriptor,
  type Partition,
  type PartitionSpec,
  type PredicateOperator,
  type PartitionPredicate,
} from './model.js';

// =============================================================================
// Collaborators
// =============================================================================

export type {
  ResolvedCatalogEntities,
  ResolvedEntity,
  PrivilegeDeriver,
} from './collaborators.js';
