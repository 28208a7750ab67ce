/**
 * @metabridge/catalog-types - Catalog protocol versions
 *
 * Releases of the metastore client protocol that the client façade can speak.
 * The version is fixed when a façade is created and picks the protocol
 * adapter used for every call.
 *
 * @module versions
 */

// =============================================================================
// Catalog Versions
// =============================================================================

/**
 * Supported catalog protocol releases.
 *
 * @example
 * ```typescript
 * const client = await createMetastoreClient({
 *   version: CatalogVersion.v1_2,
 *   connectionFactory,
 * });
 * ```
 *
 * @public
 * @stability stable
 */
export const CatalogVersion = {
  v12: '0.12',
  v13: '0.13',
  v14: '0.14',
  v1_0: '1.0',
  v1_1: '1.1',
  v1_2: '1.2',
} as const;

/**
 * A supported catalog protocol release, e.g. `'1.2'`.
 */
export type CatalogVersion = typeof CatalogVersion[keyof typeof CatalogVersion];

/**
 * Enum key of a catalog version, e.g. `'v1_2'`.
 */
export type CatalogVersionKey = keyof typeof CatalogVersion;

/**
 * Every supported version, oldest first.
 */
export const SUPPORTED_CATALOG_VERSIONS: readonly CatalogVersion[] = Object.freeze(
  Object.values(CatalogVersion)
);

/**
 * Type guard for a supported catalog version.
 */
export function isCatalogVersion(value: unknown): value is CatalogVersion {
  return typeof value === 'string' && SUPPORTED_CATALOG_VERSIONS.some((v) => v === value);
}

function isCatalogVersionKey(value: string): value is CatalogVersionKey {
  return Object.prototype.hasOwnProperty.call(CatalogVersion, value);
}

/**
 * Parses a version name into a supported catalog version.
 *
 * Accepts the release name (`'1.2'`), the enum key (`'v1_2'`) and patch
 * releases (`'0.13.1'` resolves to `'0.13'`).
 *
 * @returns The version, or `undefined` when the release is not supported
 */
export function parseCatalogVersion(text: string): CatalogVersion | undefined {
  const trimmed = text.trim();
  if (isCatalogVersionKey(trimmed)) {
    return CatalogVersion[trimmed];
  }

  const match = /^(\d+)\.(\d+)(?:\.\d+)*$/.exec(trimmed);
  if (!match) {
    return undefined;
  }
  const candidate = `${Number(match[1])}.${match[2]}`;
  return isCatalogVersion(candidate) ? candidate : undefined;
}

/**
 * Compares two catalog versions by release order.
 *
 * @returns negative if a is older than b, positive if newer, 0 if equal
 */
export function compareCatalogVersions(a: CatalogVersion, b: CatalogVersion): number {
  return SUPPORTED_CATALOG_VERSIONS.indexOf(a) - SUPPORTED_CATALOG_VERSIONS.indexOf(b);
}
