/**
 * @metabridge/client - Protocol adapters
 *
 * One adapter instance per supported catalog release.
 *
 * @packageDocumentation
 * @stability stable
 */

import { CatalogVersion } from '@metabridge/catalog-types';
import { ConfigurationError } from '../errors.js';
import type { CatalogAdapter } from './types.js';
import { CatalogAdapterV0_12 } from './v0_12.js';
import { CatalogAdapterV0_13 } from './v0_13.js';
import { CatalogAdapterV0_14 } from './v0_14.js';
import { CatalogAdapterV1_0 } from './v1_0.js';
import { CatalogAdapterV1_1 } from './v1_1.js';
import { CatalogAdapterV1_2 } from './v1_2.js';

const ADAPTERS = {
  v12: new CatalogAdapterV0_12(),
  v13: new CatalogAdapterV0_13(),
  v14: new CatalogAdapterV0_14(),
  v1_0: new CatalogAdapterV1_0(),
  v1_1: new CatalogAdapterV1_1(),
  v1_2: new CatalogAdapterV1_2(),
} satisfies Record<keyof typeof CatalogVersion, CatalogAdapter>;

/**
 * Returns the adapter for a catalog version.
 *
 * @throws {ConfigurationError} When the version is not supported
 *
 * @public
 * @stability stable
 */
export function selectAdapter(version: CatalogVersion): CatalogAdapter {
  switch (version) {
    case CatalogVersion.v12:
      return ADAPTERS.v12;
    case CatalogVersion.v13:
      return ADAPTERS.v13;
    case CatalogVersion.v14:
      return ADAPTERS.v14;
    case CatalogVersion.v1_0:
      return ADAPTERS.v1_0;
    case CatalogVersion.v1_1:
      return ADAPTERS.v1_1;
    case CatalogVersion.v1_2:
      return ADAPTERS.v1_2;
    default: {
      const unsupported: never = version;
      throw ConfigurationError.unsupportedVersion(unsupported);
    }
  }
}

export type {
  CatalogAdapter,
  CommandProcessor,
  LoadPartitionRequest,
  LoadTableRequest,
  LoadDynamicPartitionsRequest,
} from './types.js';
export { CatalogAdapterV0_12, toLocationUri } from './v0_12.js';
export { CatalogAdapterV0_13, buildPartitionFilter } from './v0_13.js';
export { CatalogAdapterV0_14 } from './v0_14.js';
export { CatalogAdapterV1_0 } from './v1_0.js';
export { CatalogAdapterV1_1 } from './v1_1.js';
export { CatalogAdapterV1_2 } from './v1_2.js';
export { parseTimeValue, parseSeconds } from './duration.js';
