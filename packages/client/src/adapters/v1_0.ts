/**
 * Adapter for 1.0 catalogs. Same native surface as 0.14.
 */

import { CatalogVersion } from '@metabridge/catalog-types';
import { CatalogAdapterV0_14 } from './v0_14.js';

export class CatalogAdapterV1_0 extends CatalogAdapterV0_14 {
  override readonly version: CatalogVersion = CatalogVersion.v1_0;
}
