/**
 * Adapter for 1.1 catalogs: dropping a missing index is an error.
 */

import { CatalogVersion } from '@metabridge/catalog-types';
import type { NativeDropIndexArgs } from '../native.js';
import { CatalogAdapterV1_0 } from './v1_0.js';

export class CatalogAdapterV1_1 extends CatalogAdapterV1_0 {
  override readonly version: CatalogVersion = CatalogVersion.v1_1;

  protected override dropIndexArgs(dbName: string, tableName: string, indexName: string): NativeDropIndexArgs {
    return { ...super.dropIndexArgs(dbName, tableName, indexName), throwException: true };
  }
}
