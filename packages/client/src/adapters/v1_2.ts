/**
 * Adapter for 1.2 catalogs: transactional dynamic partition loads and the
 * `reload` command.
 */

import { CatalogVersion } from '@metabridge/catalog-types';
import type { NativeLoadDynamicPartitionsArgs } from '../native.js';
import type { LoadDynamicPartitionsRequest } from './types.js';
import { CatalogAdapterV1_1 } from './v1_1.js';

export class CatalogAdapterV1_2 extends CatalogAdapterV1_1 {
  override readonly version: CatalogVersion = CatalogVersion.v1_2;

  protected override readonly simpleVerbs: ReadonlySet<string> = new Set([
    'set',
    'reset',
    'dfs',
    'add',
    'delete',
    'list',
    'compile',
    'reload',
  ]);

  protected override loadDynamicPartitionsArgs(request: LoadDynamicPartitionsRequest): NativeLoadDynamicPartitionsArgs {
    return { ...super.loadDynamicPartitionsArgs(request), txnId: 0 };
  }
}
