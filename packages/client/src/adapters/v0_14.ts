/**
 * Adapter for 0.14 catalogs: loads carry source-locality and ACID flags.
 */

import { CatalogVersion } from '@metabridge/catalog-types';
import type { NativeLoadDynamicPartitionsArgs, NativeLoadPartitionArgs, NativeLoadTableArgs } from '../native.js';
import type { LoadDynamicPartitionsRequest, LoadPartitionRequest, LoadTableRequest } from './types.js';
import { CatalogAdapterV0_13 } from './v0_13.js';

export class CatalogAdapterV0_14 extends CatalogAdapterV0_13 {
  override readonly version: CatalogVersion = CatalogVersion.v14;

  protected override loadPartitionArgs(request: LoadPartitionRequest): NativeLoadPartitionArgs {
    return { ...super.loadPartitionArgs(request), isSrcLocal: false, isAcid: false };
  }

  protected override loadTableArgs(request: LoadTableRequest): NativeLoadTableArgs {
    return {
      ...super.loadTableArgs(request),
      isSrcLocal: false,
      isSkewedStoreAsSubdir: false,
      isAcid: false,
    };
  }

  protected override loadDynamicPartitionsArgs(request: LoadDynamicPartitionsRequest): NativeLoadDynamicPartitionsArgs {
    return { ...super.loadDynamicPartitionsArgs(request), isAcid: false };
  }
}
