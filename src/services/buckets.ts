/**
 * Buckets service.
 *
 * A bucket token grants access to every file uploaded under it; pass it as
 * `UploadRequest.bucketToken` to upload into the bucket.
 */

import type { WaifuVaultResult } from '../errors';
import {
  buildCreateBucketRequest,
  buildDeleteBucketRequest,
  buildGetBucketRequest,
} from '../requests';
import { mapJsonResponse } from '../response';
import { BucketEntrySchema, DeleteResponseSchema, type BucketEntry } from '../types';
import { BaseService } from './base';

export interface BucketsService {
  /** Create a new, empty bucket. */
  create(): Promise<WaifuVaultResult<BucketEntry>>;

  /** Get a bucket with its files and albums. */
  get(bucketToken: string): Promise<WaifuVaultResult<BucketEntry>>;

  /** Delete a bucket and everything in it. */
  delete(bucketToken: string): Promise<WaifuVaultResult<boolean>>;
}

export class BucketsServiceImpl extends BaseService implements BucketsService {
  create(): Promise<WaifuVaultResult<BucketEntry>> {
    return this.execute('buckets.create', async () => {
      const response = await this.send('buckets.create', buildCreateBucketRequest(this.context));
      return mapJsonResponse(response, BucketEntrySchema);
    });
  }

  get(bucketToken: string): Promise<WaifuVaultResult<BucketEntry>> {
    return this.execute('buckets.get', async () => {
      const response = await this.send(
        'buckets.get',
        buildGetBucketRequest(this.context, bucketToken)
      );
      return mapJsonResponse(response, BucketEntrySchema);
    });
  }

  delete(bucketToken: string): Promise<WaifuVaultResult<boolean>> {
    return this.execute('buckets.delete', async () => {
      const response = await this.send(
        'buckets.delete',
        buildDeleteBucketRequest(this.context, bucketToken)
      );
      return mapJsonResponse(response, DeleteResponseSchema);
    });
  }
}
