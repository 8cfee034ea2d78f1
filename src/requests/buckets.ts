import type { HttpRequest } from '../transport';
import { bareRequest, endpoint, jsonRequest, requireNonEmpty, type RequestContext } from './context';

export function buildCreateBucketRequest(ctx: RequestContext): HttpRequest {
  return bareRequest(ctx, 'GET', endpoint(ctx, ['bucket', 'create']));
}

/**
 * The bucket token travels in the body here, not the path.
 */
export function buildGetBucketRequest(ctx: RequestContext, bucketToken: string): HttpRequest {
  const token = requireNonEmpty(bucketToken, 'bucketToken');
  return jsonRequest(ctx, 'POST', endpoint(ctx, ['bucket', 'get']), { bucket_token: token });
}

export function buildDeleteBucketRequest(ctx: RequestContext, bucketToken: string): HttpRequest {
  const token = requireNonEmpty(bucketToken, 'bucketToken');
  return bareRequest(ctx, 'DELETE', endpoint(ctx, ['bucket', token]));
}
