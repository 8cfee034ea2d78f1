/**
 * Builders for file info, deletion and download.
 */

import { ValidationError } from '../errors';
import type { HttpRequest } from '../transport';
import type { GetRequest } from '../types';
import { bareRequest, endpoint, requireNonEmpty, type RequestContext } from './context';

/**
 * Header carrying the password of protected content.
 */
export const PASSWORD_HEADER = 'x-password';

export function buildFileInfoRequest(ctx: RequestContext, request: GetRequest): HttpRequest {
  const token = requireNonEmpty(request.token, 'token');
  const query = new URLSearchParams({ formatted: String(request.formatted ?? false) });
  return bareRequest(ctx, 'GET', endpoint(ctx, [token], query));
}

export function buildDeleteFileRequest(ctx: RequestContext, token: string): HttpRequest {
  return bareRequest(ctx, 'DELETE', endpoint(ctx, [requireNonEmpty(token, 'token')]));
}

/**
 * Build a download of a content URL, as returned in a file entry's `url`.
 *
 * @throws {ValidationError} If the URL is empty or not absolute
 */
export function buildDownloadRequest(
  ctx: RequestContext,
  url: string,
  password?: string
): HttpRequest {
  requireNonEmpty(url, 'url');
  try {
    new URL(url);
  } catch (error) {
    throw new ValidationError(
      `url is not an absolute URL: ${error instanceof Error ? error.message : String(error)}`,
      'url'
    );
  }

  const request = bareRequest(ctx, 'GET', url);
  if (password !== undefined) {
    request.headers[PASSWORD_HEADER] = password;
  }
  return request;
}
