/**
 * Upload request builder.
 *
 * Produces a multipart `PUT` to the vault root, or to `/{bucketToken}` when a
 * bucket is given. The expiry and the two flags go in the query string, where
 * the service reads them; the content and the password go in the form body.
 */

import { readFile } from 'fs/promises';
import { basename } from 'path';
import { IoError, ValidationError } from '../errors';
import type { HttpRequest } from '../transport';
import type { ContentSource, UploadRequest } from '../types';
import { endpoint, requireNonEmpty, type RequestContext } from './context';
import { formatExpiry } from './expiry';

/**
 * The key each source kind carries its content in.
 */
const SOURCE_CONTENT_KEYS = {
  file: 'path',
  url: 'url',
  bytes: 'data',
} as const;

const ALL_CONTENT_KEYS = Object.values(SOURCE_CONTENT_KEYS);

/**
 * Check the content source without touching the filesystem.
 *
 * The `ContentSource` union already rules out a second source for typed
 * callers; the key check covers objects built without the types. A key
 * holding `undefined` counts as unset.
 *
 * @throws {ValidationError}
 */
export function validateContentSource(source: ContentSource | undefined): void {
  if (typeof source !== 'object' || source === null) {
    throw new ValidationError('An upload needs a file, url or bytes source', 'source');
  }

  switch (source.type) {
    case 'file':
      requireNonEmpty(source.path, 'source.path');
      break;
    case 'url':
      requireNonEmpty(source.url, 'source.url');
      if (source.filename !== undefined) {
        requireNonEmpty(source.filename, 'source.filename');
      }
      break;
    case 'bytes':
      if (!(source.data instanceof Uint8Array)) {
        throw new ValidationError('A bytes source needs its data as a Uint8Array', 'source.data');
      }
      requireNonEmpty(source.filename, 'source.filename');
      break;
    default:
      throw new ValidationError('An upload needs a file, url or bytes source', 'source');
  }

  const ownKey = SOURCE_CONTENT_KEYS[source.type];
  const others = ALL_CONTENT_KEYS.filter(
    (key) => key !== ownKey && Reflect.get(source, key) !== undefined
  );
  if (others.length > 0) {
    throw new ValidationError(
      `An upload takes exactly one content source; got ${[ownKey, ...others].join(', ')}`,
      'source'
    );
  }
}

/**
 * Build the query string for the upload's optional settings.
 */
function buildUploadQuery(request: UploadRequest): URLSearchParams {
  const query = new URLSearchParams();

  if (request.expires !== undefined) {
    query.set('expires', formatExpiry(request.expires, 'expires'));
  }
  if (request.hideFilename !== undefined) {
    query.set('hide_filename', String(request.hideFilename));
  }
  if (request.oneTimeDownload !== undefined) {
    query.set('one_time_download', String(request.oneTimeDownload));
  }

  return query;
}

/**
 * Read a local upload source fully into memory.
 *
 * @throws {IoError}
 */
async function readSourceFile(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path);
  } catch (error) {
    throw new IoError(path, error);
  }
}

/**
 * Build the HTTP request for an upload.
 *
 * Input is validated first; a local file is read only once validation has
 * passed. Nothing is sent from here.
 *
 * @throws {ValidationError} If the request is malformed
 * @throws {IoError} If a local file source cannot be read
 */
export async function buildUploadRequest(
  ctx: RequestContext,
  request: UploadRequest
): Promise<HttpRequest> {
  validateContentSource(request.source);

  const segments: string[] = [];
  if (request.bucketToken !== undefined) {
    segments.push(requireNonEmpty(request.bucketToken, 'bucketToken'));
  }

  const url = endpoint(ctx, segments, buildUploadQuery(request));
  const form = new FormData();
  const source = request.source;

  switch (source.type) {
    case 'file': {
      const data = await readSourceFile(source.path);
      form.append('file', new Blob([data]), basename(source.path));
      break;
    }
    case 'bytes':
      form.append('file', new Blob([source.data]), source.filename);
      break;
    case 'url':
      form.append('url', source.url);
      if (source.filename !== undefined) {
        form.append('filename', source.filename);
      }
      break;
  }

  if (request.password !== undefined) {
    form.append('password', request.password);
  }

  return {
    method: 'PUT',
    url,
    headers: { ...ctx.headers },
    body: form,
  };
}
