/**
 * Album request builders.
 */

import { ValidationError } from '../errors';
import type { HttpRequest } from '../transport';
import { bareRequest, endpoint, jsonRequest, requireNonEmpty, type RequestContext } from './context';

/**
 * Ensure a list of file tokens is non-empty and holds only non-empty tokens.
 *
 * @throws {ValidationError}
 */
function requireFileTokens(fileTokens: readonly string[]): string[] {
  if (!Array.isArray(fileTokens) || fileTokens.length === 0) {
    throw new ValidationError('fileTokens must contain at least one token', 'fileTokens');
  }
  return fileTokens.map((token, i) => requireNonEmpty(token, `fileTokens[${i}]`));
}

export function buildCreateAlbumRequest(
  ctx: RequestContext,
  bucketToken: string,
  name: string
): HttpRequest {
  const bucket = requireNonEmpty(bucketToken, 'bucketToken');
  const albumName = requireNonEmpty(name, 'name');
  return jsonRequest(ctx, 'POST', endpoint(ctx, ['album', bucket]), { name: albumName });
}

export function buildGetAlbumRequest(ctx: RequestContext, albumToken: string): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  return bareRequest(ctx, 'GET', endpoint(ctx, ['album', token]));
}

export function buildAssociateFilesRequest(
  ctx: RequestContext,
  albumToken: string,
  fileTokens: readonly string[]
): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  const files = requireFileTokens(fileTokens);
  return jsonRequest(ctx, 'POST', endpoint(ctx, ['album', token, 'associate']), {
    fileTokens: files,
  });
}

export function buildDisassociateFilesRequest(
  ctx: RequestContext,
  albumToken: string,
  fileTokens: readonly string[]
): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  const files = requireFileTokens(fileTokens);
  return jsonRequest(ctx, 'POST', endpoint(ctx, ['album', token, 'disassociate']), {
    fileTokens: files,
  });
}

/**
 * @param deleteFiles - also delete the album's files on the server
 */
export function buildDeleteAlbumRequest(
  ctx: RequestContext,
  albumToken: string,
  deleteFiles: boolean
): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  const query = new URLSearchParams({ deleteFiles: String(deleteFiles) });
  return bareRequest(ctx, 'DELETE', endpoint(ctx, ['album', token], query));
}

export function buildShareAlbumRequest(ctx: RequestContext, albumToken: string): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  return bareRequest(ctx, 'GET', endpoint(ctx, ['album', 'share', token]));
}

export function buildRevokeAlbumRequest(ctx: RequestContext, albumToken: string): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  return bareRequest(ctx, 'GET', endpoint(ctx, ['album', 'revoke', token]));
}

/**
 * Request a zip of the album. An empty id list asks for every file.
 */
export function buildDownloadAlbumRequest(
  ctx: RequestContext,
  albumToken: string,
  fileIds: readonly number[] = []
): HttpRequest {
  const token = requireNonEmpty(albumToken, 'albumToken');
  const invalid = fileIds.find((id) => !Number.isInteger(id) || id < 0);
  if (invalid !== undefined) {
    throw new ValidationError(`fileIds must be non-negative integers, got ${invalid}`, 'fileIds');
  }
  return jsonRequest(ctx, 'POST', endpoint(ctx, ['album', 'download', token]), [...fileIds]);
}
