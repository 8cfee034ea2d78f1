/**
 * Modification request builder.
 */

import { ValidationError } from '../errors';
import type { HttpRequest } from '../transport';
import type { ModificationRequest } from '../types';
import { endpoint, jsonRequest, requireNonEmpty, type RequestContext } from './context';
import { formatExpiry } from './expiry';

/**
 * JSON body of a modification. Keys are present only for fields that change.
 */
export interface ModificationPayload {
  password?: string;
  previousPassword?: string;
  customExpiry?: string;
  hideFilename?: boolean;
}

/**
 * Serialize the fields that were set. The server reads a present key as
 * "change this" and an absent one as "leave unchanged", so unset fields are
 * left out rather than sent as `null`.
 *
 * @throws {ValidationError} If no field is set or the expiry is invalid
 */
export function buildModificationPayload(request: ModificationRequest): ModificationPayload {
  const payload: ModificationPayload = {};

  if (request.password !== undefined) {
    payload.password = request.password;
  }
  if (request.previousPassword !== undefined) {
    payload.previousPassword = request.previousPassword;
  }
  if (request.customExpiry !== undefined) {
    payload.customExpiry = formatExpiry(request.customExpiry, 'customExpiry');
  }
  if (request.hideFilename !== undefined) {
    payload.hideFilename = request.hideFilename;
  }

  if (Object.keys(payload).length === 0) {
    throw new ValidationError(
      'A modification must set at least one of password, previousPassword, customExpiry, hideFilename'
    );
  }

  return payload;
}

/**
 * Build the `PATCH /{token}` request for a modification.
 *
 * The password/previousPassword pairing is left to the server, which knows
 * whether the file is already protected.
 *
 * @throws {ValidationError}
 */
export function buildModificationRequest(
  ctx: RequestContext,
  request: ModificationRequest
): HttpRequest {
  const token = requireNonEmpty(request.token, 'token');
  const payload = buildModificationPayload(request);
  return jsonRequest(ctx, 'PATCH', endpoint(ctx, [token]), payload);
}
