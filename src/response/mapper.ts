/**
 * Response mapping: decoded value on success, domain error otherwise.
 *
 * @packageDocumentation
 */

import type { z } from 'zod';
import { ApiError, DecodeError } from '../errors';
import type { HttpResponse } from '../transport';
import { ErrorEnvelopeSchema, type ErrorEnvelope } from '../types';

const decoder = new TextDecoder();

export function isSuccessStatus(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseErrorEnvelope(text: string): ErrorEnvelope | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }
  const result = ErrorEnvelopeSchema.safeParse(parsed);
  return result.success ? result.data : undefined;
}

/**
 * Map a non-2xx response to an {@link ApiError}.
 *
 * The server's error envelope supplies the message and error name. Without an
 * envelope the message is `fallbackMessage` if given, else the body text, else
 * the status text.
 */
export function toApiError(response: HttpResponse, fallbackMessage?: string): ApiError {
  const text = decoder.decode(response.body);
  const envelope = parseErrorEnvelope(text);

  if (envelope) {
    return new ApiError(response.status, envelope.message, envelope.name);
  }

  const message =
    fallbackMessage ?? (text.trim() || response.statusText || `HTTP ${response.status}`);
  return new ApiError(response.status, message);
}

/**
 * Decode a JSON response against a schema.
 *
 * @throws {ApiError} On a non-2xx status
 * @throws {DecodeError} On a 2xx status whose body is not JSON or does not match
 */
export function mapJsonResponse<T>(
  response: HttpResponse,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): T {
  if (!isSuccessStatus(response.status)) {
    throw toApiError(response);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(decoder.decode(response.body));
  } catch (error) {
    throw new DecodeError(
      response.status,
      `Response body is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new DecodeError(
      response.status,
      `Response body does not match the expected shape: ${details}`,
      { issues: result.error.issues }
    );
  }

  return result.data;
}

/**
 * Return the raw body of a binary response.
 *
 * @throws {ApiError} On a non-2xx status
 */
export function mapBinaryResponse(response: HttpResponse, fallbackMessage?: string): Uint8Array {
  if (!isSuccessStatus(response.status)) {
    throw toApiError(response, fallbackMessage);
  }
  return response.body;
}

/**
 * Map a file download. A bare 403 means a missing or wrong password.
 *
 * @throws {ApiError} On a non-2xx status
 */
export function mapDownloadResponse(response: HttpResponse, passwordSupplied: boolean): Uint8Array {
  const fallback =
    response.status === 403
      ? passwordSupplied
        ? 'supplied password is incorrect'
        : 'this file requires a password to download'
      : undefined;
  return mapBinaryResponse(response, fallback);
}
