/**
 * Shared helpers for the request builders.
 */

import type { WaifuVaultConfig } from '../config';
import { ValidationError } from '../errors';
import type { HttpMethod, HttpRequest } from '../transport';

/**
 * Everything a builder needs to know about the client it builds for.
 */
export interface RequestContext {
  /** REST endpoint, without a trailing slash */
  baseUrl: string;
  /** Headers sent with every request */
  headers: Record<string, string>;
}

/**
 * Derive the request context from a client configuration.
 */
export function contextFromConfig(config: WaifuVaultConfig): RequestContext {
  return {
    baseUrl: config.baseUrl,
    headers: {
      'User-Agent': config.userAgent,
      ...config.customHeaders,
    },
  };
}

/**
 * Ensure a token or name is a non-empty string.
 *
 * @throws {ValidationError}
 */
export function requireNonEmpty(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} must be a non-empty string`, field);
  }
  return value;
}

/**
 * Build an endpoint URL from path segments. Each segment is percent-encoded.
 */
export function endpoint(
  ctx: RequestContext,
  segments: readonly string[],
  query?: URLSearchParams
): string {
  const path = segments.map((segment) => `/${encodeURIComponent(segment)}`).join('');
  const qs = query?.toString();
  return qs ? `${ctx.baseUrl}${path}?${qs}` : `${ctx.baseUrl}${path}`;
}

/**
 * Build a request without a body.
 */
export function bareRequest(ctx: RequestContext, method: HttpMethod, url: string): HttpRequest {
  return { method, url, headers: { ...ctx.headers } };
}

/**
 * Build a request with a JSON body.
 */
export function jsonRequest(
  ctx: RequestContext,
  method: HttpMethod,
  url: string,
  payload: unknown
): HttpRequest {
  return {
    method,
    url,
    headers: { ...ctx.headers, 'Content-Type': 'application/json' },
    body: JSON.stringify(payload),
  };
}
