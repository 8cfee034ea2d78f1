/**
 * HTTP transport layer for the WaifuVault client.
 *
 * The transport only moves bytes: it never inspects status codes or decodes
 * bodies. Mapping responses to results is the response mapper's job.
 *
 * @packageDocumentation
 */

import { TransportError } from '../errors';

/**
 * HTTP methods used by the WaifuVault API.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/**
 * Request body types.
 */
export type RequestBody = string | FormData;

/**
 * HTTP request description produced by the request builders.
 */
export interface HttpRequest {
  /** HTTP method */
  method: HttpMethod;

  /** Absolute request URL, query string included */
  url: string;

  /** Request headers */
  headers: Record<string, string>;

  /** Request body */
  body?: RequestBody;
}

/**
 * HTTP response as received from the server.
 */
export interface HttpResponse {
  /** HTTP status code */
  status: number;

  /** Status text */
  statusText: string;

  /** Response headers, keys lower-cased */
  headers: Record<string, string>;

  /** Raw response body */
  body: Uint8Array;
}

/**
 * HTTP transport interface.
 *
 * Implementations resolve with any response the server sends, whatever its
 * status, and reject with a {@link TransportError} only when no response
 * arrives. A single instance may be shared by concurrent callers.
 */
export interface HttpTransport {
  send(request: HttpRequest): Promise<HttpResponse>;
}

/**
 * Options for configuring the FetchTransport.
 */
export interface FetchTransportOptions {
  /** Headers included in every request; per-request headers win */
  baseHeaders?: Record<string, string>;

  /** Timeout in milliseconds */
  timeout?: number;
}

/**
 * Fetch-based HTTP transport.
 */
export class FetchTransport implements HttpTransport {
  private readonly baseHeaders: Record<string, string>;
  private readonly timeout: number;

  constructor(options?: FetchTransportOptions) {
    this.baseHeaders = options?.baseHeaders ?? {};
    this.timeout = options?.timeout ?? 60000;
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeout);

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: { ...this.baseHeaders, ...request.headers },
        body: request.body,
        signal: controller.signal,
      });

      const raw = await response.arrayBuffer();

      const headers: Record<string, string> = {};
      response.headers.forEach((value, key) => {
        headers[key.toLowerCase()] = value;
      });

      return {
        status: response.status,
        statusText: response.statusText,
        headers,
        body: new Uint8Array(raw),
      };
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransportError(`Request timed out after ${this.timeout}ms`, {
          cause: error,
          timedOut: true,
        });
      }

      throw new TransportError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Create a default HTTP transport.
 */
export function createHttpTransport(options?: FetchTransportOptions): HttpTransport {
  return new FetchTransport(options);
}
