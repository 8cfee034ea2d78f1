/**
 * In-process transport for tests.
 *
 * Responses are queued up front and handed out in order; every request the
 * client sends is recorded for later assertions.
 *
 * @example
 * ```typescript
 * // Arrange
 * const transport = new MockTransport();
 * transport.enqueueJson(200, true);
 * const client = WaifuVaultClient.create({ transport });
 *
 * // Act
 * const result = await client.files().delete('file-token');
 *
 * // Assert
 * expect(result).toEqual({ success: true, data: true });
 * expect(transport.lastRequest()?.method).toBe('DELETE');
 * ```
 */

import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';

type QueuedReply =
  | { kind: 'response'; response: HttpResponse }
  | { kind: 'failure'; error: unknown };

const STATUS_TEXT: Record<number, string> = {
  200: 'OK',
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  500: 'Internal Server Error',
};

/**
 * Mock transport implementation for testing.
 */
export class MockTransport implements HttpTransport {
  private replies: QueuedReply[] = [];
  private requests: HttpRequest[] = [];

  /**
   * Enqueue a raw response.
   */
  enqueue(response: HttpResponse): void {
    this.replies.push({ kind: 'response', response });
  }

  /**
   * Enqueue a JSON response with the given status code and body.
   */
  enqueueJson(status: number, body: unknown): void {
    this.enqueueText(status, JSON.stringify(body), { 'content-type': 'application/json' });
  }

  /**
   * Enqueue a plain text response.
   */
  enqueueText(status: number, text: string, headers: Record<string, string> = {}): void {
    this.enqueue({
      status,
      statusText: STATUS_TEXT[status] ?? '',
      headers,
      body: new TextEncoder().encode(text),
    });
  }

  /**
   * Enqueue a binary response.
   */
  enqueueBytes(
    status: number,
    bytes: Uint8Array,
    headers: Record<string, string> = { 'content-type': 'application/octet-stream' }
  ): void {
    this.enqueue({
      status,
      statusText: STATUS_TEXT[status] ?? '',
      headers,
      body: bytes,
    });
  }

  /**
   * Enqueue a server error envelope.
   *
   * @example
   * ```typescript
   * transport.enqueueError(404, 'not found', 'NotFoundError');
   * ```
   */
  enqueueError(status: number, message: string, name = 'Error'): void {
    this.enqueueJson(status, { name, message, status });
  }

  /**
   * Make the next send reject with the given error, as a dropped connection would.
   */
  enqueueFailure(error: unknown): void {
    this.replies.push({ kind: 'failure', error });
  }

  /**
   * Get all requests that were sent.
   */
  getRequests(): HttpRequest[] {
    return [...this.requests];
  }

  /**
   * Get the most recent request.
   */
  lastRequest(): HttpRequest | undefined {
    return this.requests[this.requests.length - 1];
  }

  /**
   * Returns the number of requests sent.
   */
  requestCount(): number {
    return this.requests.length;
  }

  /**
   * Clear queued replies and recorded requests.
   */
  reset(): void {
    this.replies = [];
    this.requests = [];
  }

  async send(request: HttpRequest): Promise<HttpResponse> {
    this.requests.push(request);

    const reply = this.replies.shift();
    if (!reply) {
      throw new Error(`No mock response configured for ${request.method} ${request.url}`);
    }
    if (reply.kind === 'failure') {
      throw reply.error;
    }
    return reply.response;
  }
}
