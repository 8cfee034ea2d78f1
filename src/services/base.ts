/**
 * Base service class with common functionality for all WaifuVault services.
 */

import {
  TransportError,
  err,
  isWaifuVaultError,
  ok,
  type WaifuVaultResult,
} from '../errors';
import type { Logger } from '../observability/logging';
import type { RequestContext } from '../requests';
import type { HttpRequest, HttpResponse, HttpTransport } from '../transport';

/**
 * Dependencies shared by every service.
 */
export interface ServiceDependencies {
  transport: HttpTransport;
  context: RequestContext;
  logger: Logger;
}

/**
 * Abstract base class for all service implementations.
 */
export abstract class BaseService {
  protected readonly transport: HttpTransport;
  protected readonly context: RequestContext;
  protected readonly logger: Logger;

  constructor(deps: ServiceDependencies) {
    this.transport = deps.transport;
    this.context = deps.context;
    this.logger = deps.logger;
  }

  /**
   * Run an operation and fold its domain errors into a result.
   *
   * Errors that are not WaifuVault errors are programming faults and propagate.
   *
   * @param operation - Name used in log lines, e.g. `files.upload`
   */
  protected async execute<T>(
    operation: string,
    run: () => Promise<T>
  ): Promise<WaifuVaultResult<T>> {
    try {
      return ok(await run());
    } catch (error) {
      if (!isWaifuVaultError(error)) {
        throw error;
      }
      this.logger.warn(`${operation} failed`, {
        kind: error.kind,
        status: error.status,
        message: error.message,
      });
      return err(error);
    }
  }

  /**
   * Send a request through the transport.
   *
   * Anything the transport throws reaches the caller as a {@link TransportError};
   * a transport that already throws one has it passed through as is.
   */
  protected async send(operation: string, request: HttpRequest): Promise<HttpResponse> {
    this.logger.debug(`${operation} request`, { method: request.method });

    let response: HttpResponse;
    try {
      response = await this.transport.send(request);
    } catch (error) {
      if (error instanceof TransportError) {
        throw error;
      }
      throw new TransportError(
        `Request failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.logger.debug(`${operation} response`, {
      status: response.status,
      bytes: response.body.byteLength,
    });
    return response;
  }
}
