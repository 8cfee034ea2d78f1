/**
 * WaifuVault API client.
 */

import { WaifuVaultConfig, type WaifuVaultConfigOptions } from '../config';
import { ConsoleLogger, type LogConfig, type Logger } from '../observability/logging';
import { contextFromConfig } from '../requests';
import {
  AlbumsServiceImpl,
  BucketsServiceImpl,
  FilesServiceImpl,
  type AlbumsService,
  type BucketsService,
  type FilesService,
  type ServiceDependencies,
} from '../services';
import { FetchTransport, type HttpTransport } from '../transport';

/**
 * Options for creating a WaifuVault client.
 */
export interface WaifuVaultClientOptions extends WaifuVaultConfigOptions {
  /** Prebuilt configuration; takes precedence over the inline options. */
  config?: WaifuVaultConfig;
  /** Logging configuration for the default logger. */
  logging?: Partial<LogConfig>;
  /** Custom transport implementation. */
  transport?: HttpTransport;
  /** Custom logger. */
  logger?: Logger;
}

/**
 * The main WaifuVault client.
 *
 * @example
 * ```typescript
 * const client = WaifuVaultClient.create();
 * const result = await client.files().upload({
 *   source: { type: 'url', url: 'https://example.com/cat.png' },
 *   expires: { amount: 1, unit: 'day' },
 * });
 * if (result.success) {
 *   console.log(result.data.url);
 * }
 * ```
 */
export class WaifuVaultClient {
  private readonly config: WaifuVaultConfig;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  private readonly filesService: FilesService;
  private readonly bucketsService: BucketsService;
  private readonly albumsService: AlbumsService;

  /**
   * @throws {ConfigurationError} If the inline options are invalid
   */
  constructor(options: WaifuVaultClientOptions = {}) {
    const { config, logging, transport, logger, ...configOptions } = options;

    this.config = config ?? WaifuVaultConfig.create(configOptions);
    this.transport = transport ?? new FetchTransport({ timeout: this.config.timeout });
    this.logger = logger ?? new ConsoleLogger(logging);

    const deps: ServiceDependencies = {
      transport: this.transport,
      context: contextFromConfig(this.config),
      logger: this.logger,
    };

    this.filesService = new FilesServiceImpl(deps);
    this.bucketsService = new BucketsServiceImpl(deps);
    this.albumsService = new AlbumsServiceImpl(deps);
  }

  /**
   * Creates a new client builder.
   */
  static builder(): WaifuVaultClientBuilder {
    return new WaifuVaultClientBuilder();
  }

  /**
   * Creates a client from options.
   */
  static create(options: WaifuVaultClientOptions = {}): WaifuVaultClient {
    return new WaifuVaultClient(options);
  }

  /**
   * Creates a client from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): WaifuVaultClient {
    return new WaifuVaultClient({ config: WaifuVaultConfig.fromEnv(env) });
  }

  /**
   * Returns the files service.
   */
  files(): FilesService {
    return this.filesService;
  }

  /**
   * Returns the buckets service.
   */
  buckets(): BucketsService {
    return this.bucketsService;
  }

  /**
   * Returns the albums service.
   */
  albums(): AlbumsService {
    return this.albumsService;
  }

  /**
   * Returns the logger.
   */
  getLogger(): Logger {
    return this.logger;
  }

  /**
   * Returns the configuration.
   */
  getConfig(): WaifuVaultConfig {
    return this.config;
  }
}

/**
 * Builder for the WaifuVault client.
 */
export class WaifuVaultClientBuilder {
  private options: WaifuVaultClientOptions = {};

  /**
   * Sets the base URL.
   */
  baseUrl(url: string): this {
    this.options.baseUrl = url;
    return this;
  }

  /**
   * Sets the request timeout.
   */
  timeout(ms: number): this {
    this.options.timeout = ms;
    return this;
  }

  /**
   * Sets the user agent.
   */
  userAgent(userAgent: string): this {
    this.options.userAgent = userAgent;
    return this;
  }

  /**
   * Adds a custom header.
   */
  header(key: string, value: string): this {
    this.options.customHeaders = {
      ...this.options.customHeaders,
      [key]: value,
    };
    return this;
  }

  /**
   * Sets the logging configuration.
   */
  logging(config: Partial<LogConfig>): this {
    this.options.logging = config;
    return this;
  }

  /**
   * Sets a custom transport.
   */
  transport(transport: HttpTransport): this {
    this.options.transport = transport;
    return this;
  }

  /**
   * Sets a custom logger.
   */
  logger(logger: Logger): this {
    this.options.logger = logger;
    return this;
  }

  /**
   * Builds the client.
   *
   * @throws {ConfigurationError} If an option is invalid
   */
  build(): WaifuVaultClient {
    return new WaifuVaultClient(this.options);
  }
}
