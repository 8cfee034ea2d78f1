/**
 * Configuration module for the WaifuVault client.
 *
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors';

/**
 * Default REST endpoint of the public WaifuVault instance.
 */
export const DEFAULT_BASE_URL = 'https://waifuvault.moe/rest';

/**
 * Default timeout in milliseconds (1 minute).
 */
export const DEFAULT_TIMEOUT = 60000;

/**
 * Default user agent string.
 */
export const DEFAULT_USER_AGENT = 'waifuvault-client/0.1.0';

/**
 * Configuration options for the WaifuVault client.
 */
export interface WaifuVaultConfigOptions {
  /** REST endpoint (default: https://waifuvault.moe/rest) */
  baseUrl?: string;
  /** Request timeout in milliseconds (default: 60000) */
  timeout?: number;
  /** User agent sent with every request */
  userAgent?: string;
  /** Extra headers sent with every request */
  customHeaders?: Record<string, string>;
}

/**
 * Zod schema for configuration validation.
 */
const WaifuVaultConfigSchema = z.object({
  baseUrl: z
    .string()
    .url('baseUrl must be a valid URL')
    .refine((url) => url.startsWith('http://') || url.startsWith('https://'), {
      message: 'baseUrl must use http or https',
    }),
  timeout: z.number().int().positive('timeout must be a positive integer'),
  userAgent: z.string().min(1, 'userAgent cannot be empty'),
  customHeaders: z.record(z.string()),
});

/**
 * Validated, immutable client configuration.
 */
export class WaifuVaultConfig {
  /** REST endpoint, without a trailing slash. */
  readonly baseUrl: string;
  /** Request timeout in milliseconds. */
  readonly timeout: number;
  /** User agent sent with every request. */
  readonly userAgent: string;
  /** Extra headers sent with every request. */
  readonly customHeaders: Readonly<Record<string, string>>;

  private constructor(options: Required<WaifuVaultConfigOptions>) {
    this.baseUrl = options.baseUrl;
    this.timeout = options.timeout;
    this.userAgent = options.userAgent;
    this.customHeaders = options.customHeaders;
  }

  /**
   * Creates a new configuration builder.
   */
  static builder(): WaifuVaultConfigBuilder {
    return new WaifuVaultConfigBuilder();
  }

  /**
   * Creates configuration from options, filling in defaults.
   *
   * @throws {ConfigurationError} If an option is invalid
   */
  static create(options: WaifuVaultConfigOptions = {}): WaifuVaultConfig {
    const merged = {
      baseUrl: (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, ''),
      timeout: options.timeout ?? DEFAULT_TIMEOUT,
      userAgent: options.userAgent ?? DEFAULT_USER_AGENT,
      customHeaders: options.customHeaders ?? {},
    };

    const result = WaifuVaultConfigSchema.safeParse(merged);
    if (!result.success) {
      const details = result.error.issues.map((issue) => issue.message).join(', ');
      throw new ConfigurationError(
        `Invalid WaifuVault configuration: ${details}`,
        result.error.issues
      );
    }

    return new WaifuVaultConfig(result.data);
  }

  /**
   * Creates configuration from environment variables.
   *
   * Reads `WAIFUVAULT_BASE_URL`, `WAIFUVAULT_TIMEOUT` and `WAIFUVAULT_USER_AGENT`;
   * unset variables fall back to the defaults.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): WaifuVaultConfig {
    const timeout = env.WAIFUVAULT_TIMEOUT;

    return WaifuVaultConfig.create({
      baseUrl: env.WAIFUVAULT_BASE_URL || undefined,
      timeout: timeout ? Number(timeout) : undefined,
      userAgent: env.WAIFUVAULT_USER_AGENT || undefined,
    });
  }
}

/**
 * Builder for WaifuVault configuration.
 */
export class WaifuVaultConfigBuilder {
  private options: WaifuVaultConfigOptions = {};

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
   * Sets custom headers.
   */
  headers(headers: Record<string, string>): this {
    this.options.customHeaders = { ...this.options.customHeaders, ...headers };
    return this;
  }

  /**
   * Builds the configuration.
   *
   * @throws {ConfigurationError} If an option is invalid
   */
  build(): WaifuVaultConfig {
    return WaifuVaultConfig.create(this.options);
  }
}
