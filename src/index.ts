/**
 * WaifuVault Client Library
 *
 * A TypeScript client for the WaifuVault file-storage REST API: upload files
 * from disk, a URL or memory, read and modify their metadata, download them,
 * and manage buckets and albums.
 *
 * @example
 * ```typescript
 * import { WaifuVaultClient } from 'waifuvault-client';
 *
 * const client = WaifuVaultClient.create();
 * const uploaded = await client.files().upload({
 *   source: { type: 'file', path: './notes.txt' },
 *   expires: { amount: 30, unit: 'minute' },
 *   password: 'test-secret',
 * });
 *
 * if (uploaded.success) {
 *   const bytes = await client.files().download(uploaded.data.url, 'test-secret');
 * } else {
 *   console.error(uploaded.error.kind, uploaded.error.message);
 * }
 * ```
 *
 * @packageDocumentation
 */

// Core exports
export { WaifuVaultClient, WaifuVaultClientBuilder } from './client';
export type { WaifuVaultClientOptions } from './client';
export {
  WaifuVaultConfig,
  WaifuVaultConfigBuilder,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from './config';
export type { WaifuVaultConfigOptions } from './config';

// Errors
export {
  WaifuVaultError,
  WaifuVaultErrorKind,
  ValidationError,
  IoError,
  ApiError,
  DecodeError,
  TransportError,
  ConfigurationError,
  isWaifuVaultError,
  ok,
  err,
  unwrap,
} from './errors';
export type { WaifuVaultResult } from './errors';

// Types
export * from './types';

// Services
export { FilesServiceImpl, BucketsServiceImpl, AlbumsServiceImpl } from './services';
export type { FilesService, BucketsService, AlbumsService } from './services';

// Transport
export { FetchTransport, createHttpTransport } from './transport';
export type {
  HttpMethod,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  FetchTransportOptions,
  RequestBody,
} from './transport';

// Request builders and response mapping
export * from './requests';
export * from './response';

// Observability
export { ConsoleLogger, NoopLogger, createLogger, DEFAULT_LOG_CONFIG } from './observability/logging';
export type { Logger, LogConfig, LogLevel } from './observability/logging';
