/**
 * Error handling module for the WaifuVault client.
 *
 * Every failure an operation can report is a {@link WaifuVaultError}; the
 * `kind` field tells the categories apart without `instanceof` checks.
 *
 * @packageDocumentation
 */

import type { ZodIssue } from 'zod';

/**
 * Error kinds.
 */
export enum WaifuVaultErrorKind {
  /** Malformed or contradictory local input. */
  Validation = 'validation',
  /** Local file could not be read. */
  Io = 'io',
  /** Server answered with a non-2xx status. */
  Api = 'api',
  /** Server answered 2xx with a body that does not match the expected shape. */
  Decode = 'decode',
  /** Network failure or timeout. */
  Transport = 'transport',
  /** Invalid client configuration. */
  Configuration = 'configuration',
}

/**
 * Base class for all WaifuVault errors.
 */
export class WaifuVaultError extends Error {
  /** Error kind discriminator */
  public readonly kind: WaifuVaultErrorKind;

  /** HTTP status code if applicable */
  public readonly status?: number;

  /** Underlying error, if this one wraps another */
  public readonly cause?: unknown;

  constructor(
    kind: WaifuVaultErrorKind,
    message: string,
    options?: {
      status?: number;
      cause?: unknown;
    }
  ) {
    super(message);
    this.name = 'WaifuVaultError';
    this.kind = kind;
    this.status = options?.status;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      status: this.status,
    };
  }
}

/**
 * Local input failed validation. Raised before any request is sent.
 */
export class ValidationError extends WaifuVaultError {
  /** Request field that failed validation */
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super(WaifuVaultErrorKind.Validation, message);
    this.name = 'ValidationError';
    this.field = field;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), field: this.field };
  }
}

/**
 * Reading a local upload source failed.
 */
export class IoError extends WaifuVaultError {
  public readonly path: string;

  constructor(path: string, cause?: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(WaifuVaultErrorKind.Io, `Failed to read file ${path}: ${reason}`, { cause });
    this.name = 'IoError';
    this.path = path;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), path: this.path };
  }
}

/**
 * The server rejected the request.
 *
 * `message` is the server-supplied message, unchanged.
 */
export class ApiError extends WaifuVaultError {
  declare readonly status: number;

  /** Error name reported by the server (e.g. `NotFoundError`) */
  public readonly errorName?: string;

  constructor(status: number, message: string, errorName?: string) {
    super(WaifuVaultErrorKind.Api, message, { status });
    this.name = 'ApiError';
    this.errorName = errorName;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), errorName: this.errorName };
  }
}

/**
 * A successful response carried a body of the wrong shape.
 */
export class DecodeError extends WaifuVaultError {
  declare readonly status: number;

  /** Schema issues, empty when the body was not JSON at all */
  public readonly issues: ZodIssue[];

  constructor(status: number, message: string, options?: { issues?: ZodIssue[]; cause?: unknown }) {
    super(WaifuVaultErrorKind.Decode, message, { status, cause: options?.cause });
    this.name = 'DecodeError';
    this.issues = options?.issues ?? [];
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      issues: this.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    };
  }
}

/**
 * The request never produced a response.
 */
export class TransportError extends WaifuVaultError {
  /** Whether the request was aborted by the client timeout */
  public readonly timedOut: boolean;

  constructor(message: string, options?: { cause?: unknown; timedOut?: boolean }) {
    super(WaifuVaultErrorKind.Transport, message, { cause: options?.cause });
    this.name = 'TransportError';
    this.timedOut = options?.timedOut ?? false;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), timedOut: this.timedOut };
  }
}

/**
 * Invalid client configuration.
 */
export class ConfigurationError extends WaifuVaultError {
  constructor(message: string, public readonly issues: ZodIssue[] = []) {
    super(WaifuVaultErrorKind.Configuration, message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Type guard for WaifuVaultError.
 */
export function isWaifuVaultError(error: unknown): error is WaifuVaultError {
  return error instanceof WaifuVaultError;
}

/**
 * Result of a client operation.
 */
export type WaifuVaultResult<T> =
  | { success: true; data: T }
  | { success: false; error: WaifuVaultError };

/**
 * Creates a successful result.
 */
export function ok<T>(data: T): WaifuVaultResult<T> {
  return { success: true, data };
}

/**
 * Creates a failed result.
 */
export function err<T = never>(error: WaifuVaultError): WaifuVaultResult<T> {
  return { success: false, error };
}

/**
 * Returns the data of a successful result, or throws its error.
 */
export function unwrap<T>(result: WaifuVaultResult<T>): T {
  if (!result.success) {
    throw result.error;
  }
  return result.data;
}
