/**
 * Logging for the WaifuVault client.
 */

/**
 * Log level enumeration.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'off';

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  off: 4,
};

/**
 * Logging configuration.
 */
export interface LogConfig {
  /** Minimum log level. */
  level: LogLevel;
  /** Whether to include timestamps. */
  includeTimestamps: boolean;
  /** Whether to redact passwords and tokens from context. */
  redactSensitive: boolean;
}

/**
 * Default log configuration.
 */
export const DEFAULT_LOG_CONFIG: LogConfig = {
  level: 'warn',
  includeTimestamps: true,
  redactSensitive: true,
};

const SENSITIVE_KEYS = ['password', 'token', 'authorization', 'secret'];

/**
 * Logger interface.
 */
export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

/**
 * Console logger with level filtering and redaction.
 */
export class ConsoleLogger implements Logger {
  private readonly config: LogConfig;

  constructor(config: Partial<LogConfig> = {}) {
    this.config = { ...DEFAULT_LOG_CONFIG, ...config };
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log('debug', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log('info', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log('warn', message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log('error', message, context);
  }

  /**
   * Formats a log line without writing it.
   */
  format(level: Exclude<LogLevel, 'off'>, message: string, context?: Record<string, unknown>): string {
    const parts: string[] = [];

    if (this.config.includeTimestamps) {
      parts.push(`[${new Date().toISOString()}]`);
    }

    parts.push(`[${level.toUpperCase()}]`);
    parts.push(message);

    if (context) {
      parts.push(JSON.stringify(this.redactContext(context)));
    }

    return parts.join(' ');
  }

  private log(level: Exclude<LogLevel, 'off'>, message: string, context?: Record<string, unknown>): void {
    if (LOG_LEVEL_VALUES[level] < LOG_LEVEL_VALUES[this.config.level]) return;

    const output = this.format(level, message, context);

    switch (level) {
      case 'error':
        console.error(output);
        break;
      case 'warn':
        console.warn(output);
        break;
      case 'debug':
        console.debug(output);
        break;
      default:
        console.log(output);
    }
  }

  private redactContext(context: Record<string, unknown>): Record<string, unknown> {
    if (!this.config.redactSensitive) return context;

    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(context)) {
      if (SENSITIVE_KEYS.some((sk) => key.toLowerCase().includes(sk))) {
        redacted[key] = '[REDACTED]';
      } else if (isPlainRecord(value)) {
        redacted[key] = this.redactContext(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * No-op logger for when logging is disabled.
 */
export class NoopLogger implements Logger {
  debug(_message: string, _context?: Record<string, unknown>): void {}
  info(_message: string, _context?: Record<string, unknown>): void {}
  warn(_message: string, _context?: Record<string, unknown>): void {}
  error(_message: string, _context?: Record<string, unknown>): void {}
}

/**
 * Creates a console logger with the given configuration.
 */
export function createLogger(config?: Partial<LogConfig>): Logger {
  return new ConsoleLogger(config);
}
