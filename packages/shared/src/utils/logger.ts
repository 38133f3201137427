import pino, { type Logger as PinoLogger, type LoggerOptions } from 'pino';

/**
 * Log context that can be attached to log entries for correlation and filtering.
 * These fields flow through the pipeline into every entry of a run.
 */
export interface LogContext {
  /** Sync run identifier (the checkpoint's syncId) */
  syncId?: string;
  /** Item selection query the run was started with */
  query?: string;
  /** Operation applied to each item (fetch, trash, ...) */
  operation?: string;
  /** Individual message identifier */
  itemId?: string;
  /** Service/component name */
  service?: string;
  /** Component within a service */
  component?: string;
  /** Allow additional string keys for flexibility */
  [key: string]: string | undefined;
}

/**
 * Extended logger interface with context support
 */
export interface Logger {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;
  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void;

  /**
   * Create a child logger with additional context.
   * The context is merged with parent context and included in all log entries.
   */
  child(context: LogContext): Logger;
}

/**
 * Wrapper around pino that provides context-aware logging
 */
class ContextLogger implements Logger {
  private pino: PinoLogger;
  private context: LogContext;

  constructor(pinoInstance: PinoLogger, context: LogContext = {}) {
    this.pino = pinoInstance;
    this.context = context;
  }

  private formatData(data?: Record<string, unknown>): Record<string, unknown> {
    return { ...this.context, ...data };
  }

  private formatError(error?: Error | unknown): Record<string, unknown> {
    if (!error) return {};
    if (error instanceof Error) {
      // First 5 frames are enough to locate the failing call
      const stackLines = error.stack?.split('\n') ?? [];
      const truncatedStack = stackLines.slice(0, 6).join('\n');

      return {
        err: {
          type: error.name,
          message: error.message,
          stack: truncatedStack,
        },
      };
    }
    return { err: String(error) };
  }

  debug(msg: string, data?: Record<string, unknown>): void {
    this.pino.debug(this.formatData(data), msg);
  }

  info(msg: string, data?: Record<string, unknown>): void {
    this.pino.info(this.formatData(data), msg);
  }

  warn(msg: string, data?: Record<string, unknown>): void {
    this.pino.warn(this.formatData(data), msg);
  }

  error(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.error({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  fatal(msg: string, error?: Error | unknown, data?: Record<string, unknown>): void {
    this.pino.fatal({ ...this.formatData(data), ...this.formatError(error) }, msg);
  }

  child(context: LogContext): Logger {
    const mergedContext = { ...this.context, ...context };
    const childPino = this.pino.child(context);
    return new ContextLogger(childPino, mergedContext);
  }
}

/**
 * Configuration options for creating a logger
 */
export interface CreateLoggerOptions {
  /** Service name to include in all log entries */
  service: string;
  /** Log level (default: LOG_LEVEL env, else 'info'; 'silent' under NODE_ENV=test) */
  level?: 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';
  /** Force pretty printing regardless of environment */
  pretty?: boolean;
  /** Additional context to include in all log entries */
  context?: LogContext;
  /** Write to stderr instead of stdout (the CLI keeps stdout for reports) */
  stderr?: boolean;
}

/**
 * Determine if we should use pretty printing
 */
function shouldUsePretty(forceFlag?: boolean): boolean {
  if (forceFlag !== undefined) return forceFlag;
  const nodeEnv = process.env.NODE_ENV;
  return nodeEnv === 'development' || !nodeEnv;
}

/**
 * Get the log level from environment or default
 */
function getLogLevel(configLevel?: string): string {
  if (configLevel) return configLevel;
  if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;
  return process.env.NODE_ENV === 'test' ? 'silent' : 'info';
}

function truncated(value: unknown, maxLength: number): string {
  const str = JSON.stringify(value) ?? String(value);
  return str.length > maxLength ? str.slice(0, maxLength) + '...[truncated]' : str;
}

/**
 * Create a new logger instance with the specified configuration.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ service: 'cli' });
 * logger.info('sync_started');
 *
 * const runLogger = logger.child({ syncId: '123', operation: 'fetch' });
 * runLogger.info('batch_chunk_done'); // includes syncId and operation
 * ```
 */
export function createLogger(options: CreateLoggerOptions): Logger {
  const usePretty = shouldUsePretty(options.pretty);
  const level = getLogLevel(options.level);

  const pinoOptions: LoggerOptions = {
    level,
    base: {
      service: options.service,
      pid: process.pid,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    // Chunks carry up to 100 message IDs; keep single entries readable
    serializers: {
      itemIds: (value: unknown) =>
        Array.isArray(value) && value.length > 10
          ? `${truncated(value.slice(0, 10), 1024)} (+${value.length - 10} more)`
          : truncated(value, 1024),
      response: (value: unknown) => truncated(value, 2048),
    },
  };

  // Use pino-pretty transport for human-readable output in development
  if (usePretty) {
    pinoOptions.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        messageFormat: '{service} | {msg}',
        destination: options.stderr ? 2 : 1,
      },
    };
    return new ContextLogger(pino(pinoOptions), options.context ?? {});
  }

  const pinoInstance = options.stderr
    ? pino(pinoOptions, pino.destination(2))
    : pino(pinoOptions);
  return new ContextLogger(pinoInstance, options.context ?? {});
}

/**
 * No-op logger for testing or when logging should be disabled
 */
export const nullLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
  fatal: () => {},
  child: () => nullLogger,
};

/**
 * Create the logger for one service: `service` goes into every entry and
 * `baseContext` is attached to every entry.
 *
 * @example
 * ```typescript
 * const logger = createServiceLogger('mailsync-cli', undefined, { stderr: true });
 * logger.child({ syncId: 'abc', query: 'in:inbox' }).info('sync_resumed');
 * ```
 */
export function createServiceLogger(
  serviceName: string,
  baseContext?: LogContext,
  options: Omit<CreateLoggerOptions, 'service' | 'context'> = {},
): Logger {
  return createLogger({
    ...options,
    service: serviceName,
    context: baseContext,
  });
}

/**
 * Cap error messages to a maximum length to prevent exceeding database or log size limits.
 */
export function capErrorMessage(message: string, maxLength = 1000): string {
  if (message.length <= maxLength) return message;
  return message.substring(0, maxLength) + '... (truncated)';
}
