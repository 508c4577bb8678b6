import pino, { DestinationStream, Logger as PinoLogger, LoggerOptions } from 'pino';
import pretty from 'pino-pretty';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/**
 * Logger configuration options
 */
export interface LoggerConfig {
  /** Name of the component doing the logging */
  name: string;
  /** Log level */
  level?: LogLevel;
  /** Environment name */
  environment?: string;
  /** Human-readable output through pino-pretty instead of JSON lines */
  prettyPrint?: boolean;
  /** Additional base context to include in all logs */
  baseContext?: Record<string, unknown>;
  /** Where to write; stdout when omitted */
  destination?: DestinationStream;
  /** Custom pino options */
  pinoOptions?: LoggerOptions;
}

/**
 * Context to be added to log entries
 */
export interface LogContext {
  [key: string]: unknown;
}

function createPinoLogger(config: LoggerConfig): PinoLogger {
  const {
    name,
    level = 'info',
    environment = process.env['NODE_ENV'] || 'development',
    prettyPrint = false,
    baseContext = {},
    destination,
    pinoOptions = {},
  } = config;

  const options: LoggerOptions = {
    name,
    level,
    base: {
      sdk: name,
      environment,
      ...baseContext,
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level: (label) => ({ level: label }),
    },
    ...pinoOptions,
  };

  if (prettyPrint) {
    return pino(
      options,
      pretty({
        colorize: false,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: destination || 1,
        sync: true,
      }),
    );
  }

  return destination ? pino(options, destination) : pino(options);
}

function describeError(error: Error): Record<string, unknown> {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
  };
}

/**
 * Internal SDK logger.
 * Pino-based structured JSON logger; components log through child loggers.
 */
export class Logger {
  private pino: PinoLogger;

  constructor(config: LoggerConfig) {
    this.pino = createPinoLogger(config);
  }

  debug(message: string, context: LogContext = {}): void {
    this.pino.debug(context, message);
  }

  info(message: string, context: LogContext = {}): void {
    this.pino.info(context, message);
  }

  warn(message: string, context: LogContext = {}): void {
    this.pino.warn(context, message);
  }

  /**
   * Log an error message
   */
  error(message: string, context?: LogContext): void;
  error(error: Error, context?: LogContext): void;
  error(message: string, error: Error, context?: LogContext): void;
  error(
    messageOrError: string | Error,
    errorOrContext?: Error | LogContext,
    context?: LogContext,
  ): void {
    if (messageOrError instanceof Error) {
      // error(error, context?)
      const extra = errorOrContext instanceof Error ? {} : errorOrContext;
      this.pino.error(
        { error: describeError(messageOrError), ...extra },
        messageOrError.message,
      );
    } else if (errorOrContext instanceof Error) {
      // error(message, error, context?)
      this.pino.error({ error: describeError(errorOrContext), ...context }, messageOrError);
    } else {
      // error(message, context?)
      this.pino.error(errorOrContext || {}, messageOrError);
    }
  }

  /**
   * Create a child logger with additional base context
   */
  child(context: LogContext): Logger {
    const childLogger = Object.create(this) as Logger;
    childLogger.pino = this.pino.child(context);
    return childLogger;
  }

  isLevelEnabled(level: Exclude<LogLevel, 'silent'>): boolean {
    return this.pino.isLevelEnabled(level);
  }
}

/**
 * Create a new logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
