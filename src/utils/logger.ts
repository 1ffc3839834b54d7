/**
 * Structured Logger using Pino
 *
 * Provides structured JSON logging with:
 * - Multiple log levels (debug, info, warn, error)
 * - Component-based child loggers
 * - Named placeholders in messages ("Found {count} resources")
 * - Output to stderr (stdout carries the run summary)
 *
 * Loggers are passed in as constructor dependencies. Nothing in the crawler
 * reaches for a global instance; `noopLogger` is the default everywhere.
 */

import pino, {
  type Logger as PinoLogger,
  type LoggerOptions,
  type DestinationStream,
  type TransportTargetOptions,
} from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/**
 * Log context metadata
 */
export interface LogContext {
  component?: string;
  url?: string;
  resource?: string;
  count?: number;
  [key: string]: unknown;
}

/**
 * Minimal leveled logger the crawler depends on
 */
export interface CrawlLogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext & { error?: unknown }): void;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  level: LogLevel;
  prettyPrint: boolean;
  destination: 'stderr' | 'stdout';
  /** Also append JSON lines to this file (pretty printing applies to the console only) */
  logFile?: string;
}

const DEFAULT_CONFIG: LoggerConfig = {
  level: 'info',
  prettyPrint: false,
  destination: 'stderr',
};

const PLACEHOLDER_PATTERN = /\{([A-Za-z_][\w.]*)\}/g;

/**
 * Replace `{name}` placeholders with values from the context.
 * Unknown placeholders are left as they are.
 */
export function interpolate(message: string, context?: LogContext): string {
  if (!context) return message;

  return message.replace(PLACEHOLDER_PATTERN, (match, key: string) => {
    if (!(key in context)) return match;
    const value = context[key];
    if (value === null || value === undefined) return String(value);
    if (typeof value === 'object') {
      return value instanceof Error ? value.message : JSON.stringify(value);
    }
    return String(value);
  });
}

/**
 * Serialize an unknown thrown value for structured output
 */
export function serializeError(error: unknown): { message: string; name?: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      name: error.name,
      stack: error.stack,
    };
  }
  return { message: String(error) };
}

/**
 * Transport targets for pretty console output, plus the log file when one is set.
 * Transports run in a worker, so the file receives lines asynchronously.
 */
export function prettyTransportTargets(config: LoggerConfig): TransportTargetOptions[] {
  const targets: TransportTargetOptions[] = [
    {
      target: 'pino-pretty',
      level: config.level,
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname,service',
        destination: config.destination === 'stderr' ? 2 : 1,
      },
    },
  ];
  if (config.logFile) {
    targets.push({
      target: 'pino/file',
      level: config.level,
      options: { destination: config.logFile, mkdir: true },
    });
  }
  return targets;
}

/**
 * Create the base Pino logger instance
 */
function createBaseLogger(config: LoggerConfig): PinoLogger {
  const options: LoggerOptions = {
    level: config.level,
    base: {
      pid: process.pid,
      service: 'apidoc-codegen',
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  // Pretty print for development. Multiple targets take no level formatter.
  if (config.prettyPrint) {
    return pino({ ...options, transport: { targets: prettyTransportTargets(config) } });
  }

  const jsonOptions: LoggerOptions = {
    ...options,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };
  const stream: DestinationStream = config.destination === 'stderr' ? process.stderr : process.stdout;

  if (config.logFile) {
    const level = config.level === 'silent' ? 'error' : config.level;
    return pino(
      jsonOptions,
      pino.multistream([
        { stream, level },
        { stream: pino.destination({ dest: config.logFile, mkdir: true, sync: true }), level },
      ])
    );
  }

  return pino(jsonOptions, stream);
}

/**
 * Component-specific logger wrapper
 */
export class Logger implements CrawlLogger {
  private readonly parent: PinoLogger;
  private readonly logger: PinoLogger;

  constructor(component: string, parentLogger: PinoLogger) {
    this.parent = parentLogger;
    this.logger = parentLogger.child({ component });
  }

  /**
   * Create a logger for another component sharing the same destination
   */
  create(component: string): Logger {
    return new Logger(component, this.parent);
  }

  debug(message: string, context?: LogContext): void {
    this.logger.debug(context || {}, interpolate(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.logger.info(context || {}, interpolate(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.logger.warn(context || {}, interpolate(message, context));
  }

  /**
   * Accepts unknown type for error since catch blocks provide unknown
   */
  error(message: string, context?: LogContext & { error?: unknown }): void {
    const text = interpolate(message, context);
    if (context?.error) {
      const { error, ...rest } = context;
      this.logger.error({ ...rest, err: serializeError(error) }, text);
    } else {
      this.logger.error(context || {}, text);
    }
  }
}

/**
 * Build a component logger from configuration
 */
export function createLogger(component: string, config: Partial<LoggerConfig> = {}): Logger {
  return new Logger(component, createBaseLogger({ ...DEFAULT_CONFIG, ...config }));
}

/**
 * Logger that discards everything
 */
export const noopLogger: CrawlLogger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
