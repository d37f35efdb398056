import { destination, pino, stdTimeFunctions, type Logger, type LoggerOptions } from 'pino';
import { isGroveError } from '../errors/base.js';
import { type AppConfig, cfg } from './config.js';

/**
 * Logger configuration and setup for Grovekit
 *
 * Features:
 * - Environment-aware configuration
 * - Pretty-printed output in development
 * - JSON output in production
 * - CLI mode support for reduced verbosity
 */

export type { Logger } from 'pino';

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    this.mainLogger = this.isPretty()
      ? pino(this.createLoggerOptions())
      : pino(this.createLoggerOptions(), destination(2));
  }

  private isPretty(): boolean {
    return this.appConfig.NODE_ENV === 'development' && !this.appConfig.CLI_MODE;
  }

  /**
   * Create logger options based on environment
   */
  private createLoggerOptions(): LoggerOptions {
    const isTest = this.appConfig.NODE_ENV === 'test';

    // Tests and the CLI only surface warnings and errors
    const logLevel = isTest || this.appConfig.CLI_MODE ? 'warn' : this.appConfig.LOG_LEVEL;

    const baseOptions: LoggerOptions = {
      level: logLevel,
      base: {
        pid: process.pid,
        hostname: process.env['HOSTNAME'] || 'unknown',
      },
      timestamp: stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (this.isPretty()) {
      return {
        ...baseOptions,
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'yyyy-mm-dd HH:MM:ss',
            ignore: 'pid,hostname',
            destination: 2, // stderr
          },
        },
      };
    }

    return baseOptions;
  }

  getLogger(): Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

/**
 * Main library logger instance. Always writes to stderr so stdout stays free
 * for the output of programs embedding the library.
 */
export const logger = defaultFactory.getLogger();

/**
 * Create a module-specific logger from the default factory
 */
export function createModuleLogger(moduleName: string): Logger {
  return defaultFactory.createModuleLogger(moduleName);
}

/**
 * Error logging utility with stack trace handling
 *
 * @param logger - Logger instance to use
 * @param error - Error object or message
 * @param context - Additional context about the error
 */
export function logError(
  logger: Logger,
  error: Error | string,
  context: Record<string, unknown> = {}
): void {
  if (typeof error === 'string') {
    logger.error(context, error);
    return;
  }

  const errorInfo: Record<string, unknown> = isGroveError(error)
    ? error.toJSON()
    : {
        name: error.name,
        message: error.message,
        stack: error.stack,
      };

  if ('cause' in error && error.cause !== undefined) {
    errorInfo['cause'] = error.cause;
  }

  logger.error(
    {
      ...context,
      error: errorInfo,
    },
    error.message
  );
}
