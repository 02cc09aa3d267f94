import pino from 'pino';
import { cfg, type AppConfig } from './config.js';

/**
 * Logger configuration and setup for treeshift
 *
 * Features:
 * - Environment-aware configuration
 * - Pretty-printed output in development
 * - JSON output in production
 * - CLI mode support for reduced verbosity
 */

/**
 * Logger factory for creating configured logger instances
 */
export class LoggerFactory {
  private readonly appConfig: AppConfig;
  private readonly mainLogger: pino.Logger;

  constructor(appConfig: AppConfig) {
    this.appConfig = appConfig;
    const options = this.createLoggerOptions();
    // A transport owns its destination
    this.mainLogger = options.transport ? pino(options) : pino(options, process.stderr);
  }

  /**
   * Create logger options based on environment
   */
  private createLoggerOptions(): pino.LoggerOptions {
    const isDevelopment = this.appConfig.NODE_ENV === 'development';
    const isTest = this.appConfig.NODE_ENV === 'test';

    // Tests and CLI runs only surface warnings and errors
    const logLevel = isTest || this.appConfig.CLI_MODE ? 'warn' : this.appConfig.LOG_LEVEL;

    const baseOptions: pino.LoggerOptions = {
      level: logLevel,
      timestamp: pino.stdTimeFunctions.isoTime,
      formatters: {
        level: (label: string) => ({ level: label }),
      },
    };

    if (isDevelopment) {
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

  getLogger(): pino.Logger {
    return this.mainLogger;
  }

  /**
   * Create a module-specific logger
   *
   * @param moduleName - Name of the module/component
   */
  createModuleLogger(moduleName: string): pino.Logger {
    return this.mainLogger.child({ module: moduleName });
  }
}

const defaultFactory = new LoggerFactory(cfg);

export function createLoggerFactory(appConfig: AppConfig): LoggerFactory {
  return new LoggerFactory(appConfig);
}

/**
 * Main library logger instance. Writes to stderr so stdout stays free for
 * whatever the host prints.
 */
export const logger = defaultFactory.getLogger();

export function createModuleLogger(moduleName: string): pino.Logger {
  return defaultFactory.createModuleLogger(moduleName);
}
