/**
 * Centralized Logger Service
 * Uses Winston with a console transport and an optional JSON file transport
 */

import winston from 'winston';
import Transport from 'winston-transport';

const { combine, timestamp, printf, colorize, errors } = winston.format;

type LogMeta = Record<string, unknown>;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = typeof component === 'string' ? `[${component}]` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)} ${metaStr}`;
});

export interface LoggerOptions {
  component: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  logFilePath?: string;
  logLevel?: string;
  silent?: boolean;
}

export class Logger {
  private logger: winston.Logger;
  private component: string;

  constructor(options: LoggerOptions) {
    this.component = options.component;

    const transports: Transport[] = [];

    // Console transport (always enabled unless explicitly disabled)
    if (options.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            consoleFormat
          ),
        })
      );
    }

    if (options.enableFile && options.logFilePath) {
      transports.push(
        new winston.transports.File({
          filename: options.logFilePath,
          format: combine(
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            winston.format.json()
          ),
        })
      );
    }

    this.logger = winston.createLogger({
      level: options.logLevel || process.env.LOG_LEVEL || 'info',
      format: combine(timestamp(), errors({ stack: true }), winston.format.json()),
      transports,
      silent: options.silent ?? process.env.NODE_ENV === 'test',
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta) {
    this.logger.debug(message, { component: this.component, ...meta });
  }

  info(message: string, meta?: LogMeta) {
    this.logger.info(message, { component: this.component, ...meta });
  }

  warn(message: string, meta?: LogMeta) {
    this.logger.warn(message, { component: this.component, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogMeta) {
    const errorMeta: LogMeta = { component: this.component, ...meta };

    if (error) {
      if (error instanceof Error) {
        errorMeta.stackTrace = error.stack;
        errorMeta.errorCode = 'code' in error ? error.code : error.name;
        if (error.cause !== undefined) {
          errorMeta.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
        }
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for per-run logs
  logRun(level: 'info' | 'warn' | 'error', message: string, runId: string, meta?: LogMeta) {
    this.logger[level](message, {
      component: this.component,
      runId,
      ...meta,
    });
  }

  close() {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static defaults: Partial<LoggerOptions> = {};
  private static loggers: Map<string, Logger> = new Map();

  /** Applies to loggers created after the call */
  static configure(defaults: Partial<LoggerOptions>) {
    this.defaults = { ...this.defaults, ...defaults };
  }

  static getLogger(component: string, options?: Partial<LoggerOptions>): Logger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new Logger({
        ...this.defaults,
        ...options,
        component,
      });
      this.loggers.set(component, logger);
    }
    return logger;
  }

  static closeAll() {
    this.loggers.forEach((logger) => logger.close());
    this.loggers.clear();
  }
}

export { LoggerFactory };
