/**
 * Centralized Logger Service
 * Uses Winston with console and optional file transports
 */

import winston from 'winston';
import { loadConfig } from '../config/config';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = typeof component === 'string' ? `[${component}]` : '';
  return `${String(timestamp)} ${level} ${componentStr} ${String(message)} ${metaStr}`;
});

export type LogMeta = Record<string, unknown>;

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

    const transports: winston.transport[] = [];

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
      level: options.logLevel || 'info',
      format: combine(timestamp(), errors({ stack: true }), winston.format.json()),
      transports,
      silent: options.silent === true,
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
        errorMeta.errorCode = error.name;
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for logs about one indicator specifier
  logIndicator(level: 'debug' | 'info' | 'warn' | 'error', message: string, specifier: string, meta?: LogMeta) {
    this.logger.log(level, message, {
      component: this.component,
      specifier,
      ...meta,
    });
  }

  isSilent(): boolean {
    return this.logger.silent === true;
  }

  close() {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static loggers: Map<string, Logger> = new Map();

  static getLogger(component: string, options?: Partial<LoggerOptions>): Logger {
    const existing = this.loggers.get(component);
    if (existing) {
      return existing;
    }

    const config = loadConfig();
    const logger = new Logger({
      component,
      enableConsole: config.logConsole,
      enableFile: config.logFilePath !== undefined,
      logFilePath: config.logFilePath,
      logLevel: config.logLevel,
      silent: config.logSilent,
      ...options,
    });
    this.loggers.set(component, logger);
    return logger;
  }

  static closeAll() {
    this.loggers.forEach((logger) => logger.close());
    this.loggers.clear();
  }
}

export { LoggerFactory };
