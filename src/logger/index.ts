import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import type { Config } from '../config/schema.js';
import { PluginError } from '../errors/index.js';

/**
 * Logger module using Winston
 * Stdout belongs to the plugin protocol, so the console transport writes
 * every level to stderr
 */

const ALL_LEVELS = ['error', 'warn', 'info', 'debug'];

export class Logger {
  private logger: winston.Logger;
  private config: Config['logging'];

  /**
   * A child passes its parent's derived winston instance so no new
   * transports are opened
   */
  constructor(config: Config['logging'], instance?: winston.Logger) {
    this.config = config;
    if (instance) {
      this.logger = instance;
    } else {
      this.ensureLogDirectory();
      this.logger = this.createLogger();
    }
  }

  /**
   * Ensure the directory of the log file exists
   */
  private ensureLogDirectory(): void {
    if (!this.config.file) return;
    const dir = dirname(this.config.file);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  /**
   * Create Winston logger instance
   */
  private createLogger(): winston.Logger {
    return winston.createLogger({
      level: this.config.level,
      format: this.getFormats(),
      transports: this.getTransports(),
      exitOnError: false,
    });
  }

  /**
   * Get log formats based on configuration
   */
  private getFormats(): winston.Logform.Format {
    const timestamp = winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss.SSS',
    });

    const errors = winston.format.errors({ stack: true });

    switch (this.config.format) {
      case 'json':
        return winston.format.combine(timestamp, errors, winston.format.json());

      case 'pretty':
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, ...metadata }) => {
            let msg = `${timestamp} [${level}]: ${message}`;
            if (Object.keys(metadata).length > 0) {
              msg += ` ${JSON.stringify(metadata, null, 2)}`;
            }
            return msg;
          })
        );

      case 'simple':
      default:
        return winston.format.combine(
          timestamp,
          errors,
          winston.format.printf(({ timestamp, level, message }) => {
            return `${timestamp} [${level}]: ${message}`;
          })
        );
    }
  }

  /**
   * Get transports based on configuration
   */
  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        stderrLevels: ALL_LEVELS,
      }),
    ];

    if (this.config.file) {
      transports.push(
        new winston.transports.File({
          filename: this.config.file,
          maxsize: this.parseSize(this.config.maxSize),
          maxFiles: this.config.maxFiles,
        })
      );
    }

    return transports;
  }

  /**
   * Parse size string to bytes
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    if (!match) {
      return 10 * 1024 * 1024; // Default 10MB
    }

    const [, num, unit] = match;
    if (!num || !unit) {
      return 10 * 1024 * 1024;
    }

    return parseInt(num, 10) * (units[unit] || 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  error(message: string, error?: Error | PluginError, metadata?: object): void {
    const errorMetadata = error ? { error: describeError(error), ...metadata } : metadata;
    this.logger.error(message, errorMetadata);
  }

  /**
   * Create child logger with additional metadata
   */
  child(metadata: object): Logger {
    return new Logger(this.config, this.logger.child(metadata));
  }
}

/**
 * Error metadata for a log entry; a PluginError carries its own code,
 * severity, context and timestamp
 */
export function describeError(error: Error | PluginError): object {
  if (error instanceof PluginError) {
    return error.toJSON();
  }
  return { message: error.message, stack: error.stack };
}

// Singleton instance
let loggerInstance: Logger | null = null;

/**
 * Get logger singleton
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance && config) {
    loggerInstance = new Logger(config);
  } else if (!loggerInstance) {
    throw new Error('Logger not initialized. Call getLogger with config first.');
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
