import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { getConfig, type Config } from '../config/index.js';
import { TopologyError } from '../errors/index.js';

/**
 * Logger module using Winston
 * Console output always; rotating log files when a log directory is configured
 */

export class Logger {
  private readonly logger: winston.Logger;
  private readonly config: Config['logging'];

  constructor(config: Config['logging']) {
    this.config = config;
    this.ensureLogDirectory();
    this.logger = this.createLogger();
  }

  private ensureLogDirectory(): void {
    if (this.config.dir && !existsSync(this.config.dir)) {
      mkdirSync(this.config.dir, { recursive: true });
    }
  }

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

  private getTransports(): winston.transport[] {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format:
          this.config.format === 'json'
            ? winston.format.json()
            : winston.format.combine(winston.format.colorize(), this.getFormats()),
      }),
    ];

    const dir = this.config.dir;
    if (!dir) {
      return transports;
    }

    transports.push(
      new winston.transports.File({
        filename: join(dir, 'cpu-topology-combined.log'),
        maxsize: this.parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      }),
      new winston.transports.File({
        filename: join(dir, 'cpu-topology-error.log'),
        level: 'error',
        maxsize: this.parseSize(this.config.maxSize),
        maxFiles: this.config.maxFiles,
      })
    );

    return transports;
  }

  /**
   * Parse size string ("512k", "10m") to bytes; unparsable sizes fall back to 10MB
   */
  private parseSize(size: string): number {
    const units: Record<string, number> = {
      b: 1,
      k: 1024,
      m: 1024 * 1024,
      g: 1024 * 1024 * 1024,
    };

    const match = size.toLowerCase().match(/^(\d+)([bkmg])$/);
    const num = match?.[1];
    const unit = match?.[2];
    if (!num || !unit) {
      return 10 * 1024 * 1024;
    }

    return parseInt(num, 10) * (units[unit] ?? 1);
  }

  debug(message: string, metadata?: object): void {
    this.logger.debug(message, metadata);
  }

  info(message: string, metadata?: object): void {
    this.logger.info(message, metadata);
  }

  warn(message: string, metadata?: object): void {
    this.logger.warn(message, metadata);
  }

  error(message: string, error?: Error | TopologyError, metadata?: object): void {
    const errorMetadata = error
      ? {
          error: {
            message: error.message,
            stack: error.stack,
            ...(error instanceof TopologyError ? { code: error.code, severity: error.severity } : {}),
          },
          ...metadata,
        }
      : metadata;

    this.logger.error(message, errorMetadata);
  }
}

let loggerInstance: Logger | null = null;

/**
 * Get logger singleton. Without an explicit config the logging section of
 * the loaded configuration is used.
 */
export function getLogger(config?: Config['logging']): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(config ?? getConfig().logging);
  }
  return loggerInstance;
}

/**
 * Reset logger (useful for testing)
 */
export function resetLogger(): void {
  loggerInstance = null;
}
