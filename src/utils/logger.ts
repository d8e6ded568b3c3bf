/**
 * Logger Configuration
 * Centralized logging system using Winston
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';
import fs from 'fs';
import { appConfig } from '../config/app.config';

type LogMetadata = Record<string, unknown>;

const { level: logLevel, dir: logDir, fileLogging } = appConfig.logging;

if (fileLogging && !fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true });
}

const logLevels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  silly: 6
};

const logColors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  verbose: 'cyan',
  debug: 'blue',
  silly: 'gray'
};

winston.addColors(logColors);

const customFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} [${level.toUpperCase()}]: ${message}`;

    if (Object.keys(metadata).length > 0) {
      if (metadata.error instanceof Error) {
        metadata.error = {
          message: metadata.error.message,
          stack: metadata.error.stack,
          name: metadata.error.name
        };
      }
      msg += ` ${JSON.stringify(metadata)}`;
    }

    return msg;
  })
);

const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize({ all: true }),
  winston.format.printf(({ timestamp, level, message, ...metadata }) => {
    let msg = `${timestamp} ${level}: ${message}`;

    if (Object.keys(metadata).length > 0 && appConfig.env === 'development') {
      msg += '\n' + JSON.stringify(metadata, null, 2);
    }

    return msg;
  })
);

const createFileTransports = (): winston.transport[] => [
  new DailyRotateFile({
    filename: path.join(logDir, '%DATE%-combined.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '14d',
    format: customFormat,
    level: logLevel
  }),
  new DailyRotateFile({
    filename: path.join(logDir, '%DATE%-error.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '30d',
    format: customFormat,
    level: 'error'
  }),
  new DailyRotateFile({
    filename: path.join(logDir, '%DATE%-http.log'),
    datePattern: 'YYYY-MM-DD',
    maxSize: '50m',
    maxFiles: '7d',
    format: customFormat,
    level: 'http'
  })
];

const logger = winston.createLogger({
  levels: logLevels,
  level: logLevel,
  transports: fileLogging ? createFileTransports() : [],
  exitOnError: false
});

if (appConfig.isTest) {
  logger.add(new winston.transports.Console({ silent: true }));
} else if (appConfig.isProduction) {
  logger.add(new winston.transports.Console({
    format: winston.format.simple(),
    level: 'warn'
  }));
} else {
  logger.add(new winston.transports.Console({
    format: consoleFormat,
    level: logLevel === 'info' ? 'debug' : logLevel
  }));
}

// Stream for Morgan HTTP logger
export const stream = {
  write: (message: string): void => {
    logger.http(message.trim());
  }
};

const category = (tag: string) => ({
  info: (message: string, metadata?: LogMetadata) => logger.info(`[${tag}] ${message}`, metadata),
  warn: (message: string, metadata?: LogMetadata) => logger.warn(`[${tag}] ${message}`, metadata),
  error: (message: string, metadata?: LogMetadata) => logger.error(`[${tag}] ${message}`, metadata),
  debug: (message: string, metadata?: LogMetadata) => logger.debug(`[${tag}] ${message}`, metadata)
});

export const loggers = {
  system: category('SYSTEM'),
  api: category('API'),
  detection: category('DETECTION'),
  geometry: category('GEOMETRY'),
  export: category('EXPORT'),

  performance: {
    measure: (operation: string, startTime: number, threshold?: number) => {
      const duration = Date.now() - startTime;
      if (threshold !== undefined && duration > threshold) {
        logger.warn(`[PERFORMANCE] Slow operation: ${operation} took ${duration}ms (threshold: ${threshold}ms)`, {
          operation,
          duration,
          threshold
        });
        return duration;
      }
      logger.debug(`[PERFORMANCE] ${operation} completed in ${duration}ms`, { duration, operation });
      return duration;
    }
  }
};

export default logger;
