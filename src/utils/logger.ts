import path from 'path';
import winston from 'winston';
import { config } from '../config';

const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

winston.addColors({
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
});

const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

const consoleFormat = winston.format.combine(
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const extra = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
  })
);

export const COMBINED_LOG_FILE = path.resolve(config.logging.dir, 'combined.log');
export const ERROR_LOG_FILE = path.resolve(config.logging.dir, 'error.log');

export const logger = winston.createLogger({
  level: config.logging.level,
  levels,
  format: fileFormat,
  transports: [
    new winston.transports.Console({ format: consoleFormat }),
    // Size-based rotation: oldest file is dropped once maxFiles is reached
    new winston.transports.File({
      filename: ERROR_LOG_FILE,
      level: 'error',
      maxsize: config.logging.maxFileSize,
      maxFiles: config.logging.maxFiles,
      tailable: true,
    }),
    new winston.transports.File({
      filename: COMBINED_LOG_FILE,
      maxsize: config.logging.maxFileSize,
      maxFiles: config.logging.maxFiles,
      tailable: true,
    }),
  ],
});
