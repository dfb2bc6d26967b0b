import winston from 'winston';
import { existsSync, mkdirSync } from 'fs';
import path from 'path';

const isTest = process.env['NODE_ENV'] === 'test';
const logsDir = process.env['LOG_DIR'] || './logs';

// Custom format for console output
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, module, ...meta }) => {
    const scope = module ? ` [${String(module)}]` : '';
    const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
    return `${timestamp} ${level}${scope}: ${message}${metaStr}`;
  })
);

// Custom format for file output
const fileFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

type LogTransport =
  | winston.transports.ConsoleTransportInstance
  | winston.transports.FileTransportInstance;

function buildTransports(): LogTransport[] {
  const transports: LogTransport[] = [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ];

  // No log files from test runs
  if (isTest) {
    return transports;
  }

  if (!existsSync(logsDir)) {
    mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    // File output - all logs
    new winston.transports.File({
      filename: path.join(logsDir, 'app.log'),
      format: fileFormat,
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    }),
    // File output - errors only
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      level: 'error',
      format: fileFormat,
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    })
  );

  return transports;
}

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] || 'info',
  silent: isTest,
  transports: buildTransports(),
});

export type Logger = winston.Logger;

// Child logger per module
export function createLogger(module: string): Logger {
  return logger.child({ module });
}

export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
