// src/utils/logger.ts
import * as winston from 'winston';
import * as path from 'path';

const logLevel = process.env.LOG_LEVEL || 'info';

const lineFormat = winston.format.printf(({ level, message, timestamp, stack }) => {
  return `${timestamp} [${level}]: ${message}${stack ? '\n' + stack : ''}`;
});

const logger: winston.Logger = winston.createLogger({
  level: logLevel,
  format: winston.format.combine(
    winston.format.timestamp({
      format: 'YYYY-MM-DD HH:mm:ss'
    }),
    winston.format.errors({ stack: true }),
    winston.format.simple()
  ),
  transports: [
    new winston.transports.Console({
      silent: process.env.NODE_ENV === 'test',
      format: winston.format.combine(
        winston.format.colorize(),
        lineFormat
      )
    })
  ]
});

// File logging only when a directory is configured
if (process.env.LOG_DIR) {
  const logsDir = path.resolve(process.env.LOG_DIR);

  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'error.log'),
    level: 'error',
    format: winston.format.combine(winston.format.timestamp(), lineFormat)
  }));

  logger.add(new winston.transports.File({
    filename: path.join(logsDir, 'combined.log'),
    format: winston.format.combine(winston.format.timestamp(), lineFormat)
  }));
}

export default logger;
export { logger };

// Wrapper class for consistent logging interface
export class Logger {
  private context: string;

  constructor(context: string) {
    this.context = context;
  }

  info(message: string): void {
    logger.info(`[${this.context}] ${message}`);
  }

  warn(message: string): void {
    logger.warn(`[${this.context}] ${message}`);
  }

  error(message: string, error?: unknown): void {
    if (error) {
      logger.error(`[${this.context}] ${message}: ${describeError(error)}`);
    } else {
      logger.error(`[${this.context}] ${message}`);
    }
  }

  debug(message: string): void {
    logger.debug(`[${this.context}] ${message}`);
  }

  setLevel(level: string): void {
    logger.level = level;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
