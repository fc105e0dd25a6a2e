import winston, { format } from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import path from 'path';

interface HttpMeta {
  req: { method: string; url: string };
  res?: { statusCode?: number };
  responseTime?: number;
}

const isHttpMeta = (meta: unknown): meta is HttpMeta => {
  if (typeof meta !== 'object' || meta === null || !('req' in meta)) {
    return false;
  }
  const { req } = meta;
  return typeof req === 'object' && req !== null && 'method' in req && 'url' in req;
};

const lineFormat = format.printf(({ timestamp, level, message, meta }) => {
  if (isHttpMeta(meta)) {
    return `${timestamp} ${level}: ${message} - ${meta.req.method} ${meta.req.url} - Status: ${meta.res?.statusCode ?? 0} - ${meta.responseTime ?? 0}ms`;
  }
  return `${timestamp} ${level}: ${message}`;
});

const defaultLevel = process.env.NODE_ENV === 'production' ? 'warn' : 'info';

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || defaultLevel,
  silent: process.env.NODE_ENV === 'test',
  format: format.combine(format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), format.errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      format: format.combine(format.colorize(), lineFormat),
    }),
  ],
});

export interface LoggerOptions {
  level: string;
  logDir: string;
  logToFile: boolean;
}

/**
 * Applies the boot configuration to the shared logger. File output goes to
 * `application-%DATE%.log`, rotated daily and kept for 14 days.
 */
export const configureLogger = ({ level, logDir, logToFile }: LoggerOptions): void => {
  logger.level = level;
  if (logToFile && !logger.transports.some((transport) => transport instanceof DailyRotateFile)) {
    logger.add(
      new DailyRotateFile({
        filename: path.join(logDir, 'application-%DATE%.log'),
        datePattern: 'YYYY-MM-DD',
        zippedArchive: true,
        maxSize: '20m',
        maxFiles: '14d',
        format: lineFormat,
      }),
    );
  }
};
