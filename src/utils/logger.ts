import winston from 'winston';
import path from 'path';
import fs from 'fs';

// Define log format
const logFormat = winston.format.combine(
  winston.format.timestamp({
    format: 'YYYY-MM-DD HH:mm:ss'
  }),
  winston.format.errors({ stack: true }),
  winston.format.json()
);

// Create logger instance
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: {
    service: 'domain-snapshot',
    version: process.env.npm_package_version || '1.0.0'
  },
  silent: process.env.NODE_ENV === 'test',
  transports: [
    new winston.transports.Console({
      stderrLevels: ['error', 'warn'],
      format: winston.format.combine(
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, stack, service: _service, version: _version, ...meta }) => {
          const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
          return `${timestamp} [${level}]: ${stack || message}${metaStr}`;
        })
      )
    })
  ]
});

// Persistent log file, only when asked for
if (process.env.LOG_FILE) {
  const logFile = path.resolve(process.env.LOG_FILE);
  fs.mkdirSync(path.dirname(logFile), { recursive: true });
  logger.add(new winston.transports.File({
    filename: logFile,
    maxsize: 5242880, // 5MB
    maxFiles: 5
  }));
}

/**
 * Raise or lower the console verbosity after the command line has been read
 */
export function setLogLevel(level: string): void {
  logger.level = level;
}

export default logger;
