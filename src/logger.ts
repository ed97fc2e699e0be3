import winston from 'winston';
import type TransportStream from 'winston-transport';
import { diagnostics } from './config.js';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log format
const logFormat = printf(({ level, message, timestamp, stack, ...meta }) => {
  let log = `${timestamp} [${level}] [tglog]: ${message}`;

  // Add stack trace for errors
  if (stack) {
    log += `\n${stack}`;
  }

  // Add metadata if present
  if (Object.keys(meta).length > 0) {
    log += ` ${JSON.stringify(meta)}`;
  }

  return log;
});

const transports: TransportStream[] = [
  // Diagnostics go to stderr so they never mix with shipped stdout logs
  new winston.transports.Console({
    stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
    format: combine(
      colorize(),
      timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
      logFormat
    ),
  }),
];

if (diagnostics.file) {
  transports.push(
    new winston.transports.File({
      filename: diagnostics.file,
      maxsize: 5242880, // 5MB
      maxFiles: 5,
    })
  );
}

/**
 * Local diagnostic channel for the shipper itself.
 * Never attach a Telegram transport to this logger.
 */
export const logger = winston.createLogger({
  level: diagnostics.level === 'silent' ? 'info' : diagnostics.level,
  silent: diagnostics.level === 'silent',
  format: combine(
    errors({ stack: true }),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    logFormat
  ),
  transports,
});

// Mask sensitive data in logs
export function maskSecret(secret: string): string {
  if (secret.length <= 8) {
    return '****';
  }
  return `${secret.substring(0, 4)}****${secret.substring(secret.length - 4)}`;
}
