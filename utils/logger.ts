import winston, { type Logform } from 'winston';
import path from 'path';
import fs from 'fs';
import type { Logger } from '../types/common';
export type { Logger } from '../types/common';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom log levels
const levels: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

// Colors for each level
const colors: Record<string, string> = {
  error: 'red',
  warn: 'yellow',
  info: 'cyan',
  http: 'magenta',
  debug: 'gray',
};

winston.addColors(colors);

function renderLine(info: Logform.TransformableInfo, upperLevel: boolean): string {
  const { context, stack, timestamp: time } = info;
  const ctx = typeof context === 'string' ? ` [${context}]` : '';
  const msg = typeof stack === 'string' && stack ? stack : String(info.message);
  const level = upperLevel ? info.level.toUpperCase() : info.level;
  return `${String(time)} ${level}${ctx} ${msg}`;
}

const consoleFormat = printf((info) => renderLine(info, false));

/**
 * Mask Discord bot tokens that end up in error messages (REST failures echo the
 * Authorization header in some cases).
 */
export function sanitizeLogMessage(message: string): string {
  return message.replace(/([\w-]{24,28})\.([\w-]{6})\.[\w-]{27,38}/g, '$1.****.****');
}

// Colors only when stdout is a TTY
const isTty = typeof process.stdout?.isTTY === 'boolean' && process.stdout.isTTY;
const consoleTransportFormat = isTty
  ? combine(colorize({ all: true }), consoleFormat)
  : combine(consoleFormat);

const transports: winston.transport[] = [
  new winston.transports.Console({
    format: consoleTransportFormat,
  }),
];

const isTest = process.env['NODE_ENV'] === 'test';

// File transport only when logs dir is writable
if (!isTest) {
  try {
    const logsDir = path.join(__dirname, '..', 'logs');
    if (!fs.existsSync(logsDir)) {
      fs.mkdirSync(logsDir, { recursive: true });
    }
    transports.push(
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        format: combine(
          timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
          printf((info) => renderLine(info, true))
        ),
      })
    );
  } catch (error) {
    process.stderr.write(`File logging disabled: ${error instanceof Error ? error.message : String(error)}\n`);
  }
}

const logger = winston.createLogger({
  levels,
  level: process.env['LOG_LEVEL'] || 'info',
  silent: isTest && !process.env['LOG_LEVEL'],
  format: combine(errors({ stack: true }), timestamp({ format: 'HH:mm:ss' })),
  transports,
});

// Helper to create child logger with context
export function createLogger(context: string): Logger {
  return {
    error: (message: string, meta: Record<string, unknown> = {}) =>
      logger.error(sanitizeLogMessage(message), { context, ...meta }),
    warn: (message: string, meta: Record<string, unknown> = {}) =>
      logger.warn(sanitizeLogMessage(message), { context, ...meta }),
    info: (message: string, meta: Record<string, unknown> = {}) =>
      logger.info(sanitizeLogMessage(message), { context, ...meta }),
    http: (message: string, meta: Record<string, unknown> = {}) =>
      logger.http(sanitizeLogMessage(message), { context, ...meta }),
    debug: (message: string, meta: Record<string, unknown> = {}) =>
      logger.debug(sanitizeLogMessage(message), { context, ...meta }),
  };
}

export { logger };
