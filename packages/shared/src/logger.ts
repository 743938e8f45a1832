/**
 * @module: Logger
 * @scope: utility
 * @risk: low
 *
 * @description
 * Winston-based logging utility with console and file transports. Every
 * package in the workspace logs through this instance.
 *
 * @impact
 * Logs may carry Discord identifiers and interaction routes, so both are
 * scrubbed before any transport sees them.
 */

import fs from 'fs';
import { createLogger, format, transports } from 'winston';
import { format as dateFnsFormat } from 'date-fns';

const { combine, timestamp, printf, colorize } = format;
const splatSymbol = Symbol.for('splat');

// --- Redaction rules ---
// Discord snowflakes are 17-19 digit numeric strings.
const DISCORD_ID_REGEX = /\b\d{17,19}\b/g;
// Interaction tokens travel inside webhook and callback routes and act as
// short-lived credentials for the interaction.
const INTERACTION_TOKEN_ROUTE_REGEX = /\/(webhooks|interactions)\/(\d+)\/[A-Za-z0-9._-]+/g;

/**
 * Recursively sanitize log data: interaction tokens embedded in API routes
 * are replaced first, then any raw snowflake identifier.
 */
export function sanitizeLogData<T>(value: T): T {
  if (typeof value === 'string') {
    return value
      .replace(INTERACTION_TOKEN_ROUTE_REGEX, '/$1/$2/[REDACTED_TOKEN]')
      .replace(DISCORD_ID_REGEX, '[REDACTED_ID]') as T;
  }

  if (Array.isArray(value)) {
    return value.map((entry) => sanitizeLogData(entry)) as T;
  }

  if (value instanceof Error) {
    // Copy onto the same prototype so winston still renders it as an error;
    // the caller's instance may be rethrown after logging.
    const copy: Error = Object.create(Object.getPrototypeOf(value));
    Object.assign(copy, value, {
      message: sanitizeLogData(value.message),
      stack: value.stack === undefined ? undefined : sanitizeLogData(value.stack)
    });
    return copy as T;
  }

  if (value && typeof value === 'object') {
    const sanitized: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      sanitized[key] = sanitizeLogData(val);
    }
    return sanitized as T;
  }

  return value;
}

// --- Winston formatters ---
const sanitizeFormat = format((info) => {
  info.message = sanitizeLogData(info.message);

  const splat: unknown = info[splatSymbol];
  if (Array.isArray(splat)) {
    info[splatSymbol] = splat.map((item) => sanitizeLogData(item));
  }

  return info;
});

/**
 * Custom log format function
 * @private
 */
const logFormat = printf(({ level, message, timestamp, module }) => {
  const scope = typeof module === 'string' ? ` [${module}]` : '';
  return `${timestamp} [${level}]${scope}: ${message}`;
});

// --- Logger output configuration ---
const logDirectory = process.env.LOG_DIR || 'logs';
fs.mkdirSync(logDirectory, { recursive: true });

/**
 * Winston logger instance with console and file transports
 */
export const logger = createLogger({
  level: (process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug')).toLowerCase(),
  format: combine(
    sanitizeFormat(),
    timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    colorize({ all: true }),
    logFormat
  ),
  transports: [
    new transports.Console(),
    new transports.File({
      filename: `${logDirectory}/${dateFnsFormat(new Date(), 'yyyy-MM-dd')}.log`,
      format: format.combine(
        format.uncolorize(),
        format.timestamp(),
        format.json()
      )
    })
  ],
  exitOnError: false
});

/**
 * Returns a child logger tagged with the module name shown in each line.
 */
export const createModuleLogger = (module: string) => logger.child({ module });
