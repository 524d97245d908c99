import winston from 'winston';
import type { Logger } from '../types/index.js';
import { config } from './config.js';

/**
 * Process-wide structured logger
 *
 * Every call takes a message plus optional metadata, e.g.
 * logger.warn('Page failed', { site, url, error }).
 * JSON lines in production, colorized single lines otherwise.
 */

const level = config.app.logLevel.toLowerCase();
const production = process.env.NODE_ENV === 'production';

const prettyFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp(),
  winston.format.printf(({ timestamp, level: lvl, message, ...meta }) => {
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(timestamp)} ${lvl} ${String(message)}${metaStr}`;
  })
);

const jsonFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json()
);

const winstonLogger = winston.createLogger({
  level,
  format: production ? jsonFormat : prettyFormat,
  defaultMeta: { service: 'storefront-snapshot' },
  transports: [new winston.transports.Console({ stderrLevels: ['error', 'warn'] })],
});

export const logger: Logger = {
  debug: (message, meta) => winstonLogger.debug(message, meta),
  info: (message, meta) => winstonLogger.info(message, meta),
  warn: (message, meta) => winstonLogger.warn(message, meta),
  error: (message, meta) => winstonLogger.error(message, meta),
};
