import winston from 'winston';
import { isCatalogError } from './errors';

const HEALTH_CHECK_LINE = /^GET\s+\/health\b/i;

/**
 * Plain-object form of an error for JSON log lines. Catalog errors keep their
 * `code` and own fields (`source`, `key`) and drop the stack: they are expected
 * failures, identified by code.
 */
export const serializeError = (error: unknown): unknown => {
  if (!(error instanceof Error)) {
    return error;
  }
  const cause = error.cause === undefined ? undefined : serializeError(error.cause);
  if (isCatalogError(error)) {
    return { ...error, message: error.message, cause };
  }
  return { name: error.name, message: error.message, stack: error.stack, cause };
};

export const errorFieldsFormat = winston.format((info) => {
  Object.entries(info).forEach(([key, value]) => {
    if (value instanceof Error) {
      info[key] = serializeError(value);
    }
  });
  return info;
});

const skipHealthChecks = winston.format((info) =>
  typeof info.message === 'string' && HEALTH_CHECK_LINE.test(info.message) ? false : info
);

const consoleLine = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const details = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${details}`;
});

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(skipHealthChecks(), winston.format.timestamp(), errorFieldsFormat()),
  defaultMeta: { service: 'card-database-api' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), consoleLine)
    })
  ]
});

export default logger;
