/**
 * Logger
 *
 * Winston logger creation and management
 */

import * as winston from 'winston';
import { hostname } from 'os';
import type { LoggerMeta } from './types';
import { correlationStorage } from './correlation';
import { createDevFormat, createProdFormat } from './formatting';

/**
 * Create a Winston logger instance
 */
export function createLogger(serviceName: string): winston.Logger {
  const meta: LoggerMeta = {
    service: serviceName,
    env: process.env.NODE_ENV || 'development',
    instanceId: process.env.INSTANCE_ID || process.env.HOSTNAME || hostname() || 'unknown',
  };

  const getLogLevel = (): string => {
    if (process.env.LOG_LEVEL) return process.env.LOG_LEVEL;

    switch (process.env.NODE_ENV) {
      case 'production':
        return 'info';
      case 'test':
        return 'warn';
      default:
        return 'debug';
    }
  };

  const isDevelopment = (process.env.NODE_ENV || 'development') === 'development';

  return winston.createLogger({
    level: getLogLevel(),
    defaultMeta: meta,
    format: isDevelopment ? createDevFormat(correlationStorage) : createProdFormat(correlationStorage),
    transports: [new winston.transports.Console()],
  });
}

/**
 * Get or create a logger
 */
const loggers = new Map<string, winston.Logger>();

export function getLogger(serviceOrModule: string): winston.Logger {
  let logger = loggers.get(serviceOrModule);
  if (!logger) {
    logger = createLogger(serviceOrModule);
    loggers.set(serviceOrModule, logger);
  }
  return logger;
}
