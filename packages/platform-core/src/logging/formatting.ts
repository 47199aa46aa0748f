/**
 * Log Formatting
 *
 * Log formatters and secret redaction utilities
 */

import * as winston from 'winston';
import type { LogContext } from './types';

// Secret patterns to redact (key-based matching)
const SECRET_PATTERNS = [/authorization/i, /cookie/i, /token/i, /secret/i, /password/i, /api[-_]?key/i];

// Signed media URLs carry short-lived credentials in their query string
const SIGNED_QUERY_PARAMS = /([?&](?:sig|signature|token|expire|ei|ip)=)[^&\s"]+/gi;

export function maskSignedUrl(value: string): string {
  return value.replace(SIGNED_QUERY_PARAMS, '$1***');
}

/**
 * Redacts sensitive information from objects
 */
export function maskSecrets(obj: unknown, maxDepth = 3): unknown {
  if (typeof obj === 'string') {
    return maskSignedUrl(obj);
  }
  if (maxDepth <= 0 || obj === null || typeof obj !== 'object') {
    return obj;
  }

  if (Array.isArray(obj)) {
    return obj.map(item => maskSecrets(item, maxDepth - 1));
  }

  const masked: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (SECRET_PATTERNS.some(pattern => pattern.test(key))) {
      masked[key] = '[REDACTED]';
    } else {
      masked[key] = maskSecrets(value, maxDepth - 1);
    }
  }

  return masked;
}

/**
 * Safe JSON stringification with size limits
 */
export function safeStringify(obj: unknown, maxSize = 10000): string {
  try {
    const str = JSON.stringify(maskSecrets(obj));
    return str.length > maxSize ? str.substring(0, maxSize) + '...[TRUNCATED]' : str;
  } catch (_error) {
    return '[CIRCULAR_OR_INVALID_JSON]';
  }
}

/**
 * Development console format
 */
export function createDevFormat(correlationStorage: { getStore: () => LogContext | undefined }): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'HH:mm:ss' }),
    winston.format.colorize(),
    winston.format.printf(({ timestamp, level, message, service, correlationId, module: moduleCtx, ...meta }) => {
      const context = correlationStorage.getStore();
      const finalCorrelationId = correlationId || context?.correlationId;
      const sessionId = meta.sessionId ?? context?.sessionId;

      const correlation = finalCorrelationId ? ` [${String(finalCorrelationId).slice(0, 8)}]` : '';
      const session = sessionId ? ` <${String(sessionId)}>` : '';
      const moduleInfo = moduleCtx ? ` ${String(moduleCtx)}` : '';
      const serviceInfo = service ? `[${String(service)}]` : '';
      const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta, 1000)}` : '';

      return `${String(timestamp)} ${level}${serviceInfo}${correlation}${session}${moduleInfo}: ${String(message)}${metaStr}`;
    })
  );
}

/**
 * Production JSON format
 */
export function createProdFormat(correlationStorage: {
  getStore: () => LogContext | undefined;
}): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.printf(info => {
      const context = correlationStorage.getStore();
      if (context) {
        info.correlationId = info.correlationId || context.correlationId;
        info.sessionId = info.sessionId || context.sessionId;
      }
      return safeStringify(info, 50000);
    })
  );
}
