import { getLogger } from '../logging/logger';

const globalLogger = getLogger('error-handling:global');

export enum DomainErrorCode {
  UNKNOWN = 'UNKNOWN',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
  TIMEOUT = 'TIMEOUT',
  EXTERNAL_SERVICE_ERROR = 'EXTERNAL_SERVICE_ERROR',
}

export class DomainError extends Error {
  public readonly statusCode: number;
  public declare readonly cause?: Error;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;

  constructor(
    message: string,
    statusCode: number = 500,
    cause?: Error,
    code?: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DomainError';
    this.statusCode = statusCode;
    this.cause = cause;
    this.code = code;
    this.details = details;
    this.timestamp = new Date();
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      statusCode: this.statusCode,
      ...(this.code && { code: this.code }),
      ...(this.details && { details: this.details }),
      timestamp: this.timestamp.toISOString(),
      cause: this.cause?.message,
    };
  }
}

export class DomainServiceError<T extends string> extends DomainError {
  public declare readonly code: T;

  constructor(message: string, statusCode: number, code: T, cause?: Error, serviceName?: string) {
    super(message, statusCode, cause, code);
    if (serviceName) this.name = `${serviceName}Error`;
    this.code = code;
  }
}

/**
 * Codes every service error family must map for the shared factories.
 */
export interface DomainServiceCodes<T extends string> {
  NOT_FOUND: T;
  VALIDATION_ERROR: T;
  INTERNAL_ERROR: T;
  SERVICE_UNAVAILABLE: T;
}

export function createDomainServiceError<T extends string>(
  serviceName: string,
  domainErrorCodes: DomainServiceCodes<T> & Record<string, T>
) {
  class ServiceError extends DomainServiceError<T> {
    constructor(message: string, statusCode = 500, code?: T, cause?: Error) {
      super(message, statusCode, code ?? domainErrorCodes.INTERNAL_ERROR, cause, serviceName);
    }

    static notFound(resource: string, id?: string) {
      const msg = id ? `${resource} not found: ${id}` : `${resource} not found`;
      return new ServiceError(msg, 404, domainErrorCodes.NOT_FOUND);
    }

    static validationError(field: string, message: string) {
      return new ServiceError(`Validation failed for ${field}: ${message}`, 400, domainErrorCodes.VALIDATION_ERROR);
    }

    static internalError(message: string, cause?: Error) {
      return new ServiceError(message, 500, domainErrorCodes.INTERNAL_ERROR, cause);
    }

    static serviceUnavailable(service: string, cause?: Error) {
      return new ServiceError(`Service unavailable: ${service}`, 503, domainErrorCodes.SERVICE_UNAVAILABLE, cause);
    }
  }

  return ServiceError;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export function errorStack(error: unknown): string | undefined {
  return error instanceof Error ? error.stack : undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}

export function wrapError(error: unknown, fallbackMessage = 'Unknown error'): DomainError {
  if (error instanceof DomainError) return error;
  if (error instanceof Error) {
    return new DomainError(error.message || fallbackMessage, 500, error, DomainErrorCode.INTERNAL_ERROR);
  }
  return new DomainError(fallbackMessage, 500, undefined, DomainErrorCode.UNKNOWN, { raw: errorMessage(error) });
}

let globalHandlersRegistered = false;

/**
 * Log uncaught exceptions and unhandled rejections instead of dying silently.
 * Repeated calls are ignored.
 */
export function registerGlobalErrorHandlers(source: string): void {
  if (globalHandlersRegistered) {
    globalLogger.debug('Global error handlers already registered', { source });
    return;
  }
  globalHandlersRegistered = true;

  process.on('uncaughtException', (error: Error) => {
    globalLogger.error('Uncaught Exception', { error: error.message, stack: error.stack, source });
    if (process.env.NODE_ENV === 'production') {
      process.exit(1);
    }
  });

  process.on('unhandledRejection', (reason: unknown) => {
    globalLogger.error('Unhandled Promise Rejection', {
      reason: errorMessage(reason),
      stack: errorStack(reason) ?? 'No stack trace',
      source,
    });
  });
}
