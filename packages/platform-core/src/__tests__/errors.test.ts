import { describe, it, expect } from 'vitest';
import {
  DomainError,
  DomainErrorCode,
  createDomainServiceError,
  errorMessage,
  toError,
  wrapError,
} from '../error-handling/errors';

const Codes = {
  NOT_FOUND: 'WIDGET_NOT_FOUND',
  VALIDATION_ERROR: 'WIDGET_INVALID',
  INTERNAL_ERROR: 'WIDGET_INTERNAL',
  SERVICE_UNAVAILABLE: 'WIDGET_UNAVAILABLE',
} as const;

const WidgetError = createDomainServiceError('Widget', Codes);

describe('DomainError', () => {
  it('should serialize its public fields', () => {
    const error = new DomainError('bad thing', 409, new Error('root'), DomainErrorCode.CONFLICT, { id: 'x' });
    const json = error.toJSON();

    expect(json.message).toBe('bad thing');
    expect(json.statusCode).toBe(409);
    expect(json.code).toBe('CONFLICT');
    expect(json.details).toEqual({ id: 'x' });
    expect(json.cause).toBe('root');
  });
});

describe('createDomainServiceError', () => {
  it('should name the error after the service', () => {
    const error = new WidgetError('oops');
    expect(error.name).toBe('WidgetError');
    expect(error.statusCode).toBe(500);
    expect(error.code).toBe('WIDGET_INTERNAL');
  });

  it('should build not found errors with the mapped code', () => {
    const error = WidgetError.notFound('Widget', 'w-1');
    expect(error.message).toBe('Widget not found: w-1');
    expect(error.statusCode).toBe(404);
    expect(error.code).toBe('WIDGET_NOT_FOUND');
    expect(error).toBeInstanceOf(DomainError);
  });

  it('should build validation errors', () => {
    const error = WidgetError.validationError('size', 'must be positive');
    expect(error.message).toBe('Validation failed for size: must be positive');
    expect(error.statusCode).toBe(400);
  });
});

describe('error helpers', () => {
  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(3)).toBe('3');
  });

  it('should wrap non-errors into Error instances', () => {
    const error = toError('plain');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('plain');
  });

  it('should pass domain errors through wrapError unchanged', () => {
    const original = new DomainError('kept', 418);
    expect(wrapError(original)).toBe(original);
  });

  it('should wrap plain errors as internal domain errors', () => {
    const wrapped = wrapError(new Error('inner'));
    expect(wrapped.code).toBe(DomainErrorCode.INTERNAL_ERROR);
    expect(wrapped.message).toBe('inner');
    expect(wrapped.cause?.message).toBe('inner');
  });
});
