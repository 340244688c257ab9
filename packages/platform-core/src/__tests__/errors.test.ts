import { describe, it, expect } from 'vitest';
import {
  DomainError,
  DomainErrorCode,
  createDomainServiceError,
  errorMessage,
  isErrorCode,
  toError,
} from '../error-handling/errors.js';
import { serializeError } from '../logging/error-serializer.js';

const DemoCodes = { ...DomainErrorCode, QUOTA_EXCEEDED: 'QUOTA_EXCEEDED' } as const;
const DemoError = createDomainServiceError('Demo', DemoCodes);

describe('createDomainServiceError', () => {
  it('should name errors after the service and default to INTERNAL_ERROR', () => {
    const error = new DemoError('something broke');

    expect(error).toBeInstanceOf(DomainError);
    expect(error.name).toBe('DemoError');
    expect(error.code).toBe('INTERNAL_ERROR');
    expect(error.statusCode).toBe(500);
  });

  it('should build validation and availability errors', () => {
    expect(DemoError.validationError('port', 'must be positive')).toMatchObject({
      message: 'Validation failed for port: must be positive',
      statusCode: 400,
      code: 'VALIDATION_ERROR',
    });
    expect(DemoError.serviceUnavailable('upstream')).toMatchObject({ statusCode: 503, code: 'SERVICE_UNAVAILABLE' });
  });

  it('should accept service specific codes', () => {
    const error = new DemoError('too many', 429, DemoCodes.QUOTA_EXCEEDED);
    expect(isErrorCode(error, 'QUOTA_EXCEEDED')).toBe(true);
    expect(isErrorCode(new Error('plain'), 'QUOTA_EXCEEDED')).toBe(false);
  });
});

describe('error helpers', () => {
  it('should extract messages from anything thrown', () => {
    expect(errorMessage(new Error('a'))).toBe('a');
    expect(errorMessage('b')).toBe('b');
    expect(errorMessage(3)).toBe('3');
    expect(toError('c')).toBeInstanceOf(Error);
  });
});

describe('serializeError', () => {
  it('should include code, details and the cause chain', () => {
    const cause = new Error('socket hang up');
    const error = new DomainError('fetch failed', 503, cause, 'SERVICE_UNAVAILABLE', { url: '/x' });

    const serialized = serializeError(error);

    expect(serialized).toMatchObject({
      name: 'DomainError',
      message: 'fetch failed',
      code: 'SERVICE_UNAVAILABLE',
      details: { url: '/x' },
      cause: { name: 'Error', message: 'socket hang up' },
    });
  });

  it('should handle strings and plain objects', () => {
    expect(serializeError('oops')).toEqual({ message: 'oops' });
    expect(serializeError({ error: 'bad', code: 'E1' })).toEqual({ message: 'bad', name: undefined, code: 'E1' });
  });
});
