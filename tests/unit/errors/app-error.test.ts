import { describe, expect, test } from 'vitest';

import {
  AppError,
  CancellationError,
  CapabilityError,
  DecodingError,
  StateError,
  TransmissionError,
  ValidationError,
} from '../../../src/errors/app-error.js';
import {
  getErrorMessage,
  isSystemError,
  toError,
} from '../../../src/errors.js';

describe('app-error', () => {
  describe('AppError', () => {
    test('creates error with default values', () => {
      const error = new AppError('Test error');

      expect(error).toBeInstanceOf(Error);
      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INTERNAL_ERROR');
      expect(error.isOperational).toBe(true);
      expect(error.name).toBe('AppError');
    });

    test('creates error with custom values', () => {
      const cause = new Error('root');
      const error = new AppError('Custom error', 400, 'CUSTOM_CODE', false, {
        cause,
      });

      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('CUSTOM_CODE');
      expect(error.isOperational).toBe(false);
      expect(error.cause).toBe(cause);
    });

    test('has stack trace', () => {
      const error = new AppError('Test error');

      expect(error.stack).toContain('AppError');
    });
  });

  describe('ValidationError', () => {
    test('creates validation error with default status', () => {
      const error = new ValidationError('Invalid input');

      expect(error).toBeInstanceOf(AppError);
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('VALIDATION_ERROR');
      expect(error.details).toBeUndefined();
    });

    test('creates validation error with details', () => {
      const details = { method: 'bad method' };
      const error = new ValidationError('Invalid HTTP method', details);

      expect(error.details).toEqual(details);
    });
  });

  describe('DecodingError', () => {
    test('is a validation error with its own code', () => {
      const cause = new SyntaxError('Unexpected token');
      const error = new DecodingError('Body is not valid JSON.', { cause });

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.name).toBe('DecodingError');
      expect(error.statusCode).toBe(400);
      expect(error.code).toBe('DECODING_ERROR');
      expect(error.cause).toBe(cause);
    });

    test('leaves cause unset when none is given', () => {
      expect(new DecodingError('bad').cause).toBeUndefined();
    });
  });

  describe('StateError', () => {
    test('defaults to an operational error', () => {
      const error = new StateError('Body has already been used.');

      expect(error.statusCode).toBe(500);
      expect(error.code).toBe('INVALID_STATE');
      expect(error.isOperational).toBe(true);
    });

    test('marks contract violations as non-operational', () => {
      expect(new StateError('bug', false).isOperational).toBe(false);
    });
  });

  describe('TransmissionError', () => {
    test('stores the URL and is never retriable', () => {
      const error = new TransmissionError(
        'Too many redirects.',
        'https://example.com/loop'
      );

      expect(error.statusCode).toBe(502);
      expect(error.code).toBe('TRANSMISSION_ERROR');
      expect(error.url).toBe('https://example.com/loop');
      expect(error.retriable).toBe(false);
    });
  });

  describe('CapabilityError', () => {
    test('uses the not-supported code', () => {
      const error = new CapabilityError('Fetcher.get() is not enabled.');

      expect(error.statusCode).toBe(501);
      expect(error.code).toBe('NOT_SUPPORTED');
    });
  });

  describe('CancellationError', () => {
    test('carries the abort reason as cause', () => {
      const reason = new Error('stop');
      const error = new CancellationError(reason);

      expect(error.message).toBe('The operation was aborted');
      expect(error.statusCode).toBe(499);
      expect(error.code).toBe('CANCELED');
      expect(error.reason).toBe(reason);
      expect(error.cause).toBe(reason);
    });
  });
});

describe('error helpers', () => {
  test('getErrorMessage reads Error messages only', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('boom')).toBe('Unknown error');
  });

  test('toError wraps non-errors', () => {
    const error = new Error('kept');

    expect(toError(error)).toBe(error);
    expect(toError(42).message).toBe('42');
  });

  test('isSystemError requires a string code', () => {
    const systemError = Object.assign(new Error('refused'), {
      code: 'ECONNREFUSED',
    });

    expect(isSystemError(systemError)).toBe(true);
    expect(isSystemError(new Error('plain'))).toBe(false);
    expect(isSystemError({ code: 'ECONNREFUSED' })).toBe(false);
  });
});
