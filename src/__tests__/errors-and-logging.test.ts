/**
 * =============================================================================
 * ERRORS & LOG SANITIZATION
 * =============================================================================
 */

import {
  AppError,
  ConfigurationError,
  ErrorCode,
  EXIT_CODE,
  InternalError,
  ParseError,
  toAppError,
  UpstreamError,
} from '../core';
import { sanitizeLogData } from '../shared/services/logger.service';

describe('toAppError', () => {
  it('passes application errors through', () => {
    const error = new ParseError('duration', 'Expected "<integer>s" for duration, got "soon"');

    expect(toAppError(error)).toBe(error);
  });

  it('wraps plain errors as non-operational internal errors', () => {
    const wrapped = toAppError(new TypeError('boom'));

    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped).toMatchObject({
      message: 'boom',
      code: ErrorCode.INTERNAL_ERROR,
      isOperational: false,
      exitCode: EXIT_CODE.FAILURE,
      details: { originalName: 'TypeError' },
    });
  });

  it('wraps non-Error throwables', () => {
    expect(toAppError('nope').message).toBe('nope');
  });
});

describe('AppError subclasses', () => {
  it('keeps the subclass name and prototype', () => {
    const error = new UpstreamError('Routes API returned 403', ErrorCode.ROUTES_HTTP_ERROR, {
      status: 403,
      body: { error: { message: 'denied' } },
    });

    expect(error).toBeInstanceOf(AppError);
    expect(error.name).toBe('UpstreamError');
    expect(error.status).toBe(403);
    expect(error.toJSON()).toMatchObject({
      name: 'UpstreamError',
      code: ErrorCode.ROUTES_HTTP_ERROR,
      details: { status: 403, body: { error: { message: 'denied' } } },
    });
  });

  it('lists every configuration issue in the message', () => {
    const error = new ConfigurationError([
      { variable: 'HOME_ADDRESS', message: 'HOME_ADDRESS is required' },
      { variable: 'LOCAL_TZ', message: 'must be a valid IANA timezone' },
    ]);

    expect(error.message).toBe(
      'Invalid configuration: HOME_ADDRESS (HOME_ADDRESS is required), LOCAL_TZ (must be a valid IANA timezone)'
    );
    expect(error.exitCode).toBe(2);
  });
});

describe('sanitizeLogData', () => {
  it('redacts secret-looking keys at any depth', () => {
    expect(
      sanitizeLogData({
        apiKey: 'test-key',
        label: 'Home',
        request: { headers: { 'X-Goog-Api-Key': 'test-key' }, url: '/geocode' },
        attempts: [{ token: 'abc', status: 403 }],
      })
    ).toEqual({
      apiKey: '[REDACTED]',
      label: 'Home',
      request: { headers: { 'X-Goog-Api-Key': '[REDACTED]' }, url: '/geocode' },
      attempts: [{ token: '[REDACTED]', status: 403 }],
    });
  });
});
