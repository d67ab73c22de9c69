import { describe, it, expect } from 'vitest';
import { Hono } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { AppBindings } from '../../src/env.js';
import { APIError, ErrorCode } from '../../src/schemas/response.js';
import {
  AuthRejectedError,
  CorruptStateError,
  LookupAbortedError,
  NetworkFailureError,
  RateLimitTimeoutError,
} from '../../lib/external-services/errors.js';
import { TimeoutError } from '../../lib/fetch-utils.js';
import { mockLogger } from '../../src/__tests__/mocks/fixtures.js';
import { categorizeError, errorHandler, sanitizeMessage } from '../error-handler.js';

describe('sanitizeMessage', () => {
  it('redacts keys in query strings', () => {
    expect(sanitizeMessage('GET https://api.test/x?api_key=test-secret&q=1 failed'))
      .toBe('GET https://api.test/x?[REDACTED]&q=1 failed');
  });

  it('redacts signed authorization values', () => {
    expect(sanitizeMessage('Authorization: NPO test-key:c2lnbmF0dXJl rejected')).toBe('Authorization: [REDACTED] rejected');
  });

  it('redacts file paths and addresses', () => {
    expect(sanitizeMessage('EACCES: /root/cache/ab/x.json')).toBe('EACCES: [REDACTED]');
    expect(sanitizeMessage('connect to 10.0.0.12 refused')).toBe('connect to [REDACTED] refused');
  });

  it('truncates long messages', () => {
    const result = sanitizeMessage('x'.repeat(250));
    expect(result).toBe(`${'x'.repeat(200)}...`);
  });

  it('has a default for an empty message', () => {
    expect(sanitizeMessage(undefined)).toBe('An unexpected error occurred');
  });
});

describe('categorizeError', () => {
  it('keeps the code of an API error', () => {
    expect(categorizeError(new APIError(ErrorCode.NOT_FOUND, 'missing'))).toBe('NOT_FOUND');
  });

  it('maps resolver errors', () => {
    expect(categorizeError(new NetworkFailureError('https://api.test/x'))).toBe('PROVIDER_ERROR');
    expect(categorizeError(new AuthRejectedError(403))).toBe('CREDENTIAL_ERROR');
    expect(categorizeError(new RateLimitTimeoutError('api.test', 1000))).toBe('PROVIDER_TIMEOUT');
    expect(categorizeError(new CorruptStateError('/tmp/x.json'))).toBe('CACHE_ERROR');
    expect(categorizeError(new LookupAbortedError('poms'))).toBe('SERVICE_UNAVAILABLE');
  });

  it('maps HTTP exceptions, timeouts and filesystem errors', () => {
    expect(categorizeError(new HTTPException(404))).toBe('NOT_FOUND');
    expect(categorizeError(new HTTPException(413))).toBe('INVALID_REQUEST');
    expect(categorizeError(new TimeoutError('https://api.test/x', 50))).toBe('PROVIDER_TIMEOUT');
    expect(categorizeError(new Error('ENOSPC: no space left on device'))).toBe('CACHE_ERROR');
    expect(categorizeError(new Error('something odd'))).toBe('INTERNAL_ERROR');
  });
});

describe('errorHandler', () => {
  function app(error: Error) {
    const logger = mockLogger();
    const hono = new Hono<AppBindings>();
    hono.onError(errorHandler);
    hono.use('*', async (c, next) => {
      c.set('requestId', 'req-1');
      c.set('logger', logger);
      await next();
    });
    hono.get('/fail', () => {
      throw error;
    });
    return { hono, logger };
  }

  it('renders API errors with their details', async () => {
    const { hono } = app(new APIError(ErrorCode.NOT_FOUND, 'No cache entry for key', { key: 'vpro-x-0-none-m' }));

    const res = await hono.request('/fail');

    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({
      success: false,
      error: { code: 'NOT_FOUND', message: 'No cache entry for key', details: { key: 'vpro-x-0-none-m' } },
      meta: { requestId: 'req-1' },
    });
  });

  it('hides the message of unexpected errors and logs them', async () => {
    const { hono, logger } = app(new Error('boom at /root/app/secret.ts'));

    const res = await hono.request('/fail');

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } });
    expect(logger.error).toHaveBeenCalledWith('Error handler caught:', expect.objectContaining({
      name: 'Error',
      message: 'boom at [REDACTED]',
      path: '/fail',
    }));
  });

  it('maps upstream failures to 502', async () => {
    const { hono } = app(new NetworkFailureError('https://rs.poms.omroep.nl/v1/api/pages/'));
    const res = await hono.request('/fail');
    expect(res.status).toBe(502);
  });
});
