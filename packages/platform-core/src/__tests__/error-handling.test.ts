import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express from 'express';
import { DuplicateCheckNameError, errorHandler, errorMessage, requestLogger } from '@healthmesh/platform-core';

describe('errorMessage', () => {
  it('should never be empty', () => {
    expect(errorMessage(new Error('refused'))).toBe('refused');
    expect(errorMessage('timeout')).toBe('timeout');
    expect(errorMessage(new Error('  '))).toBe('unknown error');
    expect(errorMessage(undefined)).toBe('undefined');
  });

  it('should not throw on values that cannot be converted to a string', () => {
    expect(errorMessage(Object.create(null))).toBe('unknown error');
    expect(errorMessage(Object.assign(new Error(), { message: 503 }))).toBe('503');
  });
});

describe('errorHandler', () => {
  function appThrowing(error: unknown) {
    const app = express();
    app.use(requestLogger('test-service'));
    app.get('/boom', () => {
      throw error;
    });
    app.use(errorHandler());
    return app;
  }

  it('should answer with the domain error status and code', async () => {
    const response = await request(appThrowing(new DuplicateCheckNameError('db')))
      .get('/boom')
      .set('x-correlation-id', 'corr-1');

    expect(response.status).toBe(409);
    expect(response.body).toEqual({
      error: {
        code: 'DUPLICATE_CHECK_NAME',
        message: 'Health check "db" is already registered',
        details: { name: 'db' },
        correlationId: 'corr-1',
      },
    });
  });

  it('should answer 500 for unexpected errors', async () => {
    const response = await request(appThrowing(new Error('socket hang up'))).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body.error).toMatchObject({ code: 'INTERNAL_ERROR', message: 'socket hang up' });
  });
});
