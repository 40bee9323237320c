/**
 * Tests for the composed DAV app with a fake engine.
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import type { Request, Response, NextFunction } from 'express';
import request from 'supertest';
import { ValidationError } from '@davgate/shared';
import { createDavApp } from '../src/app.js';
import {
  createFakeEngine,
  FakeCredentialStore,
  FixedUsageProvider,
  basicAuthHeader,
  multistatus,
  TEST_DATA_ROOT,
  TEST_REALM,
} from './helpers/testApp.js';

const AUTH = basicAuthHeader('alice', 'test-secret');

function createApp(engine: (req: Request, res: Response, next: NextFunction) => void) {
  return createDavApp({
    store: new FakeCredentialStore(),
    usageProvider: new FixedUsageProvider({ freeBytes: 2048n, usedBytes: 1024n }),
    dataRoot: TEST_DATA_ROOT,
    engine,
    realm: TEST_REALM,
  });
}

describe('createDavApp', () => {
  beforeEach(() => {
    mock.method(console, 'warn', () => {});
    mock.method(console, 'error', () => {});
  });

  afterEach(() => {
    mock.restoreAll();
  });

  it('should challenge unauthenticated requests before the engine runs', async () => {
    const engine = createFakeEngine(() => ({ status: 200, body: 'never' }));

    const response = await request(createApp(engine.handler)).propfind('/');

    assert.strictEqual(response.status, 401);
    assert.strictEqual(response.headers['www-authenticate'], 'Basic realm="Test Storage"');
    assert.strictEqual(engine.requests.length, 0);
  });

  it('should hand authenticated requests to the engine with the user', async () => {
    const engine = createFakeEngine(() => ({ status: 200, body: 'hello', contentType: 'text/plain' }));

    const response = await request(createApp(engine.handler)).get('/notes.txt').set('Authorization', AUTH);

    assert.strictEqual(response.status, 200);
    assert.strictEqual(response.text, 'hello');
    assert.strictEqual(engine.requests.length, 1);
    assert.strictEqual(engine.requests[0].method, 'GET');
    assert.strictEqual(engine.requests[0].path, '/notes.txt');
    assert.strictEqual(engine.requests[0].user, 'alice');
  });

  it('should set Content-Type from the extension when the engine leaves it', async () => {
    const engine = createFakeEngine(() => ({ status: 200, body: 'a,b\n1,2\n' }));

    const response = await request(createApp(engine.handler)).get('/data/table.csv').set('Authorization', AUTH);

    assert.strictEqual(response.headers['content-type'], 'text/csv');
  });

  it('should report quota on root PROPFIND', async () => {
    const engine = createFakeEngine(() => ({ status: 207, body: multistatus('D', ''), contentType: 'text/xml; charset=utf-8' }));

    const response = await request(createApp(engine.handler)).propfind('/').set('Authorization', AUTH);

    assert.strictEqual(response.status, 207);
    assert.strictEqual(
      response.text,
      multistatus(
        'D',
        '<D:quota-available-bytes>2048</D:quota-available-bytes><D:quota-used-bytes>1024</D:quota-used-bytes>'
      )
    );
  });

  it('should map domain errors to their status code', async () => {
    const app = createApp((_req, _res, next) => {
      next(new ValidationError('Invalid depth', 'depth'));
    });

    const response = await request(app).get('/').set('Authorization', AUTH);

    assert.strictEqual(response.status, 400);
    assert.strictEqual(response.body.success, false);
    assert.deepStrictEqual(response.body.error, {
      message: 'Invalid depth',
      code: 'VALIDATION_ERROR',
      context: { field: 'depth' },
    });
    assert.strictEqual(typeof response.body.timestamp, 'string');
  });

  it('should answer other errors with 500', async () => {
    const app = createApp(() => {
      throw new Error('engine exploded');
    });

    const response = await request(app).get('/').set('Authorization', AUTH);

    assert.strictEqual(response.status, 500);
    assert.deepStrictEqual(response.body, { success: false, error: 'Internal server error' });
  });
});
