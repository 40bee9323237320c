/**
 * Tests for ResponseBuffer.
 * A middleware buffers whatever the handler writes and flushes a transformed body.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import express from 'express';
import type { Express, Request, Response, NextFunction } from 'express';
import request from 'supertest';
import { ResponseBuffer } from '../../src/api/utils/responseBuffer.js';
import type { BufferedResponse } from '../../src/api/utils/responseBuffer.js';

function createBufferingApp(
  handler: (req: Request, res: Response) => void,
  transform: (body: Buffer) => Buffer = (body) => body
): { app: Express; captured: Array<BufferedResponse | null> } {
  const captured: Array<BufferedResponse | null> = [];
  const app = express();

  app.use((_req: Request, res: Response, next: NextFunction) => {
    const buffer = new ResponseBuffer(res);
    buffer.finished
      .then((result) => {
        captured.push(result);
        if (result) {
          buffer.flush({ ...result, body: transform(result.body) });
        }
      })
      .catch(next);
    next();
  });
  app.use(handler);

  return { app, captured };
}

describe('ResponseBuffer', () => {
  it('should assemble the body from several writes', async () => {
    const { app } = createBufferingApp(
      (_req, res) => {
        res.statusCode = 201;
        res.setHeader('Content-Type', 'text/plain');
        res.write('hello ');
        res.write('world');
        res.end();
      },
      (body) => Buffer.from(body.toString('utf8').toUpperCase())
    );

    const response = await request(app).get('/');

    assert.strictEqual(response.status, 201);
    assert.strictEqual(response.text, 'HELLO WORLD');
    assert.strictEqual(response.headers['content-length'], '11');
  });

  it('should set Content-Length to the transformed byte length', async () => {
    const { app } = createBufferingApp(
      (_req, res) => {
        res.setHeader('Content-Type', 'text/plain; charset=utf-8');
        res.setHeader('Content-Length', '2');
        res.end('ab');
      },
      (body) => Buffer.concat([body, Buffer.from('é', 'utf8')])
    );

    const response = await request(app).get('/');

    assert.strictEqual(response.text, 'abé');
    assert.strictEqual(response.headers['content-length'], '4');
  });

  it('should take the status and headers passed to writeHead', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.writeHead(202, { 'X-Engine': 'yes', 'Content-Type': 'text/plain' });
      res.end('ok');
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.status, 202);
    assert.strictEqual(response.headers['x-engine'], 'yes');
    assert.strictEqual(response.text, 'ok');
    assert.strictEqual(captured[0]?.statusCode, 202);
  });

  it('should keep the status message passed to writeHead', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.writeHead(207, 'Multi-Status', { 'Content-Type': 'text/xml' });
      res.end('<multistatus/>');
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.status, 207);
    assert.strictEqual(captured[0]?.statusMessage, 'Multi-Status');
  });

  it('should accept Buffer chunks', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.setHeader('Content-Type', 'text/plain');
      res.write(Buffer.from([0x62, 0x79]));
      res.end(Buffer.from('tes'));
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.text, 'bytes');
    assert.deepStrictEqual(captured[0]?.body, Buffer.from('bytes'));
  });

  it('should decode string chunks with the given encoding', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.setHeader('Content-Type', 'text/plain');
      res.end('aGk=', 'base64');
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.text, 'hi');
    assert.deepStrictEqual(captured[0]?.body, Buffer.from('hi'));
  });

  it('should default to status 200', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.setHeader('Content-Type', 'text/plain');
      res.end('fine');
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.status, 200);
    assert.strictEqual(captured[0]?.statusCode, 200);
  });

  it('should resolve with null and restore the response when closed before end', async () => {
    const { app, captured } = createBufferingApp((_req, res) => {
      res.emit('close');
      res.setHeader('Content-Type', 'text/plain');
      res.end('unbuffered');
    });

    const response = await request(app).get('/');

    assert.strictEqual(response.text, 'unbuffered');
    assert.deepStrictEqual(captured, [null]);
  });
});
