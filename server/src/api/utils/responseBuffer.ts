/**
 * Response Buffer
 *
 * Holds back everything a downstream handler writes so the body can be
 * rewritten before it reaches the client. Headers set with `setHeader` go
 * straight to the real response; status, `write` and `end` are captured.
 */

import type { Response } from 'express';

export interface BufferedResponse {
  statusCode: number;
  statusMessage?: string;
  body: Buffer;
}

type Callback = () => void;

function toBuffer(chunk: unknown, encoding: unknown): Buffer | null {
  if (typeof chunk === 'string') {
    const bufferEncoding = typeof encoding === 'string' && Buffer.isEncoding(encoding) ? encoding : 'utf8';
    return Buffer.from(chunk, bufferEncoding);
  }
  if (chunk instanceof Uint8Array) {
    return Buffer.from(chunk);
  }
  return null;
}

function findCallback(args: unknown[]): Callback | undefined {
  const last = args[args.length - 1];
  if (typeof last === 'function') {
    return () => {
      last();
    };
  }
  return undefined;
}

export class ResponseBuffer {
  /**
   * Resolves with the captured response once the handler calls `end()`,
   * or with null if the client went away first.
   */
  readonly finished: Promise<BufferedResponse | null>;

  private readonly chunks: Buffer[] = [];
  private readonly originalWriteHead: Response['writeHead'];
  private readonly originalWrite: Response['write'];
  private readonly originalEnd: Response['end'];
  private headStatus: number | undefined;
  private headMessage: string | undefined;
  private settled = false;
  private restored = false;
  private settle: (result: BufferedResponse | null) => void = () => {};

  constructor(private readonly res: Response) {
    this.originalWriteHead = res.writeHead;
    this.originalWrite = res.write;
    this.originalEnd = res.end;

    this.finished = new Promise((resolve) => {
      this.settle = resolve;
    });

    this.intercept();

    res.on('close', () => {
      if (!this.settled) {
        this.settled = true;
        this.restore();
        this.settle(null);
      }
    });
  }

  /**
   * Put the response's own methods back. Safe to call more than once.
   */
  restore(): void {
    if (this.restored) return;
    this.restored = true;
    this.res.writeHead = this.originalWriteHead;
    this.res.write = this.originalWrite;
    this.res.end = this.originalEnd;
  }

  /**
   * Restore the response and send the given status and body with an exact
   * `Content-Length`.
   */
  flush(response: BufferedResponse): void {
    this.restore();

    const { res } = this;
    res.statusCode = response.statusCode;
    if (response.statusMessage) {
      res.statusMessage = response.statusMessage;
    }
    res.setHeader('Content-Length', response.body.length);
    res.end(response.body);
  }

  private intercept(): void {
    const { res } = this;

    res.writeHead = (...args: unknown[]): Response => {
      this.captureHead(args);
      return res;
    };

    res.write = (...args: unknown[]): boolean => {
      const chunk = toBuffer(args[0], args[1]);
      if (chunk) this.chunks.push(chunk);
      const callback = findCallback(args.slice(1));
      if (callback) process.nextTick(callback);
      return true;
    };

    res.end = (...args: unknown[]): Response => {
      if (typeof args[0] !== 'function') {
        const chunk = toBuffer(args[0], args[1]);
        if (chunk) this.chunks.push(chunk);
      }
      const callback = findCallback(args);
      this.complete();
      if (callback) process.nextTick(callback);
      return res;
    };
  }

  private captureHead(args: unknown[]): void {
    const [statusCode, second, third] = args;
    if (typeof statusCode === 'number') {
      this.headStatus = statusCode;
    }

    let headers: unknown = third;
    if (typeof second === 'string') {
      this.headMessage = second;
    } else {
      headers = second;
    }
    this.applyHeaders(headers);
  }

  private applyHeaders(headers: unknown): void {
    if (Array.isArray(headers)) {
      for (let i = 0; i + 1 < headers.length; i += 2) {
        const name: unknown = headers[i];
        const value: unknown = headers[i + 1];
        if (typeof name === 'string' && (typeof value === 'string' || typeof value === 'number')) {
          this.res.setHeader(name, value);
        }
      }
      return;
    }

    if (typeof headers !== 'object' || headers === null) return;

    for (const [name, value] of Object.entries(headers)) {
      if (typeof value === 'string' || typeof value === 'number') {
        this.res.setHeader(name, value);
      } else if (Array.isArray(value)) {
        this.res.setHeader(name, value.map(String));
      }
    }
  }

  private complete(): void {
    if (this.settled) return;
    this.settled = true;

    this.settle({
      statusCode: this.headStatus ?? this.res.statusCode,
      statusMessage: this.headMessage,
      body: Buffer.concat(this.chunks),
    });
  }
}
