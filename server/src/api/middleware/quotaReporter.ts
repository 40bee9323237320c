/**
 * Quota Reporter Middleware
 *
 * Adds RFC 4331 quota properties to PROPFIND responses for the share root.
 * All other requests pass through untouched.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger, getErrorMessage } from '@davgate/shared';
import type { AUsageProvider, UsageStats } from '@davgate/shared';
import { ResponseBuffer } from '../utils/responseBuffer.js';
import type { BufferedResponse } from '../utils/responseBuffer.js';
import { injectQuotaProperties } from '../../dav/quotaProperties.js';

export interface QuotaReporterOptions {
  /** Absolute path of the shared directory */
  dataRoot: string;
  usageProvider: Pick<AUsageProvider, 'getUsage'>;
}

const MULTI_STATUS = 207;
const DEFAULT_XML_CONTENT_TYPE = 'text/xml; charset=utf-8';

export function quotaReporter(options: QuotaReporterOptions): RequestHandler {
  const { dataRoot, usageProvider } = options;

  async function readUsage(): Promise<UsageStats | null> {
    try {
      return await usageProvider.getUsage(dataRoot);
    } catch (error) {
      logger.warn(`Failed to get disk usage: ${getErrorMessage(error)}`, {
        component: 'QuotaReporter',
        dataRoot,
      });
      return null;
    }
  }

  async function rewrite(buffer: ResponseBuffer, res: Response): Promise<void> {
    const captured = await buffer.finished;
    if (!captured) return;

    if (captured.statusCode !== MULTI_STATUS) {
      buffer.flush(captured);
      return;
    }

    const usage = await readUsage();
    const result: BufferedResponse = usage
      ? { ...captured, body: injectQuotaProperties(captured.body, usage) }
      : captured;

    if (!res.hasHeader('Content-Type')) {
      res.setHeader('Content-Type', DEFAULT_XML_CONTENT_TYPE);
    }
    buffer.flush(result);
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    if (req.method !== 'PROPFIND' || req.path !== '/') {
      next();
      return;
    }

    // The body is rewritten as plain XML, so the engine must not compress it.
    delete req.headers['accept-encoding'];

    const buffer = new ResponseBuffer(res);
    rewrite(buffer, res).catch((error: unknown) => {
      logger.error('Failed to rewrite PROPFIND response', error, {
        component: 'QuotaReporter',
      });
      buffer.restore();
      if (!res.writableEnded) {
        res.destroy();
      }
    });

    next();
  };
}
