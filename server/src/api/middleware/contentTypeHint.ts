import path from 'node:path';
import type { Request, Response, NextFunction } from 'express';
import mimeTypes from './mimeTypes.json' with { type: 'json' };

const MIME_TYPES: Readonly<Record<string, string>> = mimeTypes;

/**
 * Look up the MIME type for a request path by its extension (case-insensitive).
 */
export function getMimeType(requestPath: string): string | undefined {
  const ext = path.posix.extname(requestPath).toLowerCase();
  if (!ext) return undefined;
  return Object.hasOwn(MIME_TYPES, ext) ? MIME_TYPES[ext] : undefined;
}

/**
 * Sets `Content-Type` from the path extension. The engine may still replace it.
 */
export function contentTypeHint(req: Request, res: Response, next: NextFunction): void {
  const mimeType = getMimeType(req.path);
  if (mimeType) {
    res.setHeader('Content-Type', mimeType);
  }
  next();
}
