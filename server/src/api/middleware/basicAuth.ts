/**
 * Basic Authentication Middleware
 *
 * Every request must carry `Authorization: Basic <base64(user:password)>`
 * matching a user in the credential store. Nothing is cached between
 * requests.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '@davgate/shared';
import type { ACredentialStore } from '@davgate/shared';
import { asyncHandler } from './errorHandler.js';

// The accepted username travels to the engine on res.locals
declare global {
  namespace Express {
    interface Locals {
      davUser?: string;
    }
  }
}

export interface BasicCredentials {
  username: string;
  password: string;
}

export interface BasicAuthOptions {
  store: Pick<ACredentialStore, 'authenticate'>;
  realm: string;
}

const BASIC_SCHEME_PATTERN = /^Basic\s+(\S+)\s*$/i;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * Decode a Basic `Authorization` header value.
 *
 * Returns null for any other scheme, a value that is not base64, or a
 * decoded value without a `:` separator. The password may itself contain `:`.
 */
export function parseBasicAuthHeader(header: string | undefined): BasicCredentials | null {
  if (!header) return null;

  const match = BASIC_SCHEME_PATTERN.exec(header);
  if (!match) return null;

  const encoded = match[1];
  if (!BASE64_PATTERN.test(encoded) || encoded.length % 4 !== 0) {
    return null;
  }

  const decoded = Buffer.from(encoded, 'base64').toString('utf8');
  const separator = decoded.indexOf(':');
  if (separator === -1) return null;

  return {
    username: decoded.slice(0, separator),
    password: decoded.slice(separator + 1),
  };
}

function sendUnauthorized(res: Response, realm: string): void {
  res.setHeader('WWW-Authenticate', `Basic realm="${realm}"`);
  res.status(401).json({ success: false, error: 'Unauthorized' });
}

export function basicAuth(options: BasicAuthOptions): RequestHandler {
  const { store, realm } = options;

  return asyncHandler(async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const credentials = parseBasicAuthHeader(req.headers.authorization);
    if (!credentials) {
      sendUnauthorized(res, realm);
      return;
    }

    const authenticated = await store.authenticate(credentials.username, credentials.password);
    if (!authenticated) {
      logger.warn(`Authentication failed for ${req.method} ${req.path}`, {
        component: 'BasicAuth',
        username: credentials.username,
      });
      sendUnauthorized(res, realm);
      return;
    }

    res.locals.davUser = credentials.username;
    next();
  });
}
