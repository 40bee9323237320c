/**
 * WebDAV engine adapter.
 *
 * Wraps a `webdav-server` instance serving one directory as an Express
 * handler. Authentication has already happened in `basicAuth`; the engine
 * only needs to know who the user is.
 */

import path from 'node:path';
import type { ServerResponse } from 'node:http';
import type { Request, Response, RequestHandler } from 'express';
import { v2 as webdav } from 'webdav-server';
import { logger, DAVGATE_REALM } from '@davgate/shared';

export interface DavEngineOptions {
  /** Absolute path of the shared directory */
  dataDir: string;
  realm?: string;
}

/** Files Windows clients probe for; their 404s are expected. */
const WINDOWS_PROBE_FILES = new Set(['desktop.ini', 'autorun.inf', 'thumbs.db', 'folder.jpg']);

export function isWindowsProbe(requestPath: string): boolean {
  const pathname = requestPath.split('?')[0];
  return WINDOWS_PROBE_FILES.has(path.posix.basename(pathname).toLowerCase());
}

/**
 * Resolves the user `basicAuth` already accepted for the response.
 */
class GateAuthentication implements webdav.HTTPAuthentication {
  constructor(
    private readonly users: WeakMap<ServerResponse, string>,
    private readonly realm: string
  ) {}

  askForAuthentication(): { [header: string]: string } {
    return { 'WWW-Authenticate': `Basic realm="${this.realm}"` };
  }

  getUser(ctx: webdav.HTTPRequestContext, callback: (error: Error | null, user?: webdav.IUser) => void): void {
    const username = this.users.get(ctx.response);
    if (username === undefined) {
      callback(webdav.Errors.BadAuthentication);
      return;
    }
    callback(null, new webdav.SimpleUser(username, '', false, false));
  }
}

export function createDavEngine(options: DavEngineOptions): RequestHandler {
  const { dataDir, realm = DAVGATE_REALM } = options;
  const users = new WeakMap<ServerResponse, string>();

  const server = new webdav.WebDAVServer({
    httpAuthentication: new GateAuthentication(users, realm),
    rootFileSystem: new webdav.PhysicalFileSystem(dataDir),
  });

  server.afterRequest((ctx, next) => {
    const status = ctx.response.statusCode;
    const method = ctx.request.method ?? 'UNKNOWN';
    const url = ctx.request.url ?? '/';

    if (status >= 400 && !(status === 404 && isWindowsProbe(url))) {
      logger.warn(`WebDAV error: ${method} ${url} -> ${status}`, {
        component: 'DavEngine',
        username: users.get(ctx.response),
      });
    }
    next();
  });

  return (req: Request, res: Response): void => {
    const username: string | undefined = res.locals.davUser;
    if (username !== undefined) {
      users.set(res, username);
    }
    server.executeRequest(req, res);
  };
}
