import express from 'express';
import type { Express, RequestHandler } from 'express';
import type { ACredentialStore, AUsageProvider } from '@davgate/shared';
import { basicAuth } from './api/middleware/basicAuth.js';
import { contentTypeHint } from './api/middleware/contentTypeHint.js';
import { quotaReporter } from './api/middleware/quotaReporter.js';
import { domainErrorHandler, genericErrorHandler } from './api/middleware/errorHandler.js';

export interface DavAppOptions {
  store: Pick<ACredentialStore, 'authenticate'>;
  usageProvider: Pick<AUsageProvider, 'getUsage'>;
  /** Absolute path of the shared directory */
  dataRoot: string;
  /** Handler that serves WebDAV requests, normally from `createDavEngine` */
  engine: RequestHandler;
  realm: string;
}

/**
 * Build the request pipeline: auth, content type hint, quota reporting,
 * then the WebDAV engine.
 */
export function createDavApp(options: DavAppOptions): Express {
  const { store, usageProvider, dataRoot, engine, realm } = options;

  const app = express();
  app.disable('x-powered-by');

  app.use(basicAuth({ store, realm }));
  app.use(contentTypeHint);
  app.use(quotaReporter({ dataRoot, usageProvider }));
  app.use(engine);

  app.use(domainErrorHandler);
  app.use(genericErrorHandler);

  return app;
}
