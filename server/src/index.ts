/**
 * @davgate/server
 *
 * Express pipeline and lifecycle for the WebDAV share.
 */

export { createDavApp, type DavAppOptions } from './app.js';
export { startDavServer, type DavServerHandle } from './server.js';
export {
  gracefulShutdown,
  registerShutdownHandlers,
  closeServer,
  type GracefulShutdownConfig,
  type ShutdownTarget,
} from './gracefulShutdown.js';
export { createDavEngine, isWindowsProbe, type DavEngineOptions } from './dav/engine.js';
export {
  detectDavPrefix,
  buildQuotaProperties,
  injectQuotaProperties,
  DEFAULT_DAV_PREFIX,
} from './dav/quotaProperties.js';
export { basicAuth, parseBasicAuthHeader, type BasicAuthOptions, type BasicCredentials } from './api/middleware/basicAuth.js';
export { contentTypeHint, getMimeType } from './api/middleware/contentTypeHint.js';
export { quotaReporter, type QuotaReporterOptions } from './api/middleware/quotaReporter.js';
export { domainErrorHandler, genericErrorHandler, asyncHandler } from './api/middleware/errorHandler.js';
export { ResponseBuffer, type BufferedResponse } from './api/utils/responseBuffer.js';
