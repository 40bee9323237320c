/**
 * DAV server startup.
 */

import fs from 'node:fs/promises';
import http from 'node:http';
import type { AddressInfo } from 'node:net';
import { logger, CredentialStore, createUsageProvider, formatBytes } from '@davgate/shared';
import type { ServerConfig } from '@davgate/shared';
import { createDavApp } from './app.js';
import { createDavEngine } from './dav/engine.js';
import { closeServer } from './gracefulShutdown.js';

export interface DavServerHandle {
  server: http.Server;
  address: AddressInfo;
  close(): Promise<void>;
}

function listen(server: http.Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once('error', onError);

    const onListening = (): void => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('Server is not listening on a TCP port'));
        return;
      }
      resolve(address);
    };

    // An empty host listens on every interface.
    if (host) {
      server.listen(port, host, onListening);
    } else {
      server.listen(port, onListening);
    }
  });
}

export async function startDavServer(config: ServerConfig): Promise<DavServerHandle> {
  await fs.mkdir(config.dataDir, { recursive: true, mode: 0o755 });

  const store = new CredentialStore(config.credentialsPath);
  await store.initialize();

  if (store.size === 0) {
    logger.warn('No users found. Add one with "davgate users add <username> <password>".', {
      component: 'DavServer',
      credentialsPath: config.credentialsPath,
    });
  }

  if (config.quotaBytes > 0n) {
    logger.info(`Storage quota: ${config.quotaBytes} bytes (${formatBytes(config.quotaBytes)})`, {
      component: 'DavServer',
    });
  } else {
    logger.info('Storage quota: off, reporting filesystem usage', { component: 'DavServer' });
  }

  const usageProvider = createUsageProvider({ quotaBytes: config.quotaBytes });
  const engine = createDavEngine({ dataDir: config.dataDir, realm: config.realm });
  const app = createDavApp({
    store,
    usageProvider,
    dataRoot: config.dataDir,
    engine,
    realm: config.realm,
  });

  const server = http.createServer(app);
  const address = await listen(server, config.port, config.host);

  logger.info(`DavGate server listening on ${config.host || '0.0.0.0'}:${address.port} serving ${config.dataDir}`, {
    component: 'DavServer',
  });

  return {
    server,
    address,
    async close(): Promise<void> {
      await closeServer(server);
      await store.dispose();
    },
  };
}
