import { Command } from 'commander';
import { resolveServerConfig, logEnvConfig, isVerbose } from '@davgate/shared';
import type { ServerConfig } from '@davgate/shared';
import { startDavServer, registerShutdownHandlers } from '@davgate/server';
import { wrapCommand } from '../utils/errorHandler.js';

export interface ServerCommandOptions {
  port?: string;
  host?: string;
  dataDir?: string;
  configDir?: string;
  quota?: string;
}

/**
 * Flags override the environment; unset flags fall through to it.
 */
export function toServerConfig(options: ServerCommandOptions): ServerConfig {
  return resolveServerConfig({
    port: options.port,
    host: options.host,
    dataDir: options.dataDir,
    configDir: options.configDir,
    quota: options.quota,
  });
}

export const serverCommand = new Command('server')
  .description('Start the WebDAV server')
  .option('-p, --port <port>', 'Port to listen on (default: DAVGATE_PORT or 8080)')
  .option('-H, --host <host>', 'Interface to bind (default: all interfaces)')
  .option('-d, --data-dir <dir>', 'Directory to share (default: DAVGATE_DATA_DIR or data)')
  .option('-c, --config-dir <dir>', 'Directory holding users.json (default: DAVGATE_CONFIG_DIR or .)')
  .option('--quota <size>', 'Storage size to report to clients, e.g. 512M or 2G (default: host filesystem)')
  .action(
    wrapCommand('starting server', async (options: ServerCommandOptions) => {
      if (isVerbose()) {
        logEnvConfig();
      }

      const config = toServerConfig(options);
      const handle = await startDavServer(config);
      registerShutdownHandlers(handle, { shutdownTimeoutMs: config.shutdownTimeoutMs });
    })
  );
