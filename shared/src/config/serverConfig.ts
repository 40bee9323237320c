/**
 * Server configuration resolution.
 *
 * Precedence: explicit overrides (CLI flags) > environment > defaults. The
 * result carries plain values only; nothing downstream reads the environment.
 */

import * as path from 'path';
import { CREDENTIALS } from './constants.js';
import { parseQuotaBytes } from './quota.js';
import {
  DAVGATE_PORT,
  DAVGATE_HOST,
  DAVGATE_DATA_DIR,
  DAVGATE_CONFIG_DIR,
  DAVGATE_QUOTA,
  DAVGATE_REALM,
  SHUTDOWN_TIMEOUT_MS,
} from './env.js';
import { ValidationError } from '../utils/errorTypes.js';

export interface ServerConfigOverrides {
  port?: number | string;
  host?: string;
  dataDir?: string;
  configDir?: string;
  quota?: string;
  realm?: string;
  shutdownTimeoutMs?: number;
}

export interface ServerConfig {
  port: number;
  host: string;
  /** Absolute path of the shared directory */
  dataDir: string;
  configDir: string;
  /** `<configDir>/users.json` */
  credentialsPath: string;
  /** 0n reports the host filesystem */
  quotaBytes: bigint;
  realm: string;
  shutdownTimeoutMs: number;
}

function parsePort(value: number | string): number {
  const port = typeof value === 'number' ? value : Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ValidationError(`Invalid port: ${value}`, 'port', { value });
  }
  return port;
}

export function resolveCredentialsPath(configDir: string = DAVGATE_CONFIG_DIR): string {
  return path.join(configDir, CREDENTIALS.FILE_NAME);
}

export function resolveServerConfig(overrides: ServerConfigOverrides = {}): ServerConfig {
  const configDir = overrides.configDir ?? DAVGATE_CONFIG_DIR;

  return {
    port: parsePort(overrides.port ?? DAVGATE_PORT),
    host: overrides.host ?? DAVGATE_HOST,
    dataDir: path.resolve(overrides.dataDir ?? DAVGATE_DATA_DIR),
    configDir,
    credentialsPath: resolveCredentialsPath(configDir),
    quotaBytes: parseQuotaBytes(overrides.quota ?? DAVGATE_QUOTA),
    realm: overrides.realm ?? DAVGATE_REALM,
    shutdownTimeoutMs: overrides.shutdownTimeoutMs ?? SHUTDOWN_TIMEOUT_MS,
  };
}
