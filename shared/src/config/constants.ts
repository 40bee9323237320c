/**
 * Centralized Constants Configuration
 *
 * Namespaced defaults and fixed values. Environment-overridable settings are
 * read in env.ts; everything here is fixed at build time.
 *
 * Usage:
 *   import { DEFAULTS, CREDENTIALS, STORAGE } from '../config/constants.js';
 */

export const DEFAULTS = {
  PORT: 8080,
  HOST: '',
  DATA_DIR: 'data',
  CONFIG_DIR: '.',
  REALM: 'DavGate Storage',
  SHUTDOWN_TIMEOUT_MS: 5000,
} as const;

export const CREDENTIALS = {
  FILE_NAME: 'users.json',
  /** bcrypt cost factor. Fixed; changing it only affects newly added users. */
  BCRYPT_COST: 10,
  /** bcrypt ignores input past this many bytes. */
  MAX_PASSWORD_BYTES: 72,
  FILE_MODE: 0o644,
  DIR_MODE: 0o755,
} as const;

export const STORAGE = {
  /** Reported free space where the platform has no statfs. */
  STATIC_FREE_BYTES: 100n * 1024n * 1024n * 1024n,
  /** Largest quota that fits an unsigned 64-bit counter. */
  MAX_QUOTA_BYTES: 2n ** 64n - 1n,
} as const;

export const SIZE_UNITS = {
  K: 1024n,
  M: 1024n * 1024n,
  G: 1024n * 1024n * 1024n,
} as const;
