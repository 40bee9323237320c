/**
 * Centralized Environment Configuration
 *
 * Single source of truth for environment variables. Everything else reads the
 * exported constants (or `parseEnv()` for an explicit source) instead of
 * touching process.env.
 *
 * Entry points load `.env` through `import 'dotenv/config'` before this module
 * is imported.
 */

import { z } from 'zod';
import { DEFAULTS } from './constants.js';
import { isValidQuotaSize } from './quota.js';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

const integerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isInteger(val), { message: 'Must be a valid integer' });

const portWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? Number(val) : defaultValue))
    .refine((val) => Number.isInteger(val) && val >= 0 && val <= 65535, {
      message: 'Must be a port between 0 and 65535',
    });

const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Node Environment
  // -------------------------------------------------------------------------
  NODE_ENV: optionalString('development'),

  // -------------------------------------------------------------------------
  // Server Configuration
  // -------------------------------------------------------------------------
  DAVGATE_PORT: portWithDefault(DEFAULTS.PORT),
  DAVGATE_HOST: optionalString(DEFAULTS.HOST),
  DAVGATE_REALM: optionalString(DEFAULTS.REALM),

  // -------------------------------------------------------------------------
  // Storage Paths
  // -------------------------------------------------------------------------
  DAVGATE_DATA_DIR: optionalString(DEFAULTS.DATA_DIR),
  DAVGATE_CONFIG_DIR: optionalString(DEFAULTS.CONFIG_DIR),

  // -------------------------------------------------------------------------
  // Quota (e.g. 2G, 512M; empty reports the host filesystem)
  // -------------------------------------------------------------------------
  DAVGATE_QUOTA: z
    .string()
    .optional()
    .transform((val) => val ?? '')
    .refine(isValidQuotaSize, { message: 'Must be a byte count or a size such as 512M or 2G' }),

  // -------------------------------------------------------------------------
  // Graceful Shutdown
  // -------------------------------------------------------------------------
  SHUTDOWN_TIMEOUT_MS: integerWithDefault(DEFAULTS.SHUTDOWN_TIMEOUT_MS),

  // -------------------------------------------------------------------------
  // Verbose/Debug Mode Configuration
  // -------------------------------------------------------------------------
  VERBOSE_MODE: optionalString('off'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
});

type ParsedEnv = z.infer<typeof envSchema>;

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  host: string;
  realm: string;
  dataDir: string;
  configDir: string;
  quota: string;
  shutdownTimeoutMs: number;
  verboseMode: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
}

export interface EnvParseResult {
  config: EnvConfig;
  errors: string[];
}

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

/**
 * Parse an environment source. Invalid variables are reported in `errors` and
 * every value falls back to its default.
 */
export function parseEnv(source: NodeJS.ProcessEnv = process.env): EnvParseResult {
  const parseResult = envSchema.safeParse(source);
  const errors = parseResult.success
    ? []
    : parseResult.error.errors.map((error) => `${error.path.join('.')}: ${error.message}`);

  const parsed: Partial<ParsedEnv> = parseResult.success ? parseResult.data : {};
  const verboseMode = parsed.VERBOSE_MODE ?? 'off';

  return {
    config: {
      nodeEnv: parsed.NODE_ENV ?? 'development',
      port: parsed.DAVGATE_PORT ?? DEFAULTS.PORT,
      host: parsed.DAVGATE_HOST ?? DEFAULTS.HOST,
      realm: parsed.DAVGATE_REALM ?? DEFAULTS.REALM,
      dataDir: parsed.DAVGATE_DATA_DIR ?? DEFAULTS.DATA_DIR,
      configDir: parsed.DAVGATE_CONFIG_DIR ?? DEFAULTS.CONFIG_DIR,
      quota: parsed.DAVGATE_QUOTA ?? '',
      shutdownTimeoutMs: parsed.SHUTDOWN_TIMEOUT_MS ?? DEFAULTS.SHUTDOWN_TIMEOUT_MS,
      verboseMode,
      // LOG_LEVEL follows VERBOSE_MODE unless set explicitly
      logLevel: parsed.LOG_LEVEL ?? (verboseMode === 'debug' ? 'debug' : 'info'),
    },
    errors,
  };
}

const { config: envConfig, errors: envErrors } = parseEnv(process.env);

if (envErrors.length > 0) {
  console.error('Environment validation failed:');
  for (const error of envErrors) {
    console.error(`  ${error}`);
  }
  // Keep running on defaults in development
  if (process.env.NODE_ENV === 'production') {
    console.error('Exiting due to invalid environment configuration');
    process.exit(1);
  }
}

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const NODE_ENV = envConfig.nodeEnv;

export const DAVGATE_PORT = envConfig.port;
export const DAVGATE_HOST = envConfig.host;
export const DAVGATE_REALM = envConfig.realm;

export const DAVGATE_DATA_DIR = envConfig.dataDir;
export const DAVGATE_CONFIG_DIR = envConfig.configDir;
export const DAVGATE_QUOTA = envConfig.quota;

export const SHUTDOWN_TIMEOUT_MS = envConfig.shutdownTimeoutMs;

export const VERBOSE_MODE = envConfig.verboseMode;
export const LOG_LEVEL = envConfig.logLevel;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function isVerbose(): boolean {
  return VERBOSE_MODE !== 'off';
}

export function isDebugLevel(): boolean {
  return VERBOSE_MODE === 'debug' || LOG_LEVEL === 'debug';
}

export function isProduction(): boolean {
  return NODE_ENV === 'production';
}

/**
 * Log environment configuration
 */
export function logEnvConfig(): void {
  console.log('Environment Configuration:');
  console.log(`  NODE_ENV=${NODE_ENV}`);
  console.log(`  DAVGATE_PORT=${DAVGATE_PORT}`);
  console.log(`  DAVGATE_HOST=${DAVGATE_HOST || 'all interfaces'}`);
  console.log(`  DAVGATE_DATA_DIR=${DAVGATE_DATA_DIR}`);
  console.log(`  DAVGATE_CONFIG_DIR=${DAVGATE_CONFIG_DIR}`);
  console.log(`  DAVGATE_QUOTA=${DAVGATE_QUOTA || 'not set'}`);
  console.log(`  DAVGATE_REALM=${DAVGATE_REALM}`);
  console.log(`  SHUTDOWN_TIMEOUT_MS=${SHUTDOWN_TIMEOUT_MS}`);
  console.log(`  VERBOSE_MODE=${VERBOSE_MODE}`);
  console.log(`  LOG_LEVEL=${LOG_LEVEL}`);
}

export const config = {
  NODE_ENV,
  isProduction: isProduction(),
  DAVGATE_PORT,
  DAVGATE_HOST,
  DAVGATE_REALM,
  DAVGATE_DATA_DIR,
  DAVGATE_CONFIG_DIR,
  DAVGATE_QUOTA,
  SHUTDOWN_TIMEOUT_MS,
  VERBOSE_MODE,
  LOG_LEVEL,
} as const;
