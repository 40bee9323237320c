/**
 * Tests for the environment configuration module.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { parseEnv } from '../../src/config/env.js';

describe('parseEnv', () => {
  it('should apply defaults for an empty environment', () => {
    const { config, errors } = parseEnv({});

    assert.deepStrictEqual(errors, []);
    assert.deepStrictEqual(config, {
      nodeEnv: 'development',
      port: 8080,
      host: '',
      realm: 'DavGate Storage',
      dataDir: 'data',
      configDir: '.',
      quota: '',
      shutdownTimeoutMs: 5000,
      verboseMode: 'off',
      logLevel: 'info',
    });
  });

  it('should read DAVGATE_ variables', () => {
    const { config, errors } = parseEnv({
      DAVGATE_PORT: '9090',
      DAVGATE_HOST: '127.0.0.1',
      DAVGATE_DATA_DIR: '/srv/share',
      DAVGATE_CONFIG_DIR: '/etc/davgate',
      DAVGATE_QUOTA: '2G',
      DAVGATE_REALM: 'Team Share',
    });

    assert.deepStrictEqual(errors, []);
    assert.strictEqual(config.port, 9090);
    assert.strictEqual(config.host, '127.0.0.1');
    assert.strictEqual(config.dataDir, '/srv/share');
    assert.strictEqual(config.configDir, '/etc/davgate');
    assert.strictEqual(config.quota, '2G');
    assert.strictEqual(config.realm, 'Team Share');
  });

  it('should report a non-numeric port and fall back to defaults', () => {
    const { config, errors } = parseEnv({ DAVGATE_PORT: 'eighty', DAVGATE_HOST: '10.0.0.1' });

    assert.deepStrictEqual(errors, ['DAVGATE_PORT: Must be a port between 0 and 65535']);
    assert.strictEqual(config.port, 8080);
    assert.strictEqual(config.host, '');
  });

  it('should report a port out of range', () => {
    const { errors } = parseEnv({ DAVGATE_PORT: '70000' });

    assert.deepStrictEqual(errors, ['DAVGATE_PORT: Must be a port between 0 and 65535']);
  });

  it('should report an invalid quota size', () => {
    const { config, errors } = parseEnv({ DAVGATE_QUOTA: '12X' });

    assert.deepStrictEqual(errors, ['DAVGATE_QUOTA: Must be a byte count or a size such as 512M or 2G']);
    assert.strictEqual(config.quota, '');
  });

  it('should derive debug log level from VERBOSE_MODE=debug', () => {
    const { config } = parseEnv({ VERBOSE_MODE: 'debug' });

    assert.strictEqual(config.verboseMode, 'debug');
    assert.strictEqual(config.logLevel, 'debug');
  });

  it('should prefer an explicit LOG_LEVEL over VERBOSE_MODE', () => {
    const { config } = parseEnv({ VERBOSE_MODE: 'debug', LOG_LEVEL: 'warn' });

    assert.strictEqual(config.logLevel, 'warn');
  });

  it('should report a non-integer shutdown timeout', () => {
    const { errors } = parseEnv({ SHUTDOWN_TIMEOUT_MS: '1.5' });

    assert.deepStrictEqual(errors, ['SHUTDOWN_TIMEOUT_MS: Must be a valid integer']);
  });

  it('should reject an unknown LOG_LEVEL', () => {
    const { errors } = parseEnv({ LOG_LEVEL: 'chatty' });

    assert.strictEqual(errors.length, 1);
    assert.ok(errors[0].startsWith('LOG_LEVEL: '));
  });
});
