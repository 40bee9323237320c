/**
 * Tests for domain-specific error classes.
 * Covers construction, static factory methods and serialization.
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import {
  ValidationError,
  ConflictError,
  StorageError,
  isDomainError,
  getErrorCode,
  getErrorMessage,
  isNotFoundError,
} from '../src/utils/errorTypes.js';
import { UserExistsError, CredentialStoreError, isUserExistsError } from '../src/users/errors.js';

describe('ValidationError', () => {
  it('should create error with message and field', () => {
    const error = new ValidationError('Invalid quota', 'quota');

    assert.strictEqual(error.message, 'Invalid quota');
    assert.strictEqual(error.field, 'quota');
    assert.strictEqual(error.type, 'VALIDATION_ERROR');
    assert.strictEqual(error.statusCode, 400);
    assert.strictEqual(error.name, 'ValidationError');
    assert.deepStrictEqual(error.context, { field: 'quota' });
  });

  it('should create required field error', () => {
    const error = ValidationError.required('username');

    assert.strictEqual(error.message, 'username is required');
    assert.strictEqual(error.field, 'username');
  });

  it('should create invalid format error with expected format', () => {
    const error = ValidationError.invalidFormat('quota', '512M or 2G');

    assert.strictEqual(error.message, 'Invalid quota format. Expected: 512M or 2G');
    assert.deepStrictEqual(error.context, { expectedFormat: '512M or 2G', field: 'quota' });
  });

  it('should serialize to JSON', () => {
    const error = new ValidationError('Bad value', 'port', { value: 'abc' });

    assert.deepStrictEqual(error.toJSON(), {
      type: 'VALIDATION_ERROR',
      message: 'Bad value',
      context: { value: 'abc', field: 'port' },
    });
  });
});

describe('ConflictError', () => {
  it('should carry the 409 status and resource', () => {
    const error = new ConflictError('Already there', 'user');

    assert.strictEqual(error.statusCode, 409);
    assert.deepStrictEqual(error.context, { resource: 'user' });
  });
});

describe('Credential store errors', () => {
  it('should make UserExistsError a ConflictError', () => {
    const error = new UserExistsError('alice');

    assert.ok(error instanceof ConflictError);
    assert.strictEqual(error.message, 'user alice already exists');
    assert.strictEqual(error.username, 'alice');
    assert.strictEqual(error.name, 'UserExistsError');
    assert.strictEqual(isUserExistsError(error), true);
  });

  it('should make CredentialStoreError a StorageError', () => {
    const error = new CredentialStoreError('corrupt', '/etc/users.json');

    assert.ok(error instanceof StorageError);
    assert.strictEqual(error.path, '/etc/users.json');
    assert.strictEqual(error.statusCode, 500);
    assert.strictEqual(error.name, 'CredentialStoreError');
  });
});

describe('isDomainError', () => {
  it('should match every domain error subclass', () => {
    assert.strictEqual(isDomainError(new ValidationError('x')), true);
    assert.strictEqual(isDomainError(new UserExistsError('alice')), true);
    assert.strictEqual(isDomainError(new CredentialStoreError('x')), true);
  });

  it('should not match plain errors or other values', () => {
    assert.strictEqual(isDomainError(new Error('x')), false);
    assert.strictEqual(isDomainError('x'), false);
  });
});

describe('Error helpers', () => {
  it('should read errno codes', () => {
    const error = Object.assign(new Error('missing'), { code: 'ENOENT' });

    assert.strictEqual(getErrorCode(error), 'ENOENT');
    assert.strictEqual(isNotFoundError(error), true);
  });

  it('should ignore values without a string code', () => {
    assert.strictEqual(getErrorCode(new Error('plain')), undefined);
    assert.strictEqual(getErrorCode(Object.assign(new Error('numeric'), { code: 42 })), undefined);
    assert.strictEqual(getErrorCode('ENOENT'), undefined);
  });

  it('should render messages from any thrown value', () => {
    assert.strictEqual(getErrorMessage(new Error('boom')), 'boom');
    assert.strictEqual(getErrorMessage('plain string'), 'plain string');
  });
});
