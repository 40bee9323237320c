import { ConflictError, StorageError } from '../utils/errorTypes.js';

export class UserExistsError extends ConflictError {
  constructor(public readonly username: string) {
    super(`user ${username} already exists`, 'user', { username });
  }
}

export function isUserExistsError(error: unknown): error is UserExistsError {
  return error instanceof UserExistsError;
}

/**
 * The credential file exists but cannot be used.
 */
export class CredentialStoreError extends StorageError {}
