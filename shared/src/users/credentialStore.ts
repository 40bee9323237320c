import * as fs from 'fs/promises';
import * as path from 'path';
import bcrypt from 'bcrypt';
import { ACredentialStore } from './ACredentialStore.js';
import { CredentialStoreError, UserExistsError } from './errors.js';
import { credentialFileSchema } from './types.js';
import { CREDENTIALS } from '../config/constants.js';
import { ReadWriteLock } from '../utils/concurrency/readWriteLock.js';
import { ValidationError, getErrorMessage, isNotFoundError } from '../utils/errorTypes.js';
import { logger } from '../utils/logging/logger.js';
import type { CredentialFile, StoredUser } from './types.js';

const COMPONENT = 'CredentialStore';

/**
 * File-backed credential store.
 *
 * @see ICredentialStoreDocumentation for the full contract
 */
export class CredentialStore extends ACredentialStore {
  private users = new Map<string, StoredUser>();
  private readonly lock = new ReadWriteLock();

  constructor(readonly filePath: string) {
    super();
  }

  get size(): number {
    return this.users.size;
  }

  override async initialize(): Promise<void> {
    await this.load();
  }

  async add(username: string, password: string): Promise<void> {
    if (Buffer.byteLength(password, 'utf8') > CREDENTIALS.MAX_PASSWORD_BYTES) {
      throw new ValidationError(
        `password must be at most ${CREDENTIALS.MAX_PASSWORD_BYTES} bytes`,
        'password'
      );
    }

    await this.lock.withWrite(async () => {
      if (this.users.has(username)) {
        throw new UserExistsError(username);
      }

      // Held across hashing so two adds of one name cannot both pass the check
      const passwordHash = await bcrypt.hash(password, CREDENTIALS.BCRYPT_COST);
      this.users.set(username, { username, passwordHash });
    });

    logger.debug('User added', { component: COMPONENT, username });
  }

  async delete(username: string): Promise<void> {
    await this.lock.withWrite(() => {
      this.users.delete(username);
    });
  }

  async authenticate(username: string, password: string): Promise<boolean> {
    return this.lock.withRead(async () => {
      const user = this.users.get(username);
      if (!user || Buffer.byteLength(password, 'utf8') > CREDENTIALS.MAX_PASSWORD_BYTES) {
        return false;
      }

      try {
        return await bcrypt.compare(password, user.passwordHash);
      } catch (error) {
        logger.warn('Stored password hash could not be compared', {
          component: COMPONENT,
          username,
          error: getErrorMessage(error),
        });
        return false;
      }
    });
  }

  async list(): Promise<string[]> {
    return this.lock.withRead(() => Array.from(this.users.keys()));
  }

  async has(username: string): Promise<boolean> {
    return this.lock.withRead(() => this.users.has(username));
  }

  async load(): Promise<void> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isNotFoundError(error)) {
        logger.debug('Credential file not found, starting empty', {
          component: COMPONENT,
          path: this.filePath,
        });
        await this.lock.withWrite(() => {
          this.users = new Map();
        });
        return;
      }
      throw error;
    }

    const users = this.parse(raw);

    await this.lock.withWrite(() => {
      this.users = users;
    });

    logger.debug('Credential file loaded', {
      component: COMPONENT,
      path: this.filePath,
      users: users.size,
    });
  }

  async save(): Promise<void> {
    const data = await this.lock.withRead(() => {
      const file: CredentialFile = {};
      for (const [username, user] of this.users) {
        file[username] = { username: user.username, password_hash: user.passwordHash };
      }
      return JSON.stringify(file, null, 2);
    });

    await fs.mkdir(path.dirname(this.filePath), { recursive: true, mode: CREDENTIALS.DIR_MODE });
    await fs.writeFile(this.filePath, data, { mode: CREDENTIALS.FILE_MODE });
  }

  private parse(raw: string): Map<string, StoredUser> {
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new CredentialStoreError(
        `Credential file is not valid JSON: ${getErrorMessage(error)}`,
        this.filePath
      );
    }

    const result = credentialFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.errors
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new CredentialStoreError(`Credential file is malformed: ${issues}`, this.filePath);
    }

    const users = new Map<string, StoredUser>();
    for (const [key, record] of Object.entries(result.data)) {
      // The key is authoritative
      users.set(key, { username: key, passwordHash: record.password_hash });
    }
    return users;
  }
}
