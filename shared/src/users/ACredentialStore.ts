import { AService } from '../services/abstracts/AService.js';
import type { ICredentialStoreDocumentation } from './credentialStore.doc.js';

export abstract class ACredentialStore extends AService implements ICredentialStoreDocumentation {
  override readonly order: number = 10;

  abstract readonly size: number;

  abstract add(username: string, password: string): Promise<void>;

  abstract delete(username: string): Promise<void>;

  abstract authenticate(username: string, password: string): Promise<boolean>;

  abstract list(): Promise<string[]>;

  abstract has(username: string): Promise<boolean>;

  abstract load(): Promise<void>;

  abstract save(): Promise<void>;
}
