export { ACredentialStore } from './ACredentialStore.js';
export { CredentialStore } from './credentialStore.js';
export { UserExistsError, CredentialStoreError, isUserExistsError } from './errors.js';
export {
  credentialFileSchema,
  storedUserRecordSchema,
  type StoredUser,
  type CredentialFile,
} from './types.js';
export type { ICredentialStoreDocumentation } from './credentialStore.doc.js';
