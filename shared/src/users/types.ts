import { z } from 'zod';

/**
 * A user record as held in memory.
 */
export interface StoredUser {
  username: string;
  /** bcrypt hash string ($2a$/$2b$) */
  passwordHash: string;
}

/**
 * One record in the credential file.
 */
export const storedUserRecordSchema = z.object({
  username: z.string(),
  password_hash: z.string(),
});

/**
 * The credential file: a single object keyed by username.
 */
export const credentialFileSchema = z.record(z.string(), storedUserRecordSchema);

export type CredentialFile = z.infer<typeof credentialFileSchema>;
