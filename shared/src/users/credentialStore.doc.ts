/**
 * Credential Store Documentation Interface
 *
 * This file contains the fully-documented interface for the Credential Store.
 * Implementation classes should implement this interface to inherit documentation.
 *
 * @see ACredentialStore for the abstract base class
 * @see CredentialStore for the file-backed implementation
 */

/**
 * Interface for Credential Store with full documentation.
 *
 * Holds username → bcrypt hash records in memory and mirrors them to one JSON
 * file. The file is read on `load()` and written on `save()`; nothing else
 * touches it.
 *
 * ## File Format
 *
 * ```json
 * {
 *   "alice": {
 *     "username": "alice",
 *     "password_hash": "$2b$10$..."
 *   }
 * }
 * ```
 *
 * ## Concurrency
 *
 * A single reader/writer lock guards the map:
 * - `authenticate`, `list` and `has` share the read lock
 * - `add` and `delete` take the write lock
 * - `save` holds the read lock while serializing and writes the file after
 *   releasing it
 *
 * `save` is not serialized against other `save` calls, in this process or in
 * another one; concurrent writers can interleave on the file.
 *
 * ## Usage
 *
 * ```typescript
 * const store = new CredentialStore('./users.json');
 * await store.load();
 *
 * await store.add('alice', 'test-secret');
 * await store.save();
 *
 * await store.authenticate('alice', 'test-secret'); // true
 * ```
 */
export interface ICredentialStoreDocumentation {
  /**
   * Number of users currently held in memory.
   */
  readonly size: number;

  /**
   * Add a user with a freshly hashed password. Does not persist.
   *
   * @throws ValidationError if the password is longer than 72 bytes in UTF-8
   * @throws UserExistsError if the username is already present
   * @throws Error if hashing fails; the store is left unchanged
   */
  add(username: string, password: string): Promise<void>;

  /**
   * Remove a user. Removing an unknown username is a no-op.
   */
  delete(username: string): Promise<void>;

  /**
   * Check a username/password pair.
   *
   * Resolves false for an unknown user, a wrong password, a password over the
   * 72-byte limit or a stored hash that cannot be compared. The result never says which of those happened.
   */
  authenticate(username: string, password: string): Promise<boolean>;

  /**
   * All usernames, in no particular order.
   */
  list(): Promise<string[]>;

  /**
   * Whether a username is present.
   */
  has(username: string): Promise<boolean>;

  /**
   * Replace the in-memory map with the file's contents. A missing file leaves
   * the store empty.
   *
   * @throws CredentialStoreError when the file is not valid JSON or not a
   *   credential map
   */
  load(): Promise<void>;

  /**
   * Write the whole map to the file, pretty-printed, creating the parent
   * directory when needed.
   */
  save(): Promise<void>;
}
