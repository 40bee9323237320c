/**
 * Base abstract class for all services.
 *
 * Services expose an `order` and a pair of lifecycle hooks. Startup code calls
 * `initialize()` in ascending `order` and `dispose()` in reverse.
 *
 * @example
 * ```typescript
 * export abstract class ACredentialStore extends AService {
 *   override readonly order = 10;
 *
 *   abstract authenticate(username: string, password: string): Promise<boolean>;
 * }
 *
 * class CredentialStore extends ACredentialStore {
 *   override async initialize(): Promise<void> {
 *     await this.load();
 *   }
 * }
 * ```
 */
export abstract class AService {
  /**
   * Initialization order. Lower numbers initialize first.
   * - -100: ALogger
   * - -90: ALogCapture
   * - 0: default
   * - 10: ACredentialStore
   */
  readonly order: number = 0;

  /**
   * Override this to perform async initialization (load files, open handles).
   */
  async initialize(): Promise<void> {
    // Default: no-op
  }

  /**
   * Override this for cleanup (release handles, clear caches).
   */
  async dispose(): Promise<void> {
    // Default: no-op
  }
}
