/**
 * Abstract Logger Service
 *
 * Base class for structured logging. Initializes first so every other
 * service can log during its own initialization.
 *
 * @see Logger for the concrete implementation
 */
import { AService } from '../../services/abstracts/AService.js';

/**
 * Context metadata attached to log entries.
 */
export interface LogContext {
  /** Component name (e.g., 'BasicAuth', 'QuotaReporter', 'CredentialStore') */
  component?: string;
  /** Authenticated or attempted username */
  username?: string;
  /** Additional context fields */
  [key: string]: unknown;
}

export abstract class ALogger extends AService {
  override readonly order: number = -100;

  abstract debug(message: string, context?: LogContext): void;

  abstract info(message: string, context?: LogContext): void;

  abstract warn(message: string, context?: LogContext): void;

  abstract error(message: string, error?: Error | unknown, context?: LogContext): void;
}
