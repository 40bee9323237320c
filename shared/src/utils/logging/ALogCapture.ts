/**
 * Abstract Log Capture Service
 *
 * @see LogCapture for the concrete implementation
 */
import { AService } from '../../services/abstracts/AService.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface CapturedLog {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    message: string;
    stack?: string;
  };
}

export interface LogFilter {
  level?: LogLevel;
  component?: string;
}

/**
 * Initialize order is -90 so capture is ready before other services log.
 */
export abstract class ALogCapture extends AService {
  override readonly order: number = -90;

  abstract capture(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void;

  abstract getLogs(filter?: LogFilter): CapturedLog[];

  abstract clear(): void;
}
