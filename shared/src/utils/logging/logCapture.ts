/**
 * Keeps the most recent log entries in memory so callers can inspect what
 * was logged without reading the console.
 */
import { ALogCapture } from './ALogCapture.js';
import type { CapturedLog, LogFilter, LogLevel } from './ALogCapture.js';

export type { CapturedLog, LogFilter } from './ALogCapture.js';

const MAX_ENTRIES = 200;

class LogCapture extends ALogCapture {
  private entries: CapturedLog[] = [];

  capture(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    error?: unknown
  ): void {
    const entry: CapturedLog = { timestamp: new Date().toISOString(), level, message, context };
    if (error) {
      entry.error = error instanceof Error
        ? { message: error.message, stack: error.stack }
        : { message: String(error) };
    }

    this.entries.push(entry);
    if (this.entries.length > MAX_ENTRIES) {
      this.entries.shift();
    }
  }

  getLogs(filter: LogFilter = {}): CapturedLog[] {
    return this.entries.filter(entry =>
      (!filter.level || entry.level === filter.level) &&
      (!filter.component || entry.context?.component === filter.component)
    );
  }

  clear(): void {
    this.entries = [];
  }
}

export const logCapture = new LogCapture();
