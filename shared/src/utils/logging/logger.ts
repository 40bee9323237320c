import { logCapture } from './logCapture.js';
import { ALogger } from './ALogger.js';
import { isDebugLevel } from '../../config/env.js';
import type { LogContext } from './ALogger.js';
import type { LogLevel } from './ALogCapture.js';

export type { LogContext } from './ALogger.js';

const ORDERED_FIELDS = ['component', 'username'];

class Logger extends ALogger {
  private formatMessage(level: LogLevel, message: string, context?: LogContext): string {
    const timestamp = new Date().toISOString();
    const levelStr = level.toUpperCase().padEnd(5);

    let contextStr = '';
    if (context) {
      const parts: string[] = [];
      if (context.component) parts.push(`component=${context.component}`);
      if (context.username) parts.push(`user=${context.username}`);

      Object.keys(context).forEach(key => {
        if (!ORDERED_FIELDS.includes(key) && context[key] !== undefined) {
          parts.push(`${key}=${String(context[key])}`);
        }
      });

      if (parts.length > 0) {
        contextStr = ` [${parts.join(', ')}]`;
      }
    }

    return `${timestamp} ${levelStr}${contextStr} ${message}`;
  }

  debug(message: string, context?: LogContext): void {
    logCapture.capture('debug', message, context);
    if (isDebugLevel()) {
      console.log(this.formatMessage('debug', message, context));
    }
  }

  info(message: string, context?: LogContext): void {
    logCapture.capture('info', message, context);
    console.log(this.formatMessage('info', message, context));
  }

  warn(message: string, context?: LogContext): void {
    logCapture.capture('warn', message, context);
    console.warn(this.formatMessage('warn', message, context));
  }

  error(message: string, error?: Error | unknown, context?: LogContext): void {
    logCapture.capture('error', message, context, error);
    console.error(this.formatMessage('error', message, context));
    if (error) {
      if (error instanceof Error) {
        console.error(`  Error: ${error.message}`);
        if (error.stack && isDebugLevel()) {
          console.error(`  Stack: ${error.stack}`);
        }
      } else {
        console.error(`  Details: ${String(error)}`);
      }
    }
  }
}

export const logger = new Logger();
