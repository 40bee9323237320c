/**
 * Logging utilities
 * @module utils/logging
 */

export { ALogger, type LogContext } from './ALogger.js';
export {
  ALogCapture,
  type CapturedLog,
  type LogFilter,
  type LogLevel,
} from './ALogCapture.js';

export { logger } from './logger.js';
export { logCapture } from './logCapture.js';
