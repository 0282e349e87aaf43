/**
 * Logging infrastructure exports
 *
 * Provides structured logging with automatic redaction via pino + fast-redact
 */

export { rootLogger, resolveRootLevel, REDACT_PATHS } from './pino-setup.js';

export {
  logEvent,
  logError,
  logDir,
  logFile,
  PinoLogger,
  NoOpLogger,
  createScopedLogger,
} from '../logger.js';
export type { LogLevel, ILogger } from '../logger.js';
