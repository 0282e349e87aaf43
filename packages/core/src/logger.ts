import { appendFileSync, mkdirSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { Logger } from 'pino';
import { rootLogger } from './logging/pino-setup.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

export type LogLevel = 'error' | 'warn' | 'info' | 'debug' | 'trace';

const LEVELS: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LEVELS;
}

/**
 * Reads the current log level from STEPWISE_LOG_LEVEL.
 * Defaults to 'info' if not set or invalid.
 * @internal
 */
function currentLevel(): LogLevel {
  const env = (process.env.STEPWISE_LOG_LEVEL || '').toLowerCase();
  return isLogLevel(env) ? env : 'info';
}

function enabled(min: LogLevel): boolean {
  return LEVELS[currentLevel()] >= LEVELS[min];
}

/**
 * Directory holding the JSON Lines event logs.
 * @internal
 */
export function logDir(): string {
  const override = process.env.STEPWISE_LOG_DIR;
  if (override && override.trim()) return resolve(override);
  return resolve(__dirname, '../.logs');
}

/**
 * Gets or generates a stable per-process run identifier for log correlation.
 * @internal
 */
function runId(): string {
  if (!process.env.STEPWISE_RUN_ID) {
    process.env.STEPWISE_RUN_ID = `${Date.now()}-${process.pid}`;
  }
  return process.env.STEPWISE_RUN_ID;
}

/**
 * Path of the JSON Lines log file for the current run.
 * @public
 */
export function logFile(): string {
  return resolve(logDir(), `run-${runId()}.jsonl`);
}

/**
 * Writes a structured log event to the JSON Lines log file.
 *
 * Respects both the STEPWISE_LOG enable flag and the STEPWISE_LOG_LEVEL
 * threshold. Error-level events are always written.
 * @param level - Log severity level
 * @param event - Event identifier for categorization
 * @param data - Optional structured data to include
 * @public
 */
export function logEvent(level: LogLevel, event: string, data?: unknown): void {
  const loggingEnabled =
    process.env.STEPWISE_LOG === '1' ||
    process.env.STEPWISE_LOG === 'true' ||
    level === 'error';
  if (!loggingEnabled) return;

  if (level !== 'error' && !enabled(level)) return;

  const entry = {
    ts: new Date().toISOString(),
    pid: process.pid,
    level,
    event,
    data,
  };
  try {
    mkdirSync(logDir(), { recursive: true });
    appendFileSync(logFile(), JSON.stringify(entry) + '\n', {
      encoding: 'utf8',
    });
  } catch {
    // Avoid throwing from logger
  }
}

/**
 * Logs an error event with the message, stack and code of the failure.
 * @param context - Label identifying where the error occurred
 * @param rawError - The error object or value that was thrown
 * @param extra - Additional structured context
 * @public
 */
export function logError(context: string, rawError: unknown, extra?: unknown): void {
  const details =
    rawError instanceof Error
      ? {
          message: rawError.message,
          stack: rawError.stack,
          code: 'code' in rawError ? rawError.code : undefined,
        }
      : { message: String(rawError) };
  logEvent('error', `error:${context}`, {
    ...details,
    extra,
    cwd: process.cwd(),
  });
}

/**
 * Logging seam used across the packages, so the controller can be handed
 * a host's logger without depending on pino.
 * @public
 */
export interface ILogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/**
 * Logger backed by a pino child of the root logger.
 * @public
 */
export class PinoLogger implements ILogger {
  public constructor(private readonly logger: Logger) {}

  public debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context ?? {}, message);
  }

  public info(message: string, context?: Record<string, unknown>): void {
    this.logger.info(context ?? {}, message);
  }

  public warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context ?? {}, message);
  }

  public error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const err = error instanceof Error ? error : error === undefined ? undefined : new Error(String(error));
    this.logger.error({ ...(context ?? {}), err }, message);
  }
}

/**
 * No-op logger implementation for testing or when logging is disabled.
 * @public
 */
export class NoOpLogger implements ILogger {
  public debug(): void {}
  public info(): void {}
  public warn(): void {}
  public error(): void {}
}

/**
 * Creates a logger whose records carry `scope` as a binding.
 * @param scope - The scope for the logger
 * @public
 */
export function createScopedLogger(scope: string): ILogger {
  return new PinoLogger(rootLogger.child({ scope }));
}
