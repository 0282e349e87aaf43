/**
 * Pino logger setup with automatic redaction of sensitive data
 *
 * Uses fast-redact for path-based redaction of sensitive fields.
 */

import pino from 'pino';

const LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

type RootLevel = (typeof LEVELS)[number];

function isRootLevel(value: string): value is RootLevel {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Resolves the initial root level from STEPWISE_LOG_LEVEL, `silent` otherwise.
 * @internal
 */
export function resolveRootLevel(env: NodeJS.ProcessEnv = process.env): RootLevel {
  const value = (env.STEPWISE_LOG_LEVEL ?? '').trim().toLowerCase();
  return isRootLevel(value) ? value : 'silent';
}

/**
 * Redaction paths applied to every record of the root logger.
 *
 * Secret-bearing keys are censored at the top level and one level deep.
 * @public
 */
export const REDACT_PATHS: readonly string[] = [
  'password',
  '*.password',
  'token',
  '*.token',
  'api_key',
  '*.api_key',
  'apikey',
  '*.apikey',
  'secret',
  '*.secret',
  '*.SECRET',
  'authorization',
  '*.authorization',

  // Well-known credential variables in a debuggee's environment
  'GITHUB_TOKEN',
  '*.GITHUB_TOKEN',
  'GITLAB_ACCESS_TOKEN',
  '*.GITLAB_ACCESS_TOKEN',
  'AWS_SECRET_KEY',
  '*.AWS_SECRET_KEY',
  'AWS_SECRET_ACCESS_KEY',
  '*.AWS_SECRET_ACCESS_KEY',
  'OPENAI_API_KEY',
  '*.OPENAI_API_KEY',
  'SLACK_TOKEN',
  '*.SLACK_TOKEN',
  'STRIPE_SECRET_KEY',
  '*.STRIPE_SECRET_KEY',
];

/**
 * Root logger instance with automatic redaction of sensitive data.
 *
 * By default, the log level is `silent` to avoid noise inside the hosting
 * editor. Set STEPWISE_LOG_LEVEL or update `rootLogger.level` to enable it.
 *
 * @example
 * ```typescript
 * import { rootLogger } from './pino-setup.js';
 *
 * rootLogger.level = 'info';
 * rootLogger.info({ password: 'secret' }); // Logs: { password: '[REDACTED]' }
 * ```
 *
 * @public
 */
const rootLogger = pino({
  name: 'stepwise',
  level: resolveRootLevel(),
  redact: {
    paths: [...REDACT_PATHS],
    censor: '[REDACTED]',
    remove: false,
  },
  serializers: {
    ...pino.stdSerializers,
    err: pino.stdSerializers.err,
  },
});

export { rootLogger };
