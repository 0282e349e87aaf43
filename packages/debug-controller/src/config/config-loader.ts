import { homedir } from 'os';
import { join, resolve } from 'path';
import { readFileSync, existsSync } from 'fs';
import { deepmergeCustom } from 'deepmerge-ts';
import { type ControllerConfig, ControllerConfigSchema } from '@stepwise/schemas';

export interface ResolveConfigOptions {
  /** Defaults to .stepwise.json in the working directory */
  projectConfigPath?: string;
  env?: NodeJS.ProcessEnv;
}

export interface ResolvedControllerConfig {
  config: ControllerConfig;
  sources: string[];
  paths: { userConfigPath: string; projectConfigPath: string };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a JSON object file if it exists.
 * @throws \{SyntaxError\} When the file is not valid JSON
 */
function readJsonIfExists(path: string): Record<string, unknown> | undefined {
  if (!existsSync(path)) return undefined;
  const parsed: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  if (!isRecord(parsed)) {
    throw new TypeError(`Configuration in ${path} must be a JSON object`);
  }
  return parsed;
}

/**
 * User-level configuration directory: STEPWISE_HOME, otherwise ~/.stepwise
 */
export function getUserDir(env: NodeJS.ProcessEnv = process.env): string {
  const override = env.STEPWISE_HOME;
  if (override && override.trim()) return override;
  return join(homedir(), '.stepwise');
}

export function getUserConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(getUserDir(env), 'config.json');
}

export function getDefaultProjectConfigPath(cwd = process.cwd()): string {
  return resolve(cwd, '.stepwise.json');
}

function envOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const overrides: Record<string, unknown> = {};
  if (env.STEPWISE_DEBUGGER_HOST) overrides.debuggerHost = env.STEPWISE_DEBUGGER_HOST;
  if (env.STEPWISE_DEBUGGER_PORT) overrides.debuggerPort = env.STEPWISE_DEBUGGER_PORT;
  return overrides;
}

/**
 * Loads the controller configuration.
 *
 * Merge precedence (last wins): schema defaults, the user config, the
 * project config, then STEPWISE_DEBUGGER_HOST / STEPWISE_DEBUGGER_PORT.
 * Arrays are replaced, objects merged per key.
 * @throws \{ZodError\} When the merged configuration fails validation
 * @example
 * ```typescript
 * const { config, sources } = resolveControllerConfig();
 * logger.info('Loaded configuration', { sources, port: config.debuggerPort });
 * ```
 */
export function resolveControllerConfig(
  options: ResolveConfigOptions = {},
): ResolvedControllerConfig {
  const env = options.env ?? process.env;
  const userConfigPath = getUserConfigPath(env);
  const projectConfigPath = options.projectConfigPath ?? getDefaultProjectConfigPath();

  const user = readJsonIfExists(userConfigPath);
  const project = readJsonIfExists(projectConfigPath);

  const merge = deepmergeCustom<Record<string, unknown>>({
    mergeArrays: (values) => values[values.length - 1],
  });
  const merged = merge(user ?? {}, project ?? {}, envOverrides(env));

  const sources: string[] = [];
  if (user !== undefined) sources.push(userConfigPath);
  if (project !== undefined) sources.push(projectConfigPath);

  return {
    config: ControllerConfigSchema.parse(merged),
    sources,
    paths: { userConfigPath, projectConfigPath },
  };
}
