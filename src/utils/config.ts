/**
 * Configuration loading
 *
 * - Env file (dotenv format) layered under the process environment
 * - Optional JSON5 settings file describing the command to run
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import JSON5 from 'json5';
import { parse as parseDotenv } from 'dotenv';
import { ConfigurationError } from '../launcher/errors';
import { DEFAULT_COMMAND } from '../launcher/args';
import type { ConfigSource, LaunchCommand } from '../launcher/types';

export const DEFAULT_ENV_FILE = '.env';
export const DEFAULT_SETTINGS_FILE = 'miner-launcher.json';

export interface LoadedConfigSource {
  source: ConfigSource;
  /** Absolute path of the env file that was read, or null if none */
  envFile: string | null;
}

export interface LauncherSettings {
  command: LaunchCommand;
  /** Absolute path of the settings file that was read, or null if defaults were used */
  settingsFile: string | null;
}

export interface LoadOptions {
  /** Overrides ENV_FILE */
  envFile?: string;
  /** Settings file path; defaults to ./miner-launcher.json when present */
  configPath?: string;
  env?: ConfigSource;
  cwd?: string;
}

/**
 * Read the env file and merge it under `env`. Values already set in the
 * environment win, matching dotenv's no-override behavior.
 */
export function loadConfigSource(options: LoadOptions = {}): LoadedConfigSource {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const requested = options.envFile ?? env.ENV_FILE;
  const envFile = resolve(cwd, requested || DEFAULT_ENV_FILE);

  if (!existsSync(envFile)) {
    if (requested) {
      throw new ConfigurationError(`Env file not found: ${envFile}`, { key: 'ENV_FILE' });
    }
    return { source: definedOnly(env), envFile: null };
  }

  let fileValues: Record<string, string>;
  try {
    fileValues = parseDotenv(readFileSync(envFile));
  } catch (err) {
    throw new ConfigurationError(
      `Failed to read env file ${envFile}: ${err instanceof Error ? err.message : String(err)}`,
      { key: 'ENV_FILE' },
      { cause: err }
    );
  }

  return {
    source: Object.freeze({ ...fileValues, ...definedOnly(env) }),
    envFile,
  };
}

/**
 * Load the launcher settings file. Missing default file → defaults;
 * missing explicit file or bad JSON5 → ConfigurationError.
 */
export function loadLauncherSettings(options: LoadOptions = {}): LauncherSettings {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const settingsFile = resolve(cwd, options.configPath || DEFAULT_SETTINGS_FILE);

  if (!existsSync(settingsFile)) {
    if (options.configPath) {
      throw new ConfigurationError(`Settings file not found: ${settingsFile}`);
    }
    return { command: { ...DEFAULT_COMMAND, prefixArgs: [...DEFAULT_COMMAND.prefixArgs] }, settingsFile: null };
  }

  let raw: unknown;
  try {
    raw = JSON5.parse(readFileSync(settingsFile, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(
      `Failed to parse settings file ${settingsFile}: ${err instanceof Error ? err.message : String(err)}`,
      {},
      { cause: err }
    );
  }

  const overrides = parseCommandSettings(substituteEnvVars(raw, env), settingsFile);
  const command: LaunchCommand = {
    executable: overrides.executable ?? DEFAULT_COMMAND.executable,
    prefixArgs: overrides.prefixArgs ?? [...DEFAULT_COMMAND.prefixArgs],
    ...(overrides.cwd !== undefined ? { cwd: resolve(cwd, overrides.cwd) } : {}),
    ...(overrides.env !== undefined ? { env: overrides.env } : {}),
  };

  return { command, settingsFile };
}

/**
 * Substitute environment variables in config values
 * Supports ${VAR_NAME} syntax
 */
export function substituteEnvVars(obj: unknown, env: ConfigSource): unknown {
  if (typeof obj === 'string') {
    return obj.replace(/\$\{([A-Z_][A-Z0-9_]*)\}/g, (_, varName: string) => {
      return env[varName] || '';
    });
  }
  if (Array.isArray(obj)) {
    return obj.map((item) => substituteEnvVars(item, env));
  }
  if (isRecord(obj)) {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(obj)) {
      result[key] = substituteEnvVars(value, env);
    }
    return result;
  }
  return obj;
}

function parseCommandSettings(raw: unknown, file: string): Partial<LaunchCommand> {
  const invalid = (field: string, expected: string) =>
    new ConfigurationError(`Invalid settings file ${file}: ${field} must be ${expected}`);

  if (!isRecord(raw)) throw invalid('root', 'an object');
  if (raw.command === undefined) return {};
  if (!isRecord(raw.command)) throw invalid('command', 'an object');

  const { executable, prefixArgs, cwd, env } = raw.command;
  const result: Partial<LaunchCommand> = {};

  if (executable !== undefined) {
    if (typeof executable !== 'string' || !executable.trim()) throw invalid('command.executable', 'a non-empty string');
    result.executable = executable;
  }
  if (prefixArgs !== undefined) {
    if (!Array.isArray(prefixArgs) || !prefixArgs.every((a): a is string => typeof a === 'string')) {
      throw invalid('command.prefixArgs', 'an array of strings');
    }
    result.prefixArgs = [...prefixArgs];
  }
  if (cwd !== undefined) {
    if (typeof cwd !== 'string') throw invalid('command.cwd', 'a string');
    result.cwd = cwd;
  }
  if (env !== undefined) {
    if (!isRecord(env)) throw invalid('command.env', 'an object of strings');
    const vars: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
      if (typeof value !== 'string') throw invalid(`command.env.${key}`, 'a string');
      vars[key] = value;
    }
    result.env = vars;
  }

  return result;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function definedOnly(env: ConfigSource): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}
