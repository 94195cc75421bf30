/**
 * LaunchConfig construction and validation.
 */

import { ConfigurationError } from './errors';
import type {
  ConfigSource,
  LaunchConfig,
  RequiredConfigField,
  RequiredConfigKey,
} from './types';

/** Canonical order; missing keys are reported in this order. */
export const REQUIRED_KEYS: ReadonlyArray<readonly [RequiredConfigKey, RequiredConfigField]> = [
  ['NETUID', 'netuid'],
  ['HF_REPO_ID', 'hfRepoId'],
  ['WALLET_NAME', 'walletName'],
  ['WALLET_HOTKEY', 'walletHotkey'],
  ['SUBTENSOR_NETWORK', 'subtensorNetwork'],
  ['EVAL_DATA_DIR', 'evalDataDir'],
  ['SUBMISSION_DIR', 'submissionDir'],
];

const TRUTHY = new Set(['true', '1', 'yes', 'on']);
const FALSY = new Set(['false', '0', 'no', 'off']);
const RUN_AT_PATTERN = /^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

function readValue(source: ConfigSource, key: string): string | undefined {
  const value = source[key]?.trim();
  return value ? value : undefined;
}

export function parseDebugFlag(raw: string | undefined): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) return true;
  if (TRUTHY.has(value)) return true;
  if (FALSY.has(value)) return false;
  throw ConfigurationError.invalid('LOGGING_DEBUG', `expected true or false, got "${raw}"`);
}

export function parseSubmissionSize(raw: string): number {
  if (!/^\d+$/.test(raw)) {
    throw ConfigurationError.invalid('SUBMISSION_SIZE', `expected a positive integer, got "${raw}"`);
  }
  const size = parseInt(raw, 10);
  if (size <= 0 || !Number.isSafeInteger(size)) {
    throw ConfigurationError.invalid('SUBMISSION_SIZE', `expected a positive integer, got "${raw}"`);
  }
  return size;
}

export function parseRunAt(raw: string): string {
  if (!RUN_AT_PATTERN.test(raw)) {
    throw ConfigurationError.invalid('RUN_AT', `expected HH:MM or HH:MM:SS, got "${raw}"`);
  }
  return raw;
}

/**
 * Build an immutable LaunchConfig from a key/value source.
 * Every missing or blank required key is reported in a single ConfigurationError.
 */
export function buildLaunchConfig(source: ConfigSource): LaunchConfig {
  const missing: RequiredConfigKey[] = [];
  const required: Partial<Record<RequiredConfigField, string>> = {};

  for (const [key, field] of REQUIRED_KEYS) {
    const value = readValue(source, key);
    if (value === undefined) {
      missing.push(key);
    } else {
      required[field] = value;
    }
  }

  if (missing.length > 0) {
    throw ConfigurationError.missing(missing);
  }

  const config: LaunchConfig = {
    netuid: requireField(required, 'netuid'),
    hfRepoId: requireField(required, 'hfRepoId'),
    walletName: requireField(required, 'walletName'),
    walletHotkey: requireField(required, 'walletHotkey'),
    subtensorNetwork: requireField(required, 'subtensorNetwork'),
    evalDataDir: requireField(required, 'evalDataDir'),
    submissionDir: requireField(required, 'submissionDir'),
    debug: parseDebugFlag(source.LOGGING_DEBUG),
  };

  const evalFile = readValue(source, 'EVAL_FILE');
  const submissionSize = readValue(source, 'SUBMISSION_SIZE');
  const runAt = readValue(source, 'RUN_AT');

  return Object.freeze({
    ...config,
    ...(evalFile !== undefined ? { evalFile } : {}),
    ...(submissionSize !== undefined ? { submissionSize: parseSubmissionSize(submissionSize) } : {}),
    ...(runAt !== undefined ? { runAt: parseRunAt(runAt) } : {}),
  });
}

function requireField(
  values: Partial<Record<RequiredConfigField, string>>,
  field: RequiredConfigField
): string {
  const value = values[field];
  if (value === undefined) {
    const entry = REQUIRED_KEYS.find(([, f]) => f === field);
    throw ConfigurationError.missing([entry ? entry[0] : field]);
  }
  return value;
}

/**
 * Re-check a LaunchConfig that may have been built by hand rather than
 * through buildLaunchConfig().
 */
export function assertLaunchConfig(config: LaunchConfig): void {
  const missing = REQUIRED_KEYS
    .filter(([, field]) => !config[field]?.trim())
    .map(([key]) => key);

  if (missing.length > 0) {
    throw ConfigurationError.missing(missing);
  }

  if (config.evalFile !== undefined && !config.evalFile.trim()) {
    throw ConfigurationError.invalid('EVAL_FILE', 'expected a non-empty file name');
  }

  if (config.submissionSize !== undefined && !(Number.isSafeInteger(config.submissionSize) && config.submissionSize > 0)) {
    throw ConfigurationError.invalid('SUBMISSION_SIZE', `expected a positive integer, got "${config.submissionSize}"`);
  }

  if (config.runAt !== undefined) {
    parseRunAt(config.runAt);
  }
}
