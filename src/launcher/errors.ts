/**
 * Launch Errors
 *
 * Two fatal kinds: ConfigurationError (nothing is spawned) and SpawnError
 * (the executable could not be started). formatLaunchError() renders either
 * with a hint for the user.
 */

// =============================================================================
// ERROR TYPES
// =============================================================================

export class LaunchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigurationError extends LaunchError {
  /** Required keys that were missing or empty, in canonical order */
  readonly missingKeys: readonly string[];
  /** Key whose value was present but invalid */
  readonly key?: string;

  constructor(
    message: string,
    details: { missingKeys?: readonly string[]; key?: string } = {},
    options?: ErrorOptions
  ) {
    super(message, options);
    this.missingKeys = details.missingKeys ?? [];
    this.key = details.key;
  }

  static missing(keys: readonly string[]): ConfigurationError {
    const noun = keys.length === 1 ? 'key' : 'keys';
    return new ConfigurationError(
      `Missing required configuration ${noun}: ${keys.join(', ')}`,
      { missingKeys: keys }
    );
  }

  static invalid(key: string, reason: string): ConfigurationError {
    return new ConfigurationError(`Invalid value for ${key}: ${reason}`, { key });
  }
}

export class SpawnError extends LaunchError {
  readonly command: string;
  /** errno code from the spawn failure, e.g. ENOENT */
  readonly code: string;
  /** Set when the working directory, not the executable, was the problem */
  readonly cwd?: string;

  constructor(command: string, code: string, options: ErrorOptions & { cwd?: string } = {}) {
    super(
      options.cwd !== undefined
        ? `Failed to start ${command}: working directory ${options.cwd} does not exist (${code})`
        : `Failed to start ${command}: ${code}`,
      options
    );
    this.command = command;
    this.code = code;
    this.cwd = options.cwd;
  }
}

// =============================================================================
// EXIT CODES
// =============================================================================

/** sysexits EX_CONFIG */
export const EXIT_CONFIG_ERROR = 78;
export const EXIT_COMMAND_NOT_FOUND = 127;
export const EXIT_NOT_EXECUTABLE = 126;

export function exitCodeForError(error: unknown): number {
  if (error instanceof ConfigurationError) return EXIT_CONFIG_ERROR;
  if (error instanceof SpawnError) {
    return error.code === 'ENOENT' ? EXIT_COMMAND_NOT_FOUND : EXIT_NOT_EXECUTABLE;
  }
  return 1;
}

// =============================================================================
// FORMATTING
// =============================================================================

const ERROR_HINTS: Array<{ pattern: RegExp; hint: string }> = [
  { pattern: /env file not found/i, hint: 'Pass --env-file <path> or set ENV_FILE to an existing file.' },
  { pattern: /NETUID|HF_REPO_ID|WALLET_NAME|WALLET_HOTKEY|SUBTENSOR_NETWORK|EVAL_DATA_DIR|SUBMISSION_DIR/, hint: 'Add the missing keys to your env file, e.g. NETUID=96' },
  { pattern: /RUN_AT/, hint: 'Use a 24h time such as RUN_AT=14:30 or RUN_AT=14:30:00.' },
  { pattern: /SUBMISSION_SIZE/, hint: 'SUBMISSION_SIZE must be a whole number greater than zero.' },
  { pattern: /LOGGING_DEBUG/, hint: 'Use LOGGING_DEBUG=true or LOGGING_DEBUG=false.' },
  { pattern: /settings file/i, hint: 'Check the JSON5 syntax of the settings file passed with --config.' },
  { pattern: /working directory/, hint: 'Create the directory or fix command.cwd in the settings file.' },
  { pattern: /ENOENT/, hint: 'The executable was not found on PATH. Install uv (https://docs.astral.sh/uv/) or set command.executable in the settings file.' },
  { pattern: /EACCES|EPERM/, hint: 'The executable is not runnable. Check its permissions.' },
];

export function formatLaunchError(error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  const headline = error instanceof ConfigurationError
    ? 'Configuration error'
    : error instanceof SpawnError
      ? 'Launch failed'
      : 'Unexpected error';

  const lines = [headline, '', `Error: ${message}`];

  const hint = getHint(message);
  if (hint) {
    lines.push('');
    lines.push(`Tip: ${hint}`);
  }

  return lines.join('\n');
}

function getHint(message: string): string | null {
  for (const { pattern, hint } of ERROR_HINTS) {
    if (pattern.test(message)) return hint;
  }
  return null;
}
