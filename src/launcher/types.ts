/**
 * Miner Launcher - Type Definitions
 */

// =============================================================================
// CONFIGURATION
// =============================================================================

/** Raw key/value source, e.g. `process.env` merged with an env file. */
export type ConfigSource = Readonly<Record<string, string | undefined>>;

export type RequiredConfigKey =
  | 'NETUID'
  | 'HF_REPO_ID'
  | 'WALLET_NAME'
  | 'WALLET_HOTKEY'
  | 'SUBTENSOR_NETWORK'
  | 'EVAL_DATA_DIR'
  | 'SUBMISSION_DIR';

export type OptionalConfigKey = 'EVAL_FILE' | 'SUBMISSION_SIZE' | 'RUN_AT' | 'LOGGING_DEBUG';

export interface LaunchConfig {
  readonly netuid: string;
  readonly hfRepoId: string;
  readonly walletName: string;
  readonly walletHotkey: string;
  readonly subtensorNetwork: string;
  readonly evalDataDir: string;
  readonly submissionDir: string;
  /** Adds `--logging.debug` when true */
  readonly debug: boolean;
  readonly evalFile?: string;
  readonly submissionSize?: number;
  /** Daily run time, HH:MM or HH:MM:SS */
  readonly runAt?: string;
}

export type RequiredConfigField = Exclude<
  keyof LaunchConfig,
  'debug' | 'evalFile' | 'submissionSize' | 'runAt'
>;

// =============================================================================
// COMMAND & PLAN
// =============================================================================

export interface LaunchCommand {
  executable: string;
  /** Arguments placed before the generated flags */
  prefixArgs: string[];
  cwd?: string;
  env?: Record<string, string>;
}

export interface LaunchPlan {
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd?: string;
  readonly env: Readonly<Record<string, string>>;
}

// =============================================================================
// PROCESS RUNNER
// =============================================================================

export type ExitCode = number;

export interface ProcessRunner {
  /** Spawns the plan and resolves with the child's exit code. */
  run(plan: LaunchPlan): Promise<ExitCode>;
}

export interface ProcessRunnerOptions {
  /** Forward SIGINT/SIGTERM received by the launcher to the child. Default true. */
  forwardSignals?: boolean;
  /** Inherit the launcher's stdio. Default true; false discards child output. */
  inheritStdio?: boolean;
  /**
   * Terminal session: the child already gets Ctrl-C from the foreground
   * process group, so SIGINT is not forwarded. Default `process.stdin.isTTY`.
   */
  interactive?: boolean;
}

export interface LaunchOptions {
  command?: LaunchCommand;
  runner?: ProcessRunner;
  /** Environment the child starts from. Defaults to `process.env`. */
  baseEnv?: ConfigSource;
}
