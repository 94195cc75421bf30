/**
 * Miner Launcher
 * Barrel exports for the launcher module.
 */

export type {
  ConfigSource,
  RequiredConfigKey,
  OptionalConfigKey,
  LaunchConfig,
  RequiredConfigField,
  LaunchCommand,
  LaunchPlan,
  ExitCode,
  ProcessRunner,
  ProcessRunnerOptions,
  LaunchOptions,
} from './types';

export {
  LaunchError,
  ConfigurationError,
  SpawnError,
  formatLaunchError,
  exitCodeForError,
  EXIT_CONFIG_ERROR,
  EXIT_COMMAND_NOT_FOUND,
  EXIT_NOT_EXECUTABLE,
} from './errors';

export {
  REQUIRED_KEYS,
  buildLaunchConfig,
  assertLaunchConfig,
  parseDebugFlag,
  parseRunAt,
  parseSubmissionSize,
} from './config';

export {
  DEFAULT_COMMAND,
  DEFAULT_PYTHONPATH,
  DEBUG_FLAG,
  FLAG_MAP,
  OPTIONAL_FLAGS,
  buildArgs,
  buildLaunchPlan,
  formatCommandLine,
  shellQuote,
} from './args';

export { createProcessRunner, exitCodeForSignal } from './process-runner';
export { launch, launchFromSource } from './launch';
