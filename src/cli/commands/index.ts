/**
 * CLI Commands - run, print, doctor
 */

import { Command } from 'commander';
import { buildLaunchPlan, formatCommandLine } from '../../launcher/args';
import { buildLaunchConfig } from '../../launcher/config';
import { exitCodeForError, formatLaunchError } from '../../launcher/errors';
import { launch } from '../../launcher/launch';
import type { ConfigSource, ExitCode, LaunchCommand, LaunchConfig, ProcessRunner } from '../../launcher/types';
import { loadConfigSource, loadLauncherSettings } from '../../utils/config';
import { logger } from '../../utils/logger';
import { formatDoctorResults, runDoctor } from './doctor';

export interface SourceOptions {
  envFile?: string;
  config?: string;
  /** Set by --debug / --no-debug; undefined leaves LOGGING_DEBUG in charge */
  debug?: boolean;
}

export interface ResolvedLaunch {
  source: ConfigSource;
  config: LaunchConfig;
  command: LaunchCommand;
}

/** Load env file + settings and build the LaunchConfig, applying CLI overrides. */
export function resolveLaunch(opts: SourceOptions, env: ConfigSource = process.env): ResolvedLaunch {
  const { source: loaded, envFile } = loadConfigSource({ envFile: opts.envFile, env });
  if (envFile) logger.debug(`[launcher] Loaded env file ${envFile}`);

  const source: ConfigSource = opts.debug === undefined
    ? loaded
    : Object.freeze({ ...loaded, LOGGING_DEBUG: String(opts.debug) });

  const config = buildLaunchConfig(source);
  const { command, settingsFile } = loadLauncherSettings({ configPath: opts.config, env: source });
  if (settingsFile) logger.debug(`[launcher] Loaded settings file ${settingsFile}`);

  return { source, config, command };
}

function withSourceOptions(cmd: Command): Command {
  return cmd
    .option('-e, --env-file <path>', 'env file to read (default: $ENV_FILE or .env)')
    .option('-c, --config <path>', 'JSON5 settings file (default: ./miner-launcher.json)')
    .option('--debug', 'pass --logging.debug to the miner')
    .option('--no-debug', 'omit --logging.debug');
}

/** Report a launch error to the user and return the matching exit code. */
function handleError(err: unknown): ExitCode {
  logger.error({ err }, '[launcher] Launch aborted');
  process.stderr.write(`${formatLaunchError(err)}\n`);
  return exitCodeForError(err);
}

export interface CommandDeps {
  env?: ConfigSource;
  runner?: ProcessRunner;
}

/** `run`: the miner's exit code, or 78/127/126 when the launcher itself fails. */
export async function runCommand(opts: SourceOptions, deps: CommandDeps = {}): Promise<ExitCode> {
  try {
    const { source, config, command } = resolveLaunch(opts, deps.env);
    return await launch(config, { command, baseEnv: source, runner: deps.runner });
  } catch (err) {
    return handleError(err);
  }
}

/** `print`: writes the command line to stdout; 0 or the configuration error's exit code. */
export function printCommand(opts: SourceOptions, deps: CommandDeps = {}): ExitCode {
  try {
    const { source, config, command } = resolveLaunch(opts, deps.env);
    console.log(formatCommandLine(buildLaunchPlan(config, command, source)));
    return 0;
  } catch (err) {
    return handleError(err);
  }
}

export function addAllCommands(program: Command): void {
  withSourceOptions(
    program
      .command('run', { isDefault: true })
      .description('Validate configuration and launch the miner')
  ).action(async (opts: SourceOptions) => {
    process.exitCode = await runCommand(opts);
  });

  withSourceOptions(
    program
      .command('print')
      .description('Print the miner command line without running it')
  ).action((opts: SourceOptions) => {
    process.exitCode = printCommand(opts);
  });

  program
    .command('doctor')
    .description('Check the environment before launching')
    .option('-e, --env-file <path>', 'env file to read (default: $ENV_FILE or .env)')
    .option('-c, --config <path>', 'JSON5 settings file (default: ./miner-launcher.json)')
    .action(async (opts: SourceOptions) => {
      const results = await runDoctor({ envFile: opts.envFile, configPath: opts.config });
      console.log(formatDoctorResults(results));
      if (results.some((r) => r.status === 'fail')) {
        process.exitCode = 1;
      }
    });
}
