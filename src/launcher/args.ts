/**
 * Flag mapping and launch plan construction.
 *
 * Flags are emitted in a fixed order so identical configs produce
 * byte-identical argument lists.
 */

import type {
  ConfigSource,
  LaunchCommand,
  LaunchConfig,
  LaunchPlan,
  RequiredConfigField,
} from './types';

export const DEFAULT_COMMAND: Readonly<LaunchCommand> = Object.freeze({
  executable: 'uv',
  prefixArgs: ['run', 'python', 'miner.py'],
});

export const DEFAULT_PYTHONPATH = './';

export const DEBUG_FLAG = '--logging.debug';

/** Value flags in emission order. `--logging.debug` sits after `--subtensor.network`. */
export const FLAG_MAP: ReadonlyArray<readonly [flag: string, field: RequiredConfigField]> = [
  ['--netuid', 'netuid'],
  ['--hf_repo_id', 'hfRepoId'],
  ['--wallet.name', 'walletName'],
  ['--wallet.hotkey', 'walletHotkey'],
  ['--subtensor.network', 'subtensorNetwork'],
  ['--eval-data-dir', 'evalDataDir'],
  ['--submission-dir', 'submissionDir'],
];

export const OPTIONAL_FLAGS = {
  evalFile: '--eval-file',
  submissionSize: '--submission-size',
  runAt: '--run-at',
} as const;

export function buildArgs(config: LaunchConfig): string[] {
  const args: string[] = [];

  for (const [flag, field] of FLAG_MAP) {
    args.push(flag, config[field]);
    if (field === 'subtensorNetwork' && config.debug) {
      args.push(DEBUG_FLAG);
    }
  }

  if (config.evalFile !== undefined) {
    args.push(OPTIONAL_FLAGS.evalFile, config.evalFile);
  }
  if (config.submissionSize !== undefined) {
    args.push(OPTIONAL_FLAGS.submissionSize, String(config.submissionSize));
  }
  if (config.runAt !== undefined) {
    args.push(OPTIONAL_FLAGS.runAt, config.runAt);
  }

  return args;
}

export function buildLaunchPlan(
  config: LaunchConfig,
  command: LaunchCommand = DEFAULT_COMMAND,
  baseEnv: ConfigSource = process.env
): LaunchPlan {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(baseEnv)) {
    if (value !== undefined) env[key] = value;
  }
  // Settings may override PYTHONPATH; the inherited environment may not.
  env.PYTHONPATH = DEFAULT_PYTHONPATH;
  Object.assign(env, command.env);

  return Object.freeze({
    command: command.executable,
    args: Object.freeze([...command.prefixArgs, ...buildArgs(config)]),
    ...(command.cwd !== undefined ? { cwd: command.cwd } : {}),
    env: Object.freeze(env),
  });
}

/** Render a plan as a copy-pasteable shell command line. */
export function formatCommandLine(plan: Pick<LaunchPlan, 'command' | 'args' | 'cwd'>): string {
  const line = [plan.command, ...plan.args].map(shellQuote).join(' ');
  return plan.cwd !== undefined ? `cd ${shellQuote(plan.cwd)} && ${line}` : line;
}

export function shellQuote(arg: string): string {
  if (arg !== '' && /^[A-Za-z0-9_./:=@%+,-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}
