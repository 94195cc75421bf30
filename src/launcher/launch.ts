/**
 * launch(): validate → construct arguments → spawn → wait → return exit code.
 */

import { logger } from '../utils/logger';
import { buildLaunchPlan, DEFAULT_COMMAND, formatCommandLine } from './args';
import { assertLaunchConfig, buildLaunchConfig } from './config';
import { createProcessRunner } from './process-runner';
import type { ConfigSource, ExitCode, LaunchConfig, LaunchOptions } from './types';

export async function launch(config: LaunchConfig, options: LaunchOptions = {}): Promise<ExitCode> {
  assertLaunchConfig(config);

  const plan = buildLaunchPlan(config, options.command ?? DEFAULT_COMMAND, options.baseEnv);
  const runner = options.runner ?? createProcessRunner();

  logger.info(
    { netuid: config.netuid, wallet: config.walletName, hotkey: config.walletHotkey, cwd: plan.cwd },
    `[launcher] Starting ${formatCommandLine(plan)}`
  );

  const exitCode = await runner.run(plan);

  if (exitCode === 0) {
    logger.info('[launcher] Miner exited with code 0');
  } else {
    logger.warn(`[launcher] Miner exited with code ${exitCode}`);
  }

  return exitCode;
}

/** Build the LaunchConfig from a raw source, then launch. */
export async function launchFromSource(source: ConfigSource, options: LaunchOptions = {}): Promise<ExitCode> {
  const config = buildLaunchConfig(source);
  return launch(config, options);
}
