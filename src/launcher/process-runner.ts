/**
 * Process Runner
 * child_process wrapper that runs a LaunchPlan to completion.
 * No shell is involved, so arguments are passed through verbatim.
 */

import { spawn as nodeSpawn, type ChildProcess } from 'node:child_process';
import { statSync } from 'node:fs';
import { constants as osConstants } from 'node:os';
import { logger } from '../utils/logger';
import { SpawnError } from './errors';
import type { ExitCode, LaunchPlan, ProcessRunner, ProcessRunnerOptions } from './types';

const FORWARDED_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/** Shell convention for a child killed by a signal: 128 + signal number. */
export function exitCodeForSignal(signal: NodeJS.Signals): ExitCode {
  const entry = Object.entries(osConstants.signals).find(([name]) => name === signal);
  return 128 + (entry ? entry[1] : 0);
}

function errnoCode(err: unknown): string {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : 'UNKNOWN';
}

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

export function createProcessRunner(options: ProcessRunnerOptions = {}): ProcessRunner {
  const forwardSignals = options.forwardSignals ?? true;
  const inheritStdio = options.inheritStdio ?? true;
  const interactive = options.interactive ?? process.stdin.isTTY === true;

  function run(plan: LaunchPlan): Promise<ExitCode> {
    return new Promise((resolve, reject) => {
      // spawn reports a missing cwd as ENOENT, indistinguishable from a missing executable
      if (plan.cwd !== undefined && !isDirectory(plan.cwd)) {
        reject(new SpawnError(plan.command, 'ENOENT', { cwd: plan.cwd }));
        return;
      }

      let child: ChildProcess;
      try {
        child = nodeSpawn(plan.command, [...plan.args], {
          cwd: plan.cwd,
          env: { ...plan.env },
          stdio: inheritStdio ? 'inherit' : 'ignore',
          shell: false,
        });
      } catch (err) {
        // Invalid arguments (e.g. a null byte) throw before any process exists
        reject(new SpawnError(plan.command, errnoCode(err), { cause: err }));
        return;
      }

      let settled = false;
      const forwarders = new Map<NodeJS.Signals, () => void>();

      function cleanup(): void {
        for (const [signal, handler] of forwarders) {
          process.removeListener(signal, handler);
        }
        forwarders.clear();
      }

      if (forwardSignals) {
        for (const signal of FORWARDED_SIGNALS) {
          const handler = () => {
            // Ctrl-C in a terminal already reached the child through the process group.
            // The listener stays so the launcher keeps waiting for the child's exit code.
            if (signal === 'SIGINT' && interactive) {
              logger.debug('[launcher] SIGINT delivered to child by terminal');
              return;
            }
            logger.info(`[launcher] Forwarding ${signal} to pid ${child.pid}`);
            child.kill(signal);
          };
          forwarders.set(signal, handler);
          process.on(signal, handler);
        }
      }

      child.once('error', (err: Error) => {
        if (settled) {
          logger.warn({ err }, '[launcher] Child process error after exit');
          return;
        }
        settled = true;
        cleanup();
        reject(new SpawnError(plan.command, errnoCode(err), { cause: err }));
      });

      child.once('exit', (code, signal) => {
        if (settled) return;
        settled = true;
        cleanup();

        if (code !== null) {
          resolve(code);
        } else if (signal !== null) {
          logger.warn(`[launcher] Child terminated by ${signal}`);
          resolve(exitCodeForSignal(signal));
        } else {
          resolve(1);
        }
      });
    });
  }

  return { run };
}
