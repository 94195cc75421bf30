/**
 * Doctor Command - pre-flight diagnostics for a miner launch
 *
 * Checks:
 * - Node version
 * - Env file
 * - Required and optional keys
 * - Settings file
 * - Executable on PATH
 * - Data directories
 */

import * as fs from 'fs';
import * as path from 'path';
import { formatCommandLine } from '../../launcher/args';
import { parseDebugFlag, parseRunAt, parseSubmissionSize, REQUIRED_KEYS } from '../../launcher/config';
import type { ConfigSource, LaunchCommand } from '../../launcher/types';
import { loadConfigSource, loadLauncherSettings, type LoadOptions } from '../../utils/config';

export interface CheckResult {
  name: string;
  status: 'pass' | 'warn' | 'fail';
  message: string;
  fix?: string;
}

export async function runDoctor(options: LoadOptions = {}): Promise<CheckResult[]> {
  const results: CheckResult[] = [];
  const cwd = options.cwd ?? process.cwd();

  // 1. Node version check
  const nodeVersion = process.version;
  const majorVersion = parseInt(nodeVersion.slice(1).split('.')[0], 10);
  if (majorVersion >= 20) {
    results.push({ name: 'Node.js version', status: 'pass', message: `${nodeVersion} (>= 20 required)` });
  } else {
    results.push({
      name: 'Node.js version',
      status: 'fail',
      message: `${nodeVersion} (too old)`,
      fix: 'Upgrade to Node.js 20 LTS',
    });
  }

  // 2. Env file
  let source: ConfigSource = options.env ?? process.env;
  try {
    const loaded = loadConfigSource(options);
    source = loaded.source;
    if (loaded.envFile) {
      results.push({ name: 'Env file', status: 'pass', message: loaded.envFile });
    } else {
      results.push({
        name: 'Env file',
        status: 'warn',
        message: 'No .env found, using process environment only',
        fix: 'Create .env or pass --env-file <path>',
      });
    }
  } catch (err) {
    results.push({ name: 'Env file', status: 'fail', message: errorMessage(err), fix: 'Pass --env-file <path> or set ENV_FILE' });
  }

  // 3. Required keys
  for (const [key] of REQUIRED_KEYS) {
    const value = source[key]?.trim();
    if (value) {
      results.push({ name: key, status: 'pass', message: value });
    } else {
      results.push({ name: key, status: 'fail', message: 'Not set', fix: `Add ${key}=... to your env file` });
    }
  }

  // 4. Optional keys
  results.push(checkOptional('LOGGING_DEBUG', source.LOGGING_DEBUG, (raw) => String(parseDebugFlag(raw))));
  results.push(checkOptional('SUBMISSION_SIZE', source.SUBMISSION_SIZE, (raw) => String(parseSubmissionSize(raw))));
  results.push(checkOptional('RUN_AT', source.RUN_AT, parseRunAt));

  // 5. Settings file
  let command: LaunchCommand | null = null;
  try {
    const settings = loadLauncherSettings({ ...options, env: source });
    command = settings.command;
    results.push({
      name: 'Settings file',
      status: 'pass',
      message: settings.settingsFile
        ? `${settings.settingsFile} (${formatCommandLine({ command: command.executable, args: command.prefixArgs })})`
        : `Defaults (${formatCommandLine({ command: command.executable, args: command.prefixArgs })})`,
    });
  } catch (err) {
    results.push({ name: 'Settings file', status: 'fail', message: errorMessage(err), fix: 'Fix the JSON5 settings file' });
  }

  // 6. Executable
  if (command) {
    const runDir = command.cwd ?? cwd;
    const found = findExecutable(command.executable, source.PATH ?? '', runDir);
    if (found) {
      results.push({ name: 'Executable', status: 'pass', message: found });
    } else {
      results.push({
        name: 'Executable',
        status: 'fail',
        message: `${command.executable} not found`,
        fix: command.executable === 'uv'
          ? 'Install uv: https://docs.astral.sh/uv/'
          : `Check command.executable in the settings file`,
      });
    }

    // 7. Data directories
    for (const key of ['EVAL_DATA_DIR', 'SUBMISSION_DIR'] as const) {
      const dir = source[key]?.trim();
      if (!dir) continue;
      const resolved = path.resolve(runDir, dir);
      if (fs.existsSync(resolved)) {
        results.push({ name: `${key} directory`, status: 'pass', message: resolved });
      } else {
        results.push({
          name: `${key} directory`,
          status: 'warn',
          message: `${resolved} does not exist yet`,
          fix: 'The miner creates it on first run',
        });
      }
    }
  }

  return results;
}

export function formatDoctorResults(results: CheckResult[]): string {
  const icons = { pass: 'pass', warn: 'warn', fail: 'FAIL' } as const;
  const lines = results.map((r) => {
    const line = `[${icons[r.status]}] ${r.name}: ${r.message}`;
    return r.fix ? `${line}\n       fix: ${r.fix}` : line;
  });

  const failed = results.filter((r) => r.status === 'fail').length;
  const warned = results.filter((r) => r.status === 'warn').length;
  lines.push('');
  lines.push(`${results.length - failed - warned} passed, ${warned} warnings, ${failed} failed`);
  return lines.join('\n');
}

/** Resolve an executable the way spawn() would: a path as-is, a bare name through PATH. */
export function findExecutable(name: string, searchPath: string, cwd: string): string | null {
  if (name.includes('/') || name.includes(path.sep)) {
    const candidate = path.resolve(cwd, name);
    return isExecutableFile(candidate) ? candidate : null;
  }

  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    if (isExecutableFile(candidate)) return candidate;
  }
  return null;
}

function isExecutableFile(file: string): boolean {
  try {
    fs.accessSync(file, fs.constants.X_OK);
    return fs.statSync(file).isFile();
  } catch {
    return false;
  }
}

function checkOptional(key: string, raw: string | undefined, parse: (value: string) => string): CheckResult {
  const value = raw?.trim();
  if (!value) {
    return { name: key, status: 'pass', message: key === 'LOGGING_DEBUG' ? 'Not set (default: true)' : 'Not set' };
  }
  try {
    return { name: key, status: 'pass', message: parse(value) };
  } catch (err) {
    return { name: key, status: 'fail', message: errorMessage(err) };
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
