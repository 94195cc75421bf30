/**
 * CLI resolution and exit code tests
 */

import { describe, it, beforeEach, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { printCommand, resolveLaunch, runCommand } from '../../src/cli/commands/index';
import { ConfigurationError } from '../../src/launcher/errors';
import { createProcessRunner } from '../../src/launcher/process-runner';
import type { LaunchPlan, ProcessRunner } from '../../src/launcher/types';

const ENV_FILE = [
  'NETUID=96',
  'HF_REPO_ID=test-org/test-submissions',
  'WALLET_NAME=miner',
  'WALLET_HOTKEY=default',
  'SUBTENSOR_NETWORK=finney',
  'EVAL_DATA_DIR=data/eval_data',
  'SUBMISSION_DIR=data/submissions',
  'LOGGING_DEBUG=true',
].join('\n');

describe('resolveLaunch', () => {
  let dir: string;
  let envFile: string;
  let settingsFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'miner-launcher-cli-'));
    envFile = join(dir, 'miner.env');
    settingsFile = join(dir, 'settings.json5');
    writeFileSync(envFile, ENV_FILE);
    writeFileSync(settingsFile, "{ command: { executable: 'python3', prefixArgs: ['miner.py'] } }");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('combines env file, settings file and environment', () => {
    const { config, command, source } = resolveLaunch(
      { envFile, config: settingsFile },
      { WALLET_HOTKEY: 'hk-from-env' }
    );

    assert.equal(config.netuid, '96');
    assert.equal(config.walletHotkey, 'hk-from-env');
    assert.equal(config.debug, true);
    assert.deepEqual(command, { executable: 'python3', prefixArgs: ['miner.py'] });
    assert.equal(source.WALLET_HOTKEY, 'hk-from-env');
  });

  it('lets --no-debug override LOGGING_DEBUG', () => {
    const { config, source } = resolveLaunch({ envFile, config: settingsFile, debug: false }, {});
    assert.equal(config.debug, false);
    assert.equal(source.LOGGING_DEBUG, 'false');
  });

  it('surfaces missing keys as ConfigurationError', () => {
    writeFileSync(envFile, 'NETUID=96\n');
    assert.throws(
      () => resolveLaunch({ envFile, config: settingsFile }, {}),
      (err: unknown) => err instanceof ConfigurationError && err.missingKeys.length === 6
    );
  });
});

function fakeRunner(exitCode: number): ProcessRunner & { plans: LaunchPlan[] } {
  const plans: LaunchPlan[] = [];
  return {
    plans,
    async run(plan) {
      plans.push(plan);
      return exitCode;
    },
  };
}

describe('CLI exit codes', () => {
  let dir: string;
  let envFile: string;
  let settingsFile: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'miner-launcher-cli-'));
    envFile = join(dir, 'miner.env');
    settingsFile = join(dir, 'settings.json5');
    writeFileSync(envFile, ENV_FILE);
    writeFileSync(settingsFile, "{ command: { executable: 'python3', prefixArgs: ['miner.py'] } }");
    // Keep the rendered error report out of the test output
    mock.method(process.stderr, 'write', () => true);
  });

  afterEach(() => {
    mock.restoreAll();
    rmSync(dir, { recursive: true, force: true });
  });

  it('passes the miner exit code through', async () => {
    const runner = fakeRunner(7);
    const code = await runCommand({ envFile, config: settingsFile }, { env: {}, runner });
    assert.equal(code, 7);
    assert.equal(runner.plans.length, 1);
    assert.equal(runner.plans[0].command, 'python3');
  });

  it('returns 78 without spawning when the env file is missing', async () => {
    const runner = fakeRunner(0);
    const code = await runCommand({ envFile: join(dir, 'absent.env'), config: settingsFile }, { env: {}, runner });
    assert.equal(code, 78);
    assert.equal(runner.plans.length, 0);
  });

  it('returns 78 without spawning when a required key is missing', async () => {
    writeFileSync(envFile, 'NETUID=96\n');
    const runner = fakeRunner(0);
    const code = await runCommand({ envFile, config: settingsFile }, { env: {}, runner });
    assert.equal(code, 78);
    assert.equal(runner.plans.length, 0);
  });

  it('returns 127 when the executable does not exist', async () => {
    writeFileSync(settingsFile, "{ command: { executable: 'miner-launcher-test-no-such-binary', prefixArgs: [] } }");
    const runner = createProcessRunner({ forwardSignals: false, inheritStdio: false });
    const code = await runCommand({ envFile, config: settingsFile }, { env: {}, runner });
    assert.equal(code, 127);
  });

  it('returns 126 when the executable cannot be started', async () => {
    const runner = createProcessRunner({ forwardSignals: false, inheritStdio: false });
    const code = await runCommand(
      { envFile, config: settingsFile },
      { env: { WALLET_NAME: 'mi\0ner' }, runner }
    );
    assert.equal(code, 126);
  });

  it('prints the command line and returns 0', () => {
    const log = mock.method(console, 'log', () => undefined);
    const code = printCommand({ envFile, config: settingsFile, debug: false }, { env: {} });

    assert.equal(code, 0);
    assert.equal(log.mock.calls.length, 1);
    assert.deepEqual(log.mock.calls[0].arguments, [
      'python3 miner.py --netuid 96 --hf_repo_id test-org/test-submissions --wallet.name miner'
        + ' --wallet.hotkey default --subtensor.network finney'
        + ' --eval-data-dir data/eval_data --submission-dir data/submissions',
    ]);
  });

  it('print returns 78 on a configuration error', () => {
    const log = mock.method(console, 'log', () => undefined);
    const code = printCommand({ envFile: join(dir, 'absent.env') }, { env: {} });
    assert.equal(code, 78);
    assert.equal(log.mock.calls.length, 0);
  });
});
