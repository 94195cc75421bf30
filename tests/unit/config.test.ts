/**
 * LaunchConfig validation tests
 */

import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  REQUIRED_KEYS,
  assertLaunchConfig,
  buildLaunchConfig,
  parseDebugFlag,
} from '../../src/launcher/config';
import { ConfigurationError } from '../../src/launcher/errors';
import type { LaunchConfig } from '../../src/launcher/types';

const SOURCE: Record<string, string> = {
  NETUID: '96',
  HF_REPO_ID: 'test-org/test-submissions',
  WALLET_NAME: 'miner',
  WALLET_HOTKEY: 'default',
  SUBTENSOR_NETWORK: 'finney',
  EVAL_DATA_DIR: 'data/eval_data',
  SUBMISSION_DIR: 'data/submissions',
};

function without(key: string): Record<string, string> {
  const copy = { ...SOURCE };
  delete copy[key];
  return copy;
}

function configError(check: (err: ConfigurationError) => void) {
  return (err: unknown) => {
    assert.ok(err instanceof ConfigurationError);
    check(err);
    return true;
  };
}

describe('buildLaunchConfig', () => {
  it('builds a config from a complete source', () => {
    const config = buildLaunchConfig(SOURCE);
    assert.deepEqual({ ...config }, {
      netuid: '96',
      hfRepoId: 'test-org/test-submissions',
      walletName: 'miner',
      walletHotkey: 'default',
      subtensorNetwork: 'finney',
      evalDataDir: 'data/eval_data',
      submissionDir: 'data/submissions',
      debug: true,
    });
  });

  for (const [key] of REQUIRED_KEYS) {
    it(`fails naming ${key} when it is missing`, () => {
      assert.throws(() => buildLaunchConfig(without(key)), configError((err) => {
        assert.deepEqual(err.missingKeys, [key]);
        assert.equal(err.message, `Missing required configuration key: ${key}`);
      }));
    });
  }

  it('treats blank values as missing', () => {
    assert.throws(
      () => buildLaunchConfig({ ...SOURCE, WALLET_HOTKEY: '   ' }),
      configError((err) => assert.deepEqual(err.missingKeys, ['WALLET_HOTKEY']))
    );
  });

  it('reports every missing key in canonical order', () => {
    assert.throws(() => buildLaunchConfig({}), configError((err) => {
      assert.deepEqual(err.missingKeys, [
        'NETUID',
        'HF_REPO_ID',
        'WALLET_NAME',
        'WALLET_HOTKEY',
        'SUBTENSOR_NETWORK',
        'EVAL_DATA_DIR',
        'SUBMISSION_DIR',
      ]);
      assert.match(err.message, /^Missing required configuration keys: NETUID, HF_REPO_ID, /);
    }));
  });

  it('trims values', () => {
    const config = buildLaunchConfig({ ...SOURCE, NETUID: ' 96 \n' });
    assert.equal(config.netuid, '96');
  });

  it('returns a frozen object', () => {
    const config = buildLaunchConfig(SOURCE);
    assert.ok(Object.isFrozen(config));
  });

  it('parses optional values', () => {
    const config = buildLaunchConfig({
      ...SOURCE,
      EVAL_FILE: 'eval.jsonl',
      SUBMISSION_SIZE: '250',
      RUN_AT: '23:59:30',
    });
    assert.equal(config.evalFile, 'eval.jsonl');
    assert.equal(config.submissionSize, 250);
    assert.equal(config.runAt, '23:59:30');
  });

  it('leaves unset optional values absent', () => {
    const config = buildLaunchConfig({ ...SOURCE, EVAL_FILE: '' });
    assert.equal('evalFile' in config, false);
    assert.equal('submissionSize' in config, false);
    assert.equal('runAt' in config, false);
  });

  for (const bad of ['0', '-3', '1.5', 'ten']) {
    it(`rejects SUBMISSION_SIZE=${bad}`, () => {
      assert.throws(
        () => buildLaunchConfig({ ...SOURCE, SUBMISSION_SIZE: bad }),
        configError((err) => {
          assert.equal(err.key, 'SUBMISSION_SIZE');
          assert.equal(err.message, `Invalid value for SUBMISSION_SIZE: expected a positive integer, got "${bad}"`);
        })
      );
    });
  }

  for (const bad of ['24:00', '7:30', '12:60', '12:30:61', 'noon']) {
    it(`rejects RUN_AT=${bad}`, () => {
      assert.throws(
        () => buildLaunchConfig({ ...SOURCE, RUN_AT: bad }),
        configError((err) => assert.equal(err.key, 'RUN_AT'))
      );
    });
  }

  it('reports missing keys before invalid optional values', () => {
    assert.throws(
      () => buildLaunchConfig({ ...without('NETUID'), RUN_AT: 'noon' }),
      configError((err) => assert.deepEqual(err.missingKeys, ['NETUID']))
    );
  });
});

describe('parseDebugFlag', () => {
  it('defaults to true when unset', () => {
    assert.equal(parseDebugFlag(undefined), true);
    assert.equal(parseDebugFlag(''), true);
  });

  it('accepts common boolean spellings', () => {
    for (const value of ['true', '1', 'YES', 'on']) assert.equal(parseDebugFlag(value), true);
    for (const value of ['false', '0', 'No', 'OFF']) assert.equal(parseDebugFlag(value), false);
  });

  it('rejects anything else', () => {
    assert.throws(() => parseDebugFlag('maybe'), configError((err) => {
      assert.equal(err.key, 'LOGGING_DEBUG');
      assert.equal(err.message, 'Invalid value for LOGGING_DEBUG: expected true or false, got "maybe"');
    }));
  });
});

describe('assertLaunchConfig', () => {
  it('accepts a config from buildLaunchConfig', () => {
    assertLaunchConfig(buildLaunchConfig(SOURCE));
  });

  it('rejects a hand-built config with empty fields', () => {
    const config: LaunchConfig = { ...buildLaunchConfig(SOURCE), walletName: '', submissionDir: ' ' };
    assert.throws(
      () => assertLaunchConfig(config),
      configError((err) => assert.deepEqual(err.missingKeys, ['WALLET_NAME', 'SUBMISSION_DIR']))
    );
  });

  it('rejects a hand-built config with an invalid submission size', () => {
    const config: LaunchConfig = { ...buildLaunchConfig(SOURCE), submissionSize: 0 };
    assert.throws(() => assertLaunchConfig(config), configError((err) => assert.equal(err.key, 'SUBMISSION_SIZE')));
  });

  for (const evalFile of ['', '   ']) {
    it(`rejects a hand-built config with evalFile=${JSON.stringify(evalFile)}`, () => {
      const config: LaunchConfig = { ...buildLaunchConfig(SOURCE), evalFile };
      assert.throws(() => assertLaunchConfig(config), configError((err) => {
        assert.equal(err.key, 'EVAL_FILE');
        assert.equal(err.message, 'Invalid value for EVAL_FILE: expected a non-empty file name');
      }));
    });
  }
});
