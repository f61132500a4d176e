import { describe, it, expect, afterEach } from 'vitest';
import { loadConfig, resetConfig } from '../../../src/config/loader';
import { parseSessionConfig, newSessionId, type SessionConfigInput } from '../../../src/config/session';
import { createSeededRandom } from '../../../src/crypto/random';
import { ConfigurationError } from '../../../src/utils/errors';
import { KEY_SHARE_PLACEHOLDER, MESSAGE_DIGEST, testSettings } from '../../helpers/sessions';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfig();
  });

  it('applies defaults and coerces numeric variables', () => {
    const config = loadConfig({ MPC_DRIVER_ROUND_TIMEOUT_MS: '5000' });

    expect(config.NODE_ENV).toBe('development');
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.MPC_DRIVER_ROUND_TIMEOUT_MS).toBe(5000);
    expect(config.MPC_DRIVER_MISBEHAVIOR_TOLERANCE).toBeUndefined();
    expect(config.MPC_DRIVER_LOOKAHEAD_ROUNDS).toBe(2);
    expect(config.MPC_DRIVER_MAX_PAYLOAD_BYTES).toBe(1_048_576);
  });

  it('caches the first result until reset', () => {
    const first = loadConfig({ LOG_LEVEL: 'debug' });
    expect(loadConfig({ LOG_LEVEL: 'warn' })).toBe(first);

    resetConfig();
    expect(loadConfig({ LOG_LEVEL: 'warn' }).LOG_LEVEL).toBe('warn');
  });

  it('lists every invalid variable', () => {
    expect(() => loadConfig({ LOG_LEVEL: 'loud', MPC_DRIVER_LOOKAHEAD_ROUNDS: '9' })).toThrow(ConfigurationError);

    resetConfig();
    expect(() => loadConfig({ LOG_LEVEL: 'loud', MPC_DRIVER_LOOKAHEAD_ROUNDS: '9' })).toThrow(
      /LOG_LEVEL[\s\S]*MPC_DRIVER_LOOKAHEAD_ROUNDS/
    );
  });
});

describe('parseSessionConfig', () => {
  const base: SessionConfigInput = {
    sessionId: 'session-test-0003',
    participants: [3, 1, 2],
    localId: 2,
    variant: { family: 'cggmp', kind: 'sign' },
    parameters: { threshold: 1, keyShare: KEY_SHARE_PLACEHOLDER, message: MESSAGE_DIGEST },
    random: createSeededRandom('config'),
  };

  it('sorts participants, freezes the result and fills policy from the environment', () => {
    const config = parseSessionConfig(base, { ...testSettings, MPC_DRIVER_MISBEHAVIOR_TOLERANCE: 3 });

    expect(config.participants).toEqual([1, 2, 3]);
    expect(config.parameters.curve).toBe('secp256k1');
    expect(config.misbehaviorTolerance).toBe(3);
    expect(config.roundTimeoutMs).toBeUndefined();
    expect(config.lookaheadRounds).toBe(2);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.participants)).toBe(true);
  });

  it('prefers explicit policy over the environment', () => {
    const config = parseSessionConfig({ ...base, lookaheadRounds: 1, roundTimeoutMs: 250 }, testSettings);

    expect(config.lookaheadRounds).toBe(1);
    expect(config.roundTimeoutMs).toBe(250);
  });

  it('copies byte parameters', () => {
    const digest = new Uint8Array(32).fill(1);
    const config = parseSessionConfig({ ...base, parameters: { ...base.parameters, message: digest } }, testSettings);

    digest[0] = 99;
    expect(config.parameters.message?.[0]).toBe(1);
  });

  it.each<[string, Partial<SessionConfigInput>, string]>([
    ['duplicate participants', { participants: [1, 2, 2] }, 'duplicate participant 2'],
    ['a local id outside the set', { localId: 9 }, 'local participant 9 is not in the participant set'],
    [
      'too few participants for the threshold',
      { parameters: { threshold: 3, keyShare: KEY_SHARE_PLACEHOLDER, message: MESSAGE_DIGEST } },
      'cggmp/sign with threshold 3 needs at least 4 participants, got 3',
    ],
    ['a sign session without a message', { parameters: { threshold: 1, keyShare: KEY_SHARE_PLACEHOLDER } }, 'parameters.message: required for cggmp/sign'],
    [
      'a digest of the wrong size',
      { parameters: { threshold: 1, keyShare: KEY_SHARE_PLACEHOLDER, message: new Uint8Array(20) } },
      'expected a 32-byte digest, got 20 bytes',
    ],
    ['an empty participant set', { participants: [] }, 'participants'],
  ])('rejects %s', (_name, override, expected) => {
    expect(() => parseSessionConfig({ ...base, ...override }, testSettings)).toThrow(ConfigurationError);
    expect(() => parseSessionConfig({ ...base, ...override }, testSettings)).toThrow(expected);
  });

  it('lets keygen run without key material', () => {
    const config = parseSessionConfig(
      { ...base, variant: { family: 'gg20', kind: 'keygen' }, parameters: { threshold: 2 } },
      testSettings
    );
    expect(config.variant).toEqual({ family: 'gg20', kind: 'keygen' });
  });

  it('issues distinct session ids', () => {
    expect(newSessionId()).not.toBe(newSessionId());
  });
});
