import { describe, it, expect } from 'vitest';
import { validateMessage, type ValidationContext } from '../../../src/network/protocol/MessageValidator';

const payload = new Uint8Array([1, 2, 3]);

const ctx: ValidationContext = {
  expectedRound: 2,
  knownSenders: new Set([2, 3]),
  checkPayload: (_round, bytes) => (bytes.length === 0 ? 'empty payload' : undefined),
};

describe('validateMessage', () => {
  it('accepts a message from a known sender for the expected round', () => {
    const result = validateMessage({ from: 2, round: 2, payload }, ctx);
    expect(result).toEqual({ ok: true, message: { from: 2, round: 2, payload } });
  });

  it.each([
    ['null', null],
    ['a missing payload', { from: 2, round: 2 }],
    ['a string payload', { from: 2, round: 2, payload: 'abc' }],
    ['a fractional round', { from: 2, round: 1.5, payload }],
    ['a sender above u32', { from: 2 ** 32, round: 2, payload }],
  ])('rejects %s as malformed', (_name, data) => {
    const result = validateMessage(data, ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MalformedPayload');
      expect(result.error.detail).toEqual({});
    }
  });

  it('rejects unknown senders before looking at the round', () => {
    const result = validateMessage({ from: 7, round: 0, payload }, ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UnknownSender');
      expect(result.error.detail).toEqual({ sender: 7, round: 0 });
    }
  });

  it('tells stale from future rounds and carries both rounds', () => {
    const stale = validateMessage({ from: 3, round: 1, payload }, ctx);
    const future = validateMessage({ from: 3, round: 4, payload }, ctx);

    expect(stale.ok || stale.error.message).toBe('Stale round 1 from 3 (awaiting 2)');
    expect(future.ok || future.error.message).toBe('Future round 4 from 3 (awaiting 2)');
    if (!future.ok) expect(future.error.detail).toEqual({ sender: 3, round: 4, expectedRound: 2 });
  });

  it('runs the payload check last and attributes the defect to the sender', () => {
    const result = validateMessage({ from: 3, round: 2, payload: new Uint8Array(0) }, ctx);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MalformedPayload');
      expect(result.error.message).toBe('Malformed round 2 payload from 3: empty payload');
      expect(result.error.detail).toEqual({ sender: 3, round: 2 });
    }
  });

  it('rejects payloads above the size limit and attributes them to the sender', () => {
    const result = validateMessage({ from: 3, round: 2, payload: new Uint8Array(5) }, { ...ctx, maxPayloadBytes: 4 });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('MalformedPayload');
      expect(result.error.message).toBe('Round 2 payload from 3 is 5 bytes, above the 4-byte limit');
      expect(result.error.detail).toEqual({ sender: 3, round: 2 });
    }

    expect(validateMessage({ from: 3, round: 2, payload: new Uint8Array(4) }, { ...ctx, maxPayloadBytes: 4 }).ok).toBe(true);
  });

  it('returns a message that owns its payload bytes', () => {
    const bytes = new Uint8Array([1, 2, 3]);
    const result = validateMessage({ from: 2, round: 2, payload: bytes }, ctx);
    bytes.fill(9);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.message.payload).not.toBe(bytes);
      expect(Array.from(result.message.payload)).toEqual([1, 2, 3]);
    }
  });

  it('does not touch the sender set', () => {
    const knownSenders = new Set([2]);
    validateMessage({ from: 9, round: 2, payload }, { expectedRound: 2, knownSenders });
    expect(Array.from(knownSenders)).toEqual([2]);
  });
});
