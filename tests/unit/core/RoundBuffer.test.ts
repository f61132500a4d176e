import { describe, it, expect } from 'vitest';
import { RoundBuffer, type Quorum } from '../../../src/core/round/RoundBuffer';
import { LookaheadCache } from '../../../src/core/round/LookaheadCache';
import { BufferError, DriverError } from '../../../src/utils/errors';

const bytes = (value: number) => new Uint8Array([value]);
const message = (from: number, round: number, value = from) => ({ from, round, payload: bytes(value) });

const everyone: Quorum = { expected: [2, 3, 5], required: 3 };

describe('RoundBuffer', () => {
  it('completes once every expected sender is in', () => {
    const buffer = new RoundBuffer(0);
    buffer.admit(message(5, 0));
    buffer.admit(message(2, 0));

    expect(buffer.isComplete(everyone)).toBe(false);
    expect(buffer.missing(everyone)).toEqual([3]);

    buffer.admit(message(3, 0));
    expect(buffer.isComplete(everyone)).toBe(true);
  });

  it('rejects a second message from the same sender without overwriting', () => {
    const buffer = new RoundBuffer(0);
    expect(buffer.admit(message(2, 0, 10))).toEqual({ ok: true });

    const second = buffer.admit(message(2, 0, 20));
    expect(second.ok).toBe(false);
    if (!second.ok) {
      expect(second.error).toBeInstanceOf(BufferError);
      expect(second.error.sender).toBe(2);
    }

    buffer.admit(message(3, 0));
    const inputs = buffer.drain({ expected: [2, 3], required: 2 });
    expect(inputs.get(2)).toEqual(bytes(10));
  });

  it('drains in ascending sender order and moves to the next round', () => {
    const buffer = new RoundBuffer(4);
    buffer.admit(message(5, 4));
    buffer.admit(message(3, 4));
    buffer.admit(message(2, 4));

    const inputs = buffer.drain(everyone);

    expect(Array.from(inputs.keys())).toEqual([2, 3, 5]);
    expect(buffer.round).toBe(5);
    expect(buffer.size).toBe(0);
  });

  it('drains a threshold quorum with only the senders it received', () => {
    const buffer = new RoundBuffer(0);
    buffer.admit(message(5, 0));
    buffer.admit(message(2, 0));

    const inputs = buffer.drain({ expected: [2, 3, 5], required: 2 });
    expect(Array.from(inputs.keys())).toEqual([2, 5]);
  });

  it('refuses to drain an incomplete round', () => {
    const buffer = new RoundBuffer(1);
    buffer.admit(message(2, 1));

    expect(() => buffer.drain(everyone)).toThrow('Round 1 drained before completion (1/3)');
  });

  it('refuses messages of another round', () => {
    const buffer = new RoundBuffer(1);
    expect(() => buffer.admit(message(2, 2))).toThrow(DriverError);
  });
});

describe('LookaheadCache', () => {
  it('holds rounds within the window only', () => {
    const cache = new LookaheadCache(2);

    expect(cache.hold(message(2, 1), 0)).toBe('held');
    expect(cache.hold(message(2, 2), 0)).toBe('held');
    expect(cache.hold(message(2, 3), 0)).toBe('beyondWindow');
    expect(cache.hold(message(2, 0), 0)).toBe('beyondWindow');
    expect(cache.size).toBe(2);
  });

  it('keeps the first message per sender and round', () => {
    const cache = new LookaheadCache(2);
    cache.hold(message(2, 1, 10), 0);

    expect(cache.hold(message(2, 1, 20), 0)).toBe('duplicate');
    expect(cache.take(1).map((m) => m.payload)).toEqual([bytes(10)]);
  });

  it('hands out a round ordered by sender and forgets older rounds', () => {
    const cache = new LookaheadCache(2);
    cache.hold(message(5, 1), 0);
    cache.hold(message(2, 1), 0);
    cache.hold(message(3, 2), 0);

    expect(cache.take(1).map((m) => m.from)).toEqual([2, 5]);
    expect(cache.take(1)).toEqual([]);
    expect(cache.size).toBe(1);

    cache.clear();
    expect(cache.take(2)).toEqual([]);
  });
});
