import { sha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';

/**
 * Source of random bytes handed to a protocol adapter at session start.
 * The driver never draws randomness on its own.
 */
export type RandomSource = (length: number) => Uint8Array;

/** Cryptographically secure source backed by the platform CSPRNG (`crypto.getRandomValues`) */
export const systemRandom: RandomSource = (length) => randomBytes(length);

/**
 * Deterministic source: SHA-256 in counter mode over `seed`.
 * For simulations and reproducible tests only; never for real key material.
 */
export function createSeededRandom(seed: string): RandomSource {
  const seedBytes = new TextEncoder().encode(seed);
  let counter = 0;
  let pool: Uint8Array = new Uint8Array(0);

  return (length) => {
    const out = new Uint8Array(length);
    let filled = 0;
    while (filled < length) {
      if (pool.length === 0) {
        const block = new Uint8Array(seedBytes.length + 4);
        block.set(seedBytes);
        new DataView(block.buffer).setUint32(seedBytes.length, counter++);
        pool = sha256(block);
      }
      const take = Math.min(pool.length, length - filled);
      out.set(pool.subarray(0, take), filled);
      pool = pool.subarray(take);
      filled += take;
    }
    return out;
  };
}
