import { bytesToHex } from '@noble/hashes/utils';
import { CURVE_ORDER, mod } from './secp256k1';
import type { RandomSource } from './random';

/**
 * Shamir Secret Sharing over the secp256k1 scalar field (Z_n).
 *
 * Polynomial: f(x) = s + a_1*x + ... + a_t*x^t (mod n), degree t = threshold.
 * Any t+1 evaluations reconstruct s; t or fewer reveal nothing about it.
 */

/** Generate a random polynomial of degree `threshold` with `secret` as the constant term */
export function generatePolynomial(secret: bigint, threshold: number, random: RandomSource): bigint[] {
  if (threshold < 1) throw new Error('Threshold must be at least 1');
  const coefficients = [secret];
  for (let i = 1; i <= threshold; i++) {
    coefficients.push(BigInt('0x' + bytesToHex(random(32))) % CURVE_ORDER);
  }
  return coefficients;
}

/** Evaluate f(x) = sum_i(coefficients[i] * x^i) mod n (Horner) */
export function evaluatePolynomial(coefficients: bigint[], x: bigint): bigint {
  let result = 0n;
  for (let i = coefficients.length - 1; i >= 0; i--) {
    result = mod(result * x + coefficients[i]);
  }
  return result;
}

/**
 * Lagrange coefficient at zero for evaluation point `x` among `points`.
 * lambda = product_{j != x}( j / (j - x) ) mod n
 */
export function lagrangeCoefficient(x: bigint, points: bigint[]): bigint {
  let num = 1n;
  let den = 1n;

  for (const j of points) {
    if (j === x) continue;
    num = mod(num * j);
    den = mod(den * (j - x));
  }

  return mod(num * modInv(den));
}

function modInv(a: bigint): bigint {
  // Extended Euclidean algorithm
  let [oldR, r] = [mod(a), CURVE_ORDER];
  let [oldS, s] = [1n, 0n];

  while (r !== 0n) {
    const q = oldR / r;
    [oldR, r] = [r, oldR - q * r];
    [oldS, s] = [s, oldS - q * s];
  }

  return mod(oldS);
}

/**
 * Reconstruct the secret from at least t+1 shares.
 * @param shares evaluation point → share value
 */
export function reconstructSecret(shares: Map<bigint, bigint>): bigint {
  const points = Array.from(shares.keys());
  let secret = 0n;

  for (const [x, share] of shares) {
    secret = mod(secret + share * lagrangeCoefficient(x, points));
  }

  return secret;
}
