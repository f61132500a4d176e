import { describe, it, expect } from 'vitest';
import {
  generatePolynomial,
  evaluatePolynomial,
  lagrangeCoefficient,
  reconstructSecret,
} from '../../../src/crypto/shamir';
import { generateScalar, mod } from '../../../src/crypto/secp256k1';
import { createSeededRandom } from '../../../src/crypto/random';

const random = createSeededRandom('shamir-test');

describe('Shamir Secret Sharing', () => {
  it('keeps the secret as the constant term', () => {
    const poly = generatePolynomial(42n, 2, random);

    expect(poly).toHaveLength(3);
    expect(poly[0]).toBe(42n);
    expect(evaluatePolynomial(poly, 0n)).toBe(42n);
  });

  it('evaluates with Horner over the scalar field', () => {
    // f(x) = 5 + 3x + 2x^2
    expect(evaluatePolynomial([5n, 3n, 2n], 4n)).toBe(49n);
    expect(evaluatePolynomial([5n, 3n, 2n], -1n)).toBe(4n);
  });

  it('2-of-3 threshold: reconstructs secret from any 2 shares', () => {
    const secret = generateScalar(random);
    const poly = generatePolynomial(secret, 1, random);
    const shares = [1n, 2n, 3n].map((x) => [x, evaluatePolynomial(poly, x)] as const);

    for (const [i, j] of [[0, 1], [0, 2], [1, 2]]) {
      expect(reconstructSecret(new Map([shares[i], shares[j]]))).toBe(secret);
    }
  });

  it('one share short of the threshold does not reconstruct', () => {
    const secret = generateScalar(random);
    const poly = generatePolynomial(secret, 2, random);

    const partial = new Map([1n, 2n].map((x) => [x, evaluatePolynomial(poly, x)] as const));
    expect(reconstructSecret(partial)).not.toBe(secret);
  });

  it('lagrange coefficients at zero sum to one', () => {
    const points = [1n, 3n, 4n];
    const sum = points.reduce((acc, x) => mod(acc + lagrangeCoefficient(x, points)), 0n);

    expect(sum).toBe(1n);
  });

  it('rejects a threshold below one', () => {
    expect(() => generatePolynomial(1n, 0, random)).toThrow('Threshold must be at least 1');
  });
});
