import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, hexToBytes, utf8ToBytes } from '@noble/hashes/utils';
import {
  scalarMulG,
  pointToHex,
  hexToPoint,
  generateScalar,
  scalarToHex,
  hexToScalar,
  CURVE_ORDER,
  mod,
  type Point,
} from './secp256k1';
import type { RandomSource } from './random';

/**
 * Hash commitment: C = SHA-256(P_0 || P_1 || ... || r)
 *
 * Used in key generation round 0 to commit to the polynomial coefficient
 * points before they are revealed in round 1.
 */

/** Commit to an array of EC points with a blinding factor */
export function commitPoints(
  points: Point[],
  blindingFactor: bigint
): { commitment: string; blindingFactor: string } {
  const h = sha256.create();

  for (const P of points) {
    h.update(P.toRawBytes(true));
  }

  h.update(hexToBytes(scalarToHex(blindingFactor)));

  return {
    commitment: bytesToHex(h.digest()),
    blindingFactor: scalarToHex(blindingFactor),
  };
}

/** Verify that `commitment` opens to the provided points and blinding factor */
export function verifyCommitment(commitment: string, points: Point[], blindingFactor: string): boolean {
  const { commitment: recomputed } = commitPoints(points, hexToScalar(blindingFactor));
  return recomputed === commitment;
}

/**
 * Non-interactive Schnorr proof of knowledge of x such that P = x * G
 * (Fiat-Shamir with SHA-256, domain-separated by `context`).
 *
 * Proof: { R = k*G, s = k + e*x mod n } with e = H(P || R || context)
 * Verifier checks: s*G == R + e*P
 */
export function schnorrProve(
  secret: bigint,
  publicPoint: Point,
  context: string,
  random: RandomSource
): { R: string; s: string } {
  const k = generateScalar(random);
  const R = scalarMulG(k);
  const e = schnorrChallenge(publicPoint, R, context);
  const s = mod(k + e * secret);

  return { R: pointToHex(R), s: scalarToHex(s) };
}

/** Returns true iff the proof is valid for the given point and context */
export function schnorrVerify(publicPoint: Point, proof: { R: string; s: string }, context: string): boolean {
  try {
    const s = hexToScalar(proof.s);
    if (s === 0n || s >= CURVE_ORDER) return false;

    const R = hexToPoint(proof.R);
    const e = schnorrChallenge(publicPoint, R, context);
    const rhs = e === 0n ? R : R.add(publicPoint.multiply(e));

    return scalarMulG(s).equals(rhs);
  } catch {
    // unparseable R
    return false;
  }
}

function schnorrChallenge(P: Point, R: Point, context: string): bigint {
  const h = sha256.create();
  h.update(P.toRawBytes(true));
  h.update(R.toRawBytes(true));
  h.update(utf8ToBytes(context));
  return hexToScalar(bytesToHex(h.digest())) % CURVE_ORDER;
}
