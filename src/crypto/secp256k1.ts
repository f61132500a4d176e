import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex } from '@noble/hashes/utils';
import type { RandomSource } from './random';

export const CURVE_ORDER = secp256k1.CURVE.n;

// ---- Scalar (private key) arithmetic ----

/** Sample a uniform non-zero secp256k1 scalar from the given source */
export function generateScalar(random: RandomSource): bigint {
  let scalar: bigint;
  do {
    scalar = BigInt('0x' + bytesToHex(random(32)));
  } while (scalar === 0n || scalar >= CURVE_ORDER);
  return scalar;
}

/** Reduce any integer into [0, n) */
export function mod(a: bigint): bigint {
  return ((a % CURVE_ORDER) + CURVE_ORDER) % CURVE_ORDER;
}

/** Add two scalars modulo the curve order */
export function scalarAdd(a: bigint, b: bigint): bigint {
  return mod(a + b);
}

// ---- EC Point arithmetic ----

export type Point = ReturnType<typeof secp256k1.ProjectivePoint.fromHex>;
export const G = secp256k1.ProjectivePoint.BASE;

/** Scalar multiplication: scalar * G */
export function scalarMulG(scalar: bigint): Point {
  return G.multiply(scalar);
}

/** Add two EC points */
export function pointAdd(P: Point, Q: Point): Point {
  return P.add(Q);
}

// ---- Encoding ----

/** Convert scalar to big-endian 32-byte hex */
export function scalarToHex(scalar: bigint): string {
  return scalar.toString(16).padStart(64, '0');
}

/** Parse hex scalar */
export function hexToScalar(hex: string): bigint {
  return BigInt('0x' + hex.replace(/^0x/, ''));
}

/** Compress a point to 33-byte hex */
export function pointToHex(P: Point): string {
  return bytesToHex(P.toRawBytes(true));
}

/** Parse compressed point from hex; throws if it is not on the curve */
export function hexToPoint(hex: string): Point {
  return secp256k1.ProjectivePoint.fromHex(hex);
}

/** Uncompressed point bytes (65 bytes, prefix 04), used for address derivation */
export function pointToUncompressedBytes(P: Point): Uint8Array {
  return P.toRawBytes(false);
}
