import { z } from 'zod';
import { getAddress, keccak256 } from 'viem';
import { hexToPoint, pointToUncompressedBytes } from '../../crypto/secp256k1';
import { pointHex, scalarHex } from './DkgMessages';
import { DriverError } from '../../utils/errors';

export const KEY_SHARE_VERSION = 1;

export const KeyShareSchema = z.object({
  version: z.literal(KEY_SHARE_VERSION),
  sessionId: z.string().min(1),
  curve: z.literal('secp256k1'),
  threshold: z.number().int().min(1),
  participant: z.number().int().min(0),
  participants: z.array(z.number().int().min(0)).min(2),
  /** Compressed group public key */
  publicKey: pointHex,
  /** EIP-55 address of the group public key */
  address: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
  /** x_i = sum_j f_j(x_i); secret */
  secretShare: scalarHex,
  /** participant id → X_j = x_j * G */
  publicKeyShares: z.record(z.string(), pointHex),
});

export type KeyShare = z.infer<typeof KeyShareSchema>;

export function encodeKeyShare(share: KeyShare): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(share));
}

/** Parse and validate a serialized key share (the keygen artifact) */
export function decodeKeyShare(bytes: Uint8Array): KeyShare {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (err) {
    throw new DriverError(`Key share is not UTF-8 JSON: ${err instanceof Error ? err.message : String(err)}`);
  }

  const result = KeyShareSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new DriverError(`Invalid key share: ${issues}`);
  }
  return result.data;
}

/**
 * Ethereum address of a compressed secp256k1 public key:
 * last 20 bytes of keccak256(uncompressed point without the 0x04 prefix), EIP-55 checksummed.
 */
export function publicKeyToAddress(compressedPubkeyHex: string): string {
  const uncompressed = pointToUncompressedBytes(hexToPoint(compressedPubkeyHex.replace(/^0x/, '')));
  const hash = keccak256(uncompressed.slice(1));
  return getAddress(`0x${hash.slice(-40)}`);
}
