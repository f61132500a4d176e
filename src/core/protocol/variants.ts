export const PROTOCOL_FAMILIES = ['gg20', 'cggmp'] as const;
export const PROTOCOL_KINDS = ['keygen', 'presign', 'sign'] as const;

export type ProtocolFamily = (typeof PROTOCOL_FAMILIES)[number];
export type ProtocolKind = (typeof PROTOCOL_KINDS)[number];

export interface ProtocolVariant {
  family: ProtocolFamily;
  kind: ProtocolKind;
}

export type Curve = 'secp256k1';

/** Public, protocol-specific parameters of a session */
export interface ProtocolParameters {
  curve: Curve;
  /** t: any t+1 shares can sign, t or fewer learn nothing */
  threshold: number;
  /** Serialized key share from a previous keygen (presign, sign) */
  keyShare?: Uint8Array;
  /** Serialized presignature (sign, when presigning was done separately) */
  presignature?: Uint8Array;
  /** 32-byte message digest to sign (sign) */
  message?: Uint8Array;
}

export function variantKey(variant: ProtocolVariant): string {
  return `${variant.family}/${variant.kind}`;
}

/** Smallest participant set that can run the variant */
export function minParticipants(variant: ProtocolVariant, threshold: number): number {
  return variant.kind === 'keygen' ? threshold + 1 : Math.max(2, threshold + 1);
}

/** Names of the parameters the variant cannot run without */
export function requiredParameters(variant: ProtocolVariant): (keyof ProtocolParameters)[] {
  switch (variant.kind) {
    case 'keygen':
      return [];
    case 'presign':
      return ['keyShare'];
    case 'sign':
      return ['keyShare', 'message'];
  }
}
