/** Opaque participant identifier, unique and stable within one session (u32). */
export type ParticipantId = number;

export const MAX_PARTICIPANT_ID = 0xffff_ffff;
export const MAX_ROUND = 0xffff_ffff;

export const BROADCAST = 'broadcast' as const;

/** Either a single participant or every participant except the sender. */
export type Recipient = ParticipantId | typeof BROADCAST;

// ---- Base envelope ----

export interface RoundMessage {
  from: ParticipantId;
  round: number;
  /** Variant-specific encoding; only the protocol adapter interprets it. */
  payload: Uint8Array;
}

export interface OutboundMessage {
  to: Recipient;
  message: RoundMessage;
}

export function isBroadcast(to: Recipient): to is typeof BROADCAST {
  return to === BROADCAST;
}

export function describeRecipient(to: Recipient): string {
  return isBroadcast(to) ? 'all' : `participant ${to}`;
}
