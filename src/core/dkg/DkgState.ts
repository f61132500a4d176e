import type { ParticipantId } from '../../network/protocol/Message';
import type { RandomSource } from '../../crypto/random';

/** Per-party local state during a key generation session */
export interface DkgState {
  sessionId: string;
  localId: ParticipantId;
  participants: readonly ParticipantId[];
  threshold: number;
  random: RandomSource;

  // Round 0 — my secret polynomial
  polynomial: bigint[];          // [a_0, a_1, ..., a_t]
  coefficientCommitments: string[]; // [a_0*G, a_1*G, ...] compressed hex
  blindingFactor: string;        // hex

  // Round 0 — received commitments
  commitments: ReadonlyMap<ParticipantId, string>;

  // Round 1 — verified coefficient commitments, mine included
  verifiedCommitments: ReadonlyMap<ParticipantId, string[]>;
}

/** Shamir evaluation point of a participant; ids start at 0, points at 1 */
export function evaluationPoint(id: ParticipantId): bigint {
  return BigInt(id) + 1n;
}

export function proofContext(sessionId: string, participant: ParticipantId): string {
  return `mpc-round-driver/keygen/${sessionId}/${participant}`;
}
