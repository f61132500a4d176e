import { generateScalar, hexToPoint } from '../../../crypto/secp256k1';
import { generatePolynomial } from '../../../crypto/shamir';
import { commitPoints } from '../../../crypto/commitment';
import { feldmanCommitments } from '../FeldmanVss';
import type { DkgState } from '../DkgState';
import { CommitPayloadSchema, encodePayload } from '../DkgMessages';
import type { AdapterContext, RoundStart } from '../../protocol/ProtocolAdapter';
import { BROADCAST, type ParticipantId } from '../../../network/protocol/Message';
import { decodeInputs } from './decodeInputs';

/**
 * Key generation round 0: sample the secret polynomial and broadcast a
 * commitment to its coefficient points.
 *
 * Each party:
 * 1. Samples a_0 (its contribution to the group secret)
 * 2. Builds a polynomial of degree t with a_0 as the constant term
 * 3. Computes the coefficient points [a_0*G, a_1*G, ..., a_t*G]
 * 4. Broadcasts C = H(points, r) for a random blinding factor r,
 *    but not the points themselves
 */
export function executeCommitRound(ctx: AdapterContext): RoundStart<DkgState> {
  const { random } = ctx;
  const threshold = ctx.parameters.threshold;

  const secret = generateScalar(random);
  const polynomial = generatePolynomial(secret, threshold, random);
  const coefficientCommitments = feldmanCommitments(polynomial);
  const { commitment, blindingFactor } = commitPoints(
    coefficientCommitments.map(hexToPoint),
    generateScalar(random)
  );

  const state: DkgState = {
    sessionId: ctx.sessionId,
    localId: ctx.localId,
    participants: ctx.participants,
    threshold,
    random,
    polynomial,
    coefficientCommitments,
    blindingFactor,
    commitments: new Map(),
    verifiedCommitments: new Map(),
  };

  return {
    state,
    outbound: [{ to: BROADCAST, payload: encodePayload({ commitment }) }],
  };
}

/** Record every peer's round 0 commitment */
export function recordCommitments(state: DkgState, inputs: ReadonlyMap<ParticipantId, Uint8Array>): DkgState {
  const commitments = new Map<ParticipantId, string>();
  for (const [sender, payload] of decodeInputs(CommitPayloadSchema, inputs)) {
    commitments.set(sender, payload.commitment);
  }
  return { ...state, commitments };
}
