import { hexToPoint, type Point } from '../../../crypto/secp256k1';
import { schnorrProve, schnorrVerify, verifyCommitment } from '../../../crypto/commitment';
import { proofContext, type DkgState } from '../DkgState';
import { decommitPayloadSchema, encodePayload } from '../DkgMessages';
import type { OutboundPayload } from '../../protocol/ProtocolAdapter';
import { BROADCAST, type ParticipantId } from '../../../network/protocol/Message';
import { ProtocolError } from '../../../utils/errors';
import { decodeInputs } from './decodeInputs';

/**
 * Key generation round 1: open the round 0 commitment and prove knowledge of a_0.
 *
 * Each party broadcasts:
 * - All coefficient points [a_0*G, ..., a_t*G] (the Feldman VSS commitments)
 * - The round 0 blinding factor, so others can check the opening
 * - A Schnorr proof of knowledge of a_0, bound to the session and the sender
 */
export function executeDecommitRound(state: DkgState): OutboundPayload {
  const a0G = hexToPoint(state.coefficientCommitments[0]);
  const proof = schnorrProve(
    state.polynomial[0],
    a0G,
    proofContext(state.sessionId, state.localId),
    state.random
  );

  return {
    to: BROADCAST,
    payload: encodePayload({
      coefficientCommitments: state.coefficientCommitments,
      blindingFactor: state.blindingFactor,
      proof,
    }),
  };
}

/** Check every peer's opening against its round 0 commitment, then its proof */
export function verifyDecommitments(state: DkgState, inputs: ReadonlyMap<ParticipantId, Uint8Array>): DkgState {
  const verifiedCommitments = new Map<ParticipantId, string[]>([
    [state.localId, state.coefficientCommitments],
  ]);

  for (const [sender, opening] of decodeInputs(decommitPayloadSchema(state.threshold), inputs)) {
    const commitment = state.commitments.get(sender);
    if (!commitment) {
      throw new ProtocolError('InconsistentState', `No round 0 commitment from ${sender}`, sender);
    }

    const points = opening.coefficientCommitments.map(tryPoint);
    if (points.some((P) => P === null)) {
      throw new ProtocolError('InvalidProof', `Coefficient commitment from ${sender} is not a curve point`, sender);
    }
    const coefficientPoints = points.filter((P): P is Point => P !== null);

    if (!verifyCommitment(commitment, coefficientPoints, opening.blindingFactor)) {
      throw new ProtocolError('InconsistentState', `Round 1 opening does not match the round 0 commitment of ${sender}`, sender);
    }

    if (!schnorrVerify(coefficientPoints[0], opening.proof, proofContext(state.sessionId, sender))) {
      throw new ProtocolError('InvalidProof', `Schnorr proof of knowledge from ${sender} is invalid`, sender);
    }

    verifiedCommitments.set(sender, opening.coefficientCommitments);
  }

  return { ...state, verifiedCommitments };
}

function tryPoint(hex: string): Point | null {
  try {
    return hexToPoint(hex);
  } catch {
    return null;
  }
}
