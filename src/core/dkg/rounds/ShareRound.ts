import { hexToPoint, pointAdd, pointToHex, scalarAdd, scalarMulG, scalarToHex, hexToScalar } from '../../../crypto/secp256k1';
import { evaluatePolynomial } from '../../../crypto/shamir';
import { combinePublicKey, evaluateCommitments, verifyFeldmanShare } from '../FeldmanVss';
import { evaluationPoint, type DkgState } from '../DkgState';
import { SharePayloadSchema, encodePayload } from '../DkgMessages';
import { KEY_SHARE_VERSION, publicKeyToAddress, type KeyShare } from '../KeyShare';
import type { OutboundPayload } from '../../protocol/ProtocolAdapter';
import type { ParticipantId } from '../../../network/protocol/Message';
import { ProtocolError } from '../../../utils/errors';
import { decodeInputs } from './decodeInputs';

/**
 * Key generation round 2: send each peer its Shamir share f_i(x_j) directly.
 * Confidentiality of these messages is the transport's job.
 */
export function executeShareRound(state: DkgState): OutboundPayload[] {
  return state.participants
    .filter((id) => id !== state.localId)
    .map((id) => ({
      to: id,
      payload: encodePayload({ share: scalarToHex(evaluatePolynomial(state.polynomial, evaluationPoint(id))) }),
    }));
}

/**
 * Verify every received share against its sender's Feldman commitments and
 * combine them into this party's key share:
 *   x_i = sum_j f_j(x_i),  PK = sum_j C_{j,0},  X_k = sum_j sum_l C_{j,l} * x_k^l
 */
export function finalizeKeyShare(state: DkgState, inputs: ReadonlyMap<ParticipantId, Uint8Array>): KeyShare {
  const myPoint = evaluationPoint(state.localId);
  const commitmentPoints = new Map(
    Array.from(state.verifiedCommitments, ([id, hexes]) => [id, hexes.map(hexToPoint)] as const)
  );

  let secretShare = evaluatePolynomial(state.polynomial, myPoint);

  for (const [sender, { share }] of decodeInputs(SharePayloadSchema, inputs)) {
    const commitments = commitmentPoints.get(sender);
    if (!commitments) {
      throw new ProtocolError('InconsistentState', `No verified commitments from ${sender}`, sender);
    }

    const value = hexToScalar(share);
    if (!verifyFeldmanShare(value, myPoint, commitments)) {
      throw new ProtocolError('InvalidProof', `Share from ${sender} fails Feldman verification`, sender);
    }

    secretShare = scalarAdd(secretShare, value);
  }

  const allCommitments = state.participants.map((id) => {
    const points = commitmentPoints.get(id);
    if (!points) throw new ProtocolError('InconsistentState', `Missing commitments of ${id}`, id);
    return points;
  });

  const publicKey = pointToHex(combinePublicKey(allCommitments.map((points) => points[0])));

  const publicKeyShares: Record<string, string> = {};
  for (const id of state.participants) {
    const x = evaluationPoint(id);
    const Xk = allCommitments.map((points) => evaluateCommitments(points, x)).reduce(pointAdd);
    publicKeyShares[String(id)] = pointToHex(Xk);
  }

  if (pointToHex(scalarMulG(secretShare)) !== publicKeyShares[String(state.localId)]) {
    throw new ProtocolError('InconsistentState', 'Combined secret share does not match its public key share');
  }

  return {
    version: KEY_SHARE_VERSION,
    sessionId: state.sessionId,
    curve: 'secp256k1',
    threshold: state.threshold,
    participant: state.localId,
    participants: [...state.participants],
    publicKey,
    address: publicKeyToAddress(publicKey),
    secretShare: scalarToHex(secretShare),
    publicKeyShares,
  };
}
