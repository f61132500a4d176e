import type { DkgState } from './DkgState';
import { CommitPayloadSchema, SharePayloadSchema, decommitPayloadSchema, parsePayload } from './DkgMessages';
import { encodeKeyShare } from './KeyShare';
import { executeCommitRound, recordCommitments } from './rounds/CommitRound';
import { executeDecommitRound, verifyDecommitments } from './rounds/DecommitRound';
import { executeShareRound, finalizeKeyShare } from './rounds/ShareRound';
import {
  finished,
  nextRound,
  protocolError,
  type AdvanceResult,
  type ProtocolAdapter,
} from '../protocol/ProtocolAdapter';
import type { ProtocolParameters, ProtocolVariant } from '../protocol/variants';
import { ProtocolError } from '../../utils/errors';

export const DKG_ROUNDS = 3;

/**
 * Feldman VSS distributed key generation:
 *
 *   round 0  broadcast  H(coefficient points, r)
 *   round 1  broadcast  coefficient points, r, Schnorr proof of a_0
 *   round 2  direct     f_i(x_j) to each peer
 *
 * Every round waits for all peers. The output is a `keyShare` artifact.
 */
export function createDkgAdapter(variant: ProtocolVariant, parameters: ProtocolParameters): ProtocolAdapter<DkgState> {
  const decommitSchema = decommitPayloadSchema(parameters.threshold);
  const schemas = [CommitPayloadSchema, decommitSchema, SharePayloadSchema] as const;

  return {
    variant,
    rounds: DKG_ROUNDS,

    start: executeCommitRound,

    quorum: () => ({ includeSelf: false }),

    checkPayload(round, payload) {
      const schema = schemas[round];
      if (!schema) return `no round ${round} in key generation`;
      const parsed = parsePayload<unknown>(schema, payload);
      return parsed.ok ? undefined : parsed.defect;
    },

    advance(state, inputs, round): AdvanceResult<DkgState> {
      try {
        switch (round) {
          case 0: {
            const next = recordCommitments(state, inputs);
            return nextRound(next, [executeDecommitRound(next)]);
          }
          case 1: {
            const next = verifyDecommitments(state, inputs);
            return nextRound(next, executeShareRound(next));
          }
          case 2:
            return finished({ kind: 'keyShare', bytes: encodeKeyShare(finalizeKeyShare(state, inputs)) });
          default:
            return protocolError({ kind: 'InconsistentState', detail: `no round ${round} in key generation` });
        }
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err;
        if (err.kind === 'InvalidProof' && err.participant !== undefined) {
          return protocolError({ kind: 'InvalidProof', participant: err.participant, detail: err.message });
        }
        return protocolError({ kind: 'InconsistentState', participant: err.participant, detail: err.message });
      }
    },
  };
}
