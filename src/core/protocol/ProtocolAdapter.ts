import type { ParticipantId, Recipient } from '../../network/protocol/Message';
import type { RandomSource } from '../../crypto/random';
import type { ProtocolParameters, ProtocolVariant } from './variants';

/** Everything an adapter learns about its session, fixed at start */
export interface AdapterContext {
  sessionId: string;
  localId: ParticipantId;
  /** Ascending, no duplicates */
  participants: readonly ParticipantId[];
  parameters: ProtocolParameters;
  random: RandomSource;
}

export interface OutboundPayload {
  to: Recipient;
  payload: Uint8Array;
}

export type ArtifactKind = 'keyShare' | 'presignature' | 'signature';

export interface Artifact {
  kind: ArtifactKind;
  bytes: Uint8Array;
}

/** An unrecoverable cryptographic fault, attributed to a participant when possible */
export type ProtocolFault =
  | { kind: 'InvalidProof'; participant: ParticipantId; detail: string }
  | { kind: 'InconsistentState'; participant?: ParticipantId; detail: string };

export type AdvanceResult<S> =
  | { type: 'nextRound'; state: S; outbound: OutboundPayload[] }
  | { type: 'finished'; artifact: Artifact }
  | { type: 'protocolError'; fault: ProtocolFault };

export interface RoundStart<S> {
  state: S;
  /** Round 0 messages */
  outbound: OutboundPayload[];
}

/**
 * Completeness rule for one round. `required` defaults to every expected
 * sender; a smaller number makes the round complete on the first `required`
 * arrivals.
 */
export interface QuorumRule {
  /** Whether the local participant's own message is part of the round's input */
  includeSelf: boolean;
  required?: number;
}

/**
 * One protocol variant's round functions. The driver never looks inside `S`;
 * it only threads it from one call to the next. Given the same context,
 * randomness and inputs, an adapter must produce the same results.
 */
export interface ProtocolAdapter<S> {
  readonly variant: ProtocolVariant;
  /** Number of rounds; rounds are numbered from 0 */
  readonly rounds: number;

  start(ctx: AdapterContext): RoundStart<S>;

  quorum(round: number, ctx: AdapterContext): QuorumRule;

  /** Structural check run before a payload is buffered; returns the defect, if any */
  checkPayload(round: number, payload: Uint8Array): string | undefined;

  /**
   * Compute from the complete input of `round`. `inputs` is ordered by
   * ascending participant id. Must not call back into the session.
   */
  advance(state: S, inputs: ReadonlyMap<ParticipantId, Uint8Array>, round: number): AdvanceResult<S>;
}

export function nextRound<S>(state: S, outbound: OutboundPayload[]): AdvanceResult<S> {
  return { type: 'nextRound', state, outbound };
}

export function finished<S>(artifact: Artifact): AdvanceResult<S> {
  return { type: 'finished', artifact };
}

export function protocolError<S>(fault: ProtocolFault): AdvanceResult<S> {
  return { type: 'protocolError', fault };
}
