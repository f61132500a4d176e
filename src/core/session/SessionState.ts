import type { ParticipantId } from '../../network/protocol/Message';
import type { Artifact } from '../protocol/ProtocolAdapter';

export type AbortReason =
  | { kind: 'InvalidProof'; round: number; participant: ParticipantId; detail: string }
  | { kind: 'InconsistentState'; round: number; participant?: ParticipantId; detail: string }
  | { kind: 'MisbehaviorLimit'; round: number; participant: ParticipantId; violations: number }
  | { kind: 'Timeout'; round: number; missing: ParticipantId[] }
  | { kind: 'Cancelled'; round: number };

export type SessionState =
  | { status: 'awaitingMessages'; round: number; received: readonly ParticipantId[] }
  | { status: 'computing'; round: number }
  | { status: 'completed'; artifact: Artifact }
  | { status: 'aborted'; reason: AbortReason };

export type TerminalState = Extract<SessionState, { status: 'completed' | 'aborted' }>;

export function isTerminal(state: SessionState): state is TerminalState {
  return state.status === 'completed' || state.status === 'aborted';
}

export function describeAbort(reason: AbortReason): string {
  switch (reason.kind) {
    case 'InvalidProof':
      return `invalid proof from participant ${reason.participant} in round ${reason.round}: ${reason.detail}`;
    case 'InconsistentState':
      return reason.participant === undefined
        ? `inconsistent protocol state in round ${reason.round}: ${reason.detail}`
        : `inconsistent protocol state caused by participant ${reason.participant} in round ${reason.round}: ${reason.detail}`;
    case 'MisbehaviorLimit':
      return `participant ${reason.participant} exceeded the misbehavior tolerance (${reason.violations} violations) in round ${reason.round}`;
    case 'Timeout':
      return `round ${reason.round} timed out waiting for ${reason.missing.join(', ') || 'nobody'}`;
    case 'Cancelled':
      return `cancelled in round ${reason.round}`;
  }
}
