import {
  BROADCAST,
  isBroadcast,
  type OutboundMessage,
  type ParticipantId,
  type Recipient,
  type RoundMessage,
} from '../../network/protocol/Message';
import { parseRoundMessage, validateMessage, type ValidationResult } from '../../network/protocol/MessageValidator';
import { RoundBuffer, type Quorum } from '../round/RoundBuffer';
import { LookaheadCache } from '../round/LookaheadCache';
import type {
  AdapterContext,
  AdvanceResult,
  Artifact,
  OutboundPayload,
  ProtocolAdapter,
  ProtocolFault,
  QuorumRule,
} from '../protocol/ProtocolAdapter';
import { describeAbort, isTerminal, type AbortReason, type SessionState } from './SessionState';
import type { SessionConfig } from '../../config/session';
import { BufferError, DriverError, ReentrantCallError, ValidationError } from '../../utils/errors';
import logger from '../../utils/logger';

export type DriverStep =
  /** Message buffered; the round still waits for others */
  | { type: 'accepted'; state: SessionState }
  /** Message for a later round, kept in the look-ahead cache */
  | { type: 'held'; state: SessionState }
  /** Round complete; `poll()` runs the adapter */
  | { type: 'ready'; state: SessionState }
  /** Message dropped */
  | { type: 'rejected'; error: ValidationError | BufferError; state: SessionState }
  /** Outbound messages of `round` to hand to the transport */
  | { type: 'advanced'; round: number; outbound: OutboundMessage[]; state: SessionState }
  | { type: 'completed'; artifact: Artifact; state: SessionState }
  | { type: 'aborted'; reason: AbortReason; state: SessionState }
  /** Nothing to do: no pending computation, or the session already ended */
  | { type: 'idle'; state: SessionState };

type Dispatch =
  | { ok: true; messages: OutboundMessage[]; selfPayload?: Uint8Array }
  | { ok: false; detail: string };

/**
 * Round-sequencing state machine for one session.
 *
 * Every entry point returns immediately. The adapter runs only from `poll()`,
 * at most once per round, and only once the round's quorum is buffered.
 * Messages for later rounds wait in a bounded look-ahead cache and are
 * replayed when their round opens.
 */
export class SessionDriver<S = unknown> {
  readonly config: SessionConfig;

  private readonly adapter: ProtocolAdapter<S>;
  private readonly ctx: AdapterContext;
  private readonly knownSenders: ReadonlySet<ParticipantId>;
  private readonly quorums: Map<number, Quorum> = new Map();
  private readonly violations: Map<ParticipantId, number> = new Map();
  private readonly logTag: string;

  private state: SessionState = { status: 'awaitingMessages', round: 0, received: [] };
  private protocol: { state: S } | null = null;
  private buffer = new RoundBuffer(0);
  private cache: LookaheadCache;
  private started = false;
  /** Set while the adapter runs; guards against re-entrant calls from inside it */
  private running = false;
  private lastComputedRound = -1;

  constructor(config: SessionConfig, adapter: ProtocolAdapter<S>) {
    this.config = config;
    this.adapter = adapter;
    this.ctx = {
      sessionId: config.sessionId,
      localId: config.localId,
      participants: config.participants,
      parameters: config.parameters,
      random: config.random,
    };
    this.knownSenders = new Set(config.participants.filter((id) => id !== config.localId));
    this.cache = new LookaheadCache(config.lookaheadRounds);
    this.logTag = `[SessionDriver ${config.sessionId.slice(0, 8)}#${config.localId}]`;
  }

  get sessionId(): string {
    return this.config.sessionId;
  }

  get current(): SessionState {
    return this.state;
  }

  /** Participants whose malformed or duplicate messages were dropped */
  flaggedParticipants(): ParticipantId[] {
    return Array.from(this.violations.keys()).sort((a, b) => a - b);
  }

  /** Expected senders the awaited round has not heard from */
  missing(): ParticipantId[] {
    if (this.state.status !== 'awaitingMessages') return [];
    return this.buffer.missing(this.quorumFor(this.state.round));
  }

  /** Run the adapter's start and produce the round 0 messages */
  start(): DriverStep {
    this.assertIdle('start');
    if (this.started) throw new DriverError('Session already started');
    this.started = true;
    if (isTerminal(this.state)) return { type: 'idle', state: this.state };

    logger.info(
      `${this.logTag} Starting ${this.config.variant.family}/${this.config.variant.kind} with participants ${this.config.participants.join(', ')}`
    );

    let start: { state: S; outbound: OutboundPayload[] };
    this.running = true;
    try {
      start = this.adapter.start(this.ctx);
    } catch (err) {
      return this.abort({ kind: 'InconsistentState', round: 0, detail: `adapter start failed: ${errorMessage(err)}` });
    } finally {
      this.running = false;
    }

    return this.openRound(0, start.state, start.outbound);
  }

  /** Feed one inbound message */
  receive(input: unknown): DriverStep {
    this.assertIdle('receive');
    if (!this.started) throw new DriverError('receive() before start()');
    if (isTerminal(this.state)) return { type: 'idle', state: this.state };

    const parsed = parseRoundMessage(input);
    if (!parsed.ok) return this.reject(parsed.error);
    const { message } = parsed;

    return this.admit(message);
  }

  /** Run the pending computation, if the current round is complete */
  poll(): DriverStep {
    this.assertIdle('poll');
    if (this.state.status !== 'computing') return { type: 'idle', state: this.state };

    const round = this.state.round;
    if (round <= this.lastComputedRound || !this.protocol) {
      throw new DriverError(`Round ${round} computed twice`);
    }
    this.lastComputedRound = round;

    const inputs = this.buffer.drain(this.quorumFor(round));
    logger.debug(`${this.logTag} Computing round ${round} from ${Array.from(inputs.keys()).join(', ')}`);

    let result: AdvanceResult<S>;
    this.running = true;
    try {
      result = this.adapter.advance(this.protocol.state, inputs, round);
    } catch (err) {
      return this.abort({ kind: 'InconsistentState', round, detail: `adapter failed: ${errorMessage(err)}` });
    } finally {
      this.running = false;
    }

    switch (result.type) {
      case 'nextRound':
        if (round + 1 >= this.adapter.rounds) {
          return this.abort({
            kind: 'InconsistentState',
            round,
            detail: `adapter continued past its last round (${this.adapter.rounds - 1})`,
          });
        }
        return this.openRound(round + 1, result.state, result.outbound);
      case 'finished':
        return this.complete(result.artifact);
      case 'protocolError':
        return this.abort(faultToReason(result.fault, round));
    }
  }

  /** Host-initiated cancellation; no artifact is ever produced afterwards */
  cancel(): DriverStep {
    this.assertIdle('cancel');
    if (isTerminal(this.state)) return { type: 'idle', state: this.state };
    return this.abort({ kind: 'Cancelled', round: this.state.round });
  }

  /** The deadline of `round` passed; aborts if the session is still awaiting it */
  expire(round: number): DriverStep {
    this.assertIdle('expire');
    if (this.state.status !== 'awaitingMessages' || this.state.round !== round) {
      return { type: 'idle', state: this.state };
    }
    return this.abort({ kind: 'Timeout', round, missing: this.missing() });
  }

  // ---- Round transitions ----

  private openRound(round: number, protocolState: S, outbound: OutboundPayload[]): DriverStep {
    try {
      this.quorumFor(round);
    } catch (err) {
      return this.abort({ kind: 'InconsistentState', round, detail: errorMessage(err) });
    }

    const dispatch = this.dispatch(round, outbound);
    if (!dispatch.ok) {
      return this.abort({ kind: 'InconsistentState', round, detail: dispatch.detail });
    }

    this.protocol = { state: protocolState };
    if (this.buffer.round !== round) this.buffer.reset(round);
    this.state = { status: 'awaitingMessages', round, received: [] };

    if (dispatch.selfPayload) {
      this.buffer.admit({ from: this.config.localId, round, payload: dispatch.selfPayload });
    }
    this.settle();

    // Held messages past the quorum are refused like live ones
    for (const early of this.cache.take(round)) {
      const step = this.admit(early);
      if (step.type === 'aborted') return step;
    }

    logger.info(`${this.logTag} Round ${round} opened, sending ${dispatch.messages.length} message(s)`);
    return { type: 'advanced', round, outbound: dispatch.messages, state: this.state };
  }

  /**
   * Check the adapter's outbound set: every recipient is a participant and
   * gets exactly one message; a broadcast is the round's only message; the
   * local participant addresses itself only when its round input includes
   * its own message, and then it must.
   */
  private dispatch(round: number, outbound: OutboundPayload[]): Dispatch {
    const { localId, participants, maxPayloadBytes } = this.config;
    const includeSelf = this.quorumFor(round).expected.includes(localId);
    const seen = new Set<Recipient>();
    let selfPayload: Uint8Array | undefined;

    for (const { to, payload } of outbound) {
      if (isBroadcast(to)) {
        if (outbound.length !== 1) {
          return { ok: false, detail: `round ${round} mixes a broadcast with other messages` };
        }
      } else if (!participants.includes(to)) {
        return { ok: false, detail: `round ${round} addresses unknown participant ${to}` };
      } else if (to === localId && !includeSelf) {
        return { ok: false, detail: `round ${round} addresses the local participant` };
      }

      if (seen.has(to)) {
        return { ok: false, detail: `round ${round} addresses participant ${String(to)} twice` };
      }
      seen.add(to);

      if (payload.length > maxPayloadBytes) {
        return { ok: false, detail: `round ${round} payload of ${payload.length} bytes exceeds ${maxPayloadBytes}` };
      }

      if (includeSelf && (to === BROADCAST || to === localId)) selfPayload = payload;
    }

    if (includeSelf && !selfPayload) {
      return { ok: false, detail: `round ${round} takes the local participant's message but none was produced` };
    }

    const messages = outbound
      .filter(({ to }) => to !== localId)
      .map(({ to, payload }) => ({ to, message: { from: localId, round, payload } }));

    return { ok: true, messages, selfPayload };
  }

  private settle(): DriverStep {
    const round = this.buffer.round;
    if (this.buffer.isComplete(this.quorumFor(round))) {
      this.state = { status: 'computing', round };
      logger.debug(`${this.logTag} Round ${round} complete`);
      return { type: 'ready', state: this.state };
    }
    this.state = { status: 'awaitingMessages', round, received: this.buffer.senders() };
    return { type: 'accepted', state: this.state };
  }

  private complete(artifact: Artifact): DriverStep {
    this.state = { status: 'completed', artifact };
    this.release();
    logger.info(`${this.logTag} Completed with ${artifact.kind} (${artifact.bytes.length} bytes)`);
    return { type: 'completed', artifact, state: this.state };
  }

  private abort(reason: AbortReason): DriverStep {
    this.state = { status: 'aborted', reason };
    this.release();
    logger.warn(`${this.logTag} Aborted: ${describeAbort(reason)}`);
    return { type: 'aborted', reason, state: this.state };
  }

  private release(): void {
    this.protocol = null;
    this.buffer.reset(this.buffer.round);
    this.cache.clear();
  }

  // ---- Inbound ----

  /** Admit to the open round, hold for a later one, or refuse once the round has closed */
  private admit(message: RoundMessage): DriverStep {
    const round = this.buffer.round;
    if (message.round > round) return this.holdOrReject(message, round);

    const result = this.validate(message, round);
    if (!result.ok) return this.reject(result.error);

    if (this.state.status === 'computing') {
      if (this.buffer.has(message.from)) return this.reject(new BufferError(message.from, round));
      return this.reject(closedRound(message, round));
    }

    const admitted = this.buffer.admit(message);
    if (!admitted.ok) return this.reject(admitted.error);

    logger.debug(`${this.logTag} Round ${round} message from ${message.from}`);
    return this.settle();
  }

  private holdOrReject(message: RoundMessage, currentRound: number): DriverStep {
    const result = this.validate(message, message.round);
    if (!result.ok) return this.reject(result.error);

    if (message.round >= this.adapter.rounds || !this.cache.accepts(message.round, currentRound)) {
      return this.reject(
        new ValidationError(
          'StaleOrFutureRound',
          `Round ${message.round} from ${message.from} is beyond the look-ahead window of round ${currentRound}`,
          { sender: message.from, round: message.round, expectedRound: currentRound }
        )
      );
    }

    if (this.cache.hold(message, currentRound) === 'duplicate') {
      return this.reject(new BufferError(message.from, message.round));
    }

    logger.debug(`${this.logTag} Holding round ${message.round} message from ${message.from}`);
    return { type: 'held', state: this.state };
  }

  private validate(message: RoundMessage, expectedRound: number): ValidationResult {
    return validateMessage(message, {
      expectedRound,
      knownSenders: this.knownSenders,
      maxPayloadBytes: this.config.maxPayloadBytes,
      checkPayload: (round, payload) => this.adapter.checkPayload(round, payload),
    });
  }

  private reject(error: ValidationError | BufferError): DriverStep {
    const sender = attributableSender(error);
    if (sender === undefined) {
      logger.debug(`${this.logTag} Dropped message: ${error.message}`);
      return { type: 'rejected', error, state: this.state };
    }

    const violations = (this.violations.get(sender) ?? 0) + 1;
    this.violations.set(sender, violations);
    logger.warn(`${this.logTag} Dropped message (${violations} from ${sender}): ${error.message}`);

    const tolerance = this.config.misbehaviorTolerance;
    if (tolerance !== undefined && violations > tolerance && !isTerminal(this.state)) {
      return this.abort({ kind: 'MisbehaviorLimit', round: this.state.round, participant: sender, violations });
    }
    return { type: 'rejected', error, state: this.state };
  }

  // ---- Helpers ----

  private quorumFor(round: number): Quorum {
    const cached = this.quorums.get(round);
    if (cached) return cached;

    let rule: QuorumRule;
    this.running = true;
    try {
      rule = this.adapter.quorum(round, this.ctx);
    } finally {
      this.running = false;
    }
    const expected = this.config.participants.filter((id) => rule.includeSelf || id !== this.config.localId);
    const required = rule.required ?? expected.length;
    if (!Number.isInteger(required) || required < 1 || required > expected.length) {
      throw new DriverError(`Round ${round} quorum of ${required} is not within 1..${expected.length}`);
    }

    const quorum: Quorum = { expected, required };
    this.quorums.set(round, quorum);
    return quorum;
  }

  private assertIdle(operation: string): void {
    if (this.running) throw new ReentrantCallError(operation);
  }
}

/** Sender to charge a dropped message to: malformed payloads and duplicates only */
function attributableSender(error: ValidationError | BufferError): ParticipantId | undefined {
  if (error instanceof BufferError) return error.sender;
  return error.kind === 'MalformedPayload' ? error.detail.sender : undefined;
}

function closedRound(message: RoundMessage, round: number): ValidationError {
  return new ValidationError(
    'StaleOrFutureRound',
    `Round ${message.round} from ${message.from} arrived after the round closed`,
    { sender: message.from, round: message.round, expectedRound: round + 1 }
  );
}

function faultToReason(fault: ProtocolFault, round: number): AbortReason {
  return fault.kind === 'InvalidProof'
    ? { kind: 'InvalidProof', round, participant: fault.participant, detail: fault.detail }
    : { kind: 'InconsistentState', round, participant: fault.participant, detail: fault.detail };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
