import type { ParticipantId, RoundMessage } from '../../network/protocol/Message';
import { BufferError, DriverError } from '../../utils/errors';

/** Which senders a round waits for, and how many of them make it complete */
export interface Quorum {
  expected: readonly ParticipantId[];
  required: number;
}

export type AdmitResult = { ok: true } | { ok: false; error: BufferError };

/**
 * Per-round mailbox. Holds at most one message per sender for the current
 * round; a second message from the same sender is rejected, never merged.
 */
export class RoundBuffer {
  private entries: Map<ParticipantId, RoundMessage> = new Map();
  private currentRound: number;

  constructor(round = 0) {
    this.currentRound = round;
  }

  get round(): number {
    return this.currentRound;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Senders with an entry, ascending */
  senders(): ParticipantId[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b);
  }

  has(sender: ParticipantId): boolean {
    return this.entries.has(sender);
  }

  admit(message: RoundMessage): AdmitResult {
    if (message.round !== this.currentRound) {
      throw new DriverError(`Round ${message.round} message offered to the round ${this.currentRound} buffer`);
    }
    if (this.entries.has(message.from)) {
      return { ok: false, error: new BufferError(message.from, message.round) };
    }
    this.entries.set(message.from, message);
    return { ok: true };
  }

  isComplete(quorum: Quorum): boolean {
    return this.countExpected(quorum) >= quorum.required;
  }

  missing(quorum: Quorum): ParticipantId[] {
    return quorum.expected.filter((id) => !this.entries.has(id)).sort((a, b) => a - b);
  }

  /**
   * Hand out the round's payloads ordered by participant id, then reset for
   * the next round. Only callable once the quorum is met.
   */
  drain(quorum: Quorum): Map<ParticipantId, Uint8Array> {
    if (!this.isComplete(quorum)) {
      throw new DriverError(
        `Round ${this.currentRound} drained before completion (${this.countExpected(quorum)}/${quorum.required})`
      );
    }

    const expected = new Set(quorum.expected);
    const inputs = new Map<ParticipantId, Uint8Array>();
    for (const sender of this.senders()) {
      const entry = this.entries.get(sender);
      if (entry && expected.has(sender)) inputs.set(sender, entry.payload);
    }

    this.reset(this.currentRound + 1);
    return inputs;
  }

  reset(round: number): void {
    this.entries = new Map();
    this.currentRound = round;
  }

  private countExpected(quorum: Quorum): number {
    return quorum.expected.filter((id) => this.entries.has(id)).length;
  }
}
