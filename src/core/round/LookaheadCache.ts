import type { ParticipantId, RoundMessage } from '../../network/protocol/Message';

export type HoldResult = 'held' | 'duplicate' | 'beyondWindow';

/**
 * Bounded store for messages that arrive before their round. Holds at most
 * one message per sender for each of the `window` rounds after the current
 * one; the first message from a sender wins.
 */
export class LookaheadCache {
  private rounds: Map<number, Map<ParticipantId, RoundMessage>> = new Map();

  constructor(private readonly window: number) {}

  get size(): number {
    let total = 0;
    for (const messages of this.rounds.values()) total += messages.size;
    return total;
  }

  /** Whether a message for `round` may be held while `currentRound` is awaited */
  accepts(round: number, currentRound: number): boolean {
    return round > currentRound && round - currentRound <= this.window;
  }

  hold(message: RoundMessage, currentRound: number): HoldResult {
    if (!this.accepts(message.round, currentRound)) return 'beyondWindow';

    let messages = this.rounds.get(message.round);
    if (!messages) {
      messages = new Map();
      this.rounds.set(message.round, messages);
    }
    if (messages.has(message.from)) return 'duplicate';

    messages.set(message.from, message);
    return 'held';
  }

  /** Remove and return the messages held for `round`, ordered by sender; older rounds are dropped */
  take(round: number): RoundMessage[] {
    const messages = this.rounds.get(round);
    for (const held of Array.from(this.rounds.keys())) {
      if (held <= round) this.rounds.delete(held);
    }
    if (!messages) return [];
    return Array.from(messages.values()).sort((a, b) => a.from - b.from);
  }

  clear(): void {
    this.rounds.clear();
  }
}
