import { BROADCAST, describeRecipient, type ParticipantId, type Recipient } from '../protocol/Message';
import type { FrameHandler, Transport } from './Transport';
import logger from '../../utils/logger';

export interface Envelope {
  from: ParticipantId;
  to: ParticipantId;
  frame: Uint8Array;
}

/**
 * Decides the fate of one frame in flight: `'drop'` loses it, a byte array
 * replaces it, anything else delivers it unchanged.
 */
export type Interceptor = (envelope: Envelope) => 'drop' | Uint8Array | void;

/**
 * In-process transport hub. Every frame is copied per recipient and
 * delivered on a later turn of the event loop, never synchronously.
 */
export class MemoryNetwork {
  private endpoints: Map<ParticipantId, MemoryEndpoint> = new Map();
  private interceptor: Interceptor | null = null;
  private sent = 0;
  private dropped = 0;

  get stats(): { sent: number; dropped: number } {
    return { sent: this.sent, dropped: this.dropped };
  }

  endpoint(id: ParticipantId): Transport {
    let endpoint = this.endpoints.get(id);
    if (!endpoint) {
      endpoint = new MemoryEndpoint(id, this);
      this.endpoints.set(id, endpoint);
    }
    return endpoint;
  }

  /** Install (or with null, remove) the interception hook */
  intercept(interceptor: Interceptor | null): void {
    this.interceptor = interceptor;
  }

  /** @internal */
  route(from: ParticipantId, to: Recipient, frame: Uint8Array): void {
    const targets =
      to === BROADCAST
        ? Array.from(this.endpoints.keys()).filter((id) => id !== from)
        : [to];

    logger.debug(`[MemoryNetwork] ${from} -> ${describeRecipient(to)} (${frame.length} bytes)`);

    for (const target of targets) {
      const endpoint = this.endpoints.get(target);
      if (!endpoint) {
        logger.warn(`[MemoryNetwork] No endpoint for participant ${target}, frame dropped`);
        this.dropped++;
        continue;
      }

      let copy: Uint8Array = frame.slice();
      const verdict = this.interceptor?.({ from, to: target, frame: copy });
      if (verdict === 'drop') {
        this.dropped++;
        continue;
      }
      if (verdict instanceof Uint8Array) copy = verdict;

      this.sent++;
      setImmediate(() => endpoint.dispatch(copy));
    }
  }
}

class MemoryEndpoint implements Transport {
  private handlers: Set<FrameHandler> = new Set();

  constructor(
    readonly localId: ParticipantId,
    private readonly network: MemoryNetwork
  ) {}

  send(to: Recipient, frame: Uint8Array): void {
    this.network.route(this.localId, to, frame);
  }

  subscribe(handler: FrameHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  dispatch(frame: Uint8Array): void {
    for (const handler of Array.from(this.handlers)) handler(frame);
  }
}
