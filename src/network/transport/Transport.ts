import type { ParticipantId, Recipient } from '../protocol/Message';

export type FrameHandler = (frame: Uint8Array) => void;

/**
 * What a session needs from the network: fire-and-forget delivery of
 * encoded frames, and a way to hear inbound ones. Authentication of the
 * peer behind each frame belongs to the transport.
 */
export interface Transport {
  readonly localId: ParticipantId;

  /** Queue `frame` for `to`; a broadcast reaches every participant but the sender */
  send(to: Recipient, frame: Uint8Array): void;

  /** Register an inbound frame handler; returns its unsubscribe function */
  subscribe(handler: FrameHandler): () => void;
}
