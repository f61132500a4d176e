import { sha256 } from '@noble/hashes/sha256';
import { equalBytes } from '@noble/curves/abstract/utils';
import { MAX_PARTICIPANT_ID, MAX_ROUND, type RoundMessage } from './Message';
import { DriverError, ValidationError } from '../../utils/errors';

/**
 * Session-level framing. This is the only wire format the driver fixes:
 *
 *   version (u8) | sender (u32 BE) | round (u32 BE) | length (u32 BE) | payload | SHA-256 tag
 *
 * The tag covers every byte before it. It detects corruption in transit; it
 * is not an authenticator, peers are authenticated by the transport.
 */
export const FRAME_VERSION = 0x01;
export const HEADER_BYTES = 13;
export const TAG_BYTES = 32;
export const DEFAULT_MAX_PAYLOAD_BYTES = 1_048_576;

function isU32(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

/** Serialize a round message into a tagged frame */
export function encodeMessage(
  message: RoundMessage,
  maxPayloadBytes: number = DEFAULT_MAX_PAYLOAD_BYTES
): Uint8Array {
  if (!isU32(message.from, MAX_PARTICIPANT_ID)) {
    throw new DriverError(`Sender id out of range: ${message.from}`);
  }
  if (!isU32(message.round, MAX_ROUND)) {
    throw new DriverError(`Round out of range: ${message.round}`);
  }
  if (message.payload.length > maxPayloadBytes) {
    throw new DriverError(`Payload too large: ${message.payload.length} bytes (max: ${maxPayloadBytes})`);
  }

  const bodyLength = HEADER_BYTES + message.payload.length;
  const frame = new Uint8Array(bodyLength + TAG_BYTES);
  const view = new DataView(frame.buffer);

  view.setUint8(0, FRAME_VERSION);
  view.setUint32(1, message.from);
  view.setUint32(5, message.round);
  view.setUint32(9, message.payload.length);
  frame.set(message.payload, HEADER_BYTES);
  frame.set(sha256(frame.subarray(0, bodyLength)), bodyLength);

  return frame;
}

/**
 * Parse a tagged frame.
 * Throws a MalformedPayload ValidationError for anything that is not exactly one valid frame.
 */
export function decodeMessage(
  frame: Uint8Array,
  maxPayloadBytes: number = DEFAULT_MAX_PAYLOAD_BYTES
): RoundMessage {
  if (frame.length < HEADER_BYTES + TAG_BYTES) {
    throw malformed(`Frame too short: ${frame.length} bytes`);
  }

  const view = new DataView(frame.buffer, frame.byteOffset, frame.byteLength);
  const version = view.getUint8(0);
  if (version !== FRAME_VERSION) {
    throw malformed(`Unsupported frame version: ${version}`);
  }

  const from = view.getUint32(1);
  const round = view.getUint32(5);
  const length = view.getUint32(9);

  if (length > maxPayloadBytes) {
    throw malformed(`Payload too large: ${length} bytes (max: ${maxPayloadBytes})`);
  }

  const bodyLength = HEADER_BYTES + length;
  if (frame.length !== bodyLength + TAG_BYTES) {
    throw malformed(`Frame length ${frame.length} does not match declared payload length ${length}`);
  }

  const expectedTag = sha256(frame.subarray(0, bodyLength));
  if (!equalBytes(expectedTag, frame.subarray(bodyLength))) {
    throw malformed('Integrity tag mismatch');
  }

  return { from, round, payload: frame.slice(HEADER_BYTES, bodyLength) };
}

// Header fields of a frame that failed these checks are unauthenticated, so
// the error carries no sender to attribute it to.
function malformed(message: string): ValidationError {
  return new ValidationError('MalformedPayload', message);
}
