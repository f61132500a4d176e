import { z } from 'zod';
import { MAX_PARTICIPANT_ID, MAX_ROUND, type ParticipantId, type RoundMessage } from './Message';
import { ValidationError } from '../../utils/errors';

const roundMessageSchema = z.object({
  from: z.number().int().min(0).max(MAX_PARTICIPANT_ID),
  round: z.number().int().min(0).max(MAX_ROUND),
  payload: z.instanceof(Uint8Array),
});

/** Structural check of a payload; returns a description of the defect, if any */
export type PayloadCheck = (round: number, payload: Uint8Array) => string | undefined;

export interface ValidationContext {
  expectedRound: number;
  /** Senders whose messages are accepted (the local participant is never one) */
  knownSenders: ReadonlySet<ParticipantId>;
  /** Largest payload accepted; unbounded when unset */
  maxPayloadBytes?: number;
  checkPayload?: PayloadCheck;
}

export type ValidationResult =
  | { ok: true; message: RoundMessage }
  | { ok: false; error: ValidationError };

/**
 * Shape check only: is `data` a RoundMessage at all. The returned message
 * owns a copy of the payload, so later writes to the caller's bytes never
 * reach the round buffer.
 */
export function parseRoundMessage(data: unknown): ValidationResult {
  const parsed = roundMessageSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    return reject('MalformedPayload', `Invalid message structure: ${issues}`, {});
  }
  const { from, round, payload } = parsed.data;
  return { ok: true, message: { from, round, payload: new Uint8Array(payload) } };
}

/**
 * Classify an inbound round message. Pure: no state is read or written
 * beyond the arguments.
 */
export function validateMessage(data: unknown, ctx: ValidationContext): ValidationResult {
  const parsed = parseRoundMessage(data);
  if (!parsed.ok) return parsed;

  const { message } = parsed;

  if (!ctx.knownSenders.has(message.from)) {
    return reject('UnknownSender', `Unknown sender ${message.from}`, {
      sender: message.from,
      round: message.round,
    });
  }

  if (message.round !== ctx.expectedRound) {
    const relation = message.round < ctx.expectedRound ? 'Stale' : 'Future';
    return reject(
      'StaleOrFutureRound',
      `${relation} round ${message.round} from ${message.from} (awaiting ${ctx.expectedRound})`,
      { sender: message.from, round: message.round, expectedRound: ctx.expectedRound }
    );
  }

  if (ctx.maxPayloadBytes !== undefined && message.payload.length > ctx.maxPayloadBytes) {
    return reject(
      'MalformedPayload',
      `Round ${message.round} payload from ${message.from} is ${message.payload.length} bytes, above the ${ctx.maxPayloadBytes}-byte limit`,
      { sender: message.from, round: message.round }
    );
  }

  const defect = ctx.checkPayload?.(message.round, message.payload);
  if (defect !== undefined) {
    return reject('MalformedPayload', `Malformed round ${message.round} payload from ${message.from}: ${defect}`, {
      sender: message.from,
      round: message.round,
    });
  }

  return { ok: true, message };
}

function reject(
  kind: ValidationError['kind'],
  message: string,
  detail: ValidationError['detail']
): ValidationResult {
  return { ok: false, error: new ValidationError(kind, message, detail) };
}
