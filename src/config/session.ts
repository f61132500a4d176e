import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import { MAX_PARTICIPANT_ID, type ParticipantId } from '../network/protocol/Message';
import {
  PROTOCOL_FAMILIES,
  PROTOCOL_KINDS,
  minParticipants,
  requiredParameters,
  variantKey,
  type ProtocolParameters,
  type ProtocolVariant,
} from '../core/protocol/variants';
import type { RandomSource } from '../crypto/random';
import type { Config } from './schema';
import { loadConfig } from './loader';
import { ConfigurationError } from '../utils/errors';

const participantId = z.number().int().min(0).max(MAX_PARTICIPANT_ID);

export const SessionConfigSchema = z
  .object({
    /** Shared by every party of the session; binds proofs to it */
    sessionId: z.string().min(1).max(128),
    participants: z.array(participantId).min(1),
    localId: participantId,
    variant: z.object({
      family: z.enum(PROTOCOL_FAMILIES),
      kind: z.enum(PROTOCOL_KINDS),
    }),
    parameters: z.object({
      curve: z.literal('secp256k1').default('secp256k1'),
      threshold: z.number().int().min(1),
      keyShare: z.instanceof(Uint8Array).optional(),
      presignature: z.instanceof(Uint8Array).optional(),
      message: z.instanceof(Uint8Array).optional(),
    }),
    random: z.custom<RandomSource>((value) => typeof value === 'function', 'expected a randomness source'),

    // ---- Session policy; unset fields fall back to the environment ----
    roundTimeoutMs: z.number().int().positive().optional(),
    misbehaviorTolerance: z.number().int().nonnegative().optional(),
    lookaheadRounds: z.number().int().min(0).max(8).optional(),
    maxPayloadBytes: z.number().int().positive().optional(),
  })
  .superRefine((cfg, ctx) => {
    const seen = new Set<number>();
    for (const id of cfg.participants) {
      if (seen.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['participants'], message: `duplicate participant ${id}` });
      }
      seen.add(id);
    }

    if (!seen.has(cfg.localId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['localId'],
        message: `local participant ${cfg.localId} is not in the participant set`,
      });
    }

    const minimum = minParticipants(cfg.variant, cfg.parameters.threshold);
    if (seen.size < minimum) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['participants'],
        message: `${variantKey(cfg.variant)} with threshold ${cfg.parameters.threshold} needs at least ${minimum} participants, got ${seen.size}`,
      });
    }

    for (const name of requiredParameters(cfg.variant)) {
      if (cfg.parameters[name] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['parameters', name],
          message: `required for ${variantKey(cfg.variant)}`,
        });
      }
    }

    if (cfg.parameters.message !== undefined && cfg.parameters.message.length !== 32) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['parameters', 'message'],
        message: `expected a 32-byte digest, got ${cfg.parameters.message.length} bytes`,
      });
    }
  });

export type SessionConfigInput = z.input<typeof SessionConfigSchema>;

/** Validated session configuration; immutable for the life of the session */
export interface SessionConfig {
  readonly sessionId: string;
  /** Ascending */
  readonly participants: readonly ParticipantId[];
  readonly localId: ParticipantId;
  readonly variant: Readonly<ProtocolVariant>;
  readonly parameters: Readonly<ProtocolParameters>;
  readonly random: RandomSource;
  readonly roundTimeoutMs?: number;
  readonly misbehaviorTolerance?: number;
  readonly lookaheadRounds: number;
  readonly maxPayloadBytes: number;
}

/** Fresh identifier for a session this party initiates; peers must be handed the same one */
export function newSessionId(): string {
  return uuidv4();
}

/**
 * Validate a session configuration and resolve its policy against the
 * environment. Throws ConfigurationError on the first invalid input.
 */
export function parseSessionConfig(input: SessionConfigInput, settings: Config = loadConfig()): SessionConfig {
  const result = SessionConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigurationError(`Invalid session configuration:\n${issues}`);
  }

  const cfg = result.data;

  // Byte parameters are copied so later writes by the caller cannot reach the session
  const parameters: ProtocolParameters = Object.freeze({
    curve: cfg.parameters.curve,
    threshold: cfg.parameters.threshold,
    keyShare: cfg.parameters.keyShare?.slice(),
    presignature: cfg.parameters.presignature?.slice(),
    message: cfg.parameters.message?.slice(),
  });

  return Object.freeze({
    sessionId: cfg.sessionId,
    participants: Object.freeze([...cfg.participants].sort((a, b) => a - b)),
    localId: cfg.localId,
    variant: Object.freeze({ family: cfg.variant.family, kind: cfg.variant.kind }),
    parameters,
    random: cfg.random,
    roundTimeoutMs: cfg.roundTimeoutMs ?? settings.MPC_DRIVER_ROUND_TIMEOUT_MS,
    misbehaviorTolerance: cfg.misbehaviorTolerance ?? settings.MPC_DRIVER_MISBEHAVIOR_TOLERANCE,
    lookaheadRounds: cfg.lookaheadRounds ?? settings.MPC_DRIVER_LOOKAHEAD_ROUNDS,
    maxPayloadBytes: cfg.maxPayloadBytes ?? settings.MPC_DRIVER_MAX_PAYLOAD_BYTES,
  });
}
