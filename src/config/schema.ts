import { z } from 'zod';

export const ConfigSchema = z.object({
  // ---- Logging ----
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),

  // ---- Session policy (defaults for fields a SessionConfig leaves unset) ----
  /** Per-round deadline in ms. Unset means rounds never time out. */
  MPC_DRIVER_ROUND_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  /**
   * Malformed or duplicate messages tolerated per sender before the session
   * aborts. Unset means such messages are only dropped and the sender flagged.
   */
  MPC_DRIVER_MISBEHAVIOR_TOLERANCE: z.coerce.number().int().nonnegative().optional(),
  /** How many rounds ahead of the awaited one early messages are held. */
  MPC_DRIVER_LOOKAHEAD_ROUNDS: z.coerce.number().int().min(0).max(8).default(2),

  // ---- Framing ----
  MPC_DRIVER_MAX_PAYLOAD_BYTES: z.coerce.number().int().positive().default(1_048_576),
});

export type Config = z.infer<typeof ConfigSchema>;
