import { z } from 'zod';

const hex = (bytes: number) => z.string().regex(new RegExp(`^[0-9a-f]{${bytes * 2}}$`), `expected ${bytes}-byte lowercase hex`);

export const scalarHex = hex(32);
export const pointHex = hex(33);

/** Round 0 broadcast: commitment to the coefficient points */
export const CommitPayloadSchema = z.object({
  commitment: hex(32),
});

/** Round 1 broadcast: opening of the round 0 commitment + proof of knowledge of a_0 */
export function decommitPayloadSchema(threshold: number) {
  return z.object({
    coefficientCommitments: z.array(pointHex).length(threshold + 1),
    blindingFactor: scalarHex,
    proof: z.object({ R: pointHex, s: scalarHex }),
  });
}

/** Round 2 direct message: f_i(x_j) */
export const SharePayloadSchema = z.object({
  share: scalarHex,
});

export type CommitPayload = z.infer<typeof CommitPayloadSchema>;
export type DecommitPayload = z.infer<ReturnType<typeof decommitPayloadSchema>>;
export type SharePayload = z.infer<typeof SharePayloadSchema>;

const encoder = new TextEncoder();
const decoder = new TextDecoder('utf-8', { fatal: true });

export function encodePayload(payload: CommitPayload | DecommitPayload | SharePayload): Uint8Array {
  return encoder.encode(JSON.stringify(payload));
}

export type ParsedPayload<T> = { ok: true; data: T } | { ok: false; defect: string };

export function parsePayload<T>(schema: z.ZodType<T>, bytes: Uint8Array): ParsedPayload<T> {
  let json: unknown;
  try {
    json = JSON.parse(decoder.decode(bytes));
  } catch (err) {
    return { ok: false, defect: `not UTF-8 JSON (${err instanceof Error ? err.message : String(err)})` };
  }

  const result = schema.safeParse(json);
  if (!result.success) {
    return {
      ok: false,
      defect: result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; '),
    };
  }
  return { ok: true, data: result.data };
}
