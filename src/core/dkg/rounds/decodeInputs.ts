import type { z } from 'zod';
import type { ParticipantId } from '../../../network/protocol/Message';
import { parsePayload } from '../DkgMessages';
import { ProtocolError } from '../../../utils/errors';

/**
 * Decode a round's buffered payloads. They already passed the structural
 * check on admission, so a failure here means the buffer and the adapter
 * disagree about the round.
 */
export function decodeInputs<T>(
  schema: z.ZodType<T>,
  inputs: ReadonlyMap<ParticipantId, Uint8Array>
): Map<ParticipantId, T> {
  const decoded = new Map<ParticipantId, T>();
  for (const [sender, bytes] of inputs) {
    const parsed = parsePayload(schema, bytes);
    if (!parsed.ok) {
      throw new ProtocolError('InconsistentState', `Undecodable input from ${sender}: ${parsed.defect}`, sender);
    }
    decoded.set(sender, parsed.data);
  }
  return decoded;
}
