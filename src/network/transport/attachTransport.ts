import type { SessionTask } from '../../core/session/SessionTask';
import type { OutboundMessage } from '../protocol/Message';
import { encodeMessage } from '../protocol/MessageCodec';
import type { Transport } from './Transport';
import { DriverError } from '../../utils/errors';
import logger from '../../utils/logger';

/**
 * Connect a session to a transport in both directions: outbound messages
 * are framed and sent, inbound frames are delivered to the task. Detaches
 * by itself once the session ends; the returned function detaches early.
 */
export function attachTransport(task: SessionTask, transport: Transport): () => void {
  const { localId, maxPayloadBytes } = task.config;
  if (transport.localId !== localId) {
    throw new DriverError(
      `Transport of participant ${transport.localId} attached to the session of participant ${localId}`
    );
  }

  const onOutbound = (messages: OutboundMessage[]): void => {
    for (const { to, message } of messages) {
      transport.send(to, encodeMessage(message, maxPayloadBytes));
    }
  };

  const unsubscribe = transport.subscribe((frame) => task.deliver(frame));

  let attached = true;
  const detach = (): void => {
    if (!attached) return;
    attached = false;
    unsubscribe();
    task.off('outbound', onOutbound);
    task.off('completed', detach);
    task.off('aborted', detach);
    logger.debug(`[Transport] Detached participant ${transport.localId} from session ${task.sessionId}`);
  };

  task.on('outbound', onOutbound);
  task.once('completed', detach);
  task.once('aborted', detach);

  return detach;
}
