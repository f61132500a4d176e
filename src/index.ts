export {
  BROADCAST,
  MAX_PARTICIPANT_ID,
  MAX_ROUND,
  isBroadcast,
  type OutboundMessage,
  type ParticipantId,
  type Recipient,
  type RoundMessage,
} from './network/protocol/Message';
export { DEFAULT_MAX_PAYLOAD_BYTES, decodeMessage, encodeMessage } from './network/protocol/MessageCodec';
export {
  parseRoundMessage,
  validateMessage,
  type PayloadCheck,
  type ValidationContext,
  type ValidationResult,
} from './network/protocol/MessageValidator';
export type { FrameHandler, Transport } from './network/transport/Transport';
export { MemoryNetwork, type Envelope, type Interceptor } from './network/transport/MemoryTransport';
export { attachTransport } from './network/transport/attachTransport';

export { RoundBuffer, type AdmitResult, type Quorum } from './core/round/RoundBuffer';
export { LookaheadCache, type HoldResult } from './core/round/LookaheadCache';

export {
  finished,
  nextRound,
  protocolError,
  type AdapterContext,
  type AdvanceResult,
  type Artifact,
  type ArtifactKind,
  type OutboundPayload,
  type ProtocolAdapter,
  type ProtocolFault,
  type QuorumRule,
  type RoundStart,
} from './core/protocol/ProtocolAdapter';
export { ProtocolRegistry, type AdapterFactory } from './core/protocol/ProtocolRegistry';
export {
  PROTOCOL_FAMILIES,
  PROTOCOL_KINDS,
  type Curve,
  type ProtocolFamily,
  type ProtocolKind,
  type ProtocolParameters,
  type ProtocolVariant,
} from './core/protocol/variants';

export { SessionDriver, type DriverStep } from './core/session/SessionDriver';
export {
  SessionTask,
  createSession,
  defaultScheduler,
  waitForSession,
  type CreateSessionOptions,
  type Scheduler,
  type SessionOutcome,
  type SessionTaskEvents,
  type SessionTaskOptions,
} from './core/session/SessionTask';
export {
  describeAbort,
  isTerminal,
  type AbortReason,
  type SessionState,
  type TerminalState,
} from './core/session/SessionState';

export { DKG_ROUNDS, createDkgAdapter } from './core/dkg/DkgAdapter';
export { decodeKeyShare, encodeKeyShare, publicKeyToAddress, type KeyShare } from './core/dkg/KeyShare';

export { createSeededRandom, systemRandom, type RandomSource } from './crypto/random';

export {
  newSessionId,
  parseSessionConfig,
  type SessionConfig,
  type SessionConfigInput,
} from './config/session';
export { loadConfig, resetConfig } from './config/loader';
export type { Config } from './config/schema';

export {
  BufferError,
  ConfigurationError,
  DriverError,
  ProtocolError,
  ReentrantCallError,
  SessionAbortedError,
  ValidationError,
} from './utils/errors';
