import type { ParticipantId } from '../network/protocol/Message';
import type { AbortReason } from '../core/session/SessionState';

export class DriverError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DriverError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigurationError extends DriverError {
  constructor(message: string = 'Invalid configuration') {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ValidationErrorKind = 'UnknownSender' | 'StaleOrFutureRound' | 'MalformedPayload';

export interface ValidationErrorDetail {
  sender?: ParticipantId;
  round?: number;
  expectedRound?: number;
}

export class ValidationError extends DriverError {
  readonly kind: ValidationErrorKind;
  readonly detail: ValidationErrorDetail;

  constructor(kind: ValidationErrorKind, message: string = 'Validation failed', detail: ValidationErrorDetail = {}) {
    super(message);
    this.name = 'ValidationError';
    this.kind = kind;
    this.detail = detail;
  }
}

export class BufferError extends DriverError {
  readonly kind = 'DuplicateMessage' as const;
  readonly sender: ParticipantId;
  readonly round: number;

  constructor(sender: ParticipantId, round: number) {
    super(`Duplicate round ${round} message from participant ${sender}`);
    this.name = 'BufferError';
    this.sender = sender;
    this.round = round;
  }
}

export type ProtocolErrorKind = 'InvalidProof' | 'InconsistentState';

/** Thrown by round functions; the adapter turns it into a protocol fault. */
export class ProtocolError extends DriverError {
  readonly kind: ProtocolErrorKind;
  readonly participant?: ParticipantId;

  constructor(kind: ProtocolErrorKind, message: string = 'Protocol failure', participant?: ParticipantId) {
    super(message);
    this.name = 'ProtocolError';
    this.kind = kind;
    this.participant = participant;
  }
}

/** Rejection value of a bridged session that ended in an abort. */
export class SessionAbortedError extends DriverError {
  readonly reason: AbortReason;

  constructor(reason: AbortReason, message: string) {
    super(message);
    this.name = 'SessionAbortedError';
    this.reason = reason;
  }
}

export class ReentrantCallError extends DriverError {
  constructor(operation: string) {
    super(`Re-entrant ${operation}() while the protocol adapter is running`);
    this.name = 'ReentrantCallError';
  }
}
