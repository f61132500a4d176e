import { EventEmitter } from 'events';
import { SessionDriver, type DriverStep } from './SessionDriver';
import { describeAbort, isTerminal, type AbortReason, type SessionState } from './SessionState';
import { ProtocolRegistry } from '../protocol/ProtocolRegistry';
import type { Artifact, ProtocolAdapter } from '../protocol/ProtocolAdapter';
import type { OutboundMessage, RoundMessage } from '../../network/protocol/Message';
import { decodeMessage } from '../../network/protocol/MessageCodec';
import { parseSessionConfig, type SessionConfig, type SessionConfigInput } from '../../config/session';
import type { Config } from '../../config/schema';
import { BufferError, SessionAbortedError, ValidationError } from '../../utils/errors';
import logger from '../../utils/logger';

export type SessionOutcome =
  | { status: 'completed'; artifact: Artifact }
  | { status: 'aborted'; reason: AbortReason };

/** Runs `task` later on the host's event loop, never synchronously */
export type Scheduler = (task: () => void) => void;

export const defaultScheduler: Scheduler = (task) => {
  setTimeout(task, 0);
};

export interface SessionTaskOptions {
  scheduler?: Scheduler;
}

export type SessionTaskEvents = {
  outbound: (messages: OutboundMessage[], round: number) => void;
  state: (state: SessionState) => void;
  rejected: (error: ValidationError | BufferError) => void;
  completed: (artifact: Artifact) => void;
  aborted: (reason: AbortReason) => void;
};

export declare interface SessionTask {
  on<K extends keyof SessionTaskEvents>(event: K, listener: SessionTaskEvents[K]): this;
  once<K extends keyof SessionTaskEvents>(event: K, listener: SessionTaskEvents[K]): this;
  off<K extends keyof SessionTaskEvents>(event: K, listener: SessionTaskEvents[K]): this;
  emit<K extends keyof SessionTaskEvents>(event: K, ...args: Parameters<SessionTaskEvents[K]>): boolean;
}

/**
 * Event-loop wrapper around a SessionDriver.
 *
 * Inbound messages are fed synchronously; each computation runs in its own
 * scheduled task so delivery never waits on protocol math. `outcome`
 * settles exactly once, when the session completes or aborts.
 */
export class SessionTask extends EventEmitter {
  readonly outcome: Promise<SessionOutcome>;

  private readonly driver: SessionDriver;
  private readonly scheduler: Scheduler;
  private readonly settle: (outcome: SessionOutcome) => void;
  /** Inputs delivered before start(); fed once the driver is running */
  private pending: RoundMessage[] = [];
  private started = false;
  private settled = false;
  private pollScheduled = false;
  private lastState: SessionState;
  private deadline: NodeJS.Timeout | null = null;

  constructor(driver: SessionDriver, options: SessionTaskOptions = {}) {
    super();
    this.driver = driver;
    this.scheduler = options.scheduler ?? defaultScheduler;
    this.lastState = driver.current;

    let settle: (outcome: SessionOutcome) => void = () => undefined;
    this.outcome = new Promise<SessionOutcome>((resolve) => {
      settle = resolve;
    });
    this.settle = settle;
  }

  get sessionId(): string {
    return this.driver.sessionId;
  }

  get config(): SessionConfig {
    return this.driver.config;
  }

  get state(): SessionState {
    return this.driver.current;
  }

  get isStarted(): boolean {
    return this.started;
  }

  start(): void {
    this.started = true;
    this.handle(this.driver.start());

    const queued = this.pending;
    this.pending = [];
    for (const message of queued) this.handle(this.driver.receive(message));
  }

  /** Feed one inbound message, either decoded or as a wire frame */
  deliver(input: RoundMessage | Uint8Array): void {
    let message: RoundMessage;
    if (input instanceof Uint8Array) {
      try {
        message = decodeMessage(input, this.driver.config.maxPayloadBytes);
      } catch (err) {
        if (!(err instanceof ValidationError)) throw err;
        logger.debug(`[SessionTask] Dropped frame: ${err.message}`);
        this.emit('rejected', err);
        return;
      }
    } else {
      message = input;
    }

    if (!this.started) {
      this.pending.push(message);
      return;
    }
    this.handle(this.driver.receive(message));
  }

  cancel(): void {
    this.pending = [];
    this.handle(this.driver.cancel());
  }

  /** Resolves with the artifact; rejects with SessionAbortedError */
  async wait(): Promise<Artifact> {
    const outcome = await this.outcome;
    if (outcome.status === 'aborted') {
      throw new SessionAbortedError(
        outcome.reason,
        `Session ${this.sessionId} aborted: ${describeAbort(outcome.reason)}`
      );
    }
    return outcome.artifact;
  }

  private handle(step: DriverStep): void {
    switch (step.type) {
      case 'advanced':
        this.armDeadline(step.round);
        if (step.outbound.length > 0) this.emit('outbound', step.outbound, step.round);
        break;
      case 'rejected':
        this.emit('rejected', step.error);
        break;
      default:
        break;
    }

    this.publishState();

    const state = this.driver.current;
    if (isTerminal(state)) {
      if (state.status === 'completed') {
        this.finish({ status: 'completed', artifact: state.artifact });
      } else {
        this.finish({ status: 'aborted', reason: state.reason });
      }
    } else if (state.status === 'computing') {
      this.schedulePoll();
    }
  }

  private publishState(): void {
    const state = this.driver.current;
    if (state === this.lastState) return;
    this.lastState = state;
    this.emit('state', state);
  }

  private schedulePoll(): void {
    if (this.pollScheduled) return;
    this.pollScheduled = true;
    this.scheduler(() => {
      this.pollScheduled = false;
      if (this.driver.current.status !== 'computing') return;
      this.handle(this.driver.poll());
    });
  }

  private armDeadline(round: number): void {
    this.clearDeadline();
    const timeoutMs = this.driver.config.roundTimeoutMs;
    if (timeoutMs === undefined) return;

    this.deadline = setTimeout(() => {
      this.deadline = null;
      this.handle(this.driver.expire(round));
    }, timeoutMs);
  }

  private clearDeadline(): void {
    if (this.deadline) {
      clearTimeout(this.deadline);
      this.deadline = null;
    }
  }

  private finish(outcome: SessionOutcome): void {
    if (this.settled) return;
    this.settled = true;
    this.clearDeadline();
    this.pending = [];
    if (outcome.status === 'completed') {
      this.emit('completed', outcome.artifact);
    } else {
      this.emit('aborted', outcome.reason);
    }
    this.settle(outcome);
  }
}

export interface CreateSessionOptions extends SessionTaskOptions {
  /** Adapter source; defaults to the built-in registry */
  registry?: ProtocolRegistry;
  /** Explicit adapter, bypassing the registry */
  adapter?: ProtocolAdapter<unknown>;
  /** Environment settings; defaults to loadConfig() */
  settings?: Config;
}

/** Validate `input`, pick the adapter for its variant and wrap it in a task */
export function createSession(input: SessionConfigInput, options: CreateSessionOptions = {}): SessionTask {
  const config = parseSessionConfig(input, options.settings);
  const registry = options.registry ?? ProtocolRegistry.withDefaults();
  const adapter = options.adapter ?? registry.create(config.variant, config.parameters);
  return new SessionTask(new SessionDriver(config, adapter), { scheduler: options.scheduler });
}

/** Start the task if needed and wait for its artifact */
export function waitForSession(task: SessionTask): Promise<Artifact> {
  if (!task.isStarted) task.start();
  return task.wait();
}
