import { InvalidTransitionError } from '../errors.js';
import type {
  CallAttempt,
  CallFailure,
  CallRequest,
  CallResult,
  FailedState,
  RequestState,
} from './types.js';

/**
 * Legal moves of a request. Every open state may fail: the pool can run dry
 * before any (further) attempt, and a batch deadline can close a request at
 * any point.
 */
export const TRANSITIONS: Record<RequestState, readonly RequestState[]> = {
  pending: ['dispatched', 'failed_exhausted', 'failed_nonretryable', 'failed_timeout'],
  dispatched: ['succeeded', 'retrying', 'failed_exhausted', 'failed_nonretryable', 'failed_timeout'],
  retrying: ['dispatched', 'failed_exhausted', 'failed_nonretryable', 'failed_timeout'],
  succeeded: [],
  failed_exhausted: [],
  failed_nonretryable: [],
  failed_timeout: [],
};

export function isTerminalState(state: RequestState): boolean {
  return TRANSITIONS[state].length === 0;
}

export function canTransition(from: RequestState, to: RequestState): boolean {
  return TRANSITIONS[from].includes(to);
}

export interface RequestObserver {
  onTransition?(request: CallRequest, from: RequestState, to: RequestState): void;
  onAttempt?(request: CallRequest, attempt: CallAttempt): void;
}

/**
 * Tracks one request from `pending` to a terminal state and produces its
 * CallResult. Owned by whoever is executing the request; the batch
 * coordinator keeps a reference so it can close out requests that are
 * still open when the batch deadline passes.
 */
export class RequestLifecycle {
  private current: RequestState = 'pending';
  private path: RequestState[] = ['pending'];
  private recorded: CallAttempt[] = [];
  private final: CallResult | undefined;
  private startedAt: number;

  constructor(
    readonly request: CallRequest,
    private observer?: RequestObserver,
    private now: () => number = Date.now,
  ) {
    this.startedAt = now();
  }

  get state(): RequestState {
    return this.current;
  }

  /** Every state visited, in order */
  get history(): readonly RequestState[] {
    return this.path;
  }

  get attempts(): readonly CallAttempt[] {
    return this.recorded;
  }

  /** The terminal result, once there is one */
  get result(): CallResult | undefined {
    return this.final;
  }

  isTerminal(): boolean {
    return isTerminalState(this.current);
  }

  transition(to: RequestState): void {
    const from = this.current;
    if (!canTransition(from, to)) {
      throw new InvalidTransitionError(from, to);
    }
    this.current = to;
    this.path.push(to);
    this.observer?.onTransition?.(this.request, from, to);
  }

  record(attempt: CallAttempt): void {
    if (this.isTerminal()) return;
    this.recorded.push(attempt);
    this.observer?.onAttempt?.(this.request, attempt);
  }

  succeed(response: unknown): CallResult {
    this.transition('succeeded');
    this.final = {
      ok: true,
      state: 'succeeded',
      requestId: this.request.id,
      provider: this.request.provider,
      response,
      attempts: [...this.recorded],
      durationMs: this.now() - this.startedAt,
    };
    return this.final;
  }

  fail(state: FailedState, failure: CallFailure): CallResult {
    this.transition(state);
    this.final = {
      ok: false,
      state,
      requestId: this.request.id,
      provider: this.request.provider,
      failure,
      attempts: [...this.recorded],
      durationMs: this.now() - this.startedAt,
    };
    return this.final;
  }
}
