import type { ProviderErrorKind } from '../errors.js';
import { generateRequestId } from '../utils/id.js';

export type RequestState =
  | 'pending'
  | 'dispatched'
  | 'retrying'
  | 'succeeded'
  | 'failed_exhausted'
  | 'failed_nonretryable'
  | 'failed_timeout';

export type TerminalState = 'succeeded' | 'failed_exhausted' | 'failed_nonretryable' | 'failed_timeout';

export type FailedState = Exclude<TerminalState, 'succeeded'>;

export interface CallRequest {
  readonly id: string;
  readonly provider: string;
  /** Opaque to the dispatcher; the provider call interprets it */
  readonly payload: unknown;
  /** Deadline for the first attempt */
  readonly timeoutMs: number;
  /** Deadline for every later attempt, never above timeoutMs */
  readonly retryTimeoutMs: number;
  /** Retries after the first attempt */
  readonly maxRetries: number;
}

export type AttemptOutcome = 'success' | 'timeout' | 'error' | 'cancelled';

export interface CallAttempt {
  readonly credentialId: string;
  /** 1-based; in race mode, the lane number */
  readonly attempt: number;
  readonly startedAt: string;
  readonly latencyMs: number;
  readonly outcome: AttemptOutcome;
  readonly errorKind?: ProviderErrorKind;
  readonly message?: string;
}

export type FailureReason =
  | 'pool_exhausted'
  | 'retries_exhausted'
  | 'non_retryable'
  | 'all_racers_failed'
  | 'batch_timeout'
  | 'cancelled'
  | 'unknown_provider'
  | 'internal_error';

export interface CallFailure {
  readonly reason: FailureReason;
  readonly message: string;
  readonly lastErrorKind?: ProviderErrorKind;
}

interface CallResultBase {
  readonly requestId: string;
  readonly provider: string;
  readonly attempts: readonly CallAttempt[];
  readonly durationMs: number;
}

export interface CallSuccess extends CallResultBase {
  readonly ok: true;
  readonly state: 'succeeded';
  readonly response: unknown;
}

export interface CallFailed extends CallResultBase {
  readonly ok: false;
  readonly state: FailedState;
  readonly failure: CallFailure;
}

export type CallResult = CallSuccess | CallFailed;

export interface BatchJob {
  readonly requests: readonly CallRequest[];
  readonly concurrencyLimit: number;
}

export interface BatchResult {
  readonly batchId: string;
  /** results[i] is the outcome of requests[i] */
  readonly results: readonly CallResult[];
  readonly succeeded: number;
  readonly failed: number;
  /** The batch deadline cut the run short */
  readonly timedOut: boolean;
  readonly durationMs: number;
}

export interface RequestDefaults {
  timeoutMs: number;
  retryTimeoutMs: number;
  maxRetries: number;
}

export interface RequestOverrides {
  id?: string;
  timeoutMs?: number;
  retryTimeoutMs?: number;
  maxRetries?: number;
}

export function createCallRequest(
  provider: string,
  payload: unknown,
  defaults: RequestDefaults,
  overrides: RequestOverrides = {},
): CallRequest {
  const timeoutMs = overrides.timeoutMs ?? defaults.timeoutMs;
  const retryTimeoutMs = Math.min(overrides.retryTimeoutMs ?? defaults.retryTimeoutMs, timeoutMs);

  return Object.freeze({
    id: overrides.id ?? generateRequestId(),
    provider,
    payload,
    timeoutMs,
    retryTimeoutMs,
    maxRetries: Math.max(0, overrides.maxRetries ?? defaults.maxRetries),
  });
}
