/** Failure kinds a provider call can report. */
export type ProviderErrorKind =
  | 'timeout'
  | 'rate_limited'
  | 'invalid_response'
  | 'auth_error'
  | 'transport_error';

const RETRYABLE_KINDS: ReadonlySet<ProviderErrorKind> = new Set<ProviderErrorKind>(['timeout', 'rate_limited', 'transport_error']);

/** Transient failures: penalize the key, rotate, spend a retry. */
export function isRetryable(kind: ProviderErrorKind): boolean {
  return RETRYABLE_KINDS.has(kind);
}

export type FailureAction = 'retry' | 'rotate' | 'stop';

/**
 * What a sequential dispatcher does after a failed attempt: spend a retry on
 * another key, rotate without spending one (the key was refused), or stop.
 */
export function failureAction(kind: ProviderErrorKind): FailureAction {
  if (isRetryable(kind)) return 'retry';
  return kind === 'auth_error' ? 'rotate' : 'stop';
}

/** Failures that say something about the key rather than the request. */
export function penalizesCredential(kind: ProviderErrorKind): boolean {
  return kind !== 'invalid_response';
}

export type KeyrelayErrorCode =
  | 'POOL_EXHAUSTED'
  | 'BATCH_TOO_LARGE'
  | 'CONFIG_INVALID'
  | 'INVALID_TRANSITION'
  | 'UNKNOWN_PROVIDER';

export class KeyrelayError extends Error {
  constructor(
    readonly code: KeyrelayErrorCode,
    message: string,
  ) {
    super(message);
    this.name = 'KeyrelayError';
  }
}

export class PoolExhaustedError extends KeyrelayError {
  constructor(readonly providers: string[]) {
    super('POOL_EXHAUSTED', `No healthy API key available for ${providers.join(', ')}`);
    this.name = 'PoolExhaustedError';
  }
}

export class BatchValidationError extends KeyrelayError {
  constructor(
    readonly size: number,
    readonly maxBatchSize: number,
  ) {
    super('BATCH_TOO_LARGE', `Batch of ${size} requests exceeds the maximum of ${maxBatchSize}`);
    this.name = 'BatchValidationError';
  }
}

export class ConfigError extends KeyrelayError {
  constructor(readonly problems: string[]) {
    super('CONFIG_INVALID', `Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export class InvalidTransitionError extends KeyrelayError {
  constructor(
    readonly from: string,
    readonly to: string,
  ) {
    super('INVALID_TRANSITION', `Illegal request state transition ${from} -> ${to}`);
    this.name = 'InvalidTransitionError';
  }
}

export class UnknownProviderError extends KeyrelayError {
  constructor(readonly provider: string) {
    super('UNKNOWN_PROVIDER', `Unknown provider: ${provider}`);
    this.name = 'UnknownProviderError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
