import type { ProviderErrorKind } from '../errors.js';
import { failureAction } from '../errors.js';
import type { PoolTracker } from '../pool/tracker.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { CallRequest, CallResult } from './types.js';
import { RequestLifecycle } from './state.js';
import type { RequestObserver } from './state.js';
import { runAttempt } from './deadline.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('dispatch');

export interface DispatchOptions {
  /** Aborting cancels the in-flight attempt and ends the request */
  signal?: AbortSignal;
  /** Supplied by the batch coordinator so it can close out open requests */
  lifecycle?: RequestLifecycle;
  observer?: RequestObserver;
}

export type RequestExecutor = (request: CallRequest, options?: DispatchOptions) => Promise<CallResult>;

/** Close out a request whose caller gave up, unless someone already did. */
export function cancelledResult(lifecycle: RequestLifecycle, lastErrorKind?: ProviderErrorKind): CallResult {
  return lifecycle.result ?? lifecycle.fail('failed_timeout', {
    reason: 'cancelled',
    message: 'Request cancelled before it completed',
    lastErrorKind,
  });
}

/**
 * Runs one request against its provider's pool, one attempt at a time.
 * Transient failures rotate to a fresh key until the retry budget is spent;
 * an auth failure quarantines the key and rotates without spending a retry;
 * an invalid request stops at once.
 */
export class Dispatcher {
  constructor(
    private pools: PoolTracker,
    private providers: ProviderRegistry,
  ) {}

  async dispatch(request: CallRequest, options: DispatchOptions = {}): Promise<CallResult> {
    const lifecycle = options.lifecycle ?? new RequestLifecycle(request, options.observer);
    const provider = this.providers.get(request.provider);
    const pool = this.pools.getPool(request.provider);

    if (!provider || !pool) {
      return lifecycle.fail('failed_nonretryable', {
        reason: 'unknown_provider',
        message: `Provider "${request.provider}" is not configured`,
      });
    }

    let retriesUsed = 0;
    let authRotations = 0;
    let ordinal = 0;
    let lastErrorKind: ProviderErrorKind | undefined;
    // Keys that failed this request; retries go elsewhere while anything else is eligible
    const failed = new Set<string>();

    for (;;) {
      if (lifecycle.isTerminal()) return cancelledResult(lifecycle, lastErrorKind);
      if (options.signal?.aborted) return cancelledResult(lifecycle, lastErrorKind);

      const credential = pool.acquire(failed);
      if (!credential) {
        log.warn(`${request.id}: no healthy ${request.provider} key (${ordinal} attempt(s) made)`);
        return lifecycle.fail('failed_exhausted', {
          reason: 'pool_exhausted',
          message: `Every ${request.provider} API key is quarantined or none are configured`,
          lastErrorKind,
        });
      }

      lifecycle.transition('dispatched');
      ordinal++;
      const timeoutMs = ordinal === 1 ? request.timeoutMs : request.retryTimeoutMs;
      log.debug(`${request.id}: attempt ${ordinal} on ${credential.id} (${timeoutMs}ms)`);

      const { attempt, settlement } = await runAttempt(provider, request, credential, timeoutMs, ordinal, options.signal);

      // The batch deadline may have closed this request while the call was out
      if (lifecycle.isTerminal()) return cancelledResult(lifecycle, lastErrorKind);
      lifecycle.record(attempt);

      if (settlement.status === 'success') {
        pool.reportSuccess(credential);
        return lifecycle.succeed(settlement.response);
      }

      if (settlement.status === 'cancelled') {
        return cancelledResult(lifecycle, lastErrorKind);
      }

      lastErrorKind = settlement.kind;
      log.debug(`${request.id}: ${credential.id} failed with ${settlement.kind}: ${settlement.message}`);

      const action = failureAction(settlement.kind);
      if (action === 'stop') {
        return lifecycle.fail('failed_nonretryable', {
          reason: 'non_retryable',
          message: settlement.message,
          lastErrorKind,
        });
      }

      pool.reportFailure(credential, settlement.kind);
      failed.add(credential.id);

      if (action === 'rotate' && authRotations < pool.size) {
        authRotations++;
        lifecycle.transition('retrying');
        continue;
      }

      if (retriesUsed >= request.maxRetries) {
        return lifecycle.fail('failed_exhausted', {
          reason: 'retries_exhausted',
          message: `Gave up after ${ordinal} attempt(s): ${settlement.message}`,
          lastErrorKind,
        });
      }

      retriesUsed++;
      lifecycle.transition('retrying');
    }
  }
}
