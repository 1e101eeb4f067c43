import type { ProviderErrorKind } from '../errors.js';
import { penalizesCredential } from '../errors.js';
import type { Credential } from '../pool/credential.js';
import type { CredentialPool } from '../pool/pool.js';
import type { PoolTracker } from '../pool/tracker.js';
import type { ProviderRegistry } from '../providers/registry.js';
import type { CallRequest, CallResult } from './types.js';
import { RequestLifecycle } from './state.js';
import { runAttempt } from './deadline.js';
import type { AttemptRun, AttemptSettlement } from './deadline.js';
import { cancelledResult } from './dispatcher.js';
import type { DispatchOptions } from './dispatcher.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('race');

interface RaceState {
  winner?: AttemptRun;
}

function report(pool: CredentialPool, credential: Credential, settlement: AttemptSettlement): void {
  if (settlement.status === 'success') {
    pool.reportSuccess(credential);
  } else if (settlement.status === 'failed' && penalizesCredential(settlement.kind)) {
    pool.reportFailure(credential, settlement.kind);
  }
}

/**
 * Sends the same request through several keys at once and keeps the first
 * success. Losing attempts are aborted; whatever they return afterwards is
 * dropped. Failed lanes still report to the pool.
 */
export class FailoverRacer {
  constructor(
    private pools: PoolTracker,
    private providers: ProviderRegistry,
    private maxParallel: number,
  ) {}

  async race(request: CallRequest, options: DispatchOptions = {}): Promise<CallResult> {
    const lifecycle = options.lifecycle ?? new RequestLifecycle(request, options.observer);
    const provider = this.providers.get(request.provider);
    const pool = this.pools.getPool(request.provider);

    if (!provider || !pool) {
      return lifecycle.fail('failed_nonretryable', {
        reason: 'unknown_provider',
        message: `Provider "${request.provider}" is not configured`,
      });
    }
    if (lifecycle.isTerminal() || options.signal?.aborted) return cancelledResult(lifecycle);

    const credentials = pool.acquireMany(Math.min(this.maxParallel, pool.healthyCount()));
    if (credentials.length === 0) {
      log.warn(`${request.id}: no healthy ${request.provider} key to race`);
      return lifecycle.fail('failed_exhausted', {
        reason: 'pool_exhausted',
        message: `Every ${request.provider} API key is quarantined or none are configured`,
      });
    }

    lifecycle.transition('dispatched');
    log.debug(`${request.id}: racing ${credentials.map(c => c.id).join(', ')}`);

    const controller = new AbortController();
    const onParentAbort = (): void => controller.abort();
    options.signal?.addEventListener('abort', onParentAbort, { once: true });

    const state: RaceState = {};
    let runs: AttemptRun[];
    try {
      runs = await Promise.all(credentials.map((credential, i) =>
        runAttempt(provider, request, credential, request.timeoutMs, i + 1, controller.signal).then(run => {
          report(pool, credential, run.settlement);
          lifecycle.record(run.attempt);
          if (run.settlement.status === 'success' && !state.winner) {
            state.winner = run;
            controller.abort();
          }
          return run;
        }),
      ));
    } finally {
      options.signal?.removeEventListener('abort', onParentAbort);
    }

    if (lifecycle.isTerminal()) return cancelledResult(lifecycle);

    const winner = state.winner;
    if (winner && winner.settlement.status === 'success') {
      log.debug(`${request.id}: ${winner.attempt.credentialId} won in ${winner.attempt.latencyMs}ms`);
      return lifecycle.succeed(winner.settlement.response);
    }

    if (options.signal?.aborted) return cancelledResult(lifecycle);

    const failures: Array<{ credentialId: string; kind: ProviderErrorKind; message: string }> = [];
    for (const run of runs) {
      if (run.settlement.status === 'failed') {
        failures.push({ credentialId: run.attempt.credentialId, kind: run.settlement.kind, message: run.settlement.message });
      }
    }

    if (failures.length === 0) return cancelledResult(lifecycle);

    const lastErrorKind = failures[failures.length - 1].kind;
    const summary = failures.map(f => `${f.credentialId}: ${f.kind} (${f.message})`).join('; ');

    if (failures.every(f => f.kind === 'invalid_response')) {
      return lifecycle.fail('failed_nonretryable', { reason: 'non_retryable', message: summary, lastErrorKind });
    }

    log.warn(`${request.id}: all ${credentials.length} lane(s) failed`);
    return lifecycle.fail('failed_exhausted', {
      reason: 'all_racers_failed',
      message: `All ${credentials.length} racing key(s) failed: ${summary}`,
      lastErrorKind,
    });
  }
}
