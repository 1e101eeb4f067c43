import type { KeyrelayConfig } from '../config/schema.js';
import { PoolExhaustedError } from '../errors.js';
import { PoolTracker } from '../pool/tracker.js';
import type { PoolTrackerOptions } from '../pool/tracker.js';
import { ProviderRegistry } from '../providers/registry.js';
import type { BatchResult, CallRequest, CallResult, RequestOverrides } from './types.js';
import { createCallRequest } from './types.js';
import { Dispatcher } from './dispatcher.js';
import type { DispatchOptions } from './dispatcher.js';
import { FailoverRacer } from './racer.js';
import { BatchCoordinator } from './batch.js';
import type { RunBatchOptions } from './batch.js';

export interface CreateRequestOptions extends RequestOverrides {
  provider?: string;
}

export interface DispatchBatchOptions extends RunBatchOptions {
  /** Workers for this batch; capped by maxParallelApiKeys */
  concurrencyLimit?: number;
}

/**
 * What calling code talks to: one request at a time, or a batch whose
 * results line up with the submitted requests.
 */
export class DispatchService {
  readonly dispatcher: Dispatcher;
  readonly racer: FailoverRacer;
  readonly batch: BatchCoordinator;

  constructor(
    readonly config: KeyrelayConfig,
    readonly pools: PoolTracker,
    readonly providers: ProviderRegistry,
  ) {
    this.dispatcher = new Dispatcher(pools, providers);
    this.racer = new FailoverRacer(pools, providers, config.maxParallelApiKeys);
    this.batch = new BatchCoordinator({
      maxBatchSize: config.maxBatchSize,
      maxParallel: config.maxParallelApiKeys,
      batchTimeoutMs: config.batchTimeoutMs,
      executor: (request, options) => this.execute(request, options),
    });
  }

  static fromConfig(config: KeyrelayConfig, options: PoolTrackerOptions = {}): DispatchService {
    return new DispatchService(config, new PoolTracker(config, options), ProviderRegistry.fromConfig(config));
  }

  createRequest(payload: unknown, options: CreateRequestOptions = {}): CallRequest {
    const { provider, ...overrides } = options;
    return createCallRequest(provider ?? this.config.defaultProvider, payload, {
      timeoutMs: this.config.apiCallTimeoutMs,
      retryTimeoutMs: this.config.apiRetryTimeoutMs,
      maxRetries: this.config.maxRetries,
    }, overrides);
  }

  /** Racing only pays off when the provider has more than one key to race. */
  usesRacer(provider: string): boolean {
    return this.config.enableFastFailover && (this.pools.getPool(provider)?.size ?? 0) > 1;
  }

  dispatchOne(request: CallRequest, options: DispatchOptions = {}): Promise<CallResult> {
    return this.execute(request, options);
  }

  async dispatchBatch(requests: readonly CallRequest[], options: DispatchBatchOptions = {}): Promise<BatchResult> {
    this.batch.validate(requests.length);
    this.assertCanProgress(requests);

    const { concurrencyLimit, ...runOptions } = options;
    return this.batch.run({
      requests,
      concurrencyLimit: concurrencyLimit ?? this.config.maxParallelApiKeys,
    }, runOptions);
  }

  private execute(request: CallRequest, options: DispatchOptions = {}): Promise<CallResult> {
    return this.usesRacer(request.provider)
      ? this.racer.race(request, options)
      : this.dispatcher.dispatch(request, options);
  }

  /** A batch whose every pool is dry cannot make progress; reject it whole. */
  private assertCanProgress(requests: readonly CallRequest[]): void {
    const needed = new Set<string>();
    for (const request of requests) {
      if (this.providers.has(request.provider) && this.pools.getPool(request.provider)) {
        needed.add(request.provider);
      }
    }
    if (needed.size === 0) return;

    const providers = Array.from(needed);
    if (providers.every(p => !this.pools.canDispatch(p))) {
      throw new PoolExhaustedError(providers);
    }
  }
}
