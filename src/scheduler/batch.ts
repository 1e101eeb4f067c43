import { BatchValidationError, errorMessage } from '../errors.js';
import type { BatchJob, BatchResult, CallResult } from './types.js';
import { RequestLifecycle } from './state.js';
import type { RequestObserver } from './state.js';
import type { RequestExecutor } from './dispatcher.js';
import { generateId } from '../utils/id.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('batch');

export interface BatchCoordinatorOptions {
  maxBatchSize: number;
  /** Upper bound on workers regardless of the job's own limit */
  maxParallel: number;
  batchTimeoutMs: number;
  /** Runs one request: the sequential dispatcher or the racer */
  executor: RequestExecutor;
}

export interface RunBatchOptions {
  signal?: AbortSignal;
  observer?: RequestObserver;
  /** Called once per slot, as soon as that slot has its final result */
  onSettled?: (index: number, result: CallResult) => void;
}

type StopReason = 'done' | 'timeout' | 'cancelled';

/**
 * Runs a batch of independent requests on a bounded pool of workers.
 * Results land at their request's index, whatever order they finish in,
 * and a failed request never disturbs its siblings.
 */
export class BatchCoordinator {
  constructor(private options: BatchCoordinatorOptions) {}

  validate(size: number): void {
    if (size > this.options.maxBatchSize) {
      throw new BatchValidationError(size, this.options.maxBatchSize);
    }
  }

  workerCount(job: BatchJob): number {
    return Math.max(1, Math.min(job.concurrencyLimit, this.options.maxParallel, job.requests.length));
  }

  async run(job: BatchJob, runOptions: RunBatchOptions = {}): Promise<BatchResult> {
    this.validate(job.requests.length);

    const batchId = generateId(8);
    const started = Date.now();
    const total = job.requests.length;

    if (total === 0) {
      return { batchId, results: [], succeeded: 0, failed: 0, timedOut: false, durationMs: 0 };
    }

    const workers = this.workerCount(job);
    log.debug(`Batch ${batchId}: ${total} request(s) on ${workers} worker(s)`);

    const lifecycles = job.requests.map(r => new RequestLifecycle(r, runOptions.observer));
    const slots: Array<CallResult | undefined> = new Array<CallResult | undefined>(total).fill(undefined);
    const controller = new AbortController();
    let next = 0;

    const settle = (index: number, result: CallResult): void => {
      if (slots[index]) return;
      slots[index] = result;
      runOptions.onSettled?.(index, result);
    };

    const worker = async (): Promise<void> => {
      while (!controller.signal.aborted) {
        const index = next++;
        if (index >= total) return;
        const lifecycle = lifecycles[index];
        try {
          const result = await this.options.executor(job.requests[index], { signal: controller.signal, lifecycle });
          settle(index, result);
        } catch (err) {
          log.error(`Batch ${batchId}: request ${index} crashed: ${errorMessage(err)}`);
          settle(index, lifecycle.result ?? lifecycle.fail('failed_nonretryable', {
            reason: 'internal_error',
            message: errorMessage(err),
          }));
        }
      }
    };

    // Close out open requests first, so executors see them as settled once the abort reaches them
    const closeOut = (reason: Exclude<StopReason, 'done'>): void => {
      for (let i = 0; i < total; i++) {
        if (slots[i]) continue;
        const lifecycle = lifecycles[i];
        settle(i, lifecycle.result ?? lifecycle.fail('failed_timeout', reason === 'timeout'
          ? { reason: 'batch_timeout', message: `Batch deadline of ${this.options.batchTimeoutMs}ms passed` }
          : { reason: 'cancelled', message: 'Batch cancelled' }));
      }
      controller.abort();
    };

    let timer: ReturnType<typeof setTimeout> | undefined;
    let onParentAbort: (() => void) | undefined;
    const stop = new Promise<StopReason>(resolve => {
      const halt = (reason: Exclude<StopReason, 'done'>): void => {
        closeOut(reason);
        resolve(reason);
      };
      if (runOptions.signal?.aborted) {
        halt('cancelled');
        return;
      }
      timer = setTimeout(() => halt('timeout'), this.options.batchTimeoutMs);
      onParentAbort = () => halt('cancelled');
      runOptions.signal?.addEventListener('abort', onParentAbort, { once: true });
    });

    // Nothing is dispatched for a batch cancelled before it started
    const finished = controller.signal.aborted
      ? stop
      : Promise.all(Array.from({ length: workers }, () => worker())).then((): StopReason => 'done');
    const reason = await Promise.race([finished, stop]);

    clearTimeout(timer);
    if (onParentAbort) runOptions.signal?.removeEventListener('abort', onParentAbort);

    if (reason !== 'done') {
      log.warn(`Batch ${batchId}: ${reason === 'timeout' ? 'deadline passed' : 'cancelled'} with requests still open`);
    }

    const results: CallResult[] = [];
    for (let i = 0; i < total; i++) {
      const result = slots[i] ?? lifecycles[i].result;
      if (!result) throw new Error(`Batch ${batchId}: slot ${i} has no result`);
      results.push(result);
    }

    const succeeded = results.filter(r => r.ok).length;
    const durationMs = Date.now() - started;
    log.info(`Batch ${batchId}: ${succeeded}/${total} succeeded in ${durationMs}ms`);

    return {
      batchId,
      results,
      succeeded,
      failed: total - succeeded,
      timedOut: reason === 'timeout',
      durationMs,
    };
  }
}
