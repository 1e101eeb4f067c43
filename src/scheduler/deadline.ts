import type { ProviderErrorKind } from '../errors.js';
import { errorMessage } from '../errors.js';
import type { Credential } from '../pool/credential.js';
import type { CallContext, ProviderCall, ProviderOutcome } from '../providers/provider.js';
import type { CallAttempt, CallRequest } from './types.js';

export type AttemptSettlement =
  | { status: 'success'; response: unknown }
  | { status: 'failed'; kind: ProviderErrorKind; message: string }
  | { status: 'cancelled'; message: string };

/**
 * Run `fn` under a deadline. Settles with a timeout once `timeoutMs` passes
 * and with `cancelled` once `parent` aborts, without waiting for `fn`; the
 * signal handed to `fn` is aborted in both cases so it can stop early.
 * Anything `fn` settles with after that is discarded.
 */
export function callWithDeadline(
  fn: (context: CallContext) => Promise<ProviderOutcome>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<AttemptSettlement> {
  if (parent?.aborted) {
    return Promise.resolve({ status: 'cancelled', message: 'Cancelled before dispatch' });
  }

  const controller = new AbortController();
  const deadline = Date.now() + timeoutMs;

  return new Promise<AttemptSettlement>(resolve => {
    let settled = false;

    const finish = (settlement: AttemptSettlement): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
      resolve(settlement);
    };

    const onParentAbort = (): void => {
      finish({ status: 'cancelled', message: 'Attempt cancelled' });
      controller.abort();
    };

    const timer = setTimeout(() => {
      finish({ status: 'failed', kind: 'timeout', message: `No response within ${timeoutMs}ms` });
      controller.abort();
    }, timeoutMs);

    parent?.addEventListener('abort', onParentAbort, { once: true });

    let pending: Promise<ProviderOutcome>;
    try {
      pending = fn({ signal: controller.signal, deadline });
    } catch (err) {
      finish({ status: 'failed', kind: 'transport_error', message: errorMessage(err) });
      return;
    }

    pending.then(
      outcome => finish(outcome.ok
        ? { status: 'success', response: outcome.response }
        : { status: 'failed', kind: outcome.kind, message: outcome.message }),
      err => finish({ status: 'failed', kind: 'transport_error', message: errorMessage(err) }),
    );
  });
}

export interface AttemptRun {
  attempt: CallAttempt;
  settlement: AttemptSettlement;
}

/** One provider call with one credential, recorded as a CallAttempt. */
export async function runAttempt(
  provider: ProviderCall,
  request: CallRequest,
  credential: Credential,
  timeoutMs: number,
  ordinal: number,
  signal?: AbortSignal,
): Promise<AttemptRun> {
  const started = Date.now();
  const settlement = await callWithDeadline(
    context => provider.call(request.payload, credential, context),
    timeoutMs,
    signal,
  );

  const base = {
    credentialId: credential.id,
    attempt: ordinal,
    startedAt: new Date(started).toISOString(),
    latencyMs: Date.now() - started,
  };

  let attempt: CallAttempt;
  switch (settlement.status) {
    case 'success':
      attempt = { ...base, outcome: 'success' };
      break;
    case 'cancelled':
      attempt = { ...base, outcome: 'cancelled', message: settlement.message };
      break;
    case 'failed':
      attempt = {
        ...base,
        outcome: settlement.kind === 'timeout' ? 'timeout' : 'error',
        errorKind: settlement.kind,
        message: settlement.message,
      };
      break;
  }

  return { attempt: Object.freeze(attempt), settlement };
}
