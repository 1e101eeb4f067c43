import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { vi } from 'vitest';
import { callWithDeadline, runAttempt } from '../../src/scheduler/deadline.js';
import { createCredential } from '../../src/pool/credential.js';
import { createCallRequest } from '../../src/scheduler/types.js';
import { FakeProvider, delay, fail, hang, ok } from '../helpers/fake-provider.js';

describe('callWithDeadline', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('settles with the response when the call returns in time', async () => {
    const pending = callWithDeadline(async () => ok('pong'), 1_000);
    await expect(pending).resolves.toEqual({ status: 'success', response: 'pong' });
  });

  it('passes failures through with their kind', async () => {
    const settlement = await callWithDeadline(async () => fail('rate_limited', 'slow down'), 1_000);
    expect(settlement).toEqual({ status: 'failed', kind: 'rate_limited', message: 'slow down' });
  });

  it('times out a call that never answers and aborts it', async () => {
    let seen: AbortSignal | undefined;
    const pending = callWithDeadline(ctx => {
      seen = ctx.signal;
      return hang(ctx.signal);
    }, 1_000);

    await vi.advanceTimersByTimeAsync(1_000);
    await expect(pending).resolves.toEqual({ status: 'failed', kind: 'timeout', message: 'No response within 1000ms' });
    expect(seen?.aborted).toBe(true);
  });

  it('hands the call an absolute deadline', async () => {
    const start = Date.now();
    let deadline = 0;
    await callWithDeadline(async ctx => {
      deadline = ctx.deadline;
      return ok(null);
    }, 750);
    expect(deadline).toBe(start + 750);
  });

  it('settles as cancelled when the parent signal aborts', async () => {
    const parent = new AbortController();
    const pending = callWithDeadline(ctx => hang(ctx.signal), 10_000, parent.signal);
    parent.abort();
    await expect(pending).resolves.toEqual({ status: 'cancelled', message: 'Attempt cancelled' });
  });

  it('does not call at all when the parent is already aborted', async () => {
    const parent = new AbortController();
    parent.abort();
    const fn = vi.fn(async () => ok(null));
    const settlement = await callWithDeadline(fn, 1_000, parent.signal);
    expect(settlement.status).toBe('cancelled');
    expect(fn).not.toHaveBeenCalled();
  });

  it('treats a thrown error as a transport error', async () => {
    const settlement = await callWithDeadline(() => {
      throw new Error('socket hang up');
    }, 1_000);
    expect(settlement).toEqual({ status: 'failed', kind: 'transport_error', message: 'socket hang up' });
  });

  it('treats a rejected call as a transport error', async () => {
    const settlement = await callWithDeadline(() => Promise.reject(new Error('ECONNRESET')), 1_000);
    expect(settlement).toEqual({ status: 'failed', kind: 'transport_error', message: 'ECONNRESET' });
  });

  it('ignores an answer that arrives after the deadline', async () => {
    const pending = callWithDeadline(async () => {
      await delay(2_000);
      return ok('late');
    }, 1_000);
    await vi.advanceTimersByTimeAsync(2_000);
    await expect(pending).resolves.toMatchObject({ status: 'failed', kind: 'timeout' });
  });
});

describe('runAttempt', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  const request = createCallRequest('test', { prompt: 'hi' }, { timeoutMs: 1_000, retryTimeoutMs: 500, maxRetries: 0 });
  const credential = createCredential('test', 1, 'test-secret');

  it('records a successful attempt', async () => {
    const provider = new FakeProvider('test', async (_payload, _cred, ctx) => {
      await delay(40, ctx.signal);
      return ok('done');
    });
    const pending = runAttempt(provider, request, credential, 1_000, 2);
    await vi.advanceTimersByTimeAsync(40);
    const { attempt, settlement } = await pending;

    expect(settlement).toEqual({ status: 'success', response: 'done' });
    expect(attempt).toMatchObject({ credentialId: 'test#1', attempt: 2, latencyMs: 40, outcome: 'success' });
    expect(provider.calls[0].payload).toEqual({ prompt: 'hi' });
  });

  it('marks a timed out attempt with outcome timeout', async () => {
    const provider = new FakeProvider('test', (_payload, _cred, ctx) => hang(ctx.signal));
    const pending = runAttempt(provider, request, credential, 300, 1);
    await vi.advanceTimersByTimeAsync(300);
    const { attempt } = await pending;
    expect(attempt).toMatchObject({ outcome: 'timeout', errorKind: 'timeout', latencyMs: 300 });
  });

  it('marks other failures with outcome error', async () => {
    const provider = new FakeProvider('test', () => fail('auth_error', 'HTTP 401: bad key'));
    const { attempt } = await runAttempt(provider, request, credential, 300, 1);
    expect(attempt).toMatchObject({ outcome: 'error', errorKind: 'auth_error', message: 'HTTP 401: bad key' });
    expect(Object.isFrozen(attempt)).toBe(true);
  });
});
