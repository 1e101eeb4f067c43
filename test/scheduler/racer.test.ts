import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { vi } from 'vitest';
import { FailoverRacer } from '../../src/scheduler/racer.js';
import { createHarness, delay, fail, hang, ok, testPool } from '../helpers/fake-provider.js';
import type { Script } from '../helpers/fake-provider.js';

function setup(script: Script, maxParallel = 5, apiKeys?: string[]) {
  const harness = createHarness(script, { maxParallelApiKeys: maxParallel, enableFastFailover: true }, apiKeys);
  return { ...harness, racer: new FailoverRacer(harness.pools, harness.registry, maxParallel) };
}

describe('FailoverRacer', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('answers as soon as the fastest key does', async () => {
    const h = setup(async (_payload, credential, ctx) => {
      if (credential.id === 'test#0') return hang(ctx.signal);
      if (credential.id === 'test#1') {
        await delay(2_000, ctx.signal);
        return ok('from-b');
      }
      await delay(5_000, ctx.signal);
      return ok('from-c');
    });

    const pending = h.racer.race(h.service.createRequest({ prompt: 'hi' }, { timeoutMs: 10_000 }));
    await vi.advanceTimersByTimeAsync(2_000);
    const result = await pending;

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.response).toBe('from-b');
    expect(result.durationMs).toBe(2_000);
    expect(result.attempts[0]).toMatchObject({ credentialId: 'test#1', outcome: 'success', latencyMs: 2_000 });
    expect(result.attempts.map(a => a.outcome).sort()).toEqual(['cancelled', 'cancelled', 'success']);
  });

  it('does not penalize the lanes it cancelled', async () => {
    const h = setup(async (_payload, credential, ctx) => {
      if (credential.id === 'test#0') return ok('instant');
      return hang(ctx.signal);
    });

    await h.racer.race(h.service.createRequest({ prompt: 'hi' }));

    const pool = testPool(h);
    expect(pool.all().map(c => c.consecutiveFailures)).toEqual([0, 0, 0]);
    expect(pool.all().map(c => c.totalAcquired)).toEqual([1, 1, 1]);
  });

  it('caps the fan-out at the configured parallelism', async () => {
    const h = setup(() => ok('done'), 2);
    await h.racer.race(h.service.createRequest({ prompt: 'hi' }));
    expect(h.provider.calls.map(c => c.credentialId)).toEqual(['test#0', 'test#1']);
  });

  it('leaves quarantined keys out of the race', async () => {
    const h = setup(() => ok('done'));
    const pool = testPool(h);
    const k0 = pool.get('test#0');
    if (!k0) throw new Error('missing test#0');
    pool.reportFailure(k0, 'auth_error');

    await h.racer.race(h.service.createRequest({ prompt: 'hi' }));
    expect(h.provider.calls.map(c => c.credentialId)).toEqual(['test#1', 'test#2']);
  });

  it('reports every lane failure when no key succeeds', async () => {
    const h = setup(() => fail('rate_limited', 'HTTP 429: busy'));
    const result = await h.racer.race(h.service.createRequest({ prompt: 'hi' }));

    expect(result).toMatchObject({ ok: false, state: 'failed_exhausted' });
    if (result.ok) return;
    expect(result.failure.reason).toBe('all_racers_failed');
    expect(result.failure.lastErrorKind).toBe('rate_limited');
    expect(result.failure.message).toBe(
      'All 3 racing key(s) failed: test#0: rate_limited (HTTP 429: busy); '
      + 'test#1: rate_limited (HTTP 429: busy); test#2: rate_limited (HTTP 429: busy)',
    );
    expect(testPool(h).all().map(c => c.consecutiveFailures)).toEqual([1, 1, 1]);
  });

  it('times out every lane at the request deadline', async () => {
    const h = setup((_payload, _credential, ctx) => hang(ctx.signal));
    const pending = h.racer.race(h.service.createRequest({ prompt: 'hi' }, { timeoutMs: 1_000 }));
    await vi.advanceTimersByTimeAsync(1_000);
    const result = await pending;

    expect(result).toMatchObject({ ok: false, state: 'failed_exhausted' });
    if (result.ok) return;
    expect(result.failure.lastErrorKind).toBe('timeout');
    expect(result.attempts.map(a => a.outcome)).toEqual(['timeout', 'timeout', 'timeout']);
  });

  it('treats an invalid request as non-retryable', async () => {
    const h = setup(() => fail('invalid_response', 'HTTP 400: bad'));
    const result = await h.racer.race(h.service.createRequest({ prompt: 'hi' }));

    expect(result).toMatchObject({ ok: false, state: 'failed_nonretryable' });
    expect(testPool(h).all().map(c => c.consecutiveFailures)).toEqual([0, 0, 0]);
  });

  it('fails fast when there is no key to race', async () => {
    const h = setup(() => ok('unused'), 5, []);
    const result = await h.racer.race(h.service.createRequest({ prompt: 'hi' }));

    expect(result).toMatchObject({ ok: false, state: 'failed_exhausted', attempts: [] });
    if (result.ok) return;
    expect(result.failure.reason).toBe('pool_exhausted');
    expect(h.provider.calls).toHaveLength(0);
  });

  it('ends as cancelled when the caller aborts mid-race', async () => {
    const h = setup((_payload, _credential, ctx) => hang(ctx.signal));
    const controller = new AbortController();

    const pending = h.racer.race(h.service.createRequest({ prompt: 'hi' }), { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(result).toMatchObject({ ok: false, state: 'failed_timeout' });
    if (result.ok) return;
    expect(result.failure.reason).toBe('cancelled');
    expect(testPool(h).all().map(c => c.consecutiveFailures)).toEqual([0, 0, 0]);
  });
});
