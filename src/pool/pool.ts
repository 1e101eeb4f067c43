import type { RotationStrategy } from '../config/schema.js';
import type { ProviderErrorKind } from '../errors.js';
import type { Credential, CredentialState } from './credential.js';
import { createCredential, maskKey } from './credential.js';
import { createLogger } from '../utils/logger.js';
import type { Logger } from '../utils/logger.js';

export interface PoolPolicy {
  /** Consecutive failures tolerated; the next one quarantines the key */
  failureThreshold: number;
  cooldownMs: number;
  /** Quarantine applied at once on an auth error */
  authCooldownMs: number;
  /** Cooldown by failure kind when the threshold trips; `cooldownMs` covers the rest */
  cooldownByKind: Partial<Record<ProviderErrorKind, number>>;
}

export const DEFAULT_POOL_POLICY: PoolPolicy = {
  failureThreshold: 2,
  cooldownMs: 30_000,
  authCooldownMs: 10 * 60_000,
  cooldownByKind: {
    rate_limited: 5 * 60_000,
    timeout: 2 * 60_000,
  },
};

export interface CredentialPoolOptions extends Partial<PoolPolicy> {
  provider: string;
  apiKeys: string[];
  strategy?: RotationStrategy;
  /** Clock in epoch ms */
  now?: () => number;
  /** Uniform source in [0, 1) for the random strategy */
  random?: () => number;
}

export type CredentialHealth = 'healthy' | 'degraded' | 'quarantined';

/** Display row; never carries the full key. */
export interface CredentialStatus {
  id: string;
  provider: string;
  index: number;
  key: string;
  health: CredentialHealth;
  consecutiveFailures: number;
  quarantinedForMs?: number;
  lastUsedAt?: string;
  totalAcquired: number;
  totalFailed: number;
}

/**
 * The set of API keys for one provider plus their health.
 *
 * Every method is synchronous: on a single event loop an acquire-and-advance
 * or a report always runs to completion before another dispatch task can
 * touch the pool, so concurrent dispatchers never double-use or skip a slot.
 */
export class CredentialPool {
  readonly provider: string;
  readonly strategy: RotationStrategy;
  readonly policy: PoolPolicy;

  private credentials: CredentialState[];
  private byId = new Map<string, CredentialState>();
  private cursor = 0;
  private now: () => number;
  private random: () => number;
  private log: Logger;

  constructor(options: CredentialPoolOptions) {
    this.provider = options.provider;
    this.strategy = options.strategy ?? 'round_robin';
    this.policy = {
      failureThreshold: options.failureThreshold ?? DEFAULT_POOL_POLICY.failureThreshold,
      cooldownMs: options.cooldownMs ?? DEFAULT_POOL_POLICY.cooldownMs,
      authCooldownMs: options.authCooldownMs ?? DEFAULT_POOL_POLICY.authCooldownMs,
      cooldownByKind: options.cooldownByKind ?? DEFAULT_POOL_POLICY.cooldownByKind,
    };
    this.now = options.now ?? Date.now;
    this.random = options.random ?? Math.random;
    this.log = createLogger(`pool:${options.provider}`);

    this.credentials = options.apiKeys.map((key, i) => createCredential(options.provider, i, key));
    for (const c of this.credentials) {
      this.byId.set(c.id, c);
    }
  }

  get size(): number {
    return this.credentials.length;
  }

  /** Index the next round-robin scan starts from (or the preferred key under failover). */
  getCursor(): number {
    return this.cursor;
  }

  all(): readonly Credential[] {
    return this.credentials;
  }

  get(id: string): Credential | undefined {
    return this.byId.get(id);
  }

  /**
   * Next key per strategy, or null when every key is quarantined (or there are none).
   * Keys in `exclude` are passed over while any other key is eligible.
   */
  acquire(exclude?: ReadonlySet<string>): Credential | null {
    const now = this.now();
    this.releaseExpired(now);

    const n = this.credentials.length;
    if (n === 0) return null;

    const usable = (c: CredentialState, allowExcluded: boolean): boolean =>
      !this.isQuarantined(c, now) && (allowExcluded || !exclude?.has(c.id));

    switch (this.strategy) {
      case 'round_robin': {
        for (const allowExcluded of [false, true]) {
          for (let step = 0; step < n; step++) {
            const idx = (this.cursor + step) % n;
            const c = this.credentials[idx];
            if (!usable(c, allowExcluded)) continue;
            this.cursor = (idx + 1) % n;
            return this.take(c, now);
          }
        }
        return null;
      }
      case 'random': {
        const all = this.eligible(now);
        const fresh = all.filter(c => usable(c, false));
        const eligible = fresh.length > 0 ? fresh : all;
        if (eligible.length === 0) return null;
        const pick = eligible[Math.min(eligible.length - 1, Math.floor(this.random() * eligible.length))];
        return this.take(pick, now);
      }
      case 'failover': {
        const preferred = this.credentials.find(c => usable(c, false))
          ?? this.credentials.find(c => usable(c, true));
        if (!preferred) return null;
        if (preferred.index !== this.cursor) {
          this.log.info(`Failing over from ${this.credentials[this.cursor].id} to ${preferred.id}`);
          this.cursor = preferred.index;
        }
        return this.take(preferred, now);
      }
    }
  }

  /** Up to `count` distinct non-quarantined keys, in strategy order. */
  acquireMany(count: number): Credential[] {
    const now = this.now();
    this.releaseExpired(now);

    const n = this.credentials.length;
    if (n === 0 || count <= 0) return [];

    let picked: CredentialState[] = [];
    switch (this.strategy) {
      case 'round_robin': {
        let last = -1;
        for (let step = 0; step < n && picked.length < count; step++) {
          const idx = (this.cursor + step) % n;
          const c = this.credentials[idx];
          if (this.isQuarantined(c, now)) continue;
          picked.push(c);
          last = idx;
        }
        if (last >= 0) this.cursor = (last + 1) % n;
        break;
      }
      case 'random': {
        const eligible = this.eligible(now);
        // partial Fisher-Yates
        for (let i = 0; i < eligible.length && i < count; i++) {
          const j = i + Math.min(eligible.length - i - 1, Math.floor(this.random() * (eligible.length - i)));
          [eligible[i], eligible[j]] = [eligible[j], eligible[i]];
        }
        picked = eligible.slice(0, count);
        break;
      }
      case 'failover': {
        picked = this.eligible(now).slice(0, count);
        if (picked.length > 0) this.cursor = picked[0].index;
        break;
      }
    }

    return picked.map(c => this.take(c, now));
  }

  reportFailure(credential: Credential, kind?: ProviderErrorKind): void {
    const c = this.byId.get(credential.id);
    if (!c) return;

    const now = this.now();
    c.consecutiveFailures++;
    c.totalFailed++;

    if (kind === 'auth_error') {
      this.quarantine(c, now, this.policy.authCooldownMs, 'rejected as unauthorized');
    } else if (c.consecutiveFailures > this.policy.failureThreshold) {
      const cooldown = (kind === undefined ? undefined : this.policy.cooldownByKind[kind]) ?? this.policy.cooldownMs;
      this.quarantine(c, now, cooldown, `${c.consecutiveFailures} consecutive failures`);
    } else {
      this.log.debug(`${c.id} failed (${kind ?? 'error'}), ${c.consecutiveFailures} in a row`);
    }
  }

  reportSuccess(credential: Credential): void {
    const c = this.byId.get(credential.id);
    if (!c) return;

    if (c.quarantinedUntil !== undefined) {
      this.log.info(`${c.id} recovered, quarantine lifted`);
    }
    c.consecutiveFailures = 0;
    c.quarantinedUntil = undefined;
  }

  healthyCount(): number {
    const now = this.now();
    this.releaseExpired(now);
    return this.eligible(now).length;
  }

  snapshot(): CredentialStatus[] {
    const now = this.now();
    this.releaseExpired(now);

    return this.credentials.map(c => {
      const quarantined = this.isQuarantined(c, now);
      return {
        id: c.id,
        provider: c.provider,
        index: c.index,
        key: maskKey(c.apiKey),
        health: quarantined ? 'quarantined' : c.consecutiveFailures > 0 ? 'degraded' : 'healthy',
        consecutiveFailures: c.consecutiveFailures,
        quarantinedForMs: quarantined && c.quarantinedUntil !== undefined ? c.quarantinedUntil - now : undefined,
        lastUsedAt: c.lastUsedAt !== undefined ? new Date(c.lastUsedAt).toISOString() : undefined,
        totalAcquired: c.totalAcquired,
        totalFailed: c.totalFailed,
      };
    });
  }

  private isQuarantined(c: CredentialState, now: number): boolean {
    return c.quarantinedUntil !== undefined && c.quarantinedUntil > now;
  }

  private eligible(now: number): CredentialState[] {
    return this.credentials.filter(c => !this.isQuarantined(c, now));
  }

  private take(c: CredentialState, now: number): Credential {
    c.lastUsedAt = now;
    c.totalAcquired++;
    return c;
  }

  private quarantine(c: CredentialState, now: number, ms: number, reason: string): void {
    const until = now + ms;
    c.quarantinedUntil = Math.max(c.quarantinedUntil ?? 0, until);
    this.log.warn(`${c.id} quarantined for ${Math.round(ms / 1000)}s: ${reason}`);
  }

  /** A lapsed quarantine gives the key a clean slate. */
  private releaseExpired(now: number): void {
    for (const c of this.credentials) {
      if (c.quarantinedUntil !== undefined && c.quarantinedUntil <= now) {
        c.quarantinedUntil = undefined;
        c.consecutiveFailures = 0;
        this.log.debug(`${c.id} released from quarantine`);
      }
    }
  }
}
