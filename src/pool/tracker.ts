import type { KeyrelayConfig } from '../config/schema.js';
import { CredentialPool } from './pool.js';
import type { CredentialStatus } from './pool.js';
import { logger } from '../utils/logger.js';

/** Per-provider summary for the `pool` command */
export interface ProviderPoolSummary {
  provider: string;
  strategy: string;
  size: number;
  healthy: number;
  quarantined: number;
  credentials: CredentialStatus[];
}

export interface PoolTrackerOptions {
  now?: () => number;
  random?: () => number;
}

/** Owns one CredentialPool per enabled provider. */
export class PoolTracker {
  private pools = new Map<string, CredentialPool>();

  constructor(config: KeyrelayConfig, options: PoolTrackerOptions = {}) {
    for (const [provider, providerConfig] of Object.entries(config.providers)) {
      if (!providerConfig.enabled) continue;

      this.pools.set(provider, new CredentialPool({
        provider,
        apiKeys: providerConfig.apiKeys,
        strategy: config.rotationStrategy,
        failureThreshold: config.failureThreshold,
        cooldownMs: config.quarantineCooldownMs,
        cooldownByKind: config.cooldownByKind,
        authCooldownMs: config.authCooldownMs,
        now: options.now,
        random: options.random,
      }));

      if (providerConfig.apiKeys.length === 0) {
        logger.debug(`Pool ${provider}: no API keys configured`);
      } else {
        logger.debug(`Pool ${provider}: ${providerConfig.apiKeys.length} key(s), ${config.rotationStrategy}`);
      }
    }
  }

  getPool(provider: string): CredentialPool | undefined {
    return this.pools.get(provider);
  }

  getAllPools(): CredentialPool[] {
    return Array.from(this.pools.values());
  }

  providers(): string[] {
    return Array.from(this.pools.keys());
  }

  /** Whether any key of the provider can be acquired right now */
  canDispatch(provider: string): boolean {
    return (this.pools.get(provider)?.healthyCount() ?? 0) > 0;
  }

  getSummary(provider: string): ProviderPoolSummary | undefined {
    const pool = this.pools.get(provider);
    if (!pool) return undefined;

    const credentials = pool.snapshot();
    const quarantined = credentials.filter(c => c.health === 'quarantined').length;
    return {
      provider,
      strategy: pool.strategy,
      size: pool.size,
      healthy: pool.size - quarantined,
      quarantined,
      credentials,
    };
  }

  getAllSummaries(): ProviderPoolSummary[] {
    const summaries: ProviderPoolSummary[] = [];
    for (const provider of this.pools.keys()) {
      const summary = this.getSummary(provider);
      if (summary) summaries.push(summary);
    }
    return summaries;
  }
}
