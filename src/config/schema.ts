import type { LogLevel } from '../utils/logger.js';
import type { ProviderErrorKind } from '../errors.js';

export type RotationStrategy = 'round_robin' | 'random' | 'failover';

export const ROTATION_STRATEGIES: readonly RotationStrategy[] = ['round_robin', 'random', 'failover'];

/** Failure kinds that count toward the quarantine threshold and may carry their own cooldown. */
export const COOLDOWN_KINDS = ['timeout', 'rate_limited', 'transport_error'] as const satisfies readonly ProviderErrorKind[];

export type CooldownKind = (typeof COOLDOWN_KINDS)[number];

export interface ProviderConfig {
  enabled: boolean;
  /** API keys, in pool order */
  apiKeys: string[];
  /** Model used when a payload names none */
  model: string;
  /** Override the provider's API base URL (proxies, gateways) */
  baseUrl?: string;
}

export interface KeyrelayConfig {
  providers: Record<string, ProviderConfig>;
  /** Provider for requests that don't name one */
  defaultProvider: string;
  rotationStrategy: RotationStrategy;
  /** Batch worker cap and race-mode fan-out */
  maxParallelApiKeys: number;
  /** Deadline for the first attempt of a call */
  apiCallTimeoutMs: number;
  /** Deadline for retry attempts; clamped to apiCallTimeoutMs */
  apiRetryTimeoutMs: number;
  /** Race several keys per request instead of retrying one at a time */
  enableFastFailover: boolean;
  maxBatchSize: number;
  /** Wall-clock bound for a whole batch */
  batchTimeoutMs: number;
  /** Retries after the first attempt */
  maxRetries: number;
  /** Consecutive failures a key may have before it is quarantined */
  failureThreshold: number;
  quarantineCooldownMs: number;
  /** Quarantine length by failure kind; kinds left out use quarantineCooldownMs */
  cooldownByKind: Partial<Record<CooldownKind, number>>;
  /** Quarantine applied at once when a key is rejected as unauthorized */
  authCooldownMs: number;
  logLevel: LogLevel;
}
