import type { KeyrelayConfig } from './schema.js';

export const DEFAULT_CONFIG: KeyrelayConfig = {
  providers: {
    gemini: {
      enabled: true,
      apiKeys: [],
      model: 'gemini-2.0-flash',
    },
    openai: {
      enabled: true,
      apiKeys: [],
      model: 'gpt-4o-mini',
    },
  },
  defaultProvider: 'gemini',
  rotationStrategy: 'round_robin',
  maxParallelApiKeys: 5,
  apiCallTimeoutMs: 60_000,
  apiRetryTimeoutMs: 30_000,
  enableFastFailover: true,
  maxBatchSize: 10,
  batchTimeoutMs: 30_000,
  maxRetries: 2,
  failureThreshold: 2,
  quarantineCooldownMs: 30_000,
  cooldownByKind: {
    rate_limited: 5 * 60_000,
    timeout: 2 * 60_000,
  },
  authCooldownMs: 10 * 60_000,
  logLevel: 'info',
};
