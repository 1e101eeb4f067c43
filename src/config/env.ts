/**
 * Environment overrides.
 *
 * Names follow the deployment's .env conventions: durations are given in
 * seconds, key lists are comma separated, and `<PROVIDER>_API_KEY` is the
 * single-key fallback when `<PROVIDER>_API_KEYS` is unset or empty.
 */

import type { CooldownKind } from './schema.js';

export interface EnvOverrides {
  overlay: Record<string, unknown>;
  problems: string[];
}

type Env = Record<string, string | undefined>;

const INTEGER_OPTIONS: Array<[string, string, number]> = [
  ['MAX_PARALLEL_API_KEYS', 'maxParallelApiKeys', 1],
  ['MAX_BATCH_SIZE', 'maxBatchSize', 1],
  ['MAX_RETRIES', 'maxRetries', 0],
  ['KEY_FAILURE_THRESHOLD', 'failureThreshold', 0],
];

const SECONDS_OPTIONS: Array<[string, string]> = [
  ['API_CALL_TIMEOUT', 'apiCallTimeoutMs'],
  ['API_RETRY_TIMEOUT', 'apiRetryTimeoutMs'],
  ['BATCH_TIMEOUT', 'batchTimeoutMs'],
  ['KEY_QUARANTINE_COOLDOWN', 'quarantineCooldownMs'],
  ['KEY_AUTH_COOLDOWN', 'authCooldownMs'],
];

const KIND_COOLDOWN_OPTIONS: Array<[string, CooldownKind]> = [
  ['KEY_TIMEOUT_COOLDOWN', 'timeout'],
  ['KEY_RATE_LIMIT_COOLDOWN', 'rate_limited'],
  ['KEY_TRANSPORT_ERROR_COOLDOWN', 'transport_error'],
];

const TRUE_VALUES = new Set(['true', '1', 'yes', 'on']);
const FALSE_VALUES = new Set(['false', '0', 'no', 'off']);

function read(env: Env, name: string): string | undefined {
  const raw = env[name];
  if (raw === undefined) return undefined;
  const trimmed = raw.trim();
  return trimmed === '' ? undefined : trimmed;
}

export function parseBoolean(value: string): boolean | undefined {
  const lower = value.trim().toLowerCase();
  if (TRUE_VALUES.has(lower)) return true;
  if (FALSE_VALUES.has(lower)) return false;
  return undefined;
}

export function parseKeyList(value: string): string[] {
  return value.split(',').map(k => k.trim()).filter(k => k.length > 0);
}

export function readEnvOverrides(env: Env, providerIds: string[]): EnvOverrides {
  const overlay: Record<string, unknown> = {};
  const problems: string[] = [];

  const strategy = read(env, 'API_KEY_ROTATION_STRATEGY');
  if (strategy !== undefined) overlay.rotationStrategy = strategy.toLowerCase();

  for (const [name, key, min] of INTEGER_OPTIONS) {
    const value = read(env, name);
    if (value === undefined) continue;
    const n = Number(value);
    if (!Number.isInteger(n) || n < min) {
      problems.push(`${name} must be an integer >= ${min} (got "${value}")`);
      continue;
    }
    overlay[key] = n;
  }

  const readMs = (name: string): number | undefined => {
    const value = read(env, name);
    if (value === undefined) return undefined;
    const seconds = Number(value);
    if (!Number.isFinite(seconds) || seconds <= 0) {
      problems.push(`${name} must be a positive number of seconds (got "${value}")`);
      return undefined;
    }
    return Math.round(seconds * 1000);
  };

  for (const [name, key] of SECONDS_OPTIONS) {
    const ms = readMs(name);
    if (ms !== undefined) overlay[key] = ms;
  }

  const cooldowns: Record<string, number> = {};
  for (const [name, kind] of KIND_COOLDOWN_OPTIONS) {
    const ms = readMs(name);
    if (ms !== undefined) cooldowns[kind] = ms;
  }
  if (Object.keys(cooldowns).length > 0) overlay.cooldownByKind = cooldowns;

  const failover = read(env, 'ENABLE_FAST_FAILOVER');
  if (failover !== undefined) {
    const parsed = parseBoolean(failover);
    if (parsed === undefined) {
      problems.push(`ENABLE_FAST_FAILOVER must be a boolean (got "${failover}")`);
    } else {
      overlay.enableFastFailover = parsed;
    }
  }

  const defaultProvider = read(env, 'DEFAULT_LLM_PROVIDER');
  if (defaultProvider !== undefined) overlay.defaultProvider = defaultProvider.toLowerCase();

  const logLevel = read(env, 'LOG_LEVEL');
  if (logLevel !== undefined) overlay.logLevel = logLevel.toLowerCase();

  const providers: Record<string, unknown> = {};
  for (const id of providerIds) {
    const prefix = id.toUpperCase().replace(/[^A-Z0-9]/g, '_');
    const entry: Record<string, unknown> = {};

    const many = read(env, `${prefix}_API_KEYS`);
    const manyKeys = many !== undefined ? parseKeyList(many) : [];
    const single = read(env, `${prefix}_API_KEY`);
    if (manyKeys.length > 0) {
      entry.apiKeys = manyKeys;
    } else if (single !== undefined) {
      entry.apiKeys = [single];
    }

    const model = read(env, `${prefix}_MODEL_NAME`);
    if (model !== undefined) entry.model = model;

    const baseUrl = read(env, `${prefix}_BASE_URL`);
    if (baseUrl !== undefined) entry.baseUrl = baseUrl;

    if (Object.keys(entry).length > 0) providers[id] = entry;
  }
  if (Object.keys(providers).length > 0) overlay.providers = providers;

  return { overlay, problems };
}
