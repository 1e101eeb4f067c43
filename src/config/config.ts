import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import JSON5 from 'json5';
import type { CooldownKind, KeyrelayConfig, ProviderConfig, RotationStrategy } from './schema.js';
import { COOLDOWN_KINDS, ROTATION_STRATEGIES } from './schema.js';
import { DEFAULT_CONFIG } from './defaults.js';
import { readEnvOverrides } from './env.js';
import { ConfigError, errorMessage } from '../errors.js';
import { isLogLevel, logger } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';

const GLOBAL_CONFIG_DIR = join(homedir(), '.keyrelay');
const GLOBAL_CONFIG_FILE = join(GLOBAL_CONFIG_DIR, 'config.json');
const LOCAL_CONFIG_FILE = join('.keyrelay', 'config.json');

export interface LoadConfigOptions {
  /** Directory holding `.keyrelay/config.json` (defaults to cwd) */
  repoRoot?: string;
  /** Path of the user-wide config file; `null` skips it */
  globalConfigFile?: string | null;
  env?: Record<string, string | undefined>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function loadJsonFile(path: string): Promise<Record<string, unknown> | null> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch {
    return null;
  }

  let parsed: unknown;
  try {
    parsed = JSON5.parse(content);
  } catch (err) {
    throw new ConfigError([`${path}: ${errorMessage(err)}`]);
  }
  if (!isRecord(parsed)) {
    throw new ConfigError([`${path}: expected an object at the top level`]);
  }
  return parsed;
}

export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const key of Object.keys(override)) {
    const val = override[key];
    if (isRecord(val)) {
      const current = result[key];
      result[key] = deepMerge(isRecord(current) ? current : {}, val);
    } else if (val !== undefined && val !== null) {
      result[key] = val;
    }
  }
  return result;
}

function toRecord(config: KeyrelayConfig): Record<string, unknown> {
  const providers: Record<string, unknown> = {};
  for (const [id, p] of Object.entries(config.providers)) {
    providers[id] = { ...p, apiKeys: [...p.apiKeys] };
  }
  return { ...config, providers, cooldownByKind: { ...config.cooldownByKind } };
}

// ─── Validation ─────────────────────────────────────────────────────────────

class Reader {
  readonly problems: string[] = [];

  constructor(private raw: Record<string, unknown>) {}

  integer(key: string, min: number): number {
    const value = this.raw[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < min) {
      this.problems.push(`${key} must be an integer >= ${min}`);
      return min;
    }
    return value;
  }

  boolean(key: string): boolean {
    const value = this.raw[key];
    if (typeof value !== 'boolean') {
      this.problems.push(`${key} must be a boolean`);
      return false;
    }
    return value;
  }

  string(key: string): string {
    const value = this.raw[key];
    if (typeof value !== 'string' || value.trim() === '') {
      this.problems.push(`${key} must be a non-empty string`);
      return '';
    }
    return value.trim();
  }

  strategy(key: string): RotationStrategy {
    const value = this.raw[key];
    const match = ROTATION_STRATEGIES.find(s => s === value);
    if (!match) {
      this.problems.push(`${key} must be one of ${ROTATION_STRATEGIES.join(', ')}`);
      return 'round_robin';
    }
    return match;
  }

  cooldowns(key: string): Partial<Record<CooldownKind, number>> {
    const value = this.raw[key] ?? {};
    const cooldowns: Partial<Record<CooldownKind, number>> = {};
    if (!isRecord(value)) {
      this.problems.push(`${key} must be an object`);
      return cooldowns;
    }
    for (const [name, ms] of Object.entries(value)) {
      const kind = COOLDOWN_KINDS.find(k => k === name);
      if (!kind) {
        this.problems.push(`${key}.${name} is not one of ${COOLDOWN_KINDS.join(', ')}`);
      } else if (typeof ms !== 'number' || !Number.isInteger(ms) || ms < 1) {
        this.problems.push(`${key}.${name} must be an integer >= 1`);
      } else {
        cooldowns[kind] = ms;
      }
    }
    return cooldowns;
  }

  logLevel(key: string): LogLevel {
    const value = this.raw[key];
    if (typeof value !== 'string' || !isLogLevel(value)) {
      this.problems.push(`${key} must be one of debug, info, warn, error, silent`);
      return 'info';
    }
    return value;
  }
}

function readProvider(id: string, raw: unknown, problems: string[]): ProviderConfig {
  if (!isRecord(raw)) {
    problems.push(`providers.${id} must be an object`);
    return { enabled: false, apiKeys: [], model: '' };
  }

  const enabled = raw.enabled ?? true;
  if (typeof enabled !== 'boolean') problems.push(`providers.${id}.enabled must be a boolean`);

  const apiKeys: string[] = [];
  const keys = raw.apiKeys ?? [];
  if (!Array.isArray(keys)) {
    problems.push(`providers.${id}.apiKeys must be an array of strings`);
  } else {
    for (const key of keys) {
      if (typeof key !== 'string') {
        problems.push(`providers.${id}.apiKeys must be an array of strings`);
        break;
      }
      if (key.trim() !== '') apiKeys.push(key.trim());
    }
  }

  const model = raw.model;
  if (typeof model !== 'string' || model.trim() === '') {
    problems.push(`providers.${id}.model must be a non-empty string`);
  }

  const baseUrl = raw.baseUrl;
  if (baseUrl !== undefined && typeof baseUrl !== 'string') {
    problems.push(`providers.${id}.baseUrl must be a string`);
  }

  return {
    enabled: enabled === true,
    apiKeys,
    model: typeof model === 'string' ? model.trim() : '',
    ...(typeof baseUrl === 'string' ? { baseUrl } : {}),
  };
}

/** Validate a merged raw config object; throws ConfigError listing every problem. */
export function normalizeConfig(raw: Record<string, unknown>, extraProblems: string[] = []): KeyrelayConfig {
  const r = new Reader(raw);

  const providers: Record<string, ProviderConfig> = {};
  const problems: string[] = [];
  if (!isRecord(raw.providers)) {
    problems.push('providers must be an object');
  } else {
    for (const [id, entry] of Object.entries(raw.providers)) {
      providers[id] = readProvider(id, entry, problems);
    }
  }

  const config: KeyrelayConfig = {
    providers,
    defaultProvider: r.string('defaultProvider'),
    rotationStrategy: r.strategy('rotationStrategy'),
    maxParallelApiKeys: r.integer('maxParallelApiKeys', 1),
    apiCallTimeoutMs: r.integer('apiCallTimeoutMs', 1),
    apiRetryTimeoutMs: r.integer('apiRetryTimeoutMs', 1),
    enableFastFailover: r.boolean('enableFastFailover'),
    maxBatchSize: r.integer('maxBatchSize', 1),
    batchTimeoutMs: r.integer('batchTimeoutMs', 1),
    maxRetries: r.integer('maxRetries', 0),
    failureThreshold: r.integer('failureThreshold', 0),
    quarantineCooldownMs: r.integer('quarantineCooldownMs', 1),
    cooldownByKind: r.cooldowns('cooldownByKind'),
    authCooldownMs: r.integer('authCooldownMs', 1),
    logLevel: r.logLevel('logLevel'),
  };

  if (config.defaultProvider && isRecord(raw.providers) && !(config.defaultProvider in providers)) {
    problems.push(`defaultProvider "${config.defaultProvider}" is not a configured provider`);
  }

  const all = [...extraProblems, ...r.problems, ...problems];
  if (all.length > 0) throw new ConfigError(all);
  return config;
}

let cachedConfig: KeyrelayConfig | null = null;

export async function loadConfig(options: LoadConfigOptions = {}): Promise<KeyrelayConfig> {
  if (cachedConfig) return cachedConfig;

  let merged = toRecord(DEFAULT_CONFIG);

  // Load global config
  const globalPath = options.globalConfigFile === undefined ? GLOBAL_CONFIG_FILE : options.globalConfigFile;
  if (globalPath) {
    const globalConfig = await loadJsonFile(globalPath);
    if (globalConfig) {
      logger.debug('Loaded global config from ' + globalPath);
      merged = deepMerge(merged, globalConfig);
    }
  }

  // Load local config
  const localPath = options.repoRoot ? join(options.repoRoot, LOCAL_CONFIG_FILE) : LOCAL_CONFIG_FILE;
  const localConfig = await loadJsonFile(localPath);
  if (localConfig) {
    logger.debug('Loaded local config from ' + localPath);
    merged = deepMerge(merged, localConfig);
  }

  // Environment wins over both files
  const providerIds = isRecord(merged.providers) ? Object.keys(merged.providers) : [];
  const { overlay, problems } = readEnvOverrides(options.env ?? process.env, providerIds);
  merged = deepMerge(merged, overlay);

  cachedConfig = normalizeConfig(merged, problems);
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}

export function getGlobalConfigDir(): string {
  return GLOBAL_CONFIG_DIR;
}
