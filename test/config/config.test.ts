import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { deepMerge, loadConfig, normalizeConfig, resetConfigCache } from '../../src/config/config.js';
import { DEFAULT_CONFIG } from '../../src/config/defaults.js';
import { ConfigError } from '../../src/errors.js';

let root: string;

async function writeLocal(content: string): Promise<void> {
  await mkdir(join(root, '.keyrelay'), { recursive: true });
  await writeFile(join(root, '.keyrelay', 'config.json'), content);
}

describe('loadConfig', () => {
  beforeEach(async () => {
    resetConfigCache();
    root = await mkdtemp(join(tmpdir(), 'keyrelay-config-'));
  });

  afterEach(async () => {
    resetConfigCache();
    await rm(root, { recursive: true, force: true });
  });

  it('returns the defaults when there is no file and no environment', async () => {
    const config = await loadConfig({ repoRoot: root, globalConfigFile: null, env: {} });
    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('merges the local JSON5 file over the defaults', async () => {
    await writeLocal(`{
      // keys for local testing
      rotationStrategy: 'random',
      maxBatchSize: 4,
      providers: { gemini: { apiKeys: ['test-key-1', 'test-key-2'] } },
    }`);

    const config = await loadConfig({ repoRoot: root, globalConfigFile: null, env: {} });
    expect(config.rotationStrategy).toBe('random');
    expect(config.maxBatchSize).toBe(4);
    expect(config.providers.gemini).toEqual({ enabled: true, apiKeys: ['test-key-1', 'test-key-2'], model: 'gemini-2.0-flash' });
    expect(config.providers.openai.model).toBe('gpt-4o-mini');
  });

  it('applies the global file beneath the local one', async () => {
    const globalFile = join(root, 'global.json');
    await writeFile(globalFile, JSON.stringify({ maxRetries: 5, maxBatchSize: 8 }));
    await writeLocal(JSON.stringify({ maxBatchSize: 3 }));

    const config = await loadConfig({ repoRoot: root, globalConfigFile: globalFile, env: {} });
    expect(config.maxRetries).toBe(5);
    expect(config.maxBatchSize).toBe(3);
  });

  it('lets the environment win over files', async () => {
    await writeLocal(JSON.stringify({ maxParallelApiKeys: 2, providers: { openai: { apiKeys: ['from-file'] } } }));

    const config = await loadConfig({
      repoRoot: root,
      globalConfigFile: null,
      env: { MAX_PARALLEL_API_KEYS: '7', OPENAI_API_KEYS: 'from-env-1,from-env-2' },
    });
    expect(config.maxParallelApiKeys).toBe(7);
    expect(config.providers.openai.apiKeys).toEqual(['from-env-1', 'from-env-2']);
  });

  it('overrides one failure-kind cooldown and keeps the other defaults', async () => {
    await writeLocal(JSON.stringify({ cooldownByKind: { transport_error: 15_000 } }));

    const config = await loadConfig({
      repoRoot: root,
      globalConfigFile: null,
      env: { KEY_RATE_LIMIT_COOLDOWN: '60' },
    });
    expect(config.cooldownByKind).toEqual({ rate_limited: 60_000, timeout: 120_000, transport_error: 15_000 });
  });

  it('picks up env keys for providers declared only in a file', async () => {
    await writeLocal(JSON.stringify({ providers: { mistral: { model: 'mistral-small' } } }));

    const config = await loadConfig({ repoRoot: root, globalConfigFile: null, env: { MISTRAL_API_KEY: 'test-secret' } });
    expect(config.providers.mistral).toEqual({ enabled: true, apiKeys: ['test-secret'], model: 'mistral-small' });
  });

  it('caches the first load', async () => {
    const first = await loadConfig({ repoRoot: root, globalConfigFile: null, env: {} });
    const second = await loadConfig({ repoRoot: root, globalConfigFile: null, env: { MAX_RETRIES: '9' } });
    expect(second).toBe(first);
  });

  it('reports env and file problems together', async () => {
    await writeLocal(JSON.stringify({ rotationStrategy: 'sticky' }));

    const error = await loadConfig({ repoRoot: root, globalConfigFile: null, env: { MAX_BATCH_SIZE: 'lots' } })
      .catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ConfigError);
    if (!(error instanceof ConfigError)) return;
    expect(error.problems).toEqual([
      'MAX_BATCH_SIZE must be an integer >= 1 (got "lots")',
      'rotationStrategy must be one of round_robin, random, failover',
    ]);
  });

  it('rejects a file that is not valid JSON5', async () => {
    await writeLocal('{ maxRetries: ');
    await expect(loadConfig({ repoRoot: root, globalConfigFile: null, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('rejects a file whose top level is not an object', async () => {
    await writeLocal('[1, 2, 3]');
    await expect(loadConfig({ repoRoot: root, globalConfigFile: null, env: {} })).rejects.toThrow(
      'expected an object at the top level',
    );
  });
});

describe('normalizeConfig', () => {
  const base = (): Record<string, unknown> => JSON.parse(JSON.stringify(DEFAULT_CONFIG));

  it('requires the default provider to be configured', () => {
    expect(() => normalizeConfig({ ...base(), defaultProvider: 'claude' })).toThrow(
      'defaultProvider "claude" is not a configured provider',
    );
  });

  it('checks provider entries', () => {
    const raw = base();
    raw.providers = { gemini: { apiKeys: 'test-secret', model: '' } };
    try {
      normalizeConfig(raw);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.problems).toEqual([
        'providers.gemini.apiKeys must be an array of strings',
        'providers.gemini.model must be a non-empty string',
      ]);
    }
  });

  it('drops blank keys and trims the rest', () => {
    const raw = base();
    raw.providers = { gemini: { apiKeys: [' test-secret ', '  '], model: 'gemini-test' } };
    expect(normalizeConfig(raw).providers.gemini.apiKeys).toEqual(['test-secret']);
  });

  it('rejects out-of-range numbers', () => {
    expect(() => normalizeConfig({ ...base(), maxParallelApiKeys: 0 })).toThrow('maxParallelApiKeys must be an integer >= 1');
  });

  it('checks the per-kind cooldowns', () => {
    try {
      normalizeConfig({ ...base(), cooldownByKind: { rate_limited: 0, auth_error: 1_000, timeout: 2_000 } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (!(err instanceof ConfigError)) return;
      expect(err.problems).toEqual([
        'cooldownByKind.rate_limited must be an integer >= 1',
        'cooldownByKind.auth_error is not one of timeout, rate_limited, transport_error',
      ]);
    }
  });
});

describe('deepMerge', () => {
  it('merges nested records and replaces arrays', () => {
    const merged = deepMerge(
      { a: { b: 1, c: [1, 2] }, d: 'keep' },
      { a: { c: [3] }, d: null },
    );
    expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'keep' });
  });
});
