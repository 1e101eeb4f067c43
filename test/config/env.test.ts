import { describe, it, expect } from 'vitest';
import { parseBoolean, parseKeyList, readEnvOverrides } from '../../src/config/env.js';

const providerIds = ['gemini', 'openai'];

describe('readEnvOverrides', () => {
  it('maps the documented variables onto config fields', () => {
    const { overlay, problems } = readEnvOverrides({
      API_KEY_ROTATION_STRATEGY: ' Failover ',
      MAX_PARALLEL_API_KEYS: ' 3 ',
      API_CALL_TIMEOUT: '45',
      API_RETRY_TIMEOUT: '7.5',
      ENABLE_FAST_FAILOVER: 'off',
      MAX_BATCH_SIZE: '20',
      BATCH_TIMEOUT: '120',
      GEMINI_API_KEYS: 'test-key-1, test-key-2,,',
      OPENAI_API_KEY: 'test-secret',
    }, providerIds);

    expect(problems).toEqual([]);
    expect(overlay).toEqual({
      rotationStrategy: 'failover',
      maxParallelApiKeys: 3,
      maxBatchSize: 20,
      apiCallTimeoutMs: 45_000,
      apiRetryTimeoutMs: 7_500,
      batchTimeoutMs: 120_000,
      enableFastFailover: false,
      providers: {
        gemini: { apiKeys: ['test-key-1', 'test-key-2'] },
        openai: { apiKeys: ['test-secret'] },
      },
    });
  });

  it('falls back to the single key when the list is blank', () => {
    const { overlay } = readEnvOverrides({ GEMINI_API_KEYS: ' , ', GEMINI_API_KEY: 'test-secret' }, providerIds);
    expect(overlay).toEqual({ providers: { gemini: { apiKeys: ['test-secret'] } } });
  });

  it('reads model and base URL per provider', () => {
    const { overlay } = readEnvOverrides({
      OPENAI_MODEL_NAME: 'gpt-test',
      OPENAI_BASE_URL: 'http://localhost:8080',
    }, providerIds);
    expect(overlay).toEqual({ providers: { openai: { model: 'gpt-test', baseUrl: 'http://localhost:8080' } } });
  });

  it('derives the variable prefix from the provider id', () => {
    const { overlay } = readEnvOverrides({ LOCAL_LLM_API_KEYS: 'a-key' }, ['local-llm']);
    expect(overlay).toEqual({ providers: { 'local-llm': { apiKeys: ['a-key'] } } });
  });

  it('treats empty values as unset', () => {
    const { overlay, problems } = readEnvOverrides({ MAX_PARALLEL_API_KEYS: '', API_CALL_TIMEOUT: '  ' }, providerIds);
    expect(overlay).toEqual({});
    expect(problems).toEqual([]);
  });

  it('collects a problem for every malformed value', () => {
    const { overlay, problems } = readEnvOverrides({
      MAX_PARALLEL_API_KEYS: '0',
      MAX_RETRIES: '1.5',
      API_CALL_TIMEOUT: 'soon',
      BATCH_TIMEOUT: '-1',
      ENABLE_FAST_FAILOVER: 'maybe',
    }, providerIds);

    expect(overlay).toEqual({});
    expect(problems).toEqual([
      'MAX_PARALLEL_API_KEYS must be an integer >= 1 (got "0")',
      'MAX_RETRIES must be an integer >= 0 (got "1.5")',
      'API_CALL_TIMEOUT must be a positive number of seconds (got "soon")',
      'BATCH_TIMEOUT must be a positive number of seconds (got "-1")',
      'ENABLE_FAST_FAILOVER must be a boolean (got "maybe")',
    ]);
  });

  it('collects per-kind cooldowns in seconds', () => {
    const { overlay, problems } = readEnvOverrides({
      KEY_RATE_LIMIT_COOLDOWN: '90',
      KEY_TIMEOUT_COOLDOWN: '0.5',
      KEY_TRANSPORT_ERROR_COOLDOWN: 'never',
    }, providerIds);

    expect(overlay).toEqual({ cooldownByKind: { timeout: 500, rate_limited: 90_000 } });
    expect(problems).toEqual(['KEY_TRANSPORT_ERROR_COOLDOWN must be a positive number of seconds (got "never")']);
  });

  it('lowercases the default provider and log level', () => {
    const { overlay } = readEnvOverrides({ DEFAULT_LLM_PROVIDER: 'OpenAI', LOG_LEVEL: 'DEBUG' }, providerIds);
    expect(overlay).toEqual({ defaultProvider: 'openai', logLevel: 'debug' });
  });
});

describe('parseBoolean', () => {
  it('accepts the usual spellings', () => {
    expect(['true', '1', 'YES', 'on'].map(parseBoolean)).toEqual([true, true, true, true]);
    expect(['false', '0', 'No', 'OFF'].map(parseBoolean)).toEqual([false, false, false, false]);
    expect(parseBoolean('enabled')).toBeUndefined();
  });
});

describe('parseKeyList', () => {
  it('splits on commas and drops blanks', () => {
    expect(parseKeyList(' a ,b,, c ')).toEqual(['a', 'b', 'c']);
  });
});
