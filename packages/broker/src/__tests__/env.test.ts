import { describe, it, expect } from 'vitest';
import { loadBrokerConfig } from '../env.js';
import { BrokerError } from '../errors.js';

function loadError(env: NodeJS.ProcessEnv): BrokerError {
  try {
    loadBrokerConfig(env);
  } catch (err) {
    if (err instanceof BrokerError) return err;
    throw err;
  }
  throw new Error('expected loadBrokerConfig to throw');
}

describe('loadBrokerConfig', () => {
  it('fills every default from a minimal environment', () => {
    expect(loadBrokerConfig({ A2A_VAULT_PATH: '/srv/vault' })).toEqual({
      vaultPath: '/srv/vault',
      dedup: { maxSize: 10_000, ttlSeconds: 7200 },
      pubsub: { url: null, channelPrefix: 'a2a', connectTimeoutMs: 5000 },
      messages: { defaultTtlSeconds: 3600, defaultMaxRetries: 3 },
      logging: { level: 'info', logDir: null },
    });
  });

  it('reads every supported variable', () => {
    const config = loadBrokerConfig({
      A2A_VAULT_PATH: '/srv/vault',
      A2A_REDIS_URL: 'redis://localhost:6379',
      A2A_LOG_LEVEL: 'debug',
      A2A_LOG_DIR: '/var/log/a2a',
      A2A_DEDUP_MAX_SIZE: '500',
      A2A_DEDUP_TTL_SECONDS: '60',
    });

    expect(config.pubsub.url).toBe('redis://localhost:6379');
    expect(config.logging).toEqual({ level: 'debug', logDir: '/var/log/a2a' });
    expect(config.dedup).toEqual({ maxSize: 500, ttlSeconds: 60 });
  });

  it('treats an empty redis url as unset', () => {
    expect(loadBrokerConfig({ A2A_VAULT_PATH: '/srv/vault', A2A_REDIS_URL: '' }).pubsub.url).toBeNull();
  });

  it('throws CONFIGURATION_ERROR when the vault path is missing', () => {
    const err = loadError({});

    expect(err.code).toBe('CONFIGURATION_ERROR');
    expect(err.message).toContain('A2A_VAULT_PATH');
  });

  it('lists every invalid variable', () => {
    const err = loadError({
      A2A_VAULT_PATH: '/srv/vault',
      A2A_LOG_LEVEL: 'loud',
      A2A_DEDUP_MAX_SIZE: 'lots',
    });

    expect(err.message).toContain('  - A2A_LOG_LEVEL: ');
    expect(err.message).toContain('  - A2A_DEDUP_MAX_SIZE: ');
  });

  it('rejects a malformed redis url', () => {
    const err = loadError({ A2A_VAULT_PATH: '/srv/vault', A2A_REDIS_URL: 'not a url' });

    expect(err.code).toBe('CONFIGURATION_ERROR');
    expect(err.message).toContain('  - pubsub.url: ');
  });
});
