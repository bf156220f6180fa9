import { describe, it, expect } from 'vitest';
import { loadConfig, requireSetting } from './config';
import { ConfigError } from './errors';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = loadConfig({});
    expect(config.store).toEqual({ backend: 'local', localPath: 'var/mailchat.db', postgresUrl: undefined });
    expect(config.embedding.model).toBe('voyage-3');
    expect(config.embedding.dimension).toBe(1024);
    expect(config.chunking).toEqual({ size: 1200, overlap: 200 });
    expect(config.retrieval).toEqual({ k: 6, memoryMaxTurns: 10, memoryMaxTokens: 3000, maxSessions: 1000 });
    expect(config.gmail.userId).toBe('me');
    expect(config.retry.maxAttempts).toBe(4);
  });

  it('coerces numeric strings and treats blank secrets as unset', () => {
    const config = loadConfig({
      CHUNK_SIZE: '500',
      CHUNK_OVERLAP: '50',
      RETRIEVAL_K: '3',
      VOYAGE_API_KEY: '   ',
      ANTHROPIC_API_KEY: 'test-secret',
    });
    expect(config.chunking).toEqual({ size: 500, overlap: 50 });
    expect(config.retrieval.k).toBe(3);
    expect(config.embedding.apiKey).toBeUndefined();
    expect(config.llm.apiKey).toBe('test-secret');
  });

  it('requires a connection string for the postgres backend', () => {
    expect(() => loadConfig({ VECTOR_BACKEND: 'postgres' })).toThrow(ConfigError);
    const config = loadConfig({
      VECTOR_BACKEND: 'postgres',
      INDEXING_POSTGRES_URL: 'postgres://localhost/mailchat',
    });
    expect(config.store.backend).toBe('postgres');
  });

  it('lists every invalid variable', () => {
    const err = (() => {
      try {
        loadConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '100', RETRIEVAL_K: 'many' });
      } catch (e) {
        return e;
      }
      return null;
    })();
    expect(err).toBeInstanceOf(ConfigError);
    const issues = (err as ConfigError).issues;
    expect(issues.some((i) => i.startsWith('RETRIEVAL_K:'))).toBe(true);
  });
});

describe('requireSetting', () => {
  it('returns the value or throws ConfigError naming the setting', () => {
    expect(requireSetting('x', 'VOYAGE_API_KEY')).toBe('x');
    expect(() => requireSetting(undefined, 'VOYAGE_API_KEY')).toThrow('VOYAGE_API_KEY is not set');
  });
});
