import { describe, it, expect, afterEach, vi } from 'vitest';
import { loadServerEnv, parseServerEnv, resetServerEnv } from '../env.js';
import { buildConfig } from '../index.js';

describe('parseServerEnv', () => {
  it('should apply defaults for the in-memory store', () => {
    const env = parseServerEnv({ CANDIDATE_STORE: 'memory' });

    expect(env).toMatchObject({
      NODE_ENV: 'development',
      PORT: 4000,
      CANDIDATE_STORE: 'memory',
      EMBEDDING_MODEL: 'text-embedding-3-small',
      EMBEDDING_DIMENSIONS: 1536,
      SEARCH_OVERFETCH_FACTOR: 3,
      SEARCH_DEFAULT_LIMIT: 10,
      SEARCH_MAX_LIMIT: 50,
      SEARCH_DEFAULT_THRESHOLD: 0.1,
    });
    expect(env.DATABASE_URL).toBeUndefined();
  });

  it('should require a database for the pgvector store', () => {
    expect(() => parseServerEnv({})).toThrow('Missing/invalid server env');
  });

  it('should build DATABASE_URL from PG* variables', () => {
    const env = parseServerEnv({
      PGHOST: 'db',
      PGPORT: '5432',
      PGDATABASE: 'travel',
      PGUSER: 'search',
      PGPASSWORD: 'p@ss',
    });

    expect(env.DATABASE_URL).toBe('postgresql://search:p%40ss@db:5432/travel');
  });

  it('should treat blank optional values as unset', () => {
    const env = parseServerEnv({ CANDIDATE_STORE: 'memory', OPENAI_API_KEY: '  ' });
    expect(env.OPENAI_API_KEY).toBeUndefined();
  });

  it('should reject a default limit above the maximum', () => {
    expect(() => parseServerEnv({
      CANDIDATE_STORE: 'memory',
      SEARCH_DEFAULT_LIMIT: '60',
      SEARCH_MAX_LIMIT: '50',
    })).toThrow('SEARCH_DEFAULT_LIMIT must not exceed SEARCH_MAX_LIMIT');
  });

  it('should reject out-of-range thresholds', () => {
    expect(() => parseServerEnv({ CANDIDATE_STORE: 'memory', SEARCH_DEFAULT_THRESHOLD: '1.5' }))
      .toThrow('Missing/invalid server env');
  });
});

describe('loadServerEnv', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetServerEnv();
  });

  it('should cache the parsed environment until reset', () => {
    vi.stubEnv('CANDIDATE_STORE', 'memory');
    vi.stubEnv('PORT', '4100');
    expect(loadServerEnv().PORT).toBe(4100);

    vi.stubEnv('PORT', '4200');
    expect(loadServerEnv().PORT).toBe(4100);

    resetServerEnv();
    expect(loadServerEnv().PORT).toBe(4200);
  });
});

describe('buildConfig', () => {
  it('should group settings by concern', () => {
    const config = buildConfig(parseServerEnv({
      NODE_ENV: 'test',
      DATABASE_URL: 'postgresql://localhost/travel',
      OPENAI_API_KEY: 'test-secret',
      EMBEDDING_FALLBACK_BASE_URL: 'http://localhost:11434/v1',
    }));

    expect(config.store).toEqual({
      kind: 'pgvector',
      databaseUrl: 'postgresql://localhost/travel',
      queryTimeoutMs: 5000,
      poolMax: 10,
    });
    expect(config.embeddings.openai).toEqual({ apiKey: 'test-secret' });
    expect(config.embeddings.fallback).toEqual({ baseUrl: 'http://localhost:11434/v1', apiKey: 'test-secret' });
    expect(config.search).toEqual({ overfetchFactor: 3, defaultLimit: 10, maxLimit: 50, defaultThreshold: 0.1 });
    expect(config.nodeEnv).toBe('test');
  });

  it('should leave embeddings unconfigured without a key', () => {
    const config = buildConfig(parseServerEnv({ CANDIDATE_STORE: 'memory' }));
    expect(config.embeddings.openai).toBeUndefined();
    expect(config.embeddings.fallback).toBeUndefined();
  });
});
