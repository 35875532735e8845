import { describe, expect, it } from 'vitest';
import { ConfigSchema, apiKeyVariable, buildConfig } from '../src/config.js';

describe('configuration', () => {
  it('fills every setting with a default', () => {
    const config = buildConfig(ConfigSchema.parse({}));

    expect(config.LLM_CONFIG).toEqual({
      provider: 'google',
      model: 'gemini-1.5-flash-latest',
      apiKey: undefined,
      maxTokens: 1024,
    });
    expect(config.DB_CONNECTION).toEqual({
      host: 'localhost',
      port: 3306,
      user: 'root',
      password: '',
      database: 'tshirt_store',
    });
    expect(config.SQL_READ_ONLY_GUARD).toBe(true);
    expect(config.PREVIEW_ROWS).toBe(10);
    expect(config.LOW_STOCK_THRESHOLD).toBe(10);
    expect(config.PORT).toBe(8000);
    expect(config.LOG_LEVEL).toBe('INFO');
  });

  it('coerces numeric settings from strings', () => {
    const config = buildConfig(
      ConfigSchema.parse({ DB_PORT: '3307', PORT: '9000', LOW_STOCK_THRESHOLD: '5' })
    );

    expect(config.DB_CONNECTION.port).toBe(3307);
    expect(config.PORT).toBe(9000);
    expect(config.LOW_STOCK_THRESHOLD).toBe(5);
  });

  it('turns the read-only guard off only when asked', () => {
    expect(ConfigSchema.parse({ SQL_READ_ONLY_GUARD: 'false' }).SQL_READ_ONLY_GUARD).toBe(false);
    expect(ConfigSchema.parse({ SQL_READ_ONLY_GUARD: 'true' }).SQL_READ_ONLY_GUARD).toBe(true);
    expect(ConfigSchema.safeParse({ SQL_READ_ONLY_GUARD: 'no' }).success).toBe(false);
  });

  it('picks the API key of the selected provider', () => {
    const config = buildConfig(
      ConfigSchema.parse({
        LLM_PROVIDER: 'anthropic',
        LLM_MODEL: 'test-model',
        GOOGLE_API_KEY: 'test-google-key',
        ANTHROPIC_API_KEY: 'test-anthropic-key',
      })
    );

    expect(config.LLM_CONFIG.provider).toBe('anthropic');
    expect(config.LLM_CONFIG.apiKey).toBe('test-anthropic-key');
    expect(apiKeyVariable('openai')).toBe('OPENAI_API_KEY');
  });

  it('treats an empty key as missing', () => {
    const config = buildConfig(ConfigSchema.parse({ GOOGLE_API_KEY: '' }));
    expect(config.LLM_CONFIG.apiKey).toBeUndefined();
  });

  it('rejects unknown providers and log levels', () => {
    expect(ConfigSchema.safeParse({ LLM_PROVIDER: 'cohere' }).success).toBe(false);
    expect(ConfigSchema.safeParse({ LOG_LEVEL: 'TRACE' }).success).toBe(false);
  });

  it('keeps a single-connection pool for the executor', () => {
    const config = buildConfig(ConfigSchema.parse({}));
    expect(config.KNEX_CONFIG.client).toBe('mysql2');
    expect(config.KNEX_CONFIG.pool).toEqual({ min: 0, max: 1 });
  });
});
