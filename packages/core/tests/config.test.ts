import { describe, expect, it } from 'vitest';
import { DEFAULT_ANTHROPIC_MODEL, DEFAULT_OPENAI_MODEL, loadConfig } from '../src/config';
import { ConfigError } from '../src/errors';

describe('loadConfig', () => {
  it('applies defaults to an empty environment', () => {
    expect(loadConfig({})).toEqual({
      anthropicApiKey: undefined,
      openaiApiKey: undefined,
      primaryModel: 'anthropic',
      fallbackModel: 'openai',
      anthropicModel: DEFAULT_ANTHROPIC_MODEL,
      openaiModel: DEFAULT_OPENAI_MODEL,
      maxImageSizeBytes: 20 * 1024 * 1024,
      maxImageDimension: 2048,
      apiHost: '0.0.0.0',
      apiPort: 8000,
      corsOrigins: ['*'],
      logLevel: 'info',
    });
  });

  it('reads keys and numeric settings', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: ' test-secret ',
      PRIMARY_MODEL: 'openai',
      FALLBACK_MODEL: 'none',
      MAX_IMAGE_SIZE_MB: '0.5',
      API_PORT: '9000',
      CORS_ORIGINS: 'http://localhost:5173, https://example.test',
    });

    expect(config.anthropicApiKey).toBe('test-secret');
    expect(config.primaryModel).toBe('openai');
    expect(config.fallbackModel).toBe('none');
    expect(config.maxImageSizeBytes).toBe(524288);
    expect(config.apiPort).toBe(9000);
    expect(config.corsOrigins).toEqual(['http://localhost:5173', 'https://example.test']);
  });

  it('treats empty strings as unset', () => {
    const config = loadConfig({ OPENAI_API_KEY: '', API_PORT: '' });

    expect(config.openaiApiKey).toBeUndefined();
    expect(config.apiPort).toBe(8000);
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ API_PORT: 'eighty' })).toThrow(ConfigError);
    expect(() => loadConfig({ PRIMARY_MODEL: 'none' })).toThrow(/^Invalid configuration: PRIMARY_MODEL: /);
    expect(() => loadConfig({ FALLBACK_MODEL: 'gemini' })).toThrow(/^Invalid configuration: FALLBACK_MODEL: /);
  });
});
