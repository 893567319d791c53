import { describe, expect, test } from '@jest/globals';
import { ConfigError, getConfig, loadSettings, setConfig } from '#patchbot/config.js';

describe('loadSettings', () => {
  test('should apply defaults to an empty environment', () => {
    expect(loadSettings({})).toEqual({
      port: 3000,
      host: '0.0.0.0',
      apiKey: undefined,
      modelName: 'ollama:llama3.2',
      ollamaUrl: 'http://localhost:11434',
      modelTimeoutMs: 120000,
      storeBackend: 'file',
      schemaDir: 'data/schemas',
      valuesDir: 'data/values',
      schemaUrl: undefined,
      valuesUrl: undefined,
      keywordsFile: 'config/service-keywords.json',
      tracerProjectName: undefined,
    });
  });

  test('should read overrides', () => {
    const settings = loadSettings({
      PATCHBOT_API_PORT: '8080',
      PATCHBOT_API_KEY: 'test-secret',
      PATCHBOT_STORE_BACKEND: 'http',
      PATCHBOT_SCHEMA_URL: 'http://schemas.local/schemas',
      PATCHBOT_VALUES_URL: 'http://values.local/values',
    });
    expect(settings.port).toBe(8080);
    expect(settings.apiKey).toBe('test-secret');
    expect(settings.storeBackend).toBe('http');
    expect(settings.schemaUrl).toBe('http://schemas.local/schemas');
  });

  test('should reject a non-numeric port', () => {
    expect(() => loadSettings({ PATCHBOT_API_PORT: 'eighty' })).toThrow(ConfigError);
  });

  test('should reject an unknown backend', () => {
    expect(() => loadSettings({ PATCHBOT_STORE_BACKEND: 'redis' })).toThrow(ConfigError);
  });

  test('should require both URLs for the http backend', () => {
    expect(() => loadSettings({ PATCHBOT_STORE_BACKEND: 'http' })).toThrow(
      'PATCHBOT_SCHEMA_URL and PATCHBOT_VALUES_URL are required when PATCHBOT_STORE_BACKEND=http'
    );
  });
});

describe('runtime config', () => {
  test('should store and return switches', () => {
    expect(getConfig('max-model-retries')).toBe('1');
    setConfig('max-model-retries', '0');
    expect(getConfig('max-model-retries')).toBe('0');
    setConfig('max-model-retries', '1');
  });
});
