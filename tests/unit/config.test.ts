import { describe, it, expect } from 'vitest';
import { configFromEnv, createClientConfig, describeConfig } from '../../src/client/config.js';
import { ConfigError } from '../../src/errors.js';

describe('createClientConfig', () => {
  it('trims trailing slashes and defaults the timeout', () => {
    expect(createClientConfig('https://api.example.com/odata//', 'test-token')).toEqual({
      baseUrl: 'https://api.example.com/odata',
      token: 'test-token',
      timeoutMs: 30000,
    });
  });

  it('applies dataset id and timeout options', () => {
    const config = createClientConfig('https://api.example.com', 'test-token', {
      datasetId: 'test_dataset',
      timeoutMs: 5000,
    });
    expect(config.datasetId).toBe('test_dataset');
    expect(config.timeoutMs).toBe(5000);
  });
});

describe('configFromEnv', () => {
  it('reads required and optional variables', () => {
    const config = configFromEnv({
      RESO_BASE_URL: 'https://api.example.com/odata/',
      RESO_TOKEN: 'test-token',
      RESO_DATASET_ID: 'test_dataset',
      RESO_TIMEOUT: '60',
    });
    expect(config).toEqual({
      baseUrl: 'https://api.example.com/odata',
      token: 'test-token',
      datasetId: 'test_dataset',
      timeoutMs: 60000,
    });
  });

  it('defaults the timeout to 30 seconds', () => {
    const config = configFromEnv({ RESO_BASE_URL: 'https://api.example.com', RESO_TOKEN: 'test-token' });
    expect(config.timeoutMs).toBe(30000);
    expect(config.datasetId).toBeUndefined();
  });

  it('falls back to 30 seconds for an unparsable timeout', () => {
    const config = configFromEnv({
      RESO_BASE_URL: 'https://api.example.com',
      RESO_TOKEN: 'test-token',
      RESO_TIMEOUT: 'soon',
    });
    expect(config.timeoutMs).toBe(30000);
  });

  it('throws ConfigError when RESO_BASE_URL is missing', () => {
    expect(() => configFromEnv({ RESO_TOKEN: 'test-token' })).toThrow(ConfigError);
    expect(() => configFromEnv({ RESO_TOKEN: 'test-token' })).toThrow('RESO_BASE_URL not set');
  });

  it('throws ConfigError when RESO_TOKEN is missing', () => {
    expect(() => configFromEnv({ RESO_BASE_URL: 'https://api.example.com' })).toThrow('RESO_TOKEN not set');
  });
});

describe('describeConfig', () => {
  it('redacts the token', () => {
    const config = createClientConfig('https://api.example.com', 'test-token');
    expect(describeConfig(config)).toEqual({
      baseUrl: 'https://api.example.com',
      token: '<redacted>',
      timeoutMs: 30000,
    });
    expect(config.token).toBe('test-token');
  });
});
