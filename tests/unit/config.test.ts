import { createConfig, DEFAULT_CONFIG } from '../../src/config';
import { ConfigError } from '../../src/errors';

describe('createConfig', () => {
  it('should start from the defaults', () => {
    const config = createConfig({}, {});

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.maxProductsPerStore).toBe(100);
    expect(config.rateLimitDelay).toBe(1.0);
    expect(config.concurrentRequests).toBe(5);
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should read the Gemini settings from the environment', () => {
    const config = createConfig({}, { GEMINI_API_KEY: 'test-secret', GEMINI_MODEL: 'gemini-test' });

    expect(config.geminiApiKey).toBe('test-secret');
    expect(config.geminiModel).toBe('gemini-test');
  });

  it('should apply defined overrides only', () => {
    const config = createConfig({ maxProductsPerStore: 20, timeout: undefined }, {});

    expect(config.maxProductsPerStore).toBe(20);
    expect(config.timeout).toBe(30);
  });

  it('should reject invalid values', () => {
    expect(() => createConfig({ concurrentRequests: 0 }, {})).toThrow(ConfigError);
    expect(() => createConfig({ rateLimitDelay: -1 }, {})).toThrow('Invalid configuration: rateLimitDelay');
  });
});
