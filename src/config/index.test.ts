/**
 * Tests for configuration module
 *
 * @module config/index.test
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import {
  loadConfig,
  getConfig,
  resetConfig,
  ConfigError,
  DEFAULT_NOMINATIM_URL,
  DEFAULT_USER_AGENT,
} from './index.js';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.provider).toBe('nominatim');
    expect(config.nominatim).toEqual({
      baseUrl: DEFAULT_NOMINATIM_URL,
      userAgent: DEFAULT_USER_AGENT,
      timeoutMs: 10000,
      limit: 50,
    });
    expect(config.mock.delayMs).toBe(500);
    expect(config.mapZoom).toBe(15);
    expect(config.nodeEnv).toBe('development');
  });

  it('should identify itself with the package version', () => {
    expect(DEFAULT_USER_AGENT).toBe('citysearch/1.0.0');
  });

  it('should parse numeric variables', () => {
    const config = loadConfig({
      CITYSEARCH_TIMEOUT_MS: '2500',
      CITYSEARCH_RESULT_LIMIT: '10',
      CITYSEARCH_MAP_ZOOM: '12',
      CITYSEARCH_MOCK_DELAY_MS: '0',
    });

    expect(config.nominatim.timeoutMs).toBe(2500);
    expect(config.nominatim.limit).toBe(10);
    expect(config.mapZoom).toBe(12);
    expect(config.mock.delayMs).toBe(0);
  });

  it('should treat empty numeric variables as unset', () => {
    const config = loadConfig({ CITYSEARCH_RESULT_LIMIT: '' });

    expect(config.nominatim.limit).toBe(50);
  });

  it('should keep the provider name as given', () => {
    expect(loadConfig({ CITYSEARCH_PROVIDER: 'MOCK' }).provider).toBe('MOCK');
  });

  it('should have environment flags', () => {
    const config = loadConfig({ NODE_ENV: 'test' });

    expect(config.isTest).toBe(true);
    expect(config.isProduction).toBe(false);
    expect(config.isDevelopment).toBe(false);
  });

  it('should reject out-of-range values', () => {
    expect(() => loadConfig({ CITYSEARCH_RESULT_LIMIT: '101' })).toThrow(ConfigError);
    expect(() => loadConfig({ CITYSEARCH_TIMEOUT_MS: '50' })).toThrow(ConfigError);
    expect(() => loadConfig({ CITYSEARCH_MAP_ZOOM: '0' })).toThrow(ConfigError);
  });

  it('should reject non-numeric values', () => {
    expect(() => loadConfig({ CITYSEARCH_TIMEOUT_MS: 'soon' })).toThrow(ConfigError);
  });

  it('should reject an invalid base URL', () => {
    expect(() => loadConfig({ NOMINATIM_BASE_URL: 'not a url' })).toThrow(ConfigError);
  });

  it('should list every invalid variable', () => {
    let caught: unknown;
    try {
      loadConfig({ CITYSEARCH_RESULT_LIMIT: '0', CITYSEARCH_MAP_ZOOM: '20' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^CITYSEARCH_RESULT_LIMIT: /);
      expect(caught.issues[1]).toMatch(/^CITYSEARCH_MAP_ZOOM: /);
      expect(caught.message).toMatch(/^Invalid environment variables:/);
    }
  });
});

describe('getConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv, NODE_ENV: 'test' };
    resetConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetConfig();
  });

  it('should read process.env', () => {
    process.env.CITYSEARCH_MAP_ZOOM = '7';

    expect(getConfig().mapZoom).toBe(7);
  });

  it('should memoise until reset', () => {
    process.env.CITYSEARCH_MAP_ZOOM = '7';
    const first = getConfig();
    process.env.CITYSEARCH_MAP_ZOOM = '9';

    expect(getConfig()).toBe(first);

    resetConfig();
    expect(getConfig().mapZoom).toBe(9);
  });
});
