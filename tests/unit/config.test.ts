/**
 * Unit tests for the Configuration Module
 */

import { describe, test, expect } from '@jest/globals';
import { ConfigurationError, DEFAULT_CONFIG, resolveConfig } from '../../src/config/index.js';

describe('Configuration Module', () => {
  describe('resolveConfig()', () => {
    test('should return the defaults with an empty environment', () => {
      expect(resolveConfig({}, {})).toEqual(DEFAULT_CONFIG);
    });

    test('should read values from the environment', () => {
      const config = resolveConfig(
        {},
        {
          LEADS_DATABASE_URL: 'libsql://leads.example.test',
          LEADS_DATABASE_AUTH_TOKEN: 'test-token',
          LEADS_MAX_PAGES: '5',
          LEADS_PAGE_DELAY_MS: '0',
          LEADS_SCRIPTED_FETCH: 'off',
          LEADS_HEADLESS: 'false',
          LEADS_BROWSER_PATH: '/opt/chromium/chrome',
          LEADS_WORKERS: '4',
        }
      );

      expect(config.databaseUrl).toBe('libsql://leads.example.test');
      expect(config.databaseAuthToken).toBe('test-token');
      expect(config.maxPages).toBe(5);
      expect(config.pageDelayMs).toBe(0);
      expect(config.scriptedFetch).toBe('off');
      expect(config.headless).toBe(false);
      expect(config.browserExecutablePath).toBe('/opt/chromium/chrome');
      expect(config.workers).toBe(4);
    });

    test('should let overrides win over the environment', () => {
      const config = resolveConfig({ maxPages: 2 }, { LEADS_MAX_PAGES: '7' });

      expect(config.maxPages).toBe(2);
    });

    test('should ignore blank environment values', () => {
      const config = resolveConfig({}, { LEADS_WORKERS: '   ' });

      expect(config.workers).toBe(DEFAULT_CONFIG.workers);
    });

    test('should accept 1 as a true headless flag', () => {
      expect(resolveConfig({}, { LEADS_HEADLESS: '1' }).headless).toBe(true);
    });

    test('should throw ConfigurationError naming each invalid key', () => {
      let caught: unknown;
      try {
        resolveConfig({}, { LEADS_MAX_PAGES: '0', LEADS_SCRIPTED_FETCH: 'always' });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      if (!(caught instanceof ConfigurationError)) return;
      expect(caught.issues).toHaveLength(2);
      expect(caught.issues[0]).toMatch(/^maxPages \(LEADS_MAX_PAGES\): /);
      expect(caught.issues[1]).toMatch(/^scriptedFetch \(LEADS_SCRIPTED_FETCH\): /);
      expect(caught.message).toMatch(/^Invalid configuration: /);
    });

    test('should reject a non-numeric timeout', () => {
      expect(() => resolveConfig({}, { LEADS_HTTP_TIMEOUT_MS: 'soon' })).toThrow(
        ConfigurationError
      );
    });
  });
});
