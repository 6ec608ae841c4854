/**
 * Tests for session configuration validation
 *
 * Covers the Zod schemas, RENDERER_* environment parsing and the merge of
 * environment and programmatic options.
 */

import { describe, it, expect } from 'vitest';
import {
  optionalBooleanStringSchema,
  optionalIntegerStringSchema,
  commaSeparatedListSchema,
  sessionConfigSchema,
  formatConfigErrors,
  ConfigValidationError,
} from '../../src/utils/config-schemas.js';
import {
  parseSessionConfig,
  parseSessionConfigFromEnv,
  resolveSessionConfig,
} from '../../src/utils/env-parser.js';

describe('Configuration Validation', () => {
  describe('Helper Schemas', () => {
    it('should parse boolean strings', () => {
      expect(optionalBooleanStringSchema.parse('true')).toBe(true);
      expect(optionalBooleanStringSchema.parse('YES')).toBe(true);
      expect(optionalBooleanStringSchema.parse('1')).toBe(true);
      expect(optionalBooleanStringSchema.parse('false')).toBe(false);
      expect(optionalBooleanStringSchema.parse('')).toBeUndefined();
      expect(optionalBooleanStringSchema.parse(undefined)).toBeUndefined();
    });

    it('should parse bounded integer strings', () => {
      const schema = optionalIntegerStringSchema({ min: 1, max: 10 });

      expect(schema.parse('7')).toBe(7);
      expect(schema.parse('')).toBeUndefined();
      expect(schema.safeParse('0').success).toBe(false);
      expect(schema.safeParse('11').success).toBe(false);
      expect(schema.safeParse('2.5').success).toBe(false);
    });

    it('should split comma-separated lists', () => {
      expect(commaSeparatedListSchema.parse('*.dmm.co.jp, example.org,,')).toEqual([
        '*.dmm.co.jp',
        'example.org',
      ]);
    });
  });

  describe('sessionConfigSchema', () => {
    it('should fill in every default', () => {
      expect(sessionConfigSchema.parse({})).toEqual({
        maxConcurrentPages: 5,
        proxy: { server: 'socks5://127.0.0.1:1080' },
        whitelist: [],
        headless: true,
        userDataDir: './user_data',
        remoteDebuggingPort: 9222,
        remoteDebuggingAddress: '127.0.0.1',
        maxRetries: 2,
        pageTimeoutMs: 10000,
        logLevel: 'error',
        acceptLanguage: 'en-US,en;q=0.9',
        extraHttpHeaders: {},
        skipProvisioning: false,
        installDeps: false,
        installErrorLogPath: 'playwright_install_error.log',
      });
    });

    it('should accept the whitelist as a Set', () => {
      const config = sessionConfigSchema.parse({ whitelist: new Set(['*.dmm.co.jp']) });
      expect(config.whitelist).toEqual(['*.dmm.co.jp']);
    });

    it('should reject a non-positive page limit', () => {
      expect(sessionConfigSchema.safeParse({ maxConcurrentPages: 0 }).success).toBe(false);
    });

    it('should leave room for the proxied debug port', () => {
      expect(sessionConfigSchema.safeParse({ remoteDebuggingPort: 65535 }).success).toBe(false);
      expect(sessionConfigSchema.safeParse({ remoteDebuggingPort: 65534 }).success).toBe(true);
    });

    it('should allow zero retries', () => {
      expect(sessionConfigSchema.parse({ maxRetries: 0 }).maxRetries).toBe(0);
    });
  });

  describe('parseSessionConfigFromEnv', () => {
    it('should return nothing for an empty environment', () => {
      expect(parseSessionConfigFromEnv({})).toEqual({});
    });

    it('should map RENDERER_* variables', () => {
      expect(
        parseSessionConfigFromEnv({
          RENDERER_MAX_PAGES: '3',
          RENDERER_PROXY_SERVER: 'http://127.0.0.1:8080',
          RENDERER_WHITELIST: '*.dmm.co.jp,example.org',
          RENDERER_HEADLESS: 'false',
          RENDERER_USER_DATA_DIR: '/var/lib/renderer',
          RENDERER_DEBUG_PORT: '9500',
          RENDERER_MAX_RETRIES: '0',
          RENDERER_PAGE_TIMEOUT: '15000',
          RENDERER_LOG_LEVEL: 'debug',
          RENDERER_SKIP_PROVISIONING: 'true',
        })
      ).toEqual({
        maxConcurrentPages: 3,
        proxy: { server: 'http://127.0.0.1:8080' },
        whitelist: ['*.dmm.co.jp', 'example.org'],
        headless: false,
        userDataDir: '/var/lib/renderer',
        remoteDebuggingPort: 9500,
        maxRetries: 0,
        pageTimeoutMs: 15000,
        logLevel: 'debug',
        skipProvisioning: true,
      });
    });

    it('should ignore unrelated variables', () => {
      expect(parseSessionConfigFromEnv({ PATH: '/usr/bin', HOME: '/root' })).toEqual({});
    });

    it('should throw ConfigValidationError for invalid values', () => {
      expect(() => parseSessionConfigFromEnv({ RENDERER_MAX_PAGES: 'many' })).toThrow(
        ConfigValidationError
      );
      expect(() => parseSessionConfigFromEnv({ RENDERER_LOG_LEVEL: 'loud' })).toThrow(
        /Configuration validation failed for environment/
      );
    });
  });

  describe('parseSessionConfig', () => {
    it('should name the offending option', () => {
      try {
        parseSessionConfig({ maxConcurrentPages: -1 });
        expect.fail('should have thrown');
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigValidationError);
        if (error instanceof ConfigValidationError) {
          expect(error.section).toBe('session');
          expect(error.message).toContain('maxConcurrentPages');
        }
      }
    });
  });

  describe('resolveSessionConfig', () => {
    it('should let programmatic options override the environment', () => {
      const config = resolveSessionConfig(
        { maxConcurrentPages: 8 },
        { RENDERER_MAX_PAGES: '2', RENDERER_MAX_RETRIES: '4' }
      );

      expect(config.maxConcurrentPages).toBe(8);
      expect(config.maxRetries).toBe(4);
    });

    it('should fall back to defaults for everything unset', () => {
      const config = resolveSessionConfig({}, {});
      expect(config.maxRetries).toBe(2);
      expect(config.proxy).toEqual({ server: 'socks5://127.0.0.1:1080' });
    });
  });

  describe('formatConfigErrors', () => {
    it('should list each issue with its path', () => {
      const result = sessionConfigSchema.safeParse({ maxRetries: -1, headless: 'yes' });
      expect(result.success).toBe(false);
      if (!result.success) {
        const formatted = formatConfigErrors(result.error);
        expect(formatted).toContain('  - maxRetries:');
        expect(formatted).toContain('  - headless:');
      }
    });
  });
});
