/**
 * Tests for configuration schema validation
 */

import { describe, it, expect } from 'vitest';
import {
  ClientConfigSchema,
  validateClientConfig,
  safeValidateClientConfig,
  formatValidationError,
} from '../../src/lib/config-schema.js';

describe('Config Schema', () => {
  describe('ClientConfigSchema', () => {
    it('should accept empty config', () => {
      expect(ClientConfigSchema.safeParse({}).success).toBe(true);
    });

    it('should accept valid complete config', () => {
      const config = {
        lang: 'zh-yue',
        maxConcurrency: 8,
        maxRetries: 5,
        baseDelayMs: 500,
        timeoutMs: 10000,
        rateLimitCapacity: 20,
        rateLimitRefillRate: 2.5,
        userAgent: 'test-agent/1.0',
      };
      const result = ClientConfigSchema.safeParse(config);
      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toEqual(config);
      }
    });

    it('should reject invalid language codes', () => {
      expect(ClientConfigSchema.safeParse({ lang: 'EN' }).success).toBe(false);
      expect(ClientConfigSchema.safeParse({ lang: 'e' }).success).toBe(false);
      expect(ClientConfigSchema.safeParse({ lang: 'en.wikipedia.org' }).success).toBe(false);
      expect(ClientConfigSchema.safeParse({ lang: 'de' }).success).toBe(true);
    });

    it('should reject out-of-range concurrency', () => {
      expect(ClientConfigSchema.safeParse({ maxConcurrency: 0 }).success).toBe(false);
      expect(ClientConfigSchema.safeParse({ maxConcurrency: 65 }).success).toBe(false);
      expect(ClientConfigSchema.safeParse({ maxConcurrency: 2.5 }).success).toBe(false);
    });

    it('should accept zero retries and reject negative ones', () => {
      expect(ClientConfigSchema.safeParse({ maxRetries: 0 }).success).toBe(true);
      expect(ClientConfigSchema.safeParse({ maxRetries: -1 }).success).toBe(false);
    });

    it('should reject a non-positive refill rate', () => {
      expect(ClientConfigSchema.safeParse({ rateLimitRefillRate: 0 }).success).toBe(false);
    });
  });

  describe('validateClientConfig', () => {
    it('should return the parsed config', () => {
      expect(validateClientConfig({ lang: 'fr' })).toEqual({ lang: 'fr' });
    });

    it('should throw on invalid config', () => {
      expect(() => validateClientConfig({ maxRetries: 'three' })).toThrow();
    });
  });

  describe('formatValidationError', () => {
    it('should prefix each issue with its path', () => {
      const result = safeValidateClientConfig({ maxConcurrency: 0, userAgent: '' });
      expect(result.success).toBe(false);
      if (!result.success) {
        const lines = formatValidationError(result.error).split('\n');
        expect(lines).toHaveLength(2);
        expect(lines[0]).toMatch(/^maxConcurrency: /);
        expect(lines[1]).toMatch(/^userAgent: /);
      }
    });
  });
});
