/**
 * Configuration Schema Validation
 *
 * Zod schemas for validating client and CLI configuration.
 * Provides runtime type safety and helpful error messages for misconfiguration.
 */

import { z } from 'zod';

/**
 * Client Configuration Schema
 *
 * Validates configuration from .wikicorpusrc files and environment variables.
 */
export const ClientConfigSchema = z.object({
  /** Wiki language edition (subdomain of wikipedia.org) */
  lang: z
    .string()
    .regex(/^[a-z][a-z0-9-]{1,11}$/, 'must be a wiki language code such as "en" or "zh-yue"')
    .optional(),

  /** Concurrent requests in batch operations */
  maxConcurrency: z.number().int().min(1).max(64).optional(),

  /** Retries after the first attempt for transient failures and 429s */
  maxRetries: z.number().int().min(0).max(10).optional(),

  /** Base backoff delay in milliseconds */
  baseDelayMs: z.number().int().nonnegative().optional(),

  /** Per-request timeout in milliseconds */
  timeoutMs: z.number().int().positive().optional(),

  /** Token bucket capacity */
  rateLimitCapacity: z.number().int().min(1).optional(),

  /** Tokens added per second */
  rateLimitRefillRate: z.number().positive().optional(),

  /** User-Agent header sent with every request */
  userAgent: z.string().min(1).optional(),
});

/** Type inferred from ClientConfigSchema */
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

/**
 * Validate client configuration
 *
 * @throws {z.ZodError} If validation fails
 */
export function validateClientConfig(config: unknown): ClientConfig {
  return ClientConfigSchema.parse(config);
}

/**
 * Safely validate client configuration without throwing
 */
export function safeValidateClientConfig(
  config: unknown
): z.SafeParseReturnType<unknown, ClientConfig> {
  return ClientConfigSchema.safeParse(config);
}

/**
 * Format Zod validation errors for user display
 */
export function formatValidationError(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n');
}
