/**
 * Configuration Schemas
 *
 * Zod schemas for the session configuration. Programmatic options and
 * environment variables both go through these schemas, so every value a
 * session sees has been validated and defaulted in one place.
 */

import { z } from 'zod';
import { TIMEOUTS } from './timeouts.js';

// ============================================
// HELPER SCHEMAS
// ============================================

/**
 * Parse an optional env string as a boolean.
 * 'true', '1', 'yes' are true; any other non-empty value is false;
 * unset or empty stays undefined so the programmatic default applies.
 */
export const optionalBooleanStringSchema = z
  .string()
  .optional()
  .transform((val) => {
    if (val === undefined || val === '') return undefined;
    return ['true', '1', 'yes'].includes(val.toLowerCase());
  });

/**
 * Parse an optional env string as an integer with bounds.
 */
export function optionalIntegerStringSchema(options?: { min?: number; max?: number }) {
  const { min, max } = options ?? {};
  let schema = z.coerce.number().int();

  if (min !== undefined) schema = schema.min(min);
  if (max !== undefined) schema = schema.max(max);

  return z
    .string()
    .optional()
    .transform((val) => (val === '' ? undefined : val))
    .pipe(schema.optional());
}

/**
 * Optional string that treats '' as unset.
 */
export const optionalStringSchema = z
  .string()
  .optional()
  .transform((val) => (val === '' ? undefined : val));

/**
 * Schema for a comma-separated list of strings.
 */
export const commaSeparatedListSchema = z
  .string()
  .transform((val) => val.split(',').map((s) => s.trim()).filter(Boolean));

// ============================================
// DOMAIN SCHEMAS
// ============================================

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof logLevelSchema>;

export const waitUntilSchema = z.enum(['commit', 'domcontentloaded', 'load', 'networkidle']);
export type WaitUntil = z.infer<typeof waitUntilSchema>;

export const RESOURCE_TYPES = [
  'document',
  'stylesheet',
  'image',
  'media',
  'font',
  'script',
  'texttrack',
  'xhr',
  'fetch',
  'eventsource',
  'websocket',
  'manifest',
  'other',
] as const;

export const resourceTypeSchema = z.enum(RESOURCE_TYPES);
export type ResourceType = z.infer<typeof resourceTypeSchema>;

/**
 * Proxy descriptor handed to the browser, e.g. { server: 'socks5://127.0.0.1:1080' }
 */
export const proxySchema = z.object({
  server: z.string().min(1),
  bypass: z.string().optional(),
  username: z.string().optional(),
  password: z.string().optional(),
});

export type ProxyDescriptor = z.infer<typeof proxySchema>;

const patternListSchema = z
  .union([z.array(z.string()), z.set(z.string())])
  .transform((patterns) => [...patterns]);

// ============================================
// SESSION CONFIGURATION
// ============================================

export const DEFAULT_PROXY: ProxyDescriptor = { server: 'socks5://127.0.0.1:1080' };

export const sessionConfigSchema = z.object({
  /** Maximum number of fetch calls holding a page at once */
  maxConcurrentPages: z.number().int().min(1).default(5),
  proxy: proxySchema.default(DEFAULT_PROXY),
  /** Initial whitelist; matching URLs go through the proxy */
  whitelist: patternListSchema.default([]),
  headless: z.boolean().default(true),
  executablePath: z.string().optional(),
  /** Profiles live in <userDataDir>/direct and <userDataDir>/proxy */
  userDataDir: z.string().min(1).default('./user_data'),
  /** Occupies this port (direct) and the next one (proxied) */
  remoteDebuggingPort: z.number().int().min(1).max(65534).default(9222),
  remoteDebuggingAddress: z.string().min(1).default('127.0.0.1'),
  maxRetries: z.number().int().min(0).default(2),
  pageTimeoutMs: z.number().int().positive().default(TIMEOUTS.PAGE_LOAD),
  logLevel: logLevelSchema.default('error'),
  acceptLanguage: z.string().min(1).default('en-US,en;q=0.9'),
  extraHttpHeaders: z.record(z.string()).default({}),
  /** Skip the Playwright browser install check before launch */
  skipProvisioning: z.boolean().default(false),
  /** Also install OS dependencies (needs root on Linux, so opt-in) */
  installDeps: z.boolean().default(false),
  /** Where to write installer output when provisioning fails */
  installErrorLogPath: z.string().min(1).default('playwright_install_error.log'),
});

export type SessionConfig = z.output<typeof sessionConfigSchema>;
export type SessionConfigInput = z.input<typeof sessionConfigSchema>;

/**
 * Environment variable overrides. Every entry is optional; unset
 * variables leave the programmatic value or default in place.
 */
export const sessionEnvSchema = z.object({
  maxConcurrentPages: optionalIntegerStringSchema({ min: 1 }),
  proxyServer: optionalStringSchema,
  whitelist: commaSeparatedListSchema.optional(),
  headless: optionalBooleanStringSchema,
  executablePath: optionalStringSchema,
  userDataDir: optionalStringSchema,
  remoteDebuggingPort: optionalIntegerStringSchema({ min: 1, max: 65534 }),
  remoteDebuggingAddress: optionalStringSchema,
  maxRetries: optionalIntegerStringSchema({ min: 0 }),
  pageTimeoutMs: optionalIntegerStringSchema({ min: 1 }),
  logLevel: logLevelSchema.optional(),
  skipProvisioning: optionalBooleanStringSchema,
  installDeps: optionalBooleanStringSchema,
});

// ============================================
// ERROR FORMATTING
// ============================================

/**
 * Format Zod validation errors into readable messages.
 */
export function formatConfigErrors(error: z.ZodError<unknown>): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.join('.');
      return `  - ${path}: ${issue.message}`;
    })
    .join('\n');
}

/**
 * Create a configuration validation error with helpful messages.
 */
export class ConfigValidationError extends Error {
  constructor(
    public readonly section: string,
    public readonly zodError: z.ZodError
  ) {
    const formatted = formatConfigErrors(zodError);
    super(
      `Configuration validation failed for ${section}:\n${formatted}\n\n` +
      `Please check your session options or environment variables.`
    );
    this.name = 'ConfigValidationError';
  }
}
