/**
 * Environment Variable Parser
 *
 * Maps RENDERER_* environment variables onto session options and merges
 * them with programmatic options. Programmatic options win.
 */

import {
  sessionConfigSchema,
  sessionEnvSchema,
  ConfigValidationError,
  type SessionConfig,
  type SessionConfigInput,
} from './config-schemas.js';

type Env = Record<string, string | undefined>;

function mapEnvToSessionConfig(env: Env) {
  return {
    maxConcurrentPages: env.RENDERER_MAX_PAGES,
    proxyServer: env.RENDERER_PROXY_SERVER,
    whitelist: env.RENDERER_WHITELIST || undefined,
    headless: env.RENDERER_HEADLESS,
    executablePath: env.RENDERER_EXECUTABLE_PATH,
    userDataDir: env.RENDERER_USER_DATA_DIR,
    remoteDebuggingPort: env.RENDERER_DEBUG_PORT,
    remoteDebuggingAddress: env.RENDERER_DEBUG_ADDRESS,
    maxRetries: env.RENDERER_MAX_RETRIES,
    pageTimeoutMs: env.RENDERER_PAGE_TIMEOUT,
    logLevel: env.RENDERER_LOG_LEVEL || undefined,
    skipProvisioning: env.RENDERER_SKIP_PROVISIONING,
    installDeps: env.RENDERER_INSTALL_DEPS,
  };
}

/**
 * Parse session overrides from the environment.
 * Only variables that are set appear in the result.
 */
export function parseSessionConfigFromEnv(env: Env = process.env): Partial<SessionConfigInput> {
  const result = sessionEnvSchema.safeParse(mapEnvToSessionConfig(env));
  if (!result.success) {
    throw new ConfigValidationError('environment', result.error);
  }

  const { proxyServer, ...rest } = result.data;
  const overrides: Partial<SessionConfigInput> = {};

  for (const [key, value] of Object.entries(rest)) {
    if (value !== undefined) {
      Object.assign(overrides, { [key]: value });
    }
  }
  if (proxyServer !== undefined) {
    overrides.proxy = { server: proxyServer };
  }

  return overrides;
}

/**
 * Validate programmatic options and apply defaults.
 */
export function parseSessionConfig(input: SessionConfigInput = {}): SessionConfig {
  const result = sessionConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigValidationError('session', result.error);
  }
  return result.data;
}

/**
 * Environment overrides first, programmatic options on top, then validation.
 */
export function resolveSessionConfig(
  input: SessionConfigInput = {},
  env: Env = process.env
): SessionConfig {
  return parseSessionConfig({ ...parseSessionConfigFromEnv(env), ...input });
}
