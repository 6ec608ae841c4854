/**
 * routed-renderer
 *
 * Rendered HTML through headless Chromium, over a direct or a proxied
 * route chosen by a glob whitelist, with bounded concurrency and retries.
 *
 * Usage:
 * ```typescript
 * import { createRenderSession } from 'routed-renderer';
 *
 * const session = await createRenderSession({
 *   proxy: { server: 'socks5://127.0.0.1:1080' },
 *   whitelist: ['*.example.org'],
 * });
 * const html = await session.fetch('https://www.example.com', { waitUntil: 'domcontentloaded' });
 * await session.close();
 * ```
 */

import { RenderSession, type SessionDependencies } from './core/render-session.js';
import type { SessionConfigInput } from './utils/config-schemas.js';

export { RenderSession } from './core/render-session.js';
export type { SessionDependencies, SessionStats } from './core/render-session.js';
export { WhitelistStore } from './core/whitelist-store.js';
export { RouteSelector, type RouteKind } from './core/route-selector.js';
export { ConcurrencyGate, type GateStats } from './core/concurrency-gate.js';
export { ContextPool, type PoolState, type ContextPoolOptions } from './core/context-pool.js';
export { BrowserEnvironment, type EnvironmentSpec } from './core/browser-environment.js';
export { FetchOrchestrator, createResourceBlocker } from './core/fetch-orchestrator.js';
export type { FetchOptions, FetchDefaults, PageSource } from './core/fetch-orchestrator.js';
export { DeferredPageCloser, type PageCloserOptions } from './core/page-closer.js';
export { PlaywrightProvisioner, NoopProvisioner } from './core/provisioner.js';
export type { Provisioner, CommandRunner, PlaywrightProvisionerOptions } from './core/provisioner.js';
export { PlaywrightEngine } from './core/browser-engine.js';
export type {
  BrowserEngine,
  RenderContext,
  RenderPage,
  PersistentLaunchOptions,
  RouteHandler,
  InterceptedRoute,
  InterceptedRequest,
} from './core/browser-engine.js';

export {
  RendererError,
  NavigationTimeoutError,
  TransientFetchError,
  ProvisioningFailure,
  CleanupError,
  SessionStateError,
  classifyFetchFailure,
} from './types/errors.js';
export type { ErrorCode, FailureKind } from './types/errors.js';

export {
  sessionConfigSchema,
  RESOURCE_TYPES,
  ConfigValidationError,
} from './utils/config-schemas.js';
export type {
  SessionConfig,
  SessionConfigInput,
  ProxyDescriptor,
  ResourceType,
  WaitUntil,
  LogLevel,
} from './utils/config-schemas.js';
export { parseSessionConfigFromEnv, resolveSessionConfig } from './utils/env-parser.js';
export { configureLogger, getLogger } from './utils/logger.js';

/**
 * Create and initialize a session
 */
export async function createRenderSession(
  config: SessionConfigInput = {},
  deps: SessionDependencies = {}
): Promise<RenderSession> {
  return RenderSession.create(config, deps);
}
