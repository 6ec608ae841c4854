/**
 * Render Session
 *
 * Top-level object: owns the whitelist, the concurrency gate, the context
 * pool and the fetch defaults. Create it with RenderSession.create(), which
 * validates the configuration and brings both environments up, and release
 * it with close(), which is safe to call any number of times.
 *
 * Usage:
 * ```typescript
 * const session = await RenderSession.create({ whitelist: ['*.example.org'] });
 * const html = await session.fetch('https://docs.example.org/start');
 * await session.close();
 * ```
 */

import { ConcurrencyGate, type GateStats } from './concurrency-gate.js';
import { ContextPool, type PoolState } from './context-pool.js';
import { PlaywrightEngine, type BrowserEngine, type RenderContext } from './browser-engine.js';
import { FetchOrchestrator, type FetchOptions, type PageSource } from './fetch-orchestrator.js';
import { DeferredPageCloser, type PageCloserOptions } from './page-closer.js';
import { NoopProvisioner, PlaywrightProvisioner, type Provisioner } from './provisioner.js';
import { RouteSelector, type RouteKind } from './route-selector.js';
import { WhitelistStore } from './whitelist-store.js';
import type { SessionConfig, SessionConfigInput } from '../utils/config-schemas.js';
import { resolveSessionConfig } from '../utils/env-parser.js';
import { configureLogger, logger } from '../utils/logger.js';
import { SessionStateError } from '../types/errors.js';

const log = logger.session;

/**
 * Collaborators a session can be given instead of the defaults
 */
export interface SessionDependencies {
  engine?: BrowserEngine;
  provisioner?: Provisioner;
  pageCloser?: PageCloserOptions;
  /** Pause after a non-timeout failure; 1s by default */
  errorBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
  /** Environment to read RENDERER_* overrides from; process.env by default */
  env?: Record<string, string | undefined>;
  /** Leave the global logger level alone */
  keepLoggerConfig?: boolean;
}

export interface SessionStats {
  state: PoolState;
  gate: GateStats;
  whitelistSize: number;
  pendingPageCloses: number;
}

export class RenderSession {
  readonly config: SessionConfig;
  private readonly whitelist: WhitelistStore;
  private readonly gate: ConcurrencyGate;
  private readonly pool: ContextPool;
  private readonly closer: DeferredPageCloser;
  private orchestrator: FetchOrchestrator | null = null;

  constructor(input: SessionConfigInput = {}, private readonly deps: SessionDependencies = {}) {
    this.config = resolveSessionConfig(input, deps.env);

    if (!deps.keepLoggerConfig) {
      configureLogger({ level: this.config.logLevel });
    }

    this.whitelist = new WhitelistStore(this.config.whitelist);
    this.gate = new ConcurrencyGate(this.config.maxConcurrentPages);
    this.closer = new DeferredPageCloser(deps.pageCloser);
    this.pool = new ContextPool({
      engine: deps.engine ?? new PlaywrightEngine(),
      provisioner: deps.provisioner ?? this.defaultProvisioner(),
      userDataDir: this.config.userDataDir,
      remoteDebuggingPort: this.config.remoteDebuggingPort,
      remoteDebuggingAddress: this.config.remoteDebuggingAddress,
      headless: this.config.headless,
      executablePath: this.config.executablePath,
      proxy: this.config.proxy,
      acceptLanguage: this.config.acceptLanguage,
      extraHttpHeaders: this.config.extraHttpHeaders,
    });
  }

  /**
   * Build and initialize a session in one step
   */
  static async create(
    input: SessionConfigInput = {},
    deps: SessionDependencies = {}
  ): Promise<RenderSession> {
    const session = new RenderSession(input, deps);
    await session.initialize();
    return session;
  }

  private defaultProvisioner(): Provisioner {
    if (this.config.skipProvisioning) {
      return new NoopProvisioner();
    }
    return new PlaywrightProvisioner({
      installDeps: this.config.installDeps,
      errorLogPath: this.config.installErrorLogPath,
    });
  }

  async initialize(): Promise<void> {
    await this.pool.start();

    const { direct, proxied } = this.pool.environments();
    const routes = new RouteSelector<PageSource>(this.whitelist, { direct, proxied });

    this.orchestrator = new FetchOrchestrator({
      gate: this.gate,
      routes,
      closer: this.closer,
      defaults: {
        retries: this.config.maxRetries,
        timeoutMs: this.config.pageTimeoutMs,
      },
      errorBackoffMs: this.deps.errorBackoffMs,
      sleep: this.deps.sleep,
    });

    log.info('Session ready', {
      maxConcurrentPages: this.config.maxConcurrentPages,
      whitelistSize: this.whitelist.size,
      debugPorts: [this.pool.portFor('direct'), this.pool.portFor('proxied')],
    });
  }

  getState(): PoolState {
    return this.pool.getState();
  }

  /**
   * Rendered HTML of `url`, or null once every attempt has failed
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    if (!this.orchestrator || this.pool.getState() !== 'ready') {
      throw new SessionStateError('fetch', this.pool.getState());
    }
    return this.orchestrator.fetch(url, options);
  }

  /**
   * Add patterns to the proxy whitelist. Patterns are never removed.
   */
  whitelistUpdate(patterns: Iterable<string>): void {
    this.whitelist.update(patterns);
  }

  whitelistPatterns(): string[] {
    return this.whitelist.patterns();
  }

  /**
   * Which route a URL would take right now
   */
  routeFor(url: string): RouteKind {
    return this.whitelist.matches(url) ? 'proxied' : 'direct';
  }

  /**
   * Raw browser context of an environment, for flows fetch() does not cover.
   * Never close its last page.
   */
  getContext(route: RouteKind): RenderContext {
    return this.pool.get(route).getContext();
  }

  stats(): SessionStats {
    return {
      state: this.pool.getState(),
      gate: this.gate.stats(),
      whitelistSize: this.whitelist.size,
      pendingPageCloses: this.closer.pendingCount,
    };
  }

  /**
   * Release both environments and the engine. Pending deferred page closes
   * are abandoned. Never throws.
   */
  async close(): Promise<void> {
    this.closer.abandonAll();
    await this.pool.close();
    this.orchestrator = null;
  }
}
