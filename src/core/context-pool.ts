/**
 * Context Pool - lifecycle of the two long-lived environments
 *
 * uninitialized -> initializing -> ready -> closed
 *
 * Startup provisions the browser, starts the engine, then launches the
 * direct environment on the base debug port and the proxied environment on
 * base + 1. A failure anywhere tears down what was started and returns the
 * pool to uninitialized. Shutdown closes each piece independently; one
 * failing or already gone never stops the others.
 */

import type { BrowserEngine } from './browser-engine.js';
import type { Provisioner } from './provisioner.js';
import type { RouteKind } from './route-selector.js';
import { BrowserEnvironment, profileDirFor, type EnvironmentSpec } from './browser-environment.js';
import type { ProxyDescriptor } from '../utils/config-schemas.js';
import { CleanupError, SessionStateError } from '../types/errors.js';
import { logger } from '../utils/logger.js';

const log = logger.contextPool;

export type PoolState = 'uninitialized' | 'initializing' | 'ready' | 'closed';

export interface ContextPoolOptions {
  engine: BrowserEngine;
  provisioner: Provisioner;
  userDataDir: string;
  remoteDebuggingPort: number;
  remoteDebuggingAddress: string;
  headless: boolean;
  executablePath?: string;
  proxy: ProxyDescriptor;
  acceptLanguage: string;
  extraHttpHeaders?: Record<string, string>;
}

export class ContextPool {
  private state: PoolState = 'uninitialized';
  private direct: BrowserEnvironment | null = null;
  private proxied: BrowserEnvironment | null = null;
  private engineStarted = false;
  private starting: Promise<void> | null = null;

  constructor(private readonly options: ContextPoolOptions) {}

  getState(): PoolState {
    return this.state;
  }

  /**
   * Debug port reserved for a route (not checked for availability)
   */
  portFor(route: RouteKind): number {
    return route === 'direct'
      ? this.options.remoteDebuggingPort
      : this.options.remoteDebuggingPort + 1;
  }

  specFor(route: RouteKind): EnvironmentSpec {
    const { options } = this;
    return {
      route,
      userDataDir: profileDirFor(options.userDataDir, route),
      debugPort: this.portFor(route),
      debugAddress: options.remoteDebuggingAddress,
      headless: options.headless,
      executablePath: options.executablePath,
      proxy: route === 'proxied' ? options.proxy : undefined,
      acceptLanguage: options.acceptLanguage,
      extraHttpHeaders: options.extraHttpHeaders,
    };
  }

  async start(): Promise<void> {
    if (this.state !== 'uninitialized') {
      throw new SessionStateError('initialize', this.state);
    }

    this.state = 'initializing';
    this.starting = this.launchAll();
    try {
      await this.starting;
    } finally {
      this.starting = null;
    }
  }

  private async launchAll(): Promise<void> {
    const startTime = Date.now();
    try {
      await this.options.provisioner.ensureInstalled();

      await this.options.engine.start();
      this.engineStarted = true;

      this.direct = await BrowserEnvironment.launch(this.options.engine, this.specFor('direct'));
      this.proxied = await BrowserEnvironment.launch(this.options.engine, this.specFor('proxied'));
    } catch (error) {
      log.error('Context pool failed to start', { error });
      await this.teardown();
      this.state = 'uninitialized';
      throw error;
    }

    this.state = 'ready';
    log.timed('Context pool ready', startTime);
  }

  /**
   * The live environment for a route
   */
  get(route: RouteKind): BrowserEnvironment {
    const env = route === 'direct' ? this.direct : this.proxied;
    if (this.state !== 'ready' || !env) {
      throw new SessionStateError(`use the ${route} environment`, this.state);
    }
    return env;
  }

  environments(): Record<RouteKind, BrowserEnvironment> {
    return { direct: this.get('direct'), proxied: this.get('proxied') };
  }

  /**
   * Close everything. Never throws; calling it again is a no-op.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }

    if (this.starting) {
      // Let an in-flight startup settle first; its failure goes to the start() caller
      await this.starting.catch(() => undefined);
    }

    this.state = 'closed';
    await this.teardown();
    log.info('Context pool closed');
  }

  private async teardown(): Promise<void> {
    const direct = this.direct;
    const proxied = this.proxied;
    this.direct = null;
    this.proxied = null;

    await this.guard('direct environment', async () => {
      if (direct) await direct.close();
    });
    await this.guard('proxied environment', async () => {
      if (proxied) await proxied.close();
    });
    await this.guard('browser engine', async () => {
      if (this.engineStarted) {
        this.engineStarted = false;
        await this.options.engine.stop();
      }
    });
  }

  private async guard(target: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (error) {
      log.error('Cleanup failed', { target, error: new CleanupError(target, { cause: error }) });
    }
  }
}
