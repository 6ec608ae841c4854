/**
 * Browser Environment
 *
 * One isolated Chromium profile plus its network route. The direct and the
 * proxied environment are two instances of this class that differ only in
 * profile directory, debug port and proxy.
 *
 * Every environment keeps a sentinel page open for its whole life: closing
 * the last page of a persistent context shuts the browser down, which would
 * break every fetch routed to it.
 */

import path from 'node:path';
import type { RouteKind } from './route-selector.js';
import type { BrowserEngine, RenderContext, RenderPage } from './browser-engine.js';
import type { ProxyDescriptor } from '../utils/config-schemas.js';
import { getRandomUserAgent } from '../utils/user-agents.js';
import { logger } from '../utils/logger.js';

const log = logger.contextPool;

export interface EnvironmentSpec {
  route: RouteKind;
  userDataDir: string;
  debugPort: number;
  debugAddress: string;
  headless: boolean;
  executablePath?: string;
  proxy?: ProxyDescriptor;
  acceptLanguage: string;
  extraHttpHeaders?: Record<string, string>;
  userAgent?: string;
}

/**
 * Profile subdirectory for each route
 */
export const PROFILE_DIRS: Readonly<Record<RouteKind, string>> = {
  direct: 'direct',
  proxied: 'proxy',
};

const WINDOW_SIZE = '820,750';

export function buildLaunchArgs(spec: EnvironmentSpec): string[] {
  const lang = spec.acceptLanguage.split(',')[0].split(';')[0].trim();
  return [
    '--no-sandbox',
    '--disable-setuid-sandbox',
    '--disable-gpu',
    '--disable-dev-shm-usage',
    '--disable-blink-features=AutomationControlled',
    `--window-size=${WINDOW_SIZE}`,
    `--lang=${lang}`,
    `--remote-debugging-port=${spec.debugPort}`,
    `--remote-debugging-address=${spec.debugAddress}`,
  ];
}

export function buildDefaultHeaders(spec: EnvironmentSpec): Record<string, string> {
  return {
    'Accept-Language': spec.acceptLanguage,
    'Accept-Encoding': 'gzip, deflate, br',
    ...spec.extraHttpHeaders,
  };
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

/**
 * Placeholder document shown in the sentinel tab
 */
export function renderSentinelHtml(route: RouteKind, proxy?: ProxyDescriptor): string {
  const label = route === 'proxied' ? 'Proxy' : 'Direct';
  const description = route === 'proxied' && proxy
    ? `Proxied window, server: ${escapeHtml(proxy.server)}`
    : 'Direct window';

  return `<html>
  <head>
    <title>[${label}] DON'T CLOSE THE LAST TAB</title>
  </head>
  <body style="color: darkred; padding: 30px;">
    <h2 style="color: grey;">${description}</h2>
    <h1>Do not close the last tab manually, otherwise the browser will exit and the service will be interrupted.
      <a href="about:blank" target="_blank">Open a new tab</a></h1>
  </body>
</html>`;
}

export class BrowserEnvironment {
  private context: RenderContext | null = null;
  private sentinel: RenderPage | null = null;

  private constructor(readonly spec: EnvironmentSpec) {}

  /**
   * Launch the persistent context, apply default headers and open the sentinel
   */
  static async launch(engine: BrowserEngine, spec: EnvironmentSpec): Promise<BrowserEnvironment> {
    const env = new BrowserEnvironment(spec);
    const userAgent = spec.userAgent ?? getRandomUserAgent();

    const context = await engine.launchPersistentContext(spec.userDataDir, {
      headless: spec.headless,
      executablePath: spec.executablePath,
      userAgent,
      proxy: spec.proxy,
      args: buildLaunchArgs(spec),
    });
    env.context = context;

    try {
      await context.setExtraHTTPHeaders(buildDefaultHeaders(spec));
      const sentinel = await context.newPage();
      await sentinel.setContent(renderSentinelHtml(spec.route, spec.proxy));
      env.sentinel = sentinel;
    } catch (error) {
      await context.close().catch((closeError: unknown) => {
        log.error('Failed to close environment after launch error', {
          route: spec.route,
          error: closeError,
        });
      });
      throw error;
    }

    log.info('Environment launched', {
      route: spec.route,
      userDataDir: spec.userDataDir,
      debugPort: spec.debugPort,
      proxy: spec.proxy,
    });
    return env;
  }

  get route(): RouteKind {
    return this.spec.route;
  }

  get isOpen(): boolean {
    return this.context !== null;
  }

  /**
   * The underlying browser context, for callers that drive pages themselves.
   * Closing its last page ends the environment.
   */
  getContext(): RenderContext {
    if (!this.context) {
      throw new Error(`The ${this.spec.route} environment is closed`);
    }
    return this.context;
  }

  getSentinel(): RenderPage | null {
    return this.sentinel;
  }

  async newPage(): Promise<RenderPage> {
    return this.getContext().newPage();
  }

  /**
   * Close the context. Safe to call on an already closed environment.
   */
  async close(): Promise<void> {
    const context = this.context;
    this.context = null;
    this.sentinel = null;
    if (context) {
      await context.close();
    }
  }
}

/**
 * Profile directory for a route under the configured root
 */
export function profileDirFor(root: string, route: RouteKind): string {
  return path.join(root, PROFILE_DIRS[route]);
}
