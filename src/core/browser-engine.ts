/**
 * Browser Engine - the Playwright boundary
 *
 * The rest of the renderer talks to the browser only through the narrow
 * interfaces below. Playwright's own Page and BrowserContext satisfy them
 * structurally; tests substitute an in-process fake.
 *
 * Playwright is loaded lazily on start() so that importing this package
 * never pulls the browser driver in by itself.
 */

import type { WaitUntil, ProxyDescriptor } from '../utils/config-schemas.js';
import { ProvisioningFailure, describeError } from '../types/errors.js';

export interface InterceptedRequest {
  resourceType(): string;
  url(): string;
}

export interface InterceptedRoute {
  abort(errorCode?: string): Promise<void>;
  continue(): Promise<void>;
}

export type RouteHandler = (route: InterceptedRoute, request: InterceptedRequest) => Promise<void>;

export interface RenderPage {
  goto(url: string, options: { timeout: number; waitUntil?: WaitUntil }): Promise<unknown>;
  waitForSelector(selector: string, options: { timeout: number }): Promise<unknown>;
  content(): Promise<string>;
  setContent(html: string): Promise<void>;
  route(url: string, handler: RouteHandler): Promise<void>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface RenderContext {
  newPage(): Promise<RenderPage>;
  pages(): RenderPage[];
  setExtraHTTPHeaders(headers: Record<string, string>): Promise<void>;
  close(): Promise<void>;
}

export interface PersistentLaunchOptions {
  headless: boolean;
  executablePath?: string;
  userAgent: string;
  proxy?: ProxyDescriptor;
  args: string[];
}

export interface BrowserEngine {
  start(): Promise<void>;
  launchPersistentContext(userDataDir: string, options: PersistentLaunchOptions): Promise<RenderContext>;
  stop(): Promise<void>;
}

type PlaywrightModule = typeof import('playwright');

/**
 * Load Playwright dynamically
 */
async function loadPlaywright(): Promise<PlaywrightModule> {
  try {
    return await import('playwright');
  } catch (error) {
    throw new ProvisioningFailure(
      `Playwright could not be loaded: ${describeError(error)}. ` +
      'Install it with: npm install playwright && npx playwright install chromium',
      {},
      { cause: error }
    );
  }
}

/**
 * Chromium through Playwright. Each persistent context is its own browser
 * process, so stopping the engine only drops the driver reference; the
 * contexts are closed by their owners first.
 */
export class PlaywrightEngine implements BrowserEngine {
  private chromium: PlaywrightModule['chromium'] | null = null;

  async start(): Promise<void> {
    if (!this.chromium) {
      const pw = await loadPlaywright();
      this.chromium = pw.chromium;
    }
  }

  async launchPersistentContext(
    userDataDir: string,
    options: PersistentLaunchOptions
  ): Promise<RenderContext> {
    if (!this.chromium) {
      throw new Error('PlaywrightEngine.start() must be called before launching contexts');
    }
    return this.chromium.launchPersistentContext(userDataDir, options);
  }

  async stop(): Promise<void> {
    this.chromium = null;
  }
}
