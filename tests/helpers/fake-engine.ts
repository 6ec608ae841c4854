/**
 * In-process stand-in for the Playwright engine.
 *
 * Pages follow a scripted behavior: succeed, time out during navigation or
 * the selector wait, or fail with an ordinary error. Navigation replays a
 * list of sub-resource requests through any installed route handler so
 * blocking can be observed.
 */

import type {
  BrowserEngine,
  InterceptedRequest,
  InterceptedRoute,
  PersistentLaunchOptions,
  RenderContext,
  RenderPage,
  RouteHandler,
} from '../../src/core/browser-engine.js';
import type { WaitUntil } from '../../src/utils/config-schemas.js';

export class FakeTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export type PageOutcome =
  | { kind: 'ok'; html?: string }
  | { kind: 'timeout' }
  | { kind: 'selector-timeout' }
  | { kind: 'error'; message?: string };

export interface PageBehavior {
  outcome: PageOutcome;
  /** Resource types requested while navigating */
  subresources?: string[];
  /** Time spent inside goto() */
  navigationDelayMs?: number;
  /** close() rejects */
  failOnClose?: boolean;
}

export interface PageInfo {
  route: string;
  userDataDir: string;
  /** 1-based count of fetch pages opened in this engine */
  index: number;
}

export class FakePage implements RenderPage {
  closed = false;
  closeCalls = 0;
  html = '';
  routeHandler: RouteHandler | null = null;
  readonly gotoCalls: Array<{ url: string; options: { timeout: number; waitUntil?: WaitUntil } }> = [];
  readonly selectorCalls: Array<{ selector: string; timeout: number }> = [];
  readonly aborted: string[] = [];
  readonly continued: string[] = [];

  constructor(
    private readonly owner: FakeContext,
    readonly behavior: PageBehavior | null,
    readonly info: PageInfo | null
  ) {}

  async goto(url: string, options: { timeout: number; waitUntil?: WaitUntil }): Promise<null> {
    this.gotoCalls.push({ url, options });
    this.owner.engine.navigationStarted();
    try {
      if (this.behavior?.navigationDelayMs) {
        await new Promise((resolve) => setTimeout(resolve, this.behavior?.navigationDelayMs));
      }

      for (const type of this.behavior?.subresources ?? []) {
        const request = fakeRequest(`${url}#${type}`, type);
        if (this.routeHandler) {
          await this.routeHandler(this.fakeRoute(type), request);
        } else {
          this.continued.push(type);
        }
      }

      const outcome = this.behavior?.outcome;
      if (outcome?.kind === 'timeout') {
        throw new FakeTimeoutError(`page.goto: Timeout ${options.timeout}ms exceeded.`);
      }
      if (outcome?.kind === 'error') {
        throw new Error(outcome.message ?? 'net::ERR_CONNECTION_RESET');
      }
      if (outcome?.kind === 'ok') {
        this.html = outcome.html ?? `<html><body>${url}</body></html>`;
      }
      return null;
    } finally {
      this.owner.engine.navigationFinished();
    }
  }

  async waitForSelector(selector: string, options: { timeout: number }): Promise<null> {
    this.selectorCalls.push({ selector, timeout: options.timeout });
    if (this.behavior?.outcome.kind === 'selector-timeout') {
      throw new FakeTimeoutError(`page.waitForSelector: Timeout ${options.timeout}ms exceeded.`);
    }
    return null;
  }

  async content(): Promise<string> {
    return this.html;
  }

  async setContent(html: string): Promise<void> {
    this.html = html;
  }

  async route(_url: string, handler: RouteHandler): Promise<void> {
    this.routeHandler = handler;
  }

  isClosed(): boolean {
    return this.closed;
  }

  async close(): Promise<void> {
    this.closeCalls++;
    if (this.behavior?.failOnClose) {
      throw new Error('Target page, context or browser has been closed');
    }
    this.closed = true;
  }

  private fakeRoute(type: string): InterceptedRoute {
    return {
      abort: async () => {
        this.aborted.push(type);
      },
      continue: async () => {
        this.continued.push(type);
      },
    };
  }
}

function fakeRequest(url: string, type: string): InterceptedRequest {
  return {
    url: () => url,
    resourceType: () => type,
  };
}

export class FakeContext implements RenderContext {
  closed = false;
  headers: Record<string, string> = {};
  readonly allPages: FakePage[] = [];

  constructor(
    readonly engine: FakeEngine,
    readonly userDataDir: string,
    readonly options: PersistentLaunchOptions
  ) {}

  get route(): string {
    return this.options.proxy ? 'proxied' : 'direct';
  }

  get sentinel(): FakePage | undefined {
    return this.allPages[0];
  }

  async newPage(): Promise<FakePage> {
    if (this.closed) {
      throw new Error('Target page, context or browser has been closed');
    }
    if (this.engine.failNewPage > 0) {
      this.engine.failNewPage--;
      throw new Error('Browser crashed while opening page');
    }

    // The first page of a context is its sentinel and gets no behavior
    const isSentinel = this.allPages.length === 0;
    const info = isSentinel
      ? null
      : { route: this.route, userDataDir: this.userDataDir, index: ++this.engine.fetchPageCount };
    const page = new FakePage(this, info ? this.engine.behave(info) : null, info);
    this.allPages.push(page);
    this.engine.pages.push(page);
    return page;
  }

  pages(): FakePage[] {
    return this.allPages.filter((page) => !page.closed);
  }

  async setExtraHTTPHeaders(headers: Record<string, string>): Promise<void> {
    this.headers = { ...headers };
  }

  async close(): Promise<void> {
    if (this.engine.failContextClose.has(this.route)) {
      throw new Error(`cannot close ${this.route} context`);
    }
    this.closed = true;
    for (const page of this.allPages) {
      page.closed = true;
    }
  }
}

export interface FakeEngineOptions {
  behave?: (info: PageInfo) => PageBehavior;
  /** Launch of the context for this route rejects */
  failLaunch?: 'direct' | 'proxied';
}

export class FakeEngine implements BrowserEngine {
  started = false;
  stopped = false;
  startCalls = 0;
  stopCalls = 0;
  failStop = false;
  failNewPage = 0;
  failContextClose = new Set<string>();
  fetchPageCount = 0;
  activeNavigations = 0;
  maxActiveNavigations = 0;
  readonly contexts: FakeContext[] = [];
  readonly pages: FakePage[] = [];
  behave: (info: PageInfo) => PageBehavior;

  constructor(private readonly options: FakeEngineOptions = {}) {
    this.behave = options.behave ?? (() => ({ outcome: { kind: 'ok' } }));
  }

  async start(): Promise<void> {
    this.startCalls++;
    this.started = true;
  }

  async launchPersistentContext(
    userDataDir: string,
    options: PersistentLaunchOptions
  ): Promise<FakeContext> {
    const route = options.proxy ? 'proxied' : 'direct';
    if (this.options.failLaunch === route) {
      throw new Error(`failed to launch ${route} browser`);
    }
    const context = new FakeContext(this, userDataDir, options);
    this.contexts.push(context);
    return context;
  }

  async stop(): Promise<void> {
    this.stopCalls++;
    if (this.failStop) {
      throw new Error('driver already gone');
    }
    this.stopped = true;
  }

  context(route: 'direct' | 'proxied'): FakeContext {
    const found = this.contexts.find((context) => context.route === route);
    if (!found) {
      throw new Error(`no ${route} context launched`);
    }
    return found;
  }

  fetchPages(): FakePage[] {
    return this.pages.filter((page) => page.info !== null);
  }

  navigationStarted(): void {
    this.activeNavigations++;
    this.maxActiveNavigations = Math.max(this.maxActiveNavigations, this.activeNavigations);
  }

  navigationFinished(): void {
    this.activeNavigations--;
  }
}

/**
 * Behavior that plays back outcomes in order, repeating the last one
 */
export function sequence(...outcomes: PageOutcome[]): (info: PageInfo) => PageBehavior {
  return (info) => ({ outcome: outcomes[Math.min(info.index, outcomes.length) - 1] });
}
