/**
 * Fetch Orchestrator
 *
 * The per-request control loop:
 * 1. take one concurrency slot for the whole call
 * 2. pick the environment once from the whitelist
 * 3. per attempt: open a page, optionally block resource types, navigate,
 *    optionally wait for a selector, read the rendered HTML
 * 4. hand every page to the deferred closer, success or not
 *
 * Timeouts are retried at once; other failures after a fixed backoff.
 * When every attempt fails the result is null.
 */

import type { ConcurrencyGate } from './concurrency-gate.js';
import type { RouteHandler, RenderPage } from './browser-engine.js';
import type { DeferredPageCloser } from './page-closer.js';
import type { RouteKind, RouteSelector } from './route-selector.js';
import type { ResourceType, WaitUntil } from '../utils/config-schemas.js';
import { toFetchError } from '../types/errors.js';
import { logger, type Logger } from '../utils/logger.js';
import { retryAttempts, type AttemptFailure } from '../utils/retry.js';
import { TIMEOUTS } from '../utils/timeouts.js';

const log = logger.fetch;

export interface FetchOptions {
  /** Retries after the first attempt; session default when omitted or not a whole number >= 0 */
  retries?: number;
  /** Navigation and selector timeout in ms; session default when omitted or not positive */
  timeout?: number;
  waitUntil?: WaitUntil;
  /** CSS selector that must appear before the HTML is read */
  selector?: string;
  /** Requests of these resource types are aborted */
  abortResourceTypes?: Iterable<ResourceType>;
}

export interface FetchDefaults {
  retries: number;
  timeoutMs: number;
}

/**
 * Where pages come from; BrowserEnvironment is one
 */
export interface PageSource {
  readonly route: RouteKind;
  newPage(): Promise<RenderPage>;
}

export interface FetchOrchestratorOptions {
  gate: ConcurrencyGate;
  routes: RouteSelector<PageSource>;
  closer: DeferredPageCloser;
  defaults: FetchDefaults;
  /** Pause after a non-timeout failure */
  errorBackoffMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface ResolvedRequest {
  url: string;
  timeout: number;
  waitUntil?: WaitUntil;
  selector?: string;
  blocked: ReadonlySet<string> | null;
}

// Playwright reads a timeout of 0 as "wait forever"
function isPositiveTimeout(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function isRetryCount(value: number | undefined): value is number {
  return value !== undefined && Number.isInteger(value) && value >= 0;
}

/**
 * Route handler that aborts requests of the blocked types and lets every
 * other request through unchanged
 */
export function createResourceBlocker(blocked: ReadonlySet<string>): RouteHandler {
  return async (route, request) => {
    if (blocked.has(request.resourceType())) {
      await route.abort();
    } else {
      await route.continue();
    }
  };
}

export class FetchOrchestrator {
  constructor(private readonly options: FetchOrchestratorOptions) {}

  async fetch(url: string, options: FetchOptions = {}): Promise<string | null> {
    const { gate, routes, defaults } = this.options;
    const retries = isRetryCount(options.retries) ? options.retries : defaults.retries;
    const blocked = options.abortResourceTypes ? new Set<string>(options.abortResourceTypes) : null;

    const request: ResolvedRequest = {
      url,
      timeout: isPositiveTimeout(options.timeout) ? options.timeout : defaults.timeoutMs,
      waitUntil: options.waitUntil,
      selector: options.selector,
      blocked: blocked && blocked.size > 0 ? blocked : null,
    };

    return gate.run(async () => {
      const env = routes.select(url);
      const fetchLog = log.child({ url, route: env.route });

      return retryAttempts((attempt) => this.attempt(env, request, attempt, fetchLog), {
        retries,
        timeoutBackoffMs: 0,
        errorBackoffMs: this.options.errorBackoffMs ?? TIMEOUTS.RETRY_BACKOFF,
        sleep: this.options.sleep,
        onFailure: (failure) => this.reportFailure(fetchLog, request, failure),
      });
    });
  }

  private async attempt(
    env: PageSource,
    request: ResolvedRequest,
    attempt: number,
    fetchLog: Logger
  ): Promise<string> {
    const page = await env.newPage();

    try {
      if (request.blocked) {
        await page.route('**/*', createResourceBlocker(request.blocked));
      }

      const startTime = Date.now();
      await page.goto(request.url, { timeout: request.timeout, waitUntil: request.waitUntil });
      if (request.selector) {
        await page.waitForSelector(request.selector, { timeout: request.timeout });
      }
      const content = await page.content();

      fetchLog.timed('Fetch succeeded', startTime, { attempt });
      return content;
    } finally {
      this.options.closer.schedule(page, `${env.route} page for ${request.url}`);
    }
  }

  private reportFailure(fetchLog: Logger, request: ResolvedRequest, failure: AttemptFailure): void {
    const error = toFetchError(failure.error, request.url, request.timeout);
    const context = {
      attempt: failure.attempt,
      maxAttempts: failure.maxAttempts,
      final: failure.final,
    };

    if (failure.kind === 'timeout') {
      fetchLog.warn('Timeout on attempt', { ...context, reason: error.message });
    } else {
      fetchLog.error('Error on attempt', { ...context, error });
    }
  }
}
