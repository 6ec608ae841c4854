/**
 * Deferred Page Closer
 *
 * Fetch pages are never closed inline. Each one is handed here and closed
 * after a random delay, in the background; the fetch that used it has
 * usually returned by then. Close failures are logged and go no further.
 * On shutdown the pending closes are abandoned, not drained: closing the
 * environment closes their pages anyway.
 */

import type { RenderPage } from './browser-engine.js';
import { CleanupError } from '../types/errors.js';
import { logger } from '../utils/logger.js';
import { TIMEOUTS, randomDelay } from '../utils/timeouts.js';

const log = logger.cleanup;

export interface PageCloserOptions {
  minDelayMs?: number;
  maxDelayMs?: number;
  random?: () => number;
}

export class DeferredPageCloser {
  private readonly pending = new Set<ReturnType<typeof setTimeout>>();
  private readonly minDelayMs: number;
  private readonly maxDelayMs: number;
  private readonly random: () => number;

  constructor(options: PageCloserOptions = {}) {
    this.minDelayMs = options.minDelayMs ?? TIMEOUTS.PAGE_CLOSE_MIN;
    this.maxDelayMs = options.maxDelayMs ?? TIMEOUTS.PAGE_CLOSE_MAX;
    this.random = options.random ?? Math.random;
  }

  /**
   * Schedule a close and return the chosen delay
   */
  schedule(page: RenderPage, label = 'page'): number {
    const delay = randomDelay(this.minDelayMs, this.maxDelayMs, this.random);

    const timer = setTimeout(() => {
      this.pending.delete(timer);
      void this.closeNow(page, label);
    }, delay);
    this.pending.add(timer);

    return delay;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Drop every scheduled close that has not fired yet
   */
  abandonAll(): number {
    const count = this.pending.size;
    for (const timer of this.pending) {
      clearTimeout(timer);
    }
    this.pending.clear();
    if (count > 0) {
      log.debug('Abandoned pending page closes', { count });
    }
    return count;
  }

  private async closeNow(page: RenderPage, label: string): Promise<void> {
    try {
      if (!page.isClosed()) {
        await page.close();
      }
    } catch (error) {
      const cleanupError = new CleanupError(label, { cause: error });
      log.error('Error closing page', { error: cleanupError });
    }
  }
}
