/**
 * Whitelist Store
 *
 * Append-only set of glob patterns. A URL is whitelisted when any pattern
 * matches its host, or its host followed by its path. Reads are not
 * synchronized with updates; a concurrent match may or may not see a
 * pattern being added, which is harmless because the set only grows.
 */

import { logger } from '../utils/logger.js';
import { matchGlob, urlMatchTargets } from '../utils/url-pattern-matcher.js';

const log = logger.whitelist;

export class WhitelistStore {
  private readonly entries = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    this.update(initial);
  }

  /**
   * Merge patterns into the store. Re-adding a pattern is a no-op.
   */
  update(patterns: Iterable<string>): void {
    for (const pattern of patterns) {
      this.entries.add(pattern);
    }
  }

  matches(url: string): boolean {
    const targets = urlMatchTargets(url);
    if (!targets) {
      log.debug('Unparseable URL treated as not whitelisted', { url });
      return false;
    }

    let matched = false;
    for (const pattern of this.entries) {
      if (matchGlob(targets.host, pattern) || matchGlob(targets.hostAndPath, pattern)) {
        matched = true;
        break;
      }
    }

    log.debug('Whitelist lookup', { url, host: targets.host, matched });
    return matched;
  }

  has(pattern: string): boolean {
    return this.entries.has(pattern);
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Snapshot of the stored patterns
   */
  patterns(): string[] {
    return [...this.entries];
  }
}
