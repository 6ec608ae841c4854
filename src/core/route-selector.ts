import type { WhitelistStore } from './whitelist-store.js';

export type RouteKind = 'direct' | 'proxied';

/**
 * Picks the proxied environment for whitelisted URLs and the direct one
 * for everything else. Callers select once per fetch and keep the result
 * for all of its attempts.
 */
export class RouteSelector<E> {
  constructor(
    private readonly whitelist: WhitelistStore,
    private readonly environments: Readonly<Record<RouteKind, E>>
  ) {}

  route(url: string): RouteKind {
    return this.whitelist.matches(url) ? 'proxied' : 'direct';
  }

  select(url: string): E {
    return this.environments[this.route(url)];
  }
}
