import { describe, it, expect } from 'vitest';
import { RouteSelector } from '../../src/core/route-selector.js';
import { WhitelistStore } from '../../src/core/whitelist-store.js';

describe('RouteSelector', () => {
  const environments = { direct: 'direct-env', proxied: 'proxied-env' };

  it('should send whitelisted URLs through the proxied environment', () => {
    const selector = new RouteSelector(new WhitelistStore(['*.dmm.co.jp']), environments);

    expect(selector.route('https://video.dmm.co.jp/')).toBe('proxied');
    expect(selector.select('https://video.dmm.co.jp/')).toBe('proxied-env');
  });

  it('should send everything else through the direct environment', () => {
    const selector = new RouteSelector(new WhitelistStore(['*.dmm.co.jp']), environments);

    expect(selector.route('https://www.google.com')).toBe('direct');
    expect(selector.select('https://www.google.com')).toBe('direct-env');
  });

  it('should read the shared whitelist by reference', () => {
    const whitelist = new WhitelistStore();
    const selector = new RouteSelector(whitelist, environments);
    expect(selector.route('https://example.org/')).toBe('direct');

    whitelist.update(['example.org']);

    expect(selector.route('https://example.org/')).toBe('proxied');
  });
});
