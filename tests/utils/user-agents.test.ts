import { describe, it, expect } from 'vitest';
import { getRandomUserAgent, isKnownUserAgent } from '../../src/utils/user-agents.js';

describe('user agents', () => {
  it('should pick by the random draw', () => {
    expect(getRandomUserAgent(() => 0)).toContain('Chrome/123.0.0.0');
    expect(getRandomUserAgent(() => 0.99)).toContain('X11; Linux x86_64');
  });

  it('should only hand out known agents', () => {
    for (const draw of [0, 0.2, 0.4, 0.6, 0.8, 0.999]) {
      expect(isKnownUserAgent(getRandomUserAgent(() => draw))).toBe(true);
    }
    expect(isKnownUserAgent('curl/8.0')).toBe(false);
  });
});
