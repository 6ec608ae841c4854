/**
 * Central Timeout Configuration
 *
 * All timing values used by the renderer come from this module.
 */

/**
 * Default timing values in milliseconds
 */
export const TIMEOUTS = {
  /**
   * Navigation and selector wait timeout used when neither the call nor the
   * session configuration overrides it
   */
  PAGE_LOAD: 10000,

  /**
   * Pause before the next attempt after a non-timeout failure.
   * Timeouts retry immediately.
   */
  RETRY_BACKOFF: 1000,

  /**
   * Deferred page close delay is drawn uniformly from
   * [PAGE_CLOSE_MIN, PAGE_CLOSE_MAX)
   */
  PAGE_CLOSE_MIN: 1000,
  PAGE_CLOSE_MAX: 7000,
} as const;

/**
 * Draw a delay uniformly from [min, max)
 */
export function randomDelay(
  min: number = TIMEOUTS.PAGE_CLOSE_MIN,
  max: number = TIMEOUTS.PAGE_CLOSE_MAX,
  random: () => number = Math.random
): number {
  return min + (max - min) * random();
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
