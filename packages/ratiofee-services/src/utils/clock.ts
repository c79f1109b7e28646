/**
 * Wall-clock source
 *
 * Only used for cooldown comparisons, so whole seconds are enough.
 */
export interface Clock {
  /** Current time in whole seconds */
  now(): number;
}

/**
 * Clock backed by the system time
 */
export const systemClock: Clock = {
  now: () => Math.floor(Date.now() / 1000),
};
