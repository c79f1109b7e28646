/**
 * Cooldown arithmetic
 */

/**
 * Earliest timestamp at which the next update may commit
 */
export function nextEligibleTimestamp(lastUpdateTimestamp: number, minPeriod: number): number {
  return lastUpdateTimestamp + minPeriod;
}

/**
 * Whether `minPeriod` seconds have passed since the last committed update
 */
export function isCooldownElapsed(
  now: number,
  lastUpdateTimestamp: number,
  minPeriod: number
): boolean {
  return now - lastUpdateTimestamp >= minPeriod;
}
