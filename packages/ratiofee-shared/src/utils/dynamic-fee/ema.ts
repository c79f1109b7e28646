/**
 * Exponential moving average over a lookback window of whole days
 */

import { InvalidParameterError } from '../../errors/index.js';
import { mulDiv } from '../math.js';
import { WAD } from './constants.js';

/**
 * Smoothing coefficient for a lookback window: 2 / (lookbackDays + 1), in WAD
 *
 * @throws InvalidParameterError if lookbackDays is not an integer >= 1
 */
export function computeAlpha(lookbackDays: number): bigint {
  if (!Number.isSafeInteger(lookbackDays) || lookbackDays < 1) {
    throw new InvalidParameterError([
      `lookbackPeriod must be an integer >= 1 (got ${lookbackDays})`,
    ]);
  }
  return (2n * WAD) / BigInt(lookbackDays + 1);
}

/**
 * Single EMA step
 *
 * The delta is computed on its magnitude and added or subtracted, so the
 * result always lies between `previous` and `current`.
 *
 * @param current - New observation (WAD)
 * @param previous - Previous smoothed value (WAD)
 * @param lookbackDays - Smoothing window; 1 returns `current` unchanged
 * @returns The smoothed value
 *
 * @example
 * ema(1_200_000_000_000_000_000n, 1_000_000_000_000_000_000n, 30);
 * // Returns: 1_012_903_225_806_451_612n
 */
export function ema(current: bigint, previous: bigint, lookbackDays: number): bigint {
  const alpha = computeAlpha(lookbackDays);

  if (current === previous) {
    return previous;
  }

  if (current > previous) {
    return previous + mulDiv(current - previous, alpha, WAD);
  }
  return previous - mulDiv(previous - current, alpha, WAD);
}
