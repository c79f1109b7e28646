/**
 * Fee clamping and tolerance-band classification
 */

import { mulDiv } from '../math.js';
import { WAD } from './constants.js';

/**
 * Tolerance band around a target ratio
 */
export interface ToleranceBand {
  lowerBound: bigint;
  upperBound: bigint;
}

/**
 * Classification of a ratio observation against the tolerance band
 *
 * `isUpper` and `inBand` are never both true.
 */
export interface BoundsCheck {
  isUpper: boolean;
  inBand: boolean;
}

/**
 * Clamps a fee of any magnitude into [minFee, maxFee]
 *
 * Oversized values saturate to maxFee and negative values to minFee.
 *
 * @param fee - Candidate fee (fee units)
 * @param minFee - Lower bound (fee units)
 * @param maxFee - Upper bound (fee units), must be >= minFee
 * @returns The fee itself if already in range, otherwise the nearer bound
 *
 * @example
 * clampFee(12_000n, 100, 10_000); // 10_000
 * clampFee(5_000n, 100, 10_000);  // 5_000
 */
export function clampFee(fee: bigint, minFee: number, maxFee: number): number {
  if (fee < BigInt(minFee)) {
    return minFee;
  }
  if (fee > BigInt(maxFee)) {
    return maxFee;
  }
  return Number(fee);
}

/**
 * Computes [target - target·tolerance, target + target·tolerance]
 *
 * The lower bound saturates at zero when the tolerance exceeds 100%.
 *
 * @param target - Target ratio (WAD)
 * @param tolerance - Fractional tolerance (WAD)
 */
export function toleranceBand(target: bigint, tolerance: bigint): ToleranceBand {
  const delta = mulDiv(target, tolerance, WAD);
  return {
    lowerBound: delta >= target ? 0n : target - delta,
    upperBound: target + delta,
  };
}

/**
 * Classifies a ratio observation against the tolerance band of a target
 *
 * Both bounds are inclusive. A zero target has a degenerate band: only a
 * zero observation is in band and any positive one is upper.
 *
 * @param target - Target ratio (WAD)
 * @param tolerance - Fractional tolerance (WAD)
 * @param current - Observed ratio (WAD)
 */
export function withinBounds(target: bigint, tolerance: bigint, current: bigint): BoundsCheck {
  if (target === 0n) {
    return current === 0n
      ? { isUpper: false, inBand: true }
      : { isUpper: true, inBand: false };
  }

  const { lowerBound, upperBound } = toleranceBand(target, tolerance);
  const isUpper = current > upperBound;
  const inBand = !isUpper && current >= lowerBound;

  return { isUpper, inBand };
}
