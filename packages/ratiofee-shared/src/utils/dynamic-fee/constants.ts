/**
 * Dynamic fee constants
 */

/**
 * 18-decimal fixed-point scale: 1.0 is encoded as 10^18
 */
export const WAD = 10n ** 18n;

/**
 * Largest representable fee (fee units are parts-per-million)
 */
export const MAX_FEE = 1_000_000;

/**
 * Streak length beyond which the per-update delta cap stops growing
 */
export const MAX_STREAK_MULTIPLIER = 10;

/**
 * Fee units added on top of the rate-based cap so that pools with low
 * fees can still move by more than a rounding error
 */
export const RATE_CAP_ALLOWANCE = 10n;

/**
 * Saturation point of the consecutive-hits counter (uint32 max)
 */
export const MAX_CONSECUTIVE_HITS = 0xffff_ffff;
