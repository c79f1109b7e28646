/**
 * Tunable fee parameters
 *
 * One parameter set exists per pool category. Fees are expressed in fee
 * units (parts-per-million of swap notional); ratios, tolerances and
 * multipliers are 18-decimal fixed point (WAD) bigints.
 */

/**
 * Pool categories served by a deployment
 *
 * Each category carries its own parameter set and global sanity bounds.
 * - stable: pegged pairs with a narrow volume/liquidity regime
 * - standard: ordinary pairs
 * - volatile: long-tail pairs that need a wide fee range
 */
export type PoolCategory = 'stable' | 'standard' | 'volatile';

/**
 * All pool categories, in declaration order
 */
export const POOL_CATEGORIES: readonly PoolCategory[] = ['stable', 'standard', 'volatile'];

/**
 * Tunable Parameter Set
 */
export interface FeeParams {
  /** Lower fee bound (fee units) */
  minFee: number;

  /** Upper fee bound (fee units) */
  maxFee: number;

  /** Maximum fee-unit change per out-of-bounds hit before streak amplification */
  baseMaxFeeDelta: number;

  /** EMA smoothing window for the target ratio, in whole days */
  lookbackPeriod: number;

  /** Cooldown between two committed updates, in seconds */
  minPeriod: number;

  /**
   * Fractional band around the target ratio considered in-band (WAD)
   * @example 50_000_000_000_000_000n // 5%
   */
  ratioTolerance: bigint;

  /** Maps the normalized deviation into an adjustment rate (WAD) */
  linearSlope: bigint;

  /** Ratio observations above this are rejected (WAD) */
  maxCurrentRatio: bigint;

  /** Multiplier applied to the fee delta below the band (WAD) */
  lowerSideFactor: bigint;

  /** Multiplier applied to the fee delta above the band (WAD) */
  upperSideFactor: bigint;
}
