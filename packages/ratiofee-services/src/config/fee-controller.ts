/**
 * Fee Controller Configuration
 *
 * Global sanity bounds for the tunable parameters of each pool category,
 * default parameter sets, and the environment-derived adjustment-rate
 * ceiling.
 *
 * Environment variables:
 * - FEE_CONTROLLER_MAX_ADJUSTMENT_RATE: initial adjustment-rate ceiling as
 *   a WAD integer string (default 10%: "100000000000000000")
 */

import { z } from 'zod';
import { MAX_FEE, WAD } from '@ratiofee/shared';
import type { FeeParams, PoolCategory } from '@ratiofee/shared';

/**
 * Inclusive range
 */
export interface Range<T> {
  min: T;
  max: T;
}

/**
 * Sanity bounds for one category's parameter set
 */
export interface FeeParamBounds {
  /** Range for both minFee and maxFee (fee units) */
  fee: Range<number>;
  baseMaxFeeDelta: Range<number>;
  /** Days */
  lookbackPeriod: Range<number>;
  /** Seconds */
  minPeriod: Range<number>;
  ratioTolerance: Range<bigint>;
  linearSlope: Range<bigint>;
  maxCurrentRatio: Range<bigint>;
  /** Range for both lowerSideFactor and upperSideFactor */
  sideFactor: Range<bigint>;
}

/**
 * Global bounds enforced before any parameter change is accepted
 */
export interface GlobalParamBounds {
  categories: Record<PoolCategory, FeeParamBounds>;
  maxAdjustmentRate: Range<bigint>;
}

const PERCENT = WAD / 100n;
const DAY = 86_400;

const SHARED_BOUNDS = {
  lookbackPeriod: { min: 1, max: 365 },
  minPeriod: { min: 60, max: 30 * DAY },
  linearSlope: { min: WAD / 10n, max: 10n * WAD },
  maxCurrentRatio: { min: WAD, max: 10n ** 6n * WAD },
  sideFactor: { min: WAD / 10n, max: 10n * WAD },
} as const;

/**
 * Default global bounds
 */
export const DEFAULT_GLOBAL_BOUNDS: GlobalParamBounds = {
  categories: {
    stable: {
      ...SHARED_BOUNDS,
      fee: { min: 0, max: 10_000 },
      baseMaxFeeDelta: { min: 1, max: 1_000 },
      ratioTolerance: { min: PERCENT / 10n, max: 20n * PERCENT },
    },
    standard: {
      ...SHARED_BOUNDS,
      fee: { min: 0, max: 50_000 },
      baseMaxFeeDelta: { min: 1, max: 5_000 },
      ratioTolerance: { min: PERCENT / 10n, max: 50n * PERCENT },
    },
    volatile: {
      ...SHARED_BOUNDS,
      fee: { min: 0, max: MAX_FEE },
      baseMaxFeeDelta: { min: 1, max: 50_000 },
      ratioTolerance: { min: PERCENT, max: 100n * PERCENT },
    },
  },
  maxAdjustmentRate: { min: 1n, max: 10n * WAD },
};

/**
 * Default parameter set per category
 */
export const DEFAULT_CATEGORY_PARAMS: Record<PoolCategory, FeeParams> = {
  stable: {
    minFee: 10,
    maxFee: 1_000,
    baseMaxFeeDelta: 10,
    lookbackPeriod: 30,
    minPeriod: DAY,
    ratioTolerance: PERCENT / 2n,
    linearSlope: WAD / 2n,
    maxCurrentRatio: 1_000n * WAD,
    lowerSideFactor: WAD,
    upperSideFactor: WAD,
  },
  standard: {
    minFee: 100,
    maxFee: 10_000,
    baseMaxFeeDelta: 50,
    lookbackPeriod: 30,
    minPeriod: DAY,
    ratioTolerance: 5n * PERCENT,
    linearSlope: WAD,
    maxCurrentRatio: 1_000n * WAD,
    lowerSideFactor: WAD,
    upperSideFactor: WAD,
  },
  volatile: {
    minFee: 500,
    maxFee: 50_000,
    baseMaxFeeDelta: 250,
    lookbackPeriod: 14,
    minPeriod: DAY / 2,
    ratioTolerance: 10n * PERCENT,
    linearSlope: 2n * WAD,
    maxCurrentRatio: 1_000n * WAD,
    lowerSideFactor: WAD,
    upperSideFactor: 2n * WAD,
  },
};

/**
 * Default adjustment-rate ceiling: 10% of the current fee per update
 */
export const DEFAULT_MAX_ADJUSTMENT_RATE = 10n * PERCENT;

/**
 * Fee controller runtime configuration
 */
export interface FeeControllerConfig {
  maxAdjustmentRate: bigint;
}

const WadStringSchema = z
  .string()
  .trim()
  .regex(/^\d+$/, 'must be a non-negative integer (WAD)')
  .transform((value) => BigInt(value));

/**
 * Get fee controller configuration from environment
 *
 * @throws Error if FEE_CONTROLLER_MAX_ADJUSTMENT_RATE is set but malformed
 */
export function getFeeControllerConfig(): FeeControllerConfig {
  const raw = process.env.FEE_CONTROLLER_MAX_ADJUSTMENT_RATE;
  if (!raw) {
    return { maxAdjustmentRate: DEFAULT_MAX_ADJUSTMENT_RATE };
  }

  const parsed = WadStringSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(
      `FEE_CONTROLLER_MAX_ADJUSTMENT_RATE ${parsed.error.issues[0]?.message ?? 'is invalid'} (got "${raw}")`
    );
  }

  return { maxAdjustmentRate: parsed.data };
}
