/**
 * Pool Fee Controller types
 */

import type {
  FeeParams,
  FeeUpdatePreview,
  FeeUpdateResult,
  OobState,
  PoolCategory,
  PoolFeeState,
} from '@ratiofee/shared';

/**
 * Input for activating a pool
 */
export interface InitializePoolInput {
  poolId: string;
  category: PoolCategory;
  /** Fee units; must lie within the category's [minFee, maxFee] */
  initialFee: number;
  /** WAD; must be positive and at most the category's maxCurrentRatio */
  initialTargetRatio: bigint;
}

/**
 * Behavior of a pool fee controller
 *
 * Implementations may be swapped as long as they read and write records of
 * the store layout they were built for.
 */
export interface FeeController {
  initialize(input: InitializePoolInput): PoolFeeState;
  previewUpdate(poolId: string, currentRatio: bigint): FeeUpdatePreview;
  commitUpdate(poolId: string, currentRatio: bigint): FeeUpdateResult;
  deactivate(poolId: string): void;

  setParams(category: PoolCategory, params: FeeParams): void;
  setAdjustmentRateCeiling(rate: bigint): void;

  getFee(poolId: string): number;
  getTargetRatio(poolId: string): bigint;
  getOobState(poolId: string): OobState;
  getPoolCategory(poolId: string): PoolCategory;
  getNextEligibleTimestamp(poolId: string): number;
  getPoolState(poolId: string): PoolFeeState | null;
  isActive(poolId: string): boolean;
  getParams(category: PoolCategory): FeeParams;
  getAdjustmentRateCeiling(): bigint;
}
