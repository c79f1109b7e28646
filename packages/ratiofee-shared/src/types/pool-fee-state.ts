/**
 * Pool fee state types
 */

import type { PoolCategory } from './fee-params.js';
import type { OobState } from './oob-state.js';

/**
 * Persisted per-pool fee record
 *
 * Mutated only by a committed update; the record is replaced wholesale,
 * never patched field by field.
 */
export interface PoolFeeState {
  /** Pool identifier the record belongs to */
  poolId: string;

  /** Category whose parameter set governs this pool */
  category: PoolCategory;

  /** Fee currently charged (fee units) */
  currentFee: number;

  /** Smoothed volume/liquidity target ratio (WAD) */
  currentTargetRatio: bigint;

  /** Out-of-bounds streak record */
  oobState: OobState;

  /** Timestamp of the last committed update (seconds) */
  lastUpdateTimestamp: number;

  /** Activation flag */
  isActive: boolean;
}

/**
 * Outcome of a dry-run fee computation
 */
export interface FeeUpdatePreview {
  newFee: number;
  oldFee: number;
  oldTargetRatio: bigint;
  newTargetRatio: bigint;
  newOobState: OobState;
}

/**
 * Outcome of a committed fee update
 */
export interface FeeUpdateResult {
  newFee: number;
  oldFee: number;
  oldTargetRatio: bigint;
  newTargetRatio: bigint;
}
