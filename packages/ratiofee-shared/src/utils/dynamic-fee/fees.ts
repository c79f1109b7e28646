/**
 * Dynamic Fee Computation
 *
 * Turns a volume/liquidity ratio observation into the fee a pool should
 * charge until the next observation. The fee moves only while the ratio
 * stays outside the tolerance band around the target; consecutive hits on
 * the same side widen the per-update cap, a side flip resets it.
 */

import { InvalidRatioError } from '../../errors/index.js';
import type { FeeParams } from '../../types/fee-params.js';
import type { OobState } from '../../types/oob-state.js';
import type { FeeUpdatePreview } from '../../types/pool-fee-state.js';
import { ceilDiv, minBigInt, mulDiv } from '../math.js';
import { clampFee, toleranceBand, withinBounds } from './bounds.js';
import {
  MAX_CONSECUTIVE_HITS,
  MAX_STREAK_MULTIPLIER,
  RATE_CAP_ALLOWANCE,
  WAD,
} from './constants.js';
import { ema } from './ema.js';

/**
 * Result of a single fee decision
 */
export interface NewFeeResult {
  newFee: number;
  oobState: OobState;
}

/**
 * Fee-relevant slice of a pool's persisted state
 */
export interface FeeComputationState {
  currentFee: number;
  currentTargetRatio: bigint;
  oobState: OobState;
}

/**
 * Per-update delta cap for a streak length
 *
 * Grows linearly with the streak up to MAX_STREAK_MULTIPLIER hits, then
 * stays flat.
 */
export function streakDeltaCap(baseMaxFeeDelta: number, consecutiveHits: number): bigint {
  const multiplier = Math.min(Math.max(consecutiveHits, 1), MAX_STREAK_MULTIPLIER);
  return BigInt(baseMaxFeeDelta) * BigInt(multiplier);
}

/**
 * Binding delta cap: the streak cap, unless the adjustment-rate ceiling
 * (plus RATE_CAP_ALLOWANCE) is tighter
 *
 * @param currentFee - Fee in force (fee units)
 * @param maxAdjRate - Adjustment-rate ceiling as a fraction of the fee (WAD)
 * @param streakCap - Result of {@link streakDeltaCap}
 */
export function bindingDeltaCap(currentFee: number, maxAdjRate: bigint, streakCap: bigint): bigint {
  const rateCap = mulDiv(BigInt(currentFee), maxAdjRate, WAD);
  return minBigInt(streakCap, minBigInt(streakCap, rateCap) + RATE_CAP_ALLOWANCE);
}

/**
 * Advances the out-of-bounds streak for an out-of-band observation
 */
function nextOobState(oobIn: OobState, isUpper: boolean): OobState {
  if (oobIn.consecutiveHits === 0 || oobIn.lastSideWasUpper !== isUpper) {
    return { lastSideWasUpper: isUpper, consecutiveHits: 1 };
  }
  return {
    lastSideWasUpper: isUpper,
    consecutiveHits: Math.min(oobIn.consecutiveHits + 1, MAX_CONSECUTIVE_HITS),
  };
}

/**
 * Computes the fee for the next period and the updated streak record
 *
 * Steps:
 * 1. In band (or zero target): keep the fee, reset the streak.
 * 2. Advance or reset the streak depending on the side.
 * 3. Adjustment rate = (distance past the crossed band edge / target) · linearSlope.
 * 4. Proposed delta = fee · adjustment rate (rounded up), capped by
 *    {@link bindingDeltaCap}.
 * 5. Scale the capped delta by the side factor, apply it and clamp.
 *
 * @param currentFee - Fee in force (fee units)
 * @param currentRatio - Observed ratio (WAD)
 * @param targetRatio - Target ratio in force when the observation was taken (WAD)
 * @param maxAdjRate - Adjustment-rate ceiling (WAD)
 * @param params - Tunable parameter set
 * @param oobIn - Streak record before this observation
 *
 * @example
 * computeNewFee(5000, 1_200_000_000_000_000_000n, 1_000_000_000_000_000_000n, maxAdjRate, params, INITIAL_OOB_STATE);
 * // Returns: { newFee: 5050, oobState: { lastSideWasUpper: true, consecutiveHits: 1 } }
 * // with baseMaxFeeDelta = 50
 */
export function computeNewFee(
  currentFee: number,
  currentRatio: bigint,
  targetRatio: bigint,
  maxAdjRate: bigint,
  params: FeeParams,
  oobIn: OobState
): NewFeeResult {
  const { isUpper, inBand } = withinBounds(targetRatio, params.ratioTolerance, currentRatio);

  if (targetRatio === 0n || inBand) {
    return {
      newFee: clampFee(BigInt(currentFee), params.minFee, params.maxFee),
      oobState: { lastSideWasUpper: oobIn.lastSideWasUpper, consecutiveHits: 0 },
    };
  }

  const oobState = nextOobState(oobIn, isUpper);

  const { lowerBound, upperBound } = toleranceBand(targetRatio, params.ratioTolerance);
  const excess = isUpper ? currentRatio - upperBound : lowerBound - currentRatio;
  const adjustmentRate = mulDiv(excess, params.linearSlope, targetRatio);

  const feeBasis = BigInt(Math.max(currentFee, 1));
  const proposedDelta = ceilDiv(feeBasis * adjustmentRate, WAD);

  const cap = bindingDeltaCap(
    currentFee,
    maxAdjRate,
    streakDeltaCap(params.baseMaxFeeDelta, oobState.consecutiveHits)
  );
  const cappedDelta = minBigInt(proposedDelta, cap);

  const sideFactor = isUpper ? params.upperSideFactor : params.lowerSideFactor;
  const delta = mulDiv(cappedDelta, sideFactor, WAD);

  const fee = BigInt(currentFee);
  const newFee = clampFee(isUpper ? fee + delta : fee - delta, params.minFee, params.maxFee);

  return { newFee, oobState };
}

/**
 * Dry-run of a full update: validates the observation, smooths the target
 * and decides the new fee
 *
 * The fee decision is taken against the target in force before this
 * observation; the smoothed target becomes the reference for the next one.
 *
 * @throws InvalidRatioError if the ratio is zero, above maxCurrentRatio,
 * or the smoothed target would be zero
 */
export function computeFeeAndTargetRatio(
  state: FeeComputationState,
  currentRatio: bigint,
  maxAdjRate: bigint,
  params: FeeParams
): FeeUpdatePreview {
  if (currentRatio <= 0n) {
    throw new InvalidRatioError(currentRatio, 'ratio must be positive');
  }
  if (currentRatio > params.maxCurrentRatio) {
    throw new InvalidRatioError(
      currentRatio,
      `ratio exceeds maxCurrentRatio ${params.maxCurrentRatio.toString()}`
    );
  }

  const newTargetRatio = ema(currentRatio, state.currentTargetRatio, params.lookbackPeriod);
  if (newTargetRatio === 0n) {
    throw new InvalidRatioError(currentRatio, 'smoothed target ratio would be zero');
  }

  const { newFee, oobState } = computeNewFee(
    state.currentFee,
    currentRatio,
    state.currentTargetRatio,
    maxAdjRate,
    params,
    state.oobState
  );

  return {
    newFee,
    oldFee: state.currentFee,
    oldTargetRatio: state.currentTargetRatio,
    newTargetRatio,
    newOobState: oobState,
  };
}
