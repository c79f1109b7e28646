/**
 * Pool Fee Controller Service
 *
 * Owns the per-pool fee records and the per-category parameter sets, and
 * runs the dynamic fee engine behind a cooldown gate.
 *
 * Update lifecycle for an active pool:
 *
 *   eligibility check ──► dry-run computation ──► commit
 *   (active, cooldown)    (ratio checks, EMA,      (single put of the
 *                          fee decision)            whole record)
 *
 * previewUpdate stops after the dry run and never touches the store.
 * Callers serialize update attempts per pool; the service holds no locks.
 */

import {
  computeFeeAndTargetRatio,
  CooldownNotElapsedError,
  INITIAL_OOB_STATE,
  InvalidFeeError,
  InvalidRatioError,
  isCooldownElapsed,
  nextEligibleTimestamp,
  PoolAlreadyActiveError,
  PoolNotActiveError,
} from '@ratiofee/shared';
import type {
  FeeParams,
  FeeUpdatePreview,
  FeeUpdateResult,
  OobState,
  PoolCategory,
  PoolFeeState,
} from '@ratiofee/shared';
import {
  DEFAULT_CATEGORY_PARAMS,
  DEFAULT_GLOBAL_BOUNDS,
  getFeeControllerConfig,
} from '../../config/fee-controller.js';
import type { GlobalParamBounds } from '../../config/fee-controller.js';
import { createServiceLogger, log, toError } from '../../logging/index.js';
import type { ServiceLogger } from '../../logging/index.js';
import { systemClock } from '../../utils/clock.js';
import type { Clock } from '../../utils/clock.js';
import type { FeeController, InitializePoolInput } from '../types/pool-fee/index.js';
import { validateAdjustmentRate, validateFeeParams } from './param-validation.js';
import { InMemoryPoolFeeStateStore, STATE_LAYOUT_VERSION } from './pool-fee-state-store.js';
import type { PoolFeeStateStore } from './pool-fee-state-store.js';

/**
 * Dependencies for PoolFeeControllerService
 */
export interface PoolFeeControllerServiceDependencies {
  /**
   * Pool record arena
   * If not provided, an in-memory store is used
   */
  store?: PoolFeeStateStore;

  /**
   * Time source for cooldown checks
   * If not provided, the system clock is used
   */
  clock?: Clock;

  /**
   * Global sanity bounds enforced on parameter changes
   */
  bounds?: GlobalParamBounds;

  /**
   * Initial parameter set per category (validated against `bounds`)
   */
  categoryParams?: Record<PoolCategory, FeeParams>;

  /**
   * Initial adjustment-rate ceiling (WAD)
   * If not provided, read from FEE_CONTROLLER_MAX_ADJUSTMENT_RATE
   */
  maxAdjustmentRate?: bigint;

  /**
   * Logger override
   */
  logger?: ServiceLogger;
}

/**
 * Pool Fee Controller Service
 */
export class PoolFeeControllerService implements FeeController {
  private readonly store: PoolFeeStateStore;
  private readonly clock: Clock;
  private readonly bounds: GlobalParamBounds;
  private readonly logger: ServiceLogger;

  private categoryParams: Record<PoolCategory, FeeParams>;
  private maxAdjustmentRate: bigint;

  /**
   * Creates a new PoolFeeControllerService instance
   *
   * @param dependencies - Service dependencies
   * @throws Error if the store holds records of another layout version
   * @throws InvalidParameterError if the initial parameters violate the bounds
   */
  constructor(dependencies: PoolFeeControllerServiceDependencies = {}) {
    this.store = dependencies.store ?? new InMemoryPoolFeeStateStore();
    this.clock = dependencies.clock ?? systemClock;
    this.bounds = dependencies.bounds ?? DEFAULT_GLOBAL_BOUNDS;
    this.logger = dependencies.logger ?? createServiceLogger('PoolFeeControllerService');

    if (this.store.layoutVersion !== STATE_LAYOUT_VERSION) {
      throw new Error(
        `Unsupported pool fee state layout version ${this.store.layoutVersion} ` +
          `(expected ${STATE_LAYOUT_VERSION})`
      );
    }

    const initialParams = dependencies.categoryParams ?? DEFAULT_CATEGORY_PARAMS;
    this.categoryParams = {
      stable: validateFeeParams(initialParams.stable, this.bounds.categories.stable),
      standard: validateFeeParams(initialParams.standard, this.bounds.categories.standard),
      volatile: validateFeeParams(initialParams.volatile, this.bounds.categories.volatile),
    };

    this.maxAdjustmentRate = validateAdjustmentRate(
      dependencies.maxAdjustmentRate ?? getFeeControllerConfig().maxAdjustmentRate,
      this.bounds.maxAdjustmentRate
    );
  }

  // ============================================================================
  // LIFECYCLE
  // ============================================================================

  /**
   * Activates a pool with an initial fee and target ratio
   *
   * @param input - Pool identifier, category, initial fee and target ratio
   * @returns The stored record
   * @throws PoolAlreadyActiveError if the pool is already active
   * @throws InvalidFeeError if the fee is outside the category's fee bounds
   * @throws InvalidRatioError if the ratio is zero or above maxCurrentRatio
   *
   * @example
   * ```typescript
   * controller.initialize({
   *   poolId: 'pool-eth-usdc',
   *   category: 'standard',
   *   initialFee: 3_000,
   *   initialTargetRatio: 1_000_000_000_000_000_000n,
   * });
   * ```
   */
  initialize(input: InitializePoolInput): PoolFeeState {
    const { poolId, category, initialFee, initialTargetRatio } = input;
    log.methodEntry(this.logger, 'initialize', {
      poolId,
      category,
      initialFee,
      initialTargetRatio: initialTargetRatio.toString(),
    });

    try {
      if (this.store.get(poolId)?.isActive) {
        throw new PoolAlreadyActiveError(poolId);
      }

      const params = this.categoryParams[category];

      if (
        !Number.isInteger(initialFee) ||
        initialFee < params.minFee ||
        initialFee > params.maxFee
      ) {
        throw new InvalidFeeError(initialFee, params.minFee, params.maxFee);
      }
      if (initialTargetRatio <= 0n) {
        throw new InvalidRatioError(initialTargetRatio, 'initial target ratio must be positive');
      }
      if (initialTargetRatio > params.maxCurrentRatio) {
        throw new InvalidRatioError(
          initialTargetRatio,
          `initial target ratio exceeds maxCurrentRatio ${params.maxCurrentRatio.toString()}`
        );
      }

      const state: PoolFeeState = {
        poolId,
        category,
        currentFee: initialFee,
        currentTargetRatio: initialTargetRatio,
        oobState: { ...INITIAL_OOB_STATE },
        lastUpdateTimestamp: this.clock.now(),
        isActive: true,
      };
      this.store.put(state);

      this.logger.info(
        { poolId, category, fee: initialFee, targetRatio: initialTargetRatio.toString() },
        'Pool fee controller activated'
      );
      log.methodExit(this.logger, 'initialize', { poolId });
      return { ...state, oobState: { ...state.oobState } };
    } catch (error) {
      log.methodError(this.logger, 'initialize', toError(error), { poolId, category });
      throw error;
    }
  }

  /**
   * Deactivates a pool and drops its record
   *
   * @throws PoolNotActiveError if the pool is not active
   */
  deactivate(poolId: string): void {
    log.methodEntry(this.logger, 'deactivate', { poolId });

    try {
      this.requireActive(poolId);
      this.store.delete(poolId);

      this.logger.info({ poolId }, 'Pool fee controller deactivated');
      log.methodExit(this.logger, 'deactivate', { poolId });
    } catch (error) {
      log.methodError(this.logger, 'deactivate', toError(error), { poolId });
      throw error;
    }
  }

  // ============================================================================
  // FEE UPDATES
  // ============================================================================

  /**
   * Computes what a commit would produce now, without the cooldown check
   * and without touching stored state
   *
   * @param poolId - Pool identifier
   * @param currentRatio - Observed volume/liquidity ratio (WAD)
   * @throws PoolNotActiveError if the pool is not active
   * @throws InvalidRatioError if the ratio is zero, above maxCurrentRatio,
   * or would drive the smoothed target to zero
   */
  previewUpdate(poolId: string, currentRatio: bigint): FeeUpdatePreview {
    log.methodEntry(this.logger, 'previewUpdate', {
      poolId,
      currentRatio: currentRatio.toString(),
    });

    try {
      const state = this.requireActive(poolId);
      const preview = computeFeeAndTargetRatio(
        state,
        currentRatio,
        this.maxAdjustmentRate,
        this.categoryParams[state.category]
      );

      log.methodExit(this.logger, 'previewUpdate', {
        poolId,
        oldFee: preview.oldFee,
        newFee: preview.newFee,
      });
      return preview;
    } catch (error) {
      log.methodError(this.logger, 'previewUpdate', toError(error), {
        poolId,
        currentRatio: currentRatio.toString(),
      });
      throw error;
    }
  }

  /**
   * Runs a cooldown-gated update and commits the new fee, target ratio,
   * streak record and timestamp together
   *
   * Nothing is written when any check fails.
   *
   * @param poolId - Pool identifier
   * @param currentRatio - Observed volume/liquidity ratio (WAD)
   * @returns Old and new fee/target for the caller to propagate
   * @throws PoolNotActiveError if the pool is not active
   * @throws CooldownNotElapsedError if minPeriod has not passed since the last commit
   * @throws InvalidRatioError as {@link previewUpdate}
   */
  commitUpdate(poolId: string, currentRatio: bigint): FeeUpdateResult {
    log.methodEntry(this.logger, 'commitUpdate', {
      poolId,
      currentRatio: currentRatio.toString(),
    });

    try {
      const state = this.requireActive(poolId);
      const params = this.categoryParams[state.category];
      const now = this.clock.now();

      if (!isCooldownElapsed(now, state.lastUpdateTimestamp, params.minPeriod)) {
        const nextEligible = nextEligibleTimestamp(state.lastUpdateTimestamp, params.minPeriod);
        this.logger.warn(
          { poolId, now, nextEligibleTimestamp: nextEligible },
          'Fee update rejected: cooldown not elapsed'
        );
        throw new CooldownNotElapsedError(now, nextEligible);
      }

      const preview = computeFeeAndTargetRatio(
        state,
        currentRatio,
        this.maxAdjustmentRate,
        params
      );

      this.store.put({
        ...state,
        currentFee: preview.newFee,
        currentTargetRatio: preview.newTargetRatio,
        oobState: preview.newOobState,
        lastUpdateTimestamp: now,
      });

      this.logger.info(
        {
          poolId,
          oldFee: preview.oldFee,
          newFee: preview.newFee,
          oldTargetRatio: preview.oldTargetRatio.toString(),
          newTargetRatio: preview.newTargetRatio.toString(),
          consecutiveHits: preview.newOobState.consecutiveHits,
        },
        'Pool fee updated'
      );
      log.methodExit(this.logger, 'commitUpdate', { poolId, newFee: preview.newFee });

      return {
        newFee: preview.newFee,
        oldFee: preview.oldFee,
        oldTargetRatio: preview.oldTargetRatio,
        newTargetRatio: preview.newTargetRatio,
      };
    } catch (error) {
      if (!(error instanceof CooldownNotElapsedError)) {
        log.methodError(this.logger, 'commitUpdate', toError(error), {
          poolId,
          currentRatio: currentRatio.toString(),
        });
      }
      throw error;
    }
  }

  // ============================================================================
  // ADMINISTRATION
  // ============================================================================

  /**
   * Replaces a category's parameter set
   *
   * Takes effect for the next update of every pool in the category; stored
   * fees are not re-clamped until then.
   *
   * @throws InvalidParameterError if the parameters violate the category's bounds
   */
  setParams(category: PoolCategory, params: FeeParams): void {
    log.methodEntry(this.logger, 'setParams', { category });

    try {
      const validated = validateFeeParams(params, this.bounds.categories[category]);
      this.categoryParams = { ...this.categoryParams, [category]: validated };

      this.logger.info(
        { category, minFee: validated.minFee, maxFee: validated.maxFee },
        'Category parameters updated'
      );
      log.methodExit(this.logger, 'setParams', { category });
    } catch (error) {
      log.methodError(this.logger, 'setParams', toError(error), { category });
      throw error;
    }
  }

  /**
   * Replaces the global adjustment-rate ceiling
   *
   * @param rate - Maximum fee change per update as a fraction of the fee (WAD)
   * @throws InvalidParameterError if the rate is outside the global bounds
   */
  setAdjustmentRateCeiling(rate: bigint): void {
    log.methodEntry(this.logger, 'setAdjustmentRateCeiling', { rate: rate.toString() });

    try {
      this.maxAdjustmentRate = validateAdjustmentRate(rate, this.bounds.maxAdjustmentRate);

      this.logger.info({ rate: rate.toString() }, 'Adjustment-rate ceiling updated');
      log.methodExit(this.logger, 'setAdjustmentRateCeiling');
    } catch (error) {
      log.methodError(this.logger, 'setAdjustmentRateCeiling', toError(error), {
        rate: rate.toString(),
      });
      throw error;
    }
  }

  // ============================================================================
  // ACCESSORS
  // ============================================================================

  getFee(poolId: string): number {
    return this.requireActive(poolId).currentFee;
  }

  getTargetRatio(poolId: string): bigint {
    return this.requireActive(poolId).currentTargetRatio;
  }

  getOobState(poolId: string): OobState {
    return this.requireActive(poolId).oobState;
  }

  getPoolCategory(poolId: string): PoolCategory {
    return this.requireActive(poolId).category;
  }

  /**
   * Earliest timestamp at which commitUpdate will pass the cooldown gate
   */
  getNextEligibleTimestamp(poolId: string): number {
    const state = this.requireActive(poolId);
    return nextEligibleTimestamp(
      state.lastUpdateTimestamp,
      this.categoryParams[state.category].minPeriod
    );
  }

  /**
   * Full record of a pool, or null if the pool was never activated
   */
  getPoolState(poolId: string): PoolFeeState | null {
    return this.store.get(poolId) ?? null;
  }

  isActive(poolId: string): boolean {
    return this.store.get(poolId)?.isActive ?? false;
  }

  getParams(category: PoolCategory): FeeParams {
    return { ...this.categoryParams[category] };
  }

  getAdjustmentRateCeiling(): bigint {
    return this.maxAdjustmentRate;
  }

  // ============================================================================
  // HELPERS
  // ============================================================================

  private requireActive(poolId: string): PoolFeeState {
    const state = this.store.get(poolId);
    if (!state || !state.isActive) {
      throw new PoolNotActiveError(poolId);
    }
    return state;
  }
}
