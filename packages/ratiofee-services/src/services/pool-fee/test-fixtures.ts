/**
 * Test fixtures for the pool fee controller
 */

import { WAD } from '@ratiofee/shared';
import type { FeeParams } from '@ratiofee/shared';
import { DEFAULT_CATEGORY_PARAMS } from '../../config/fee-controller.js';
import type { Clock } from '../../utils/clock.js';

export const MOCK_POOL_ID = 'pool-eth-usdc';
export const MOCK_OTHER_POOL_ID = 'pool-wbtc-usdc';
export const MOCK_START_TIME = 1_700_000_000;

/** 10% of the current fee per update */
export const MOCK_MAX_ADJUSTMENT_RATE = 10n ** 17n;

export const RATIO_ONE = WAD;
export const RATIO_1_2 = 1_200_000_000_000_000_000n;
export const RATIO_0_8 = 800_000_000_000_000_000n;

/** ema(1.2, 1.0, 30 days) */
export const SMOOTHED_TARGET_AFTER_RATIO_1_2 = 1_012_903_225_806_451_612n;

/**
 * Clock whose time only moves when a test says so
 */
export class ManualClock implements Clock {
  constructor(private current: number = MOCK_START_TIME) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): void {
    this.current += seconds;
  }
}

/**
 * Standard-category parameters with optional overrides
 */
export function createMockParams(overrides: Partial<FeeParams> = {}): FeeParams {
  return { ...DEFAULT_CATEGORY_PARAMS.standard, ...overrides };
}
