import { describe, it, expect } from 'vitest';
import { InvalidRatioError } from '../../errors/index.js';
import type { FeeParams } from '../../types/fee-params.js';
import { INITIAL_OOB_STATE } from '../../types/oob-state.js';
import { WAD, MAX_STREAK_MULTIPLIER } from './constants.js';
import {
  bindingDeltaCap,
  computeFeeAndTargetRatio,
  computeNewFee,
  streakDeltaCap,
} from './fees.js';

const PARAMS: FeeParams = {
  minFee: 100,
  maxFee: 10_000,
  baseMaxFeeDelta: 50,
  lookbackPeriod: 30,
  minPeriod: 3_600,
  ratioTolerance: 5n * 10n ** 16n, // 5%
  linearSlope: WAD,
  maxCurrentRatio: 1_000n * WAD,
  lowerSideFactor: WAD,
  upperSideFactor: WAD,
};

// 10% of the current fee per update
const MAX_ADJ_RATE = 10n ** 17n;

const RATIO_1_2 = 1_200_000_000_000_000_000n;
const RATIO_0_8 = 800_000_000_000_000_000n;

describe('Dynamic fee computation', () => {
  describe('streakDeltaCap', () => {
    it('should equal the base delta on the first hit', () => {
      expect(streakDeltaCap(50, 1)).toBe(50n);
    });

    it('should never decrease as the streak grows', () => {
      let last = streakDeltaCap(50, 1);
      for (let hits = 2; hits <= MAX_STREAK_MULTIPLIER + 5; hits++) {
        const next = streakDeltaCap(50, hits);
        expect(next >= last).toBe(true);
        last = next;
      }
    });

    it('should stop growing past the multiplier limit', () => {
      expect(streakDeltaCap(50, MAX_STREAK_MULTIPLIER)).toBe(500n);
      expect(streakDeltaCap(50, MAX_STREAK_MULTIPLIER + 20)).toBe(500n);
    });
  });

  describe('bindingDeltaCap', () => {
    it('should use the streak cap when the rate cap is looser', () => {
      // rate cap: 5000 * 10% = 500, plus allowance 10
      expect(bindingDeltaCap(5_000, MAX_ADJ_RATE, 50n)).toBe(50n);
    });

    it('should use the rate cap plus allowance when it is tighter', () => {
      // rate cap: 150 * 10% = 15, plus allowance 10
      expect(bindingDeltaCap(150, MAX_ADJ_RATE, 50n)).toBe(25n);
    });

    it('should never exceed the streak cap', () => {
      expect(bindingDeltaCap(0, 0n, 5n)).toBe(5n);
    });
  });

  describe('computeNewFee', () => {
    it('should keep the fee and reset the streak when the ratio sits on target', () => {
      const result = computeNewFee(5_000, WAD, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);

      expect(result).toEqual({
        newFee: 5_000,
        oobState: { lastSideWasUpper: false, consecutiveHits: 0 },
      });
    });

    it('should keep the last side when resetting an in-band streak', () => {
      const result = computeNewFee(5_000, WAD, WAD, MAX_ADJ_RATE, PARAMS, {
        lastSideWasUpper: true,
        consecutiveHits: 4,
      });

      expect(result.oobState).toEqual({ lastSideWasUpper: true, consecutiveHits: 0 });
    });

    it('should clamp an out-of-range fee even when in band', () => {
      const result = computeNewFee(20_000, WAD, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);
      expect(result.newFee).toBe(10_000);
    });

    it('should treat a zero target as in band', () => {
      const result = computeNewFee(5_000, RATIO_1_2, 0n, MAX_ADJ_RATE, PARAMS, {
        lastSideWasUpper: true,
        consecutiveHits: 2,
      });

      expect(result).toEqual({
        newFee: 5_000,
        oobState: { lastSideWasUpper: true, consecutiveHits: 0 },
      });
    });

    it('should raise the fee on a first hit above the band', () => {
      // excess 0.15, proposed ceil(5000 * 0.15) = 750, capped by the streak cap 50
      const result = computeNewFee(5_000, RATIO_1_2, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);

      expect(result.newFee).toBe(5_050);
      expect(result.newFee).toBeGreaterThanOrEqual(5_000);
      expect(result.oobState).toEqual({ lastSideWasUpper: true, consecutiveHits: 1 });
    });

    it('should amplify the cap when the same side repeats', () => {
      // streak 2 -> cap 100; rate cap 505 + 10 is looser
      const result = computeNewFee(5_050, RATIO_1_2, WAD, MAX_ADJ_RATE, PARAMS, {
        lastSideWasUpper: true,
        consecutiveHits: 1,
      });

      expect(result.newFee).toBe(5_150);
      expect(result.oobState).toEqual({ lastSideWasUpper: true, consecutiveHits: 2 });
    });

    it('should lower the fee below the band', () => {
      const result = computeNewFee(5_000, RATIO_0_8, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);

      expect(result.newFee).toBe(4_950);
      expect(result.oobState).toEqual({ lastSideWasUpper: false, consecutiveHits: 1 });
    });

    it('should reset amplification to the base rate on a side flip', () => {
      const result = computeNewFee(5_000, RATIO_0_8, WAD, MAX_ADJ_RATE, PARAMS, {
        lastSideWasUpper: true,
        consecutiveHits: 3,
      });

      expect(result.newFee).toBe(4_950);
      expect(result.oobState).toEqual({ lastSideWasUpper: false, consecutiveHits: 1 });
    });

    it('should count a lower hit after an in-band reset as a first hit', () => {
      const result = computeNewFee(5_000, RATIO_0_8, WAD, MAX_ADJ_RATE, PARAMS, {
        lastSideWasUpper: false,
        consecutiveHits: 0,
      });

      expect(result.oobState).toEqual({ lastSideWasUpper: false, consecutiveHits: 1 });
    });

    it('should keep a fee pinned at maxFee when pushed further up', () => {
      const result = computeNewFee(10_000, 2n * WAD, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);
      expect(result.newFee).toBe(10_000);
    });

    it('should keep a fee pinned at minFee when pushed further down', () => {
      // delta 20 (rate cap 10 + allowance 10) takes 100 to 80, clamped back to 100
      const result = computeNewFee(100, WAD / 2n, WAD, MAX_ADJ_RATE, PARAMS, INITIAL_OOB_STATE);
      expect(result.newFee).toBe(100);
    });

    it('should limit low fees to the rate cap plus allowance', () => {
      // slope 10 -> adjustment rate 1.5, proposed 225; cap = 15 + 10
      const params = { ...PARAMS, linearSlope: 10n * WAD };
      const result = computeNewFee(150, RATIO_1_2, WAD, MAX_ADJ_RATE, params, INITIAL_OOB_STATE);

      expect(result.newFee).toBe(175);
    });

    it('should apply the side-specific factors', () => {
      const params = {
        ...PARAMS,
        baseMaxFeeDelta: 10_000,
        upperSideFactor: 2n * WAD,
        lowerSideFactor: WAD / 2n,
      };

      const up = computeNewFee(5_000, RATIO_1_2, WAD, WAD, params, INITIAL_OOB_STATE);
      const down = computeNewFee(5_000, RATIO_0_8, WAD, WAD, params, INITIAL_OOB_STATE);

      // 750 * 2 and 750 * 0.5
      expect(up.newFee).toBe(6_500);
      expect(down.newFee).toBe(4_625);
    });

    it('should scale the capped delta by the side factor', () => {
      // volatile-style set: streak cap 250 binds, upper side doubled
      const params: FeeParams = {
        ...PARAMS,
        minFee: 500,
        maxFee: 50_000,
        baseMaxFeeDelta: 250,
        ratioTolerance: 10n ** 17n,
        linearSlope: 2n * WAD,
        upperSideFactor: 2n * WAD,
      };

      // excess 0.4, proposed 4000, capped to 250
      const up = computeNewFee(
        5_000,
        1_500_000_000_000_000_000n,
        WAD,
        MAX_ADJ_RATE,
        params,
        INITIAL_OOB_STATE
      );
      const down = computeNewFee(5_000, WAD / 2n, WAD, MAX_ADJ_RATE, params, INITIAL_OOB_STATE);

      expect(up.newFee).toBe(5_500);
      expect(down.newFee).toBe(4_750);
    });

    it('should let a side factor below one shrink a capped delta', () => {
      const params = { ...PARAMS, lowerSideFactor: WAD / 2n };

      // proposed 750, capped to 50, halved
      const down = computeNewFee(5_000, RATIO_0_8, WAD, MAX_ADJ_RATE, params, INITIAL_OOB_STATE);

      expect(down.newFee).toBe(4_975);
    });

    it('should classify the boundary as in band and one unit past it as out of band', () => {
      const onBoundary = computeNewFee(
        5_000,
        1_050_000_000_000_000_000n,
        WAD,
        MAX_ADJ_RATE,
        PARAMS,
        INITIAL_OOB_STATE
      );
      const pastBoundary = computeNewFee(
        5_000,
        1_050_000_000_000_000_001n,
        WAD,
        MAX_ADJ_RATE,
        PARAMS,
        INITIAL_OOB_STATE
      );

      expect(onBoundary).toEqual({
        newFee: 5_000,
        oobState: { lastSideWasUpper: false, consecutiveHits: 0 },
      });
      // excess of one unit still rounds the proposed delta up to one fee unit
      expect(pastBoundary).toEqual({
        newFee: 5_001,
        oobState: { lastSideWasUpper: true, consecutiveHits: 1 },
      });
    });

    it('should grow the streak strictly while the side repeats', () => {
      let oob = INITIAL_OOB_STATE;
      let fee = 5_000;
      for (let i = 1; i <= 6; i++) {
        const result = computeNewFee(fee, RATIO_1_2, WAD, MAX_ADJ_RATE, PARAMS, oob);
        expect(result.oobState.consecutiveHits).toBe(i);
        oob = result.oobState;
        fee = result.newFee;
      }
    });

    it('should always return a fee within bounds', () => {
      const fees = [0, 100, 2_500, 9_999, 10_000, 50_000];
      const ratios = [1n, WAD / 3n, WAD, RATIO_1_2, 40n * WAD];
      const streaks = [
        INITIAL_OOB_STATE,
        { lastSideWasUpper: true, consecutiveHits: 7 },
        { lastSideWasUpper: false, consecutiveHits: 30 },
      ];

      for (const fee of fees) {
        for (const ratio of ratios) {
          for (const oob of streaks) {
            const { newFee } = computeNewFee(fee, ratio, WAD, MAX_ADJ_RATE, PARAMS, oob);
            expect(newFee).toBeGreaterThanOrEqual(PARAMS.minFee);
            expect(newFee).toBeLessThanOrEqual(PARAMS.maxFee);
          }
        }
      }
    });
  });

  describe('computeFeeAndTargetRatio', () => {
    const state = {
      currentFee: 5_000,
      currentTargetRatio: WAD,
      oobState: INITIAL_OOB_STATE,
    };

    it('should smooth the target and decide the fee against the previous target', () => {
      const preview = computeFeeAndTargetRatio(state, RATIO_1_2, MAX_ADJ_RATE, PARAMS);

      expect(preview).toEqual({
        newFee: 5_050,
        oldFee: 5_000,
        oldTargetRatio: WAD,
        newTargetRatio: 1_012_903_225_806_451_612n,
        newOobState: { lastSideWasUpper: true, consecutiveHits: 1 },
      });
    });

    it('should reject a zero ratio', () => {
      expect(() => computeFeeAndTargetRatio(state, 0n, MAX_ADJ_RATE, PARAMS)).toThrow(
        InvalidRatioError
      );
    });

    it('should reject a ratio above maxCurrentRatio', () => {
      expect(() =>
        computeFeeAndTargetRatio(state, PARAMS.maxCurrentRatio + 1n, MAX_ADJ_RATE, PARAMS)
      ).toThrow(InvalidRatioError);
    });

    it('should accept a ratio equal to maxCurrentRatio', () => {
      const preview = computeFeeAndTargetRatio(
        state,
        PARAMS.maxCurrentRatio,
        MAX_ADJ_RATE,
        PARAMS
      );
      expect(preview.newFee).toBe(5_050);
    });

    it('should reject an update that would leave a zero target', () => {
      // alpha of a 365-day window is too small to lift a zero target off zero
      const params = { ...PARAMS, lookbackPeriod: 365 };
      const zeroTarget = { ...state, currentTargetRatio: 0n };

      expect(() => computeFeeAndTargetRatio(zeroTarget, 1n, MAX_ADJ_RATE, params)).toThrow(
        'smoothed target ratio would be zero'
      );
    });

    it('should not mutate the input state', () => {
      const input = { ...state, oobState: { ...state.oobState } };
      computeFeeAndTargetRatio(input, RATIO_1_2, MAX_ADJ_RATE, PARAMS);
      expect(input).toEqual(state);
    });
  });
});
