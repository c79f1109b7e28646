/**
 * Parameter validation
 *
 * Parameter sets and the adjustment-rate ceiling are checked against the
 * global bounds with zod before the controller accepts them.
 */

import { z } from 'zod';
import { InvalidParameterError } from '@ratiofee/shared';
import type { FeeParams } from '@ratiofee/shared';
import type { FeeParamBounds, Range } from '../../config/fee-controller.js';

function intInRange(range: Range<number>) {
  return z.number().int().min(range.min).max(range.max);
}

function bigintInRange(range: Range<bigint>) {
  return z.bigint().min(range.min).max(range.max);
}

/**
 * Build the zod schema for one category's parameter set
 */
export function createFeeParamsSchema(bounds: FeeParamBounds) {
  return z
    .object({
      minFee: intInRange(bounds.fee),
      maxFee: intInRange(bounds.fee),
      baseMaxFeeDelta: intInRange(bounds.baseMaxFeeDelta),
      lookbackPeriod: intInRange(bounds.lookbackPeriod),
      minPeriod: intInRange(bounds.minPeriod),
      ratioTolerance: bigintInRange(bounds.ratioTolerance),
      linearSlope: bigintInRange(bounds.linearSlope),
      maxCurrentRatio: bigintInRange(bounds.maxCurrentRatio),
      lowerSideFactor: bigintInRange(bounds.sideFactor),
      upperSideFactor: bigintInRange(bounds.sideFactor),
    })
    .refine((params) => params.minFee <= params.maxFee, {
      message: 'minFee must not exceed maxFee',
      path: ['minFee'],
    });
}

/**
 * Format zod issues as "path: message"
 */
function toIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a parameter set against a category's bounds
 *
 * @returns A fresh copy of the validated parameters
 * @throws InvalidParameterError listing every violated field
 */
export function validateFeeParams(params: FeeParams, bounds: FeeParamBounds): FeeParams {
  const result = createFeeParamsSchema(bounds).safeParse(params);
  if (!result.success) {
    throw new InvalidParameterError(toIssues(result.error));
  }
  return result.data;
}

/**
 * Validate an adjustment-rate ceiling
 *
 * @throws InvalidParameterError if the rate is outside the allowed range
 */
export function validateAdjustmentRate(rate: bigint, range: Range<bigint>): bigint {
  const result = bigintInRange(range).safeParse(rate);
  if (!result.success) {
    throw new InvalidParameterError(
      toIssues(result.error).map((issue) => `maxAdjustmentRate: ${issue}`)
    );
  }
  return result.data;
}
