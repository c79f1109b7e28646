/**
 * Fee Controller Errors
 *
 * Every failure of the fee engine is signaled through one of these
 * classes; none is ever coerced into a default value.
 */

/**
 * Machine-readable error codes
 */
export type FeeControllerErrorCode =
  | 'INVALID_FEE'
  | 'INVALID_RATIO'
  | 'INVALID_PARAMETER'
  | 'COOLDOWN_NOT_ELAPSED'
  | 'NOT_ACTIVE'
  | 'ALREADY_ACTIVE';

/**
 * Base class for all fee controller errors
 */
export class FeeControllerError extends Error {
  constructor(
    public readonly code: FeeControllerErrorCode,
    message: string
  ) {
    super(message);
    this.name = 'FeeControllerError';
  }
}

/**
 * Error thrown when a supplied fee lies outside [minFee, maxFee]
 */
export class InvalidFeeError extends FeeControllerError {
  constructor(
    public readonly fee: number,
    public readonly minFee: number,
    public readonly maxFee: number
  ) {
    super('INVALID_FEE', `Fee ${fee} is outside the allowed range [${minFee}, ${maxFee}]`);
    this.name = 'InvalidFeeError';
  }
}

/**
 * Error thrown when a ratio is zero, implausibly large, or would drive
 * the smoothed target to zero
 */
export class InvalidRatioError extends FeeControllerError {
  constructor(
    public readonly ratio: bigint,
    public readonly reason: string
  ) {
    super('INVALID_RATIO', `Invalid ratio ${ratio.toString()}: ${reason}`);
    this.name = 'InvalidRatioError';
  }
}

/**
 * Error thrown when a tunable parameter violates its sanity range
 */
export class InvalidParameterError extends FeeControllerError {
  constructor(public readonly issues: readonly string[]) {
    super('INVALID_PARAMETER', `Invalid parameter: ${issues.join('; ')}`);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Error thrown when a commit is attempted before the cooldown elapsed
 */
export class CooldownNotElapsedError extends FeeControllerError {
  constructor(
    public readonly now: number,
    public readonly nextEligibleTimestamp: number
  ) {
    super(
      'COOLDOWN_NOT_ELAPSED',
      `Cooldown not elapsed: now ${now}, next update eligible at ${nextEligibleTimestamp}`
    );
    this.name = 'CooldownNotElapsedError';
  }
}

/**
 * Error thrown when a pool has not been initialized (or was deactivated)
 */
export class PoolNotActiveError extends FeeControllerError {
  constructor(public readonly poolId: string) {
    super('NOT_ACTIVE', `Pool ${poolId} is not active`);
    this.name = 'PoolNotActiveError';
  }
}

/**
 * Error thrown when initializing a pool that is already active
 */
export class PoolAlreadyActiveError extends FeeControllerError {
  constructor(public readonly poolId: string) {
    super('ALREADY_ACTIVE', `Pool ${poolId} is already active`);
    this.name = 'PoolAlreadyActiveError';
  }
}
