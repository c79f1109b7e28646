/**
 * BigInt arithmetic helpers
 *
 * Operands are treated as unsigned; callers never pass negative values.
 */

/**
 * Floor of (a * b) / denominator
 *
 * @throws RangeError if denominator is zero
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('mulDiv: division by zero');
  }
  return (a * b) / denominator;
}

/**
 * Ceiling of numerator / denominator
 *
 * @throws RangeError if denominator is zero
 */
export function ceilDiv(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new RangeError('ceilDiv: division by zero');
  }
  if (numerator === 0n) {
    return 0n;
  }
  return (numerator - 1n) / denominator + 1n;
}

/**
 * Smaller of two bigints
 */
export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
