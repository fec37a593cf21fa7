/**
 * Integer helpers for pool math. Every division here truncates toward zero,
 * which is floor for the non-negative operands the engines pass in.
 */

/** Basis-point denominator: fees are expressed as numerator / 10000. */
export const BPS_DENOMINATOR = 10_000n;

/** Integer square root (floor) using Newton's method */
export function sqrt(n: bigint): bigint {
  if (n < 0n) throw new RangeError('Square root of negative number');
  if (n < 2n) return n;
  let x = n;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + n / x) / 2n;
  }
  return x;
}

export function min(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}
