/**
 * Mask helpers shared by layouts and packs
 */

/**
 * Unshifted mask with the low `width` bits set: `(1 << width) - 1`
 */
export function bitmask(width: number): bigint {
  return (1n << BigInt(width)) - 1n;
}

/**
 * Check that `value` uses no bits outside `mask`.
 *
 * Negative values always fail, their sign bits extend past any mask.
 */
export function fitsMask(value: bigint, mask: bigint): boolean {
  return (value & mask) === value;
}

/**
 * Convert a field or word value to bigint.
 *
 * @returns undefined when a number is not an integer
 */
export function toBigInt(value: bigint | number): bigint | undefined {
  if (typeof value === "bigint") return value;
  return Number.isInteger(value) ? BigInt(value) : undefined;
}
