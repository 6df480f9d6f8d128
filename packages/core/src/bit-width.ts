import { InvalidLayoutError } from "./errors.js";

/** Widest field (and widest layout) that can be stored */
export const MAX_BIT_WIDTH = 64;

/** Largest field width that `number` represents exactly */
export const MAX_SAFE_FIELD_WIDTH = 53;

type Enumerate<N extends number, Acc extends number[] = []> = Acc["length"] extends N
  ? Acc[number]
  : Enumerate<N, [...Acc, Acc["length"]]>;

/**
 * Every accepted field width as a literal type: `1 | 2 | ... | 64`.
 */
export type BitWidthLiteral = Exclude<Enumerate<65>, 0>;

/**
 * Check that a number is a usable field width.
 */
export function isValidWidth(width: number): boolean {
  return Number.isInteger(width) && width > 0 && width <= MAX_BIT_WIDTH;
}

/**
 * Marker for the width of one field.
 *
 * Layouts accept plain numbers too; the marker exists for code that wants
 * a width validated once and passed around as a value.
 */
export class BitWidth {
  readonly width: number;

  constructor(width: number) {
    if (!isValidWidth(width)) {
      throw new InvalidLayoutError([width], `Field width must be an integer in 1..${MAX_BIT_WIDTH}, got ${width}`);
    }
    this.width = width;
  }

  toString(): string {
    return `BitWidth(${this.width})`;
  }
}

/**
 * Create a validated field width marker.
 */
export function bitWidth(width: number): BitWidth {
  return new BitWidth(width);
}

export function isBitWidth(value: unknown): value is BitWidth {
  return value instanceof BitWidth;
}
