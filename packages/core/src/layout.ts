/**
 * Field layouts
 *
 * A layout is an ordered list of field widths plus a storage preference.
 * Field 0 occupies the least significant bits, every following field sits
 * directly above its predecessor:
 *
 * ```
 *   widths [4, 3, 5]
 *
 *   bit 11      7   5   3       0
 *       | field 2 | f1  | field 0 |
 * ```
 *
 * Everything derived from the widths (total width, storage type, shifts and
 * masks) is computed once in the constructor.
 */

import { type BitWidth, type BitWidthLiteral, isValidWidth, MAX_BIT_WIDTH } from "./bit-width.js";
import { bitmask } from "./bitmask.js";
import { IndexOutOfRangeError, InvalidLayoutError } from "./errors.js";
import { checkStorageType, resolveLayoutTraits, sumWidths } from "./layout-traits.js";
import {
  resolveStorageType,
  StoragePreference,
  type StorageType,
  type StorageTypeResolver,
} from "./storage-type.js";

/**
 * Position of one field inside the storage word
 */
export interface FieldDescriptor {
  readonly index: number;
  readonly width: number;
  /** Sum of the widths of all preceding fields */
  readonly shift: number;
  /** Unshifted mask, `(1 << width) - 1` */
  readonly mask: bigint;
}

export interface LayoutOptions {
  /** Replaces the default storage resolver */
  resolver?: StorageTypeResolver;
}

export class Layout {
  readonly fieldSizes: readonly number[];
  readonly preference: StoragePreference;
  readonly totalBitWidth: number;
  readonly storage: StorageType;
  private readonly fields: readonly FieldDescriptor[];
  private readonly resolver: StorageTypeResolver;

  /**
   * @param widths Field widths, least significant field first
   * @param preference Storage preference (default: FAST)
   * @throws InvalidLayoutError for widths outside 1..64 or a total above 64 bits
   * @throws UnsupportedWidthError for a layout without fields
   */
  constructor(
    widths: readonly (number | BitWidth)[],
    preference: StoragePreference = StoragePreference.FAST,
    options: LayoutOptions = {},
  ) {
    const sizes = widths.map((w) => (typeof w === "number" ? w : w.width));
    for (const size of sizes) {
      if (!isValidWidth(size)) {
        throw new InvalidLayoutError(sizes, `Field width must be an integer in 1..${MAX_BIT_WIDTH}, got ${size}`);
      }
    }
    const total = sumWidths(sizes);
    if (total > MAX_BIT_WIDTH) {
      throw new InvalidLayoutError(sizes, `Layout needs ${total} bits, at most ${MAX_BIT_WIDTH} are supported`);
    }

    this.resolver = options.resolver ?? resolveStorageType;
    const traits = resolveLayoutTraits(sizes, preference, this.resolver);

    this.fieldSizes = Object.freeze(sizes);
    this.preference = preference;
    this.totalBitWidth = traits.totalBitWidth;
    this.storage = traits.storage;
    this.fields = Object.freeze(
      sizes.map((width, index) =>
        Object.freeze({ index, width, shift: sumWidths(sizes, index), mask: bitmask(width) }),
      ),
    );
  }

  get fieldCount(): number {
    return this.fields.length;
  }

  /**
   * Descriptor of the field at `index`
   *
   * @throws IndexOutOfRangeError
   */
  field(index: number): FieldDescriptor {
    const field = Number.isInteger(index) ? this.fields[index] : undefined;
    if (field === undefined) {
      throw new IndexOutOfRangeError(index, this.fields.length);
    }
    return field;
  }

  widthAt(index: number): number {
    return this.field(index).width;
  }

  shiftAt(index: number): number {
    return this.field(index).shift;
  }

  maskAt(index: number): bigint {
    return this.field(index).mask;
  }

  /**
   * Storage class able to hold the value of the field at `index` on its own,
   * resolved with this layout's preference and resolver.
   */
  fieldStorageAt(index: number): StorageType {
    const width = this.widthAt(index);
    return checkStorageType(this.resolver(width, this.preference), width);
  }

  equals(other: Layout): boolean {
    if (this === other) return true;
    return (
      this.preference === other.preference &&
      this.storage.bits === other.storage.bits &&
      this.fieldSizes.length === other.fieldSizes.length &&
      this.fieldSizes.every((width, i) => width === other.fieldSizes[i])
    );
  }

  toString(): string {
    return `Layout(${this.preference}, [${this.fieldSizes.join(", ")}] -> ${this.storage.name})`;
  }
}

type BuildTuple<N extends number, Acc extends unknown[] = []> = Acc["length"] extends N
  ? Acc
  : BuildTuple<N, [...Acc, unknown]>;

type LiteralSum<W extends readonly number[], Acc extends unknown[] = []> = W extends readonly [
  infer Head extends BitWidthLiteral,
  ...infer Rest extends readonly number[],
]
  ? LiteralSum<Rest, [...Acc, ...BuildTuple<Head>]>
  : Acc["length"];

type AtMost64 = BitWidthLiteral | 0;

/**
 * Compile-time check of literal widths.
 *
 * Resolves to `unknown` when the widths are acceptable or not known
 * statically, and to an error message otherwise, which makes
 * `createLayout([40, 40])` fail to type-check.
 */
export type LayoutWidthCheck<W extends readonly number[]> = number extends W["length"]
  ? unknown
  : number extends W[number]
    ? unknown
    : W extends readonly []
      ? "layout must declare at least one field"
      : W extends readonly BitWidthLiteral[]
        ? LiteralSum<W> extends AtMost64
          ? unknown
          : "layout fields add up to more than 64 bits"
        : "field widths must be integers between 1 and 64";

/**
 * Create a layout, rejecting invalid literal widths at compile time.
 *
 * @example
 * ```typescript
 * const header = createLayout([4, 4, 8], StoragePreference.SMALL);
 * header.storage.name; // "uint_least16"
 * ```
 */
export function createLayout<const W extends readonly number[]>(
  widths: W & LayoutWidthCheck<W>,
  preference: StoragePreference = StoragePreference.FAST,
  options?: LayoutOptions,
): Layout {
  return new Layout(widths, preference, options);
}

/**
 * Layout that favors access speed
 */
export function fastLayout<const W extends readonly number[]>(
  widths: W & LayoutWidthCheck<W>,
  options?: LayoutOptions,
): Layout {
  return new Layout(widths, StoragePreference.FAST, options);
}

/**
 * Layout that favors a small footprint
 */
export function smallLayout<const W extends readonly number[]>(
  widths: W & LayoutWidthCheck<W>,
  options?: LayoutOptions,
): Layout {
  return new Layout(widths, StoragePreference.SMALL, options);
}
