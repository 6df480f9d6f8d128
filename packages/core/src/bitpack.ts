/**
 * Packed storage word with per-field access
 *
 * A BitPack owns one unsigned word whose bits are split into the fields of
 * its layout. Words and field values are bigints so that every storage
 * class, including 64 bits, is exact; setters also take integer numbers.
 *
 * @example
 * ```typescript
 * enum Packet { Header = 0, Content = 1 }
 *
 * const pack = new BitPack(smallLayout([8, 9]));
 * pack.set(Packet.Header, 1).set(Packet.Content, 8);
 * pack.get(Packet.Content); // 8n
 * pack.rawValue();          // 0x801n
 * ```
 */

import { MAX_SAFE_FIELD_WIDTH } from "./bit-width.js";
import { fitsMask, toBigInt } from "./bitmask.js";
import { FieldOverflowError, RawValueOutOfRangeError, UnsafeFieldWidthError } from "./errors.js";
import type { Layout } from "./layout.js";

export type FieldValue = bigint | number;

export class BitPack {
  readonly layout: Layout;
  private word: bigint;

  /**
   * @param layout Field layout of the word
   * @param raw Initial storage word; fields are not validated individually
   * @throws RawValueOutOfRangeError when `raw` does not fit the storage class
   */
  constructor(layout: Layout, raw: FieldValue = 0n) {
    this.layout = layout;
    this.word = checkRaw(raw, layout);
  }

  /**
   * Build a pack from per-field values, field 0 first. Fields without a
   * value stay 0.
   *
   * @throws IndexOutOfRangeError when there are more values than fields
   * @throws FieldOverflowError when a value does not fit its field
   */
  static fromFields(layout: Layout, values: readonly FieldValue[]): BitPack {
    const pack = new BitPack(layout);
    values.forEach((value, index) => pack.set(index, value));
    return pack;
  }

  /**
   * Value of the field at `index`
   *
   * @throws IndexOutOfRangeError
   */
  get(index: number): bigint {
    const field = this.layout.field(index);
    const shift = BigInt(field.shift);
    return (this.word & (field.mask << shift)) >> shift;
  }

  /**
   * Value of the field at `index` as a number
   *
   * @throws IndexOutOfRangeError
   * @throws UnsafeFieldWidthError for fields wider than 53 bits
   */
  getNumber(index: number): number {
    const width = this.layout.widthAt(index);
    if (width > MAX_SAFE_FIELD_WIDTH) {
      throw new UnsafeFieldWidthError(index, width);
    }
    return Number(this.get(index));
  }

  /**
   * Store `value` in the field at `index`. Other fields keep their bits.
   *
   * A value that needs more bits than the field has is rejected, never
   * truncated; the word is left untouched in that case.
   *
   * @throws IndexOutOfRangeError
   * @throws FieldOverflowError for negative, fractional or too large values
   */
  set(index: number, value: FieldValue): this {
    const field = this.layout.field(index);
    const v = toBigInt(value);
    if (v === undefined || !fitsMask(v, field.mask)) {
      throw new FieldOverflowError(index, field.width, value);
    }
    const shift = BigInt(field.shift);
    this.word = (this.word & ~(field.mask << shift)) | (v << shift);
    return this;
  }

  /** The whole storage word */
  rawValue(): bigint {
    return this.word;
  }

  /**
   * Replace the whole storage word.
   *
   * @throws RawValueOutOfRangeError
   */
  fromRaw(value: FieldValue): this {
    this.word = checkRaw(value, this.layout);
    return this;
  }

  /** Every field value, field 0 first */
  toArray(): bigint[] {
    const values: bigint[] = [];
    for (let i = 0; i < this.layout.fieldCount; i++) {
      values.push(this.get(i));
    }
    return values;
  }

  clone(): BitPack {
    return new BitPack(this.layout, this.word);
  }

  equals(other: BitPack): boolean {
    return this.word === other.word && this.layout.equals(other.layout);
  }

  toString(): string {
    const digits = Math.ceil(this.layout.storage.bits / 4);
    return `BitPack(0x${this.word.toString(16).padStart(digits, "0")})`;
  }
}

function checkRaw(raw: FieldValue, layout: Layout): bigint {
  const { storage } = layout;
  const value = toBigInt(raw);
  if (value === undefined || value < 0n || value > storage.max) {
    throw new RawValueOutOfRangeError(raw, storage.bits);
  }
  return value;
}
