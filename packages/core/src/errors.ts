/**
 * Error classes raised by layouts and packs.
 *
 * Every error is thrown synchronously by the call that detected it.
 */

/**
 * Base error for all bit packing operations.
 */
export class BitPackError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BitPackError";
  }
}

/**
 * A layout declares a field width outside 1..64 bits, or its widths
 * add up to more than 64 bits.
 */
export class InvalidLayoutError extends BitPackError {
  readonly widths: readonly number[];

  constructor(widths: readonly number[], message?: string) {
    super(message ?? `Invalid layout: [${widths.join(", ")}]`);
    this.name = "InvalidLayoutError";
    this.widths = widths;
  }
}

/**
 * No storage class exists for the requested number of bits.
 */
export class UnsupportedWidthError extends BitPackError {
  readonly bits: number;

  constructor(bits: number) {
    super(`No storage type for ${bits} bits (supported: 1-64)`);
    this.name = "UnsupportedWidthError";
    this.bits = bits;
  }
}

/**
 * Field index outside `[0, fieldCount)`.
 */
export class IndexOutOfRangeError extends BitPackError {
  readonly index: number;
  readonly fieldCount: number;

  constructor(index: number, fieldCount: number) {
    super(`Field index ${index} out of range [0, ${fieldCount})`);
    this.name = "IndexOutOfRangeError";
    this.index = index;
    this.fieldCount = fieldCount;
  }
}

/**
 * A value does not fit into the bits of its field.
 */
export class FieldOverflowError extends BitPackError {
  readonly index: number;
  readonly width: number;
  readonly value: bigint | number;

  constructor(index: number, width: number, value: bigint | number) {
    super(`Value ${value} overflows the ${width}-bit field at index ${index}`);
    this.name = "FieldOverflowError";
    this.index = index;
    this.width = width;
    this.value = value;
  }
}

/**
 * A storage resolver returned a class narrower than the layout.
 *
 * Only a custom resolver can trigger this.
 */
export class StorageTooSmallError extends BitPackError {
  readonly storageBits: number;
  readonly totalBitWidth: number;

  constructor(storageBits: number, totalBitWidth: number) {
    super(`Storage of ${storageBits} bits cannot hold a ${totalBitWidth}-bit layout`);
    this.name = "StorageTooSmallError";
    this.storageBits = storageBits;
    this.totalBitWidth = totalBitWidth;
  }
}

/**
 * A raw storage word is negative, not an integer, or wider than its
 * storage class.
 */
export class RawValueOutOfRangeError extends BitPackError {
  readonly value: bigint | number;
  readonly storageBits: number;

  constructor(value: bigint | number, storageBits: number) {
    super(`Raw value ${value} does not fit a ${storageBits}-bit storage word`);
    this.name = "RawValueOutOfRangeError";
    this.value = value;
    this.storageBits = storageBits;
  }
}

/**
 * A field is too wide to be read back as a JavaScript number without
 * losing precision.
 */
export class UnsafeFieldWidthError extends BitPackError {
  readonly index: number;
  readonly width: number;

  constructor(index: number, width: number) {
    super(`Field ${index} is ${width} bits wide; use get() for fields wider than 53 bits`);
    this.name = "UnsafeFieldWidthError";
    this.index = index;
    this.width = width;
  }
}
