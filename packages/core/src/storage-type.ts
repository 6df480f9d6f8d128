/**
 * Storage type resolution
 *
 * Maps the number of bits a layout needs onto the narrowest unsigned
 * integer class that holds them:
 *
 *   1..8   -> 8
 *   9..16  -> 16
 *   17..32 -> 32
 *   33..64 -> 64
 *
 * The preference distinguishes a "fast" from a "least" type of the same
 * class. JavaScript has a single representation per class, so both kinds
 * share the width and the typed array; only `kind` and `name` differ.
 */

import { UnsupportedWidthError } from "./errors.js";

/**
 * Whether a layout favors access speed or a minimal footprint
 */
export enum StoragePreference {
  /** Fastest type with at least N bits */
  FAST = "fast",
  /** Smallest type with at least N bits */
  SMALL = "small",
}

/** Width classes a storage word can have */
export type StorageBits = 8 | 16 | 32 | 64;

export type StorageKind = "fast" | "least";

export type StorageArrayConstructor =
  | Uint8ArrayConstructor
  | Uint16ArrayConstructor
  | Uint32ArrayConstructor
  | BigUint64ArrayConstructor;

/**
 * Resolved storage representation of a layout
 */
export interface StorageType {
  /** Width class in bits */
  readonly bits: StorageBits;
  /** "fast" for StoragePreference.FAST, "least" for SMALL */
  readonly kind: StorageKind;
  /** Conventional type name, e.g. `uint_least16` */
  readonly name: `uint_${StorageKind}${StorageBits}`;
  /** Typed array whose elements have this width, for external codecs */
  readonly arrayType: StorageArrayConstructor;
  /** Largest value a word of this class holds */
  readonly max: bigint;
}

/**
 * Signature of a storage resolver. A custom one can be handed to a layout
 * in place of `resolveStorageType`.
 */
export type StorageTypeResolver = (totalBitWidth: number, preference: StoragePreference) => StorageType;

function storageType(bits: StorageBits, kind: StorageKind, arrayType: StorageArrayConstructor): StorageType {
  return Object.freeze({
    bits,
    kind,
    name: `uint_${kind}${bits}` as const,
    arrayType,
    max: (1n << BigInt(bits)) - 1n,
  });
}

const FAST_TYPES: readonly StorageType[] = [
  storageType(8, "fast", Uint8Array),
  storageType(16, "fast", Uint16Array),
  storageType(32, "fast", Uint32Array),
  storageType(64, "fast", BigUint64Array),
];

const LEAST_TYPES: readonly StorageType[] = [
  storageType(8, "least", Uint8Array),
  storageType(16, "least", Uint16Array),
  storageType(32, "least", Uint32Array),
  storageType(64, "least", BigUint64Array),
];

/**
 * Pick the storage class for `totalBitWidth` bits.
 *
 * @throws UnsupportedWidthError for 0, negative, fractional or > 64 bits
 */
export function resolveStorageType(
  totalBitWidth: number,
  preference: StoragePreference = StoragePreference.FAST,
): StorageType {
  if (!Number.isInteger(totalBitWidth) || totalBitWidth < 1) {
    throw new UnsupportedWidthError(totalBitWidth);
  }
  const table = preference === StoragePreference.SMALL ? LEAST_TYPES : FAST_TYPES;
  for (const type of table) {
    if (totalBitWidth <= type.bits) {
      return type;
    }
  }
  throw new UnsupportedWidthError(totalBitWidth);
}

