import { StorageTooSmallError, UnsupportedWidthError } from "./errors.js";
import { resolveStorageType, type StoragePreference, type StorageType, type StorageTypeResolver } from "./storage-type.js";

const STORAGE_CLASSES: readonly number[] = [8, 16, 32, 64];

/**
 * Derived facts about a layout: how many bits it uses and where they live
 */
export interface LayoutTraits {
  readonly totalBitWidth: number;
  readonly storage: StorageType;
}

/**
 * Sum field widths
 *
 * @param widths Field widths
 * @param end Number of leading fields to include (default: all)
 */
export function sumWidths(widths: readonly number[], end = widths.length): number {
  let total = 0;
  for (let i = 0; i < end; i++) {
    total += widths[i];
  }
  return total;
}

/**
 * Check a resolver's answer against the number of bits it must hold
 *
 * @throws UnsupportedWidthError when the class does not exist
 * @throws StorageTooSmallError when the class is narrower than `bits`
 */
export function checkStorageType(storage: StorageType, bits: number): StorageType {
  if (!STORAGE_CLASSES.includes(storage.bits)) {
    throw new UnsupportedWidthError(storage.bits);
  }
  if (storage.bits < bits) {
    throw new StorageTooSmallError(storage.bits, bits);
  }
  return storage;
}

/**
 * Bind field widths to their storage representation.
 *
 * The resolver's answer goes through `checkStorageType`, which only a custom
 * resolver can fail.
 *
 * @throws UnsupportedWidthError when the resolver has no class for the total
 *   or answers with a class that does not exist
 * @throws StorageTooSmallError when the resolved class is narrower than the total
 */
export function resolveLayoutTraits(
  widths: readonly number[],
  preference: StoragePreference,
  resolver: StorageTypeResolver = resolveStorageType,
): LayoutTraits {
  const totalBitWidth = sumWidths(widths);
  const storage = checkStorageType(resolver(totalBitWidth, preference), totalBitWidth);
  return { totalBitWidth, storage };
}
