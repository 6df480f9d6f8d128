import { BitPack, type FieldValue } from "@bitpack/core";
import { UnknownFieldError } from "./errors.js";
import type { NamedLayout } from "./named-layout.js";

/**
 * BitPack whose fields are addressed by name.
 */
export class NamedBitPack<Name extends string = string> {
  readonly namedLayout: NamedLayout<Name>;
  /** Positional view of the same storage word */
  readonly pack: BitPack;

  constructor(namedLayout: NamedLayout<Name>, raw: FieldValue = 0n) {
    this.namedLayout = namedLayout;
    this.pack = new BitPack(namedLayout.layout, raw);
  }

  /**
   * Build a pack from named values. Fields left out stay 0.
   *
   * @throws UnknownFieldError for names the layout does not declare
   * @throws FieldOverflowError
   */
  static from<Name extends string>(
    namedLayout: NamedLayout<Name>,
    values: Partial<Record<Name, FieldValue>>,
  ): NamedBitPack<Name> {
    for (const key of Object.keys(values)) {
      if (!namedLayout.has(key)) {
        throw new UnknownFieldError(key);
      }
    }
    const result = new NamedBitPack(namedLayout);
    for (const name of namedLayout.names) {
      const value = Object.hasOwn(values, name) ? values[name] : undefined;
      if (value !== undefined) {
        result.set(name, value);
      }
    }
    return result;
  }

  get(name: Name): bigint {
    return this.pack.get(this.namedLayout.indexOf(name));
  }

  getNumber(name: Name): number {
    return this.pack.getNumber(this.namedLayout.indexOf(name));
  }

  set(name: Name, value: FieldValue): this {
    this.pack.set(this.namedLayout.indexOf(name), value);
    return this;
  }

  rawValue(): bigint {
    return this.pack.rawValue();
  }

  fromRaw(value: FieldValue): this {
    this.pack.fromRaw(value);
    return this;
  }

  /** Name and value of every field, in declaration order */
  entries(): [Name, bigint][] {
    return this.namedLayout.names.map((name, index): [Name, bigint] => [name, this.pack.get(index)]);
  }

  toObject(): Record<Name, bigint> {
    return fromEntries(this.entries());
  }
}

/** `Object.fromEntries` keeping the key type of its entries */
function fromEntries<K extends string, V>(entries: readonly (readonly [K, V])[]): Record<K, V>;
function fromEntries<V>(entries: readonly (readonly [string, V])[]): Record<string, V> {
  return Object.fromEntries(entries);
}
