import { IndexOutOfRangeError, Layout, type LayoutOptions, StoragePreference } from "@bitpack/core";
import {
  type FieldDefinition,
  type PreferenceName,
  toStoragePreference,
  validateLayoutDefinition,
} from "./definition.js";
import { UnknownFieldError } from "./errors.js";

/**
 * Layout whose fields are addressed by name.
 *
 * Names map to positions in declaration order; the mapping never changes
 * after construction.
 *
 * @throws InvalidLayoutDefinitionError for empty, duplicate or oversized fields
 */
export class NamedLayout<Name extends string = string> {
  readonly layout: Layout;
  readonly names: readonly Name[];
  private readonly indexes: ReadonlyMap<string, number>;

  constructor(
    fields: readonly FieldDefinition<Name>[],
    preference: StoragePreference = StoragePreference.FAST,
    options?: LayoutOptions,
  ) {
    validateLayoutDefinition({ fields });
    this.layout = new Layout(
      fields.map((field) => field.width),
      preference,
      options,
    );
    this.names = Object.freeze(fields.map((field) => field.name));
    this.indexes = new Map(this.names.map((name, index): [string, number] => [name, index]));
  }

  get fieldCount(): number {
    return this.names.length;
  }

  has(name: string): name is Name {
    return this.indexes.has(name);
  }

  /**
   * Position of a field
   *
   * @throws UnknownFieldError
   */
  indexOf(name: Name): number {
    const index = this.indexes.get(name);
    if (index === undefined) {
      throw new UnknownFieldError(name);
    }
    return index;
  }

  /**
   * Name of the field at `index`
   *
   * @throws IndexOutOfRangeError
   */
  nameAt(index: number): Name {
    const name = Number.isInteger(index) ? this.names[index] : undefined;
    if (name === undefined) {
      throw new IndexOutOfRangeError(index, this.names.length);
    }
    return name;
  }

  widthOf(name: Name): number {
    return this.layout.widthAt(this.indexOf(name));
  }
}

export interface NamedLayoutDefinition<Name extends string> {
  readonly preference?: PreferenceName;
  readonly fields: readonly FieldDefinition<Name>[];
}

/**
 * Define a named layout in code. Field names become a literal union, so
 * accessors only accept declared names.
 *
 * @example
 * ```typescript
 * const header = defineNamedLayout({
 *   preference: "small",
 *   fields: [
 *     { name: "version", width: 4 },
 *     { name: "flags", width: 4 },
 *   ],
 * });
 * header.indexOf("flags"); // 1
 * ```
 *
 * @throws InvalidLayoutDefinitionError
 */
export function defineNamedLayout<Name extends string>(
  definition: NamedLayoutDefinition<Name>,
  options?: LayoutOptions,
): NamedLayout<Name> {
  const { preference } = validateLayoutDefinition(definition);
  return new NamedLayout(definition.fields, toStoragePreference(preference), options);
}

/**
 * Build a named layout from untrusted input, such as parsed JSON.
 *
 * @throws InvalidLayoutDefinitionError
 */
export function parseLayoutDefinition(input: unknown, options?: LayoutOptions): NamedLayout {
  const { preference, fields } = validateLayoutDefinition(input);
  return new NamedLayout(fields, toStoragePreference(preference), options);
}
