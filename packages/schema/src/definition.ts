/**
 * Layout definitions
 *
 * A definition names every field of a layout:
 *
 * ```json
 * {
 *   "preference": "small",
 *   "fields": [
 *     { "name": "version", "width": 4 },
 *     { "name": "flags", "width": 4 },
 *     { "name": "length", "width": 16 }
 *   ]
 * }
 * ```
 *
 * Definitions often come from configuration files, so they are validated
 * with zod before a layout is built from them.
 */

import { MAX_BIT_WIDTH, StoragePreference } from "@bitpack/core";
import { z } from "zod";
import { InvalidLayoutDefinitionError } from "./errors.js";

export const PreferenceNameSchema = z.enum(["fast", "small"]);

export type PreferenceName = z.infer<typeof PreferenceNameSchema>;

export const FieldDefinitionSchema = z.object({
  name: z.string().min(1).describe("Field name, unique within the layout"),
  width: z.number().int().min(1).max(MAX_BIT_WIDTH).describe("Field width in bits"),
});

export const LayoutDefinitionSchema = z
  .object({
    preference: PreferenceNameSchema.default("fast").describe("Storage preference"),
    fields: z.array(FieldDefinitionSchema).min(1).describe("Fields, least significant first"),
  })
  .superRefine((definition, ctx) => {
    const seen = new Set<string>();
    definition.fields.forEach((field, index) => {
      if (seen.has(field.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["fields", index, "name"],
          message: `Duplicate field name "${field.name}"`,
        });
      }
      seen.add(field.name);
    });

    const total = definition.fields.reduce((sum, field) => sum + field.width, 0);
    if (total > MAX_BIT_WIDTH) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fields"],
        message: `Fields need ${total} bits, at most ${MAX_BIT_WIDTH} are supported`,
      });
    }
  });

/** Definition after validation (preference filled in) */
export type LayoutDefinition = z.output<typeof LayoutDefinitionSchema>;

export interface FieldDefinition<Name extends string = string> {
  readonly name: Name;
  readonly width: number;
}

const PREFERENCES: Record<PreferenceName, StoragePreference> = {
  fast: StoragePreference.FAST,
  small: StoragePreference.SMALL,
};

export function toStoragePreference(name: PreferenceName): StoragePreference {
  return PREFERENCES[name];
}

/**
 * Validate a definition.
 *
 * @throws InvalidLayoutDefinitionError listing every problem found
 */
export function validateLayoutDefinition(input: unknown): LayoutDefinition {
  const result = LayoutDefinitionSchema.safeParse(input);
  if (!result.success) {
    throw new InvalidLayoutDefinitionError(result.error.issues);
  }
  return result.data;
}
