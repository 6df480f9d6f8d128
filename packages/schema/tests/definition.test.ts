import { StoragePreference } from "@bitpack/core";
import { describe, expect, it } from "vitest";
import { toStoragePreference, validateLayoutDefinition } from "../src/definition.js";
import { InvalidLayoutDefinitionError } from "../src/errors.js";

function issuesOf(input: unknown): InvalidLayoutDefinitionError["issues"] {
  try {
    validateLayoutDefinition(input);
  } catch (error) {
    if (error instanceof InvalidLayoutDefinitionError) {
      return error.issues;
    }
    throw error;
  }
  throw new Error("definition was accepted");
}

describe("validateLayoutDefinition", () => {
  it("accepts a definition and fills in the preference", () => {
    const definition = validateLayoutDefinition({ fields: [{ name: "a", width: 4 }] });
    expect(definition).toEqual({ preference: "fast", fields: [{ name: "a", width: 4 }] });
  });

  it("keeps an explicit preference", () => {
    const definition = validateLayoutDefinition({ preference: "small", fields: [{ name: "a", width: 64 }] });
    expect(definition.preference).toBe("small");
  });

  it("rejects widths outside 1..64", () => {
    expect(issuesOf({ fields: [{ name: "a", width: 0 }] })[0].path).toEqual(["fields", 0, "width"]);
    expect(issuesOf({ fields: [{ name: "a", width: 4 }, { name: "b", width: 65 }] })[0].path).toEqual([
      "fields",
      1,
      "width",
    ]);
    expect(issuesOf({ fields: [{ name: "a", width: 2.5 }] })[0].path).toEqual(["fields", 0, "width"]);
  });

  it("rejects empty names", () => {
    expect(issuesOf({ fields: [{ name: "", width: 1 }] })[0].path).toEqual(["fields", 0, "name"]);
  });

  it("rejects duplicate names", () => {
    const issues = issuesOf({
      fields: [
        { name: "a", width: 1 },
        { name: "a", width: 2 },
      ],
    });
    expect(issues).toHaveLength(1);
    expect(issues[0].path).toEqual(["fields", 1, "name"]);
    expect(issues[0].message).toBe('Duplicate field name "a"');
  });

  it("rejects fields wider than 64 bits in total", () => {
    expect(() =>
      validateLayoutDefinition({
        fields: [
          { name: "a", width: 40 },
          { name: "b", width: 30 },
        ],
      }),
    ).toThrow("Invalid layout definition: fields: Fields need 70 bits, at most 64 are supported");
  });

  it("rejects a definition without fields", () => {
    expect(issuesOf({ fields: [] })[0].path).toEqual(["fields"]);
  });

  it("rejects unknown preferences", () => {
    expect(issuesOf({ preference: "medium", fields: [{ name: "a", width: 1 }] })[0].path).toEqual(["preference"]);
  });

  it("rejects input that is not an object", () => {
    expect(() => validateLayoutDefinition("8,9")).toThrow(InvalidLayoutDefinitionError);
    expect(() => validateLayoutDefinition(null)).toThrow(InvalidLayoutDefinitionError);
  });
});

describe("toStoragePreference", () => {
  it("maps names to preferences", () => {
    expect(toStoragePreference("fast")).toBe(StoragePreference.FAST);
    expect(toStoragePreference("small")).toBe(StoragePreference.SMALL);
  });
});
