import { IndexOutOfRangeError, resolveStorageType, StoragePreference } from "@bitpack/core";
import { describe, expect, it } from "vitest";
import { InvalidLayoutDefinitionError, UnknownFieldError } from "../src/errors.js";
import { defineNamedLayout, NamedLayout, parseLayoutDefinition } from "../src/named-layout.js";

describe("NamedLayout", () => {
  const header = defineNamedLayout({
    preference: "small",
    fields: [
      { name: "version", width: 4 },
      { name: "flags", width: 4 },
      { name: "length", width: 16 },
    ],
  });

  it("builds the underlying layout", () => {
    expect(header.layout.fieldSizes).toEqual([4, 4, 16]);
    expect(header.layout.preference).toBe(StoragePreference.SMALL);
    expect(header.layout.storage.name).toBe("uint_least32");
  });

  it("maps names to indexes in declaration order", () => {
    expect(header.names).toEqual(["version", "flags", "length"]);
    expect(header.fieldCount).toBe(3);
    expect(header.indexOf("version")).toBe(0);
    expect(header.indexOf("flags")).toBe(1);
    expect(header.indexOf("length")).toBe(2);
  });

  it("maps indexes back to names", () => {
    expect(header.nameAt(2)).toBe("length");
    expect(() => header.nameAt(3)).toThrow(IndexOutOfRangeError);
    expect(() => header.nameAt(-1)).toThrow(IndexOutOfRangeError);
  });

  it("reports field widths by name", () => {
    expect(header.widthOf("length")).toBe(16);
  });

  it("tells declared names apart", () => {
    expect(header.has("flags")).toBe(true);
    expect(header.has("checksum")).toBe(false);
  });

  it("defaults to the fast preference", () => {
    const layout = defineNamedLayout({ fields: [{ name: "on", width: 1 }] });
    expect(layout.layout.storage.name).toBe("uint_fast8");
  });

  it("passes layout options through", () => {
    const layout = defineNamedLayout(
      { fields: [{ name: "on", width: 1 }] },
      { resolver: (_total, preference) => resolveStorageType(64, preference) },
    );
    expect(layout.layout.storage.bits).toBe(64);
  });

  it("rejects invalid definitions", () => {
    expect(() =>
      defineNamedLayout({
        fields: [
          { name: "a", width: 4 },
          { name: "a", width: 4 },
        ],
      }),
    ).toThrow(InvalidLayoutDefinitionError);
    expect(() => defineNamedLayout({ fields: [{ name: "a", width: 0 }] })).toThrow(InvalidLayoutDefinitionError);
  });

  it("validates fields passed to the constructor", () => {
    expect(
      () =>
        new NamedLayout([
          { name: "x", width: 2 },
          { name: "x", width: 2 },
        ]),
    ).toThrow(InvalidLayoutDefinitionError);
  });
});

describe("parseLayoutDefinition", () => {
  const json = '{"preference":"fast","fields":[{"name":"opcode","width":6},{"name":"operand","width":26}]}';

  it("builds a layout from parsed JSON", () => {
    const layout = parseLayoutDefinition(JSON.parse(json));
    expect(layout.names).toEqual(["opcode", "operand"]);
    expect(layout.layout.totalBitWidth).toBe(32);
    expect(layout.layout.storage.name).toBe("uint_fast32");
  });

  it("rejects unknown names at runtime", () => {
    const layout = parseLayoutDefinition(JSON.parse(json));
    expect(() => layout.indexOf("immediate")).toThrow(UnknownFieldError);
    expect(() => layout.indexOf("immediate")).toThrow("Unknown field: immediate");
  });

  it("rejects malformed input", () => {
    expect(() => parseLayoutDefinition({ fields: "6,26" })).toThrow(InvalidLayoutDefinitionError);
  });
});
