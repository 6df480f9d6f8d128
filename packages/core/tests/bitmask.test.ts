import { describe, expect, it } from "vitest";
import { bitmask, fitsMask, toBigInt } from "../src/bitmask.js";
import { sumWidths } from "../src/layout-traits.js";

describe("bitmask", () => {
  it("sets the low bits", () => {
    expect(bitmask(1)).toBe(1n);
    expect(bitmask(2)).toBe(3n);
    expect(bitmask(3)).toBe(7n);
    expect(bitmask(12)).toBe(0xfffn);
  });

  it("covers a full 64-bit word", () => {
    expect(bitmask(64)).toBe(0xffff_ffff_ffff_ffffn);
  });
});

describe("fitsMask", () => {
  it("accepts values inside the mask", () => {
    expect(fitsMask(0n, 0xffn)).toBe(true);
    expect(fitsMask(255n, 0xffn)).toBe(true);
  });

  it("rejects values with bits outside the mask", () => {
    expect(fitsMask(256n, 0xffn)).toBe(false);
    expect(fitsMask(0x1ffn, 0xffn)).toBe(false);
  });

  it("rejects negative values", () => {
    expect(fitsMask(-1n, 0xffn)).toBe(false);
  });
});

describe("toBigInt", () => {
  it("passes bigints through", () => {
    expect(toBigInt(42n)).toBe(42n);
  });

  it("converts integer numbers", () => {
    expect(toBigInt(511)).toBe(511n);
    expect(toBigInt(-3)).toBe(-3n);
  });

  it("refuses fractional numbers", () => {
    expect(toBigInt(1.5)).toBeUndefined();
    expect(toBigInt(Number.NaN)).toBeUndefined();
  });
});

describe("sumWidths", () => {
  const widths = [1, 2, 3, 4];

  it("sums all widths", () => {
    expect(sumWidths(widths)).toBe(10);
  });

  it("sums a prefix", () => {
    expect(sumWidths(widths, 2)).toBe(3);
    expect(sumWidths(widths, 0)).toBe(0);
  });
});
