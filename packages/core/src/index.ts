export * from "./bit-width.js";
export * from "./bitmask.js";
export * from "./bitpack.js";
export * from "./errors.js";
export * from "./layout.js";
export * from "./layout-traits.js";
export * from "./storage-type.js";
