export * from "./definition.js";
export * from "./errors.js";
export * from "./named-bitpack.js";
export * from "./named-layout.js";
