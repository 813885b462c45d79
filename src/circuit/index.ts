export * from "./types.js";
export * from "./errors.js";
export * from "./arithmetic.js";
export * from "./store.js";
export * from "./evaluator.js";
export * from "./constraints.js";
export * from "./hints.js";
export * from "./format.js";
export * from "./builder.js";
