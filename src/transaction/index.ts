export * from "./input.js";
export * from "./output.js";
export * from "./body.js";
export * from "./witness.js";
export * from "./metadata.js";
export * from "./transaction.js";
