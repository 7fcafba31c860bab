export * from "./asset.js";
export * from "./multi-asset.js";
export * from "./value.js";
