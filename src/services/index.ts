export * from "./chain-context.js";
export * from "./config.js";
