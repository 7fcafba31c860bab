export * from "./address.js";
export * from "./codec/index.js";
export * from "./crypto/index.js";
export * from "./errors.js";
export * from "./hash.js";
export * from "./identifiers.js";
export * from "./message-signing/index.js";
export * from "./services/index.js";
export * from "./transaction/index.js";
export * from "./utils.js";
export * from "./value/index.js";
export * from "./workflows/index.js";
