export * from "./primitive.js";
export * from "./cbor.js";
export * from "./serializable.js";
