export * from "./cose.js";
export * from "./envelope.js";
