import { blake2b } from "@noble/hashes/blake2.js";

export const HASH32_LENGTH = 32;
export const HASH28_LENGTH = 28;

export const computeHash32 = (value: Uint8Array): Uint8Array =>
  blake2b(value, { dkLen: HASH32_LENGTH });

export const computeHash28 = (value: Uint8Array): Uint8Array =>
  blake2b(value, { dkLen: HASH28_LENGTH });
