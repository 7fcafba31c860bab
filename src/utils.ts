import { InvalidHexError } from "./errors.js";

export const isHexString = (str: string): boolean => {
  const hexRegex = /^(?:[0-9A-Fa-f]{2})*$/;
  return hexRegex.test(str);
};

/**
 * Unlike `Buffer.from(str, "hex")`, which silently stops at the first
 * invalid character, this rejects anything that isn't an even-length hex
 * string.
 */
export const fromHex = (hex: string): Uint8Array => {
  if (!isHexString(hex)) {
    throw new InvalidHexError({
      message: "Malformed hex string",
      cause: hex.length > 80 ? `${hex.slice(0, 80)}…` : hex,
    });
  }
  return new Uint8Array(Buffer.from(hex, "hex"));
};

export const toHex = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "hex",
  );

export const copyBytes = (bytes: Uint8Array): Uint8Array =>
  new Uint8Array(bytes);

export const compareBytes = (a: Uint8Array, b: Uint8Array): number =>
  Buffer.compare(a, b);

export const bytesEqual = (a: Uint8Array, b: Uint8Array): boolean =>
  compareBytes(a, b) === 0;

export const utf8ToBytes = (str: string): Uint8Array =>
  new Uint8Array(Buffer.from(str, "utf8"));

export const bytesToUtf8 = (bytes: Uint8Array): string =>
  Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString(
    "utf8",
  );

/**
 * Splits a string into consecutive chunks of at most `size` characters.
 */
export const splitIntoChunks = (str: string, size: number): string[] => {
  const chunks: string[] = [];
  for (let i = 0; i < str.length; i += size) {
    chunks.push(str.slice(i, i + size));
  }
  return chunks;
};
