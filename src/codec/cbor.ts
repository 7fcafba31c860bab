import { decodeFirst, encode, Token, Type } from "cborg";
import { DeserializeError, SerializeError } from "../errors.js";
import { compareBytes, copyBytes, fromHex, toHex } from "../utils.js";
import { Primitive, type MapEntry } from "./primitive.js";

/**
 * Tags the decoder understands. Anything else is rejected in strict mode.
 *
 *   2, 3          unsigned / negative bignums (folded into `Int`)
 *   24            embedded CBOR
 *   30            rational number
 *   102           Plutus data, general constructor
 *   121..127      Plutus data, constructors 0..6
 *   258           set
 *   1280..1400    Plutus data, constructors 7..127
 */
const BIGNUM_POSITIVE_TAG = 2;
const BIGNUM_NEGATIVE_TAG = 3;

const SUPPORTED_TAGS: readonly number[] = [
  BIGNUM_POSITIVE_TAG,
  BIGNUM_NEGATIVE_TAG,
  24,
  30,
  102,
  ...Array.from({ length: 7 }, (_, i) => 121 + i),
  258,
  ...Array.from({ length: 121 }, (_, i) => 1280 + i),
];

class DecodedTag {
  constructor(
    readonly tag: number,
    readonly value: unknown,
  ) {}
}

const TAG_DECODERS: Array<(inner: unknown) => unknown> = [];
for (const tag of SUPPORTED_TAGS) {
  TAG_DECODERS[tag] = (inner: unknown) => new DecodedTag(tag, inner);
}

const DECODER_OPTIONS = {
  strict: true,
  allowIndefinite: false,
  allowUndefined: false,
  useMaps: true,
  rejectDuplicateMapKeys: true,
  tags: TAG_DECODERS,
};

const UINT64_LIMIT = 1n << 64n;

type TokenTree = Token | TokenTree[];

const bigintToBytes = (n: bigint): Uint8Array => {
  const hex = n.toString(16);
  return fromHex(hex.length % 2 === 1 ? `0${hex}` : hex);
};

const bytesToBigint = (bytes: Uint8Array): bigint =>
  bytes.length === 0 ? 0n : BigInt(`0x${toHex(bytes)}`);

const intTokens = (n: bigint): TokenTree => {
  const tokenValue = (v: bigint): number | bigint =>
    v <= BigInt(Number.MAX_SAFE_INTEGER) && v >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(v)
      : v;
  if (n >= 0n) {
    if (n < UINT64_LIMIT) return new Token(Type.uint, tokenValue(n));
    return [
      new Token(Type.tag, BIGNUM_POSITIVE_TAG),
      new Token(Type.bytes, bigintToBytes(n)),
    ];
  }
  const magnitude = -1n - n;
  if (magnitude < UINT64_LIMIT) return new Token(Type.negint, tokenValue(n));
  return [
    new Token(Type.tag, BIGNUM_NEGATIVE_TAG),
    new Token(Type.bytes, bigintToBytes(magnitude)),
  ];
};

/**
 * Map entries are emitted in the bytewise order of their encoded keys
 * (RFC 8949 §4.2.1), so a map's bytes never depend on insertion order.
 */
const sortedEntries = (
  entries: ReadonlyArray<MapEntry>,
): Array<{ key: Uint8Array; entry: MapEntry }> => {
  const keyed = entries.map((entry) => ({
    key: encodePrimitive(entry[0]),
    entry,
  }));
  keyed.sort((a, b) => compareBytes(a.key, b.key));
  for (let i = 1; i < keyed.length; i++) {
    if (compareBytes(keyed[i - 1].key, keyed[i].key) === 0) {
      throw new SerializeError({
        message: "Duplicate map key",
        cause: toHex(keyed[i].key),
      });
    }
  }
  return keyed;
};

const toTokens = (p: Primitive): TokenTree => {
  switch (p._tag) {
    case "Int":
      return intTokens(p.value);
    case "Bytes":
      return new Token(Type.bytes, p.value);
    case "Text":
      return new Token(Type.string, p.value);
    case "Bool":
      return p.value ? new Token(Type.true, true) : new Token(Type.false, false);
    case "Null":
      return new Token(Type.null, null);
    case "Sequence":
      return [new Token(Type.array, p.items.length), ...p.items.map(toTokens)];
    case "Map":
      return [
        new Token(Type.map, p.entries.length),
        ...sortedEntries(p.entries).map(({ entry: [k, v] }) => [
          toTokens(k),
          toTokens(v),
        ]),
      ];
    case "Tagged":
      return [new Token(Type.tag, p.tag), toTokens(p.value)];
  }
};

class PrimitiveRoot {
  constructor(readonly tree: Primitive) {}
}

const ENCODER_OPTIONS = {
  typeEncoders: {
    Object: (obj: unknown): TokenTree | null =>
      obj instanceof PrimitiveRoot ? toTokens(obj.tree) : null,
  },
};

/**
 * Writes a primitive tree as canonical CBOR: minimal-length heads, definite
 * lengths, sorted map keys.
 */
export const encodePrimitive = (p: Primitive): Uint8Array => {
  try {
    return encode(new PrimitiveRoot(p), ENCODER_OPTIONS);
  } catch (e) {
    if (e instanceof SerializeError) {
      throw e;
    }
    throw new SerializeError({
      message: "Failed to encode CBOR",
      cause: e,
    });
  }
};

const MAJOR_ARRAY = 4;
const MAJOR_MAP = 5;
const MAJOR_TAG = 6;
const MAJOR_SIMPLE = 7;
const HEAD_ARGUMENT_BYTES: Record<number, number> = { 24: 1, 25: 2, 26: 4, 27: 8 };

/**
 * Walks the heads of an already validated item and rejects floats. The
 * decoder hands integral floats back as plain numbers, so `1.0` would
 * otherwise pass as the integer `1`.
 */
const rejectFloats = (bytes: Uint8Array, path: string): void => {
  let offset = 0;
  let pending = 1;
  while (pending > 0) {
    const head = bytes[offset];
    const major = head >> 5;
    const info = head & 0x1f;
    const argumentBytes = HEAD_ARGUMENT_BYTES[info] ?? 0;
    if (major === MAJOR_SIMPLE && argumentBytes > 1) {
      throw new DeserializeError({
        message: `${path}: floating point values are not supported`,
        cause: `offset=${offset}`,
        path,
      });
    }
    let argument = info < 24 ? info : 0;
    for (let i = 1; i <= argumentBytes; i++) {
      argument = argument * 256 + bytes[offset + i];
    }
    offset += 1 + argumentBytes;
    pending -= 1;
    if (major === 2 || major === 3) offset += argument;
    else if (major === MAJOR_ARRAY) pending += argument;
    else if (major === MAJOR_MAP) pending += 2 * argument;
    else if (major === MAJOR_TAG) pending += 1;
  }
};

const fromDecoded = (value: unknown, path: string): Primitive => {
  if (typeof value === "bigint") {
    return Primitive.int(value);
  }
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new DeserializeError({
        message: `${path}: floating point values are not supported`,
        cause: value,
        path,
      });
    }
    return Primitive.int(value);
  }
  if (typeof value === "boolean") {
    return Primitive.bool(value);
  }
  if (value === null) {
    return Primitive.null();
  }
  if (typeof value === "string") {
    return Primitive.text(value);
  }
  if (value instanceof Uint8Array) {
    return Primitive.bytes(copyBytes(value));
  }
  if (Array.isArray(value)) {
    return Primitive.sequence(
      value.map((item: unknown, i) => fromDecoded(item, `${path}[${i}]`)),
    );
  }
  if (value instanceof Map) {
    const entries: MapEntry[] = [];
    const seen = new Set<string>();
    for (const [k, v] of value) {
      const key = fromDecoded(k, `${path}.<key>`);
      const keyHex = toHex(encodePrimitive(key));
      if (seen.has(keyHex)) {
        throw new DeserializeError({
          message: `${path}: duplicate map key`,
          cause: keyHex,
          path,
        });
      }
      seen.add(keyHex);
      entries.push([key, fromDecoded(v, `${path}{${keyHex}}`)]);
    }
    return Primitive.map(entries);
  }
  if (value instanceof DecodedTag) {
    if (
      value.tag === BIGNUM_POSITIVE_TAG ||
      value.tag === BIGNUM_NEGATIVE_TAG
    ) {
      if (!(value.value instanceof Uint8Array)) {
        throw new DeserializeError({
          message: `${path}: bignum tag must wrap a byte string`,
          cause: value.tag,
          path,
        });
      }
      const magnitude = bytesToBigint(value.value);
      if (value.value[0] === 0 || magnitude < UINT64_LIMIT) {
        throw new DeserializeError({
          message: `${path}: bignum must be minimal and exceed the 64-bit range`,
          cause: toHex(value.value),
          path,
        });
      }
      return Primitive.int(
        value.tag === BIGNUM_POSITIVE_TAG ? magnitude : -1n - magnitude,
      );
    }
    return Primitive.tagged(value.tag, fromDecoded(value.value, path));
  }
  throw new DeserializeError({
    message: `${path}: unsupported CBOR value`,
    cause: typeof value,
    path,
  });
};

/**
 * Reads exactly one CBOR data item. Non-canonical integer heads, indefinite
 * lengths, floats, non-minimal bignums, unknown tags and trailing bytes are
 * rejected.
 */
export const decodePrimitive = (
  bytes: Uint8Array,
  path = "$",
): Primitive => {
  let decoded: unknown;
  try {
    const [value, remainder] = decodeFirst(bytes, DECODER_OPTIONS);
    if (remainder.length !== 0) {
      throw new DeserializeError({
        message: "Trailing bytes after CBOR value",
        cause: `remaining=${remainder.length}`,
        path,
      });
    }
    rejectFloats(bytes, path);
    decoded = value;
  } catch (e) {
    if (e instanceof DeserializeError) {
      throw e;
    }
    throw new DeserializeError({
      message: "Failed to decode CBOR",
      cause: e,
      path,
    });
  }
  return fromDecoded(decoded, path);
};
