/**
 * Language-independent primitive tree that every ledger type converts to
 * before it is written as CBOR.
 *
 * The set of variants is closed; decoders pattern-match on `_tag` and use
 * the `as*` helpers below, which fail with a `DeserializeError` naming the
 * path of the mismatching node.
 */

import { DeserializeError } from "../errors.js";
import { bytesEqual, copyBytes, toHex } from "../utils.js";

export type IntPrimitive = {
  readonly _tag: "Int";
  readonly value: bigint;
};

export type BytesPrimitive = {
  readonly _tag: "Bytes";
  readonly value: Uint8Array;
};

export type TextPrimitive = {
  readonly _tag: "Text";
  readonly value: string;
};

export type BoolPrimitive = {
  readonly _tag: "Bool";
  readonly value: boolean;
};

export type NullPrimitive = {
  readonly _tag: "Null";
};

export type SequencePrimitive = {
  readonly _tag: "Sequence";
  readonly items: ReadonlyArray<Primitive>;
};

export type MapEntry = readonly [Primitive, Primitive];

export type MapPrimitive = {
  readonly _tag: "Map";
  readonly entries: ReadonlyArray<MapEntry>;
};

export type TaggedPrimitive = {
  readonly _tag: "Tagged";
  readonly tag: number;
  readonly value: Primitive;
};

export type Primitive =
  | IntPrimitive
  | BytesPrimitive
  | TextPrimitive
  | BoolPrimitive
  | NullPrimitive
  | SequencePrimitive
  | MapPrimitive
  | TaggedPrimitive;

export type PrimitiveTag = Primitive["_tag"];

const NULL: NullPrimitive = { _tag: "Null" };

export const Primitive = {
  int: (value: bigint | number): IntPrimitive => ({
    _tag: "Int",
    value: BigInt(value),
  }),
  bytes: (value: Uint8Array): BytesPrimitive => ({
    _tag: "Bytes",
    value: copyBytes(value),
  }),
  text: (value: string): TextPrimitive => ({ _tag: "Text", value }),
  bool: (value: boolean): BoolPrimitive => ({ _tag: "Bool", value }),
  null: (): NullPrimitive => NULL,
  sequence: (items: ReadonlyArray<Primitive>): SequencePrimitive => ({
    _tag: "Sequence",
    items: [...items],
  }),
  map: (entries: ReadonlyArray<MapEntry>): MapPrimitive => ({
    _tag: "Map",
    entries: [...entries],
  }),
  tagged: (tag: number, value: Primitive): TaggedPrimitive => ({
    _tag: "Tagged",
    tag,
    value,
  }),
} as const;

/**
 * Structural equality. Map entries are compared in order; two maps that only
 * differ in entry order still encode to the same canonical bytes.
 */
export const primitiveEquals = (a: Primitive, b: Primitive): boolean => {
  switch (a._tag) {
    case "Int":
      return b._tag === "Int" && b.value === a.value;
    case "Text":
      return b._tag === "Text" && b.value === a.value;
    case "Bool":
      return b._tag === "Bool" && b.value === a.value;
    case "Null":
      return b._tag === "Null";
    case "Bytes":
      return b._tag === "Bytes" && bytesEqual(a.value, b.value);
    case "Sequence":
      return (
        b._tag === "Sequence" &&
        a.items.length === b.items.length &&
        a.items.every((item, i) => primitiveEquals(item, b.items[i]))
      );
    case "Map":
      return (
        b._tag === "Map" &&
        a.entries.length === b.entries.length &&
        a.entries.every(
          ([k, v], i) =>
            primitiveEquals(k, b.entries[i][0]) &&
            primitiveEquals(v, b.entries[i][1]),
        )
      );
    case "Tagged":
      return (
        b._tag === "Tagged" && a.tag === b.tag && primitiveEquals(a.value, b.value)
      );
  }
};

/** Short human-readable rendering used in error messages. */
export const describePrimitive = (p: Primitive): string => {
  switch (p._tag) {
    case "Int":
      return `int(${p.value})`;
    case "Bytes":
      return `bytes(${p.value.length}):${toHex(p.value.subarray(0, 16))}${p.value.length > 16 ? "…" : ""}`;
    case "Text":
      return `text(${JSON.stringify(p.value.slice(0, 32))})`;
    case "Bool":
      return `bool(${p.value})`;
    case "Null":
      return "null";
    case "Sequence":
      return `sequence(${p.items.length})`;
    case "Map":
      return `map(${p.entries.length})`;
    case "Tagged":
      return `tag(${p.tag})`;
  }
};

const shapeMismatch = (
  p: Primitive,
  expected: string,
  path: string,
): DeserializeError =>
  new DeserializeError({
    message: `${path} must be ${expected}`,
    cause: `found ${describePrimitive(p)}`,
    path,
  });

export const asInt = (p: Primitive, path: string): bigint => {
  if (p._tag !== "Int") throw shapeMismatch(p, "an integer", path);
  return p.value;
};

export const asUnsigned = (p: Primitive, path: string): bigint => {
  const value = asInt(p, path);
  if (value < 0n) throw shapeMismatch(p, "an unsigned integer", path);
  return value;
};

/**
 * Unsigned integer that must also fit a JS number, e.g. an output index or a
 * network id.
 */
export const asSafeUnsigned = (p: Primitive, path: string): number => {
  const value = asUnsigned(p, path);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw shapeMismatch(p, "a safe unsigned integer", path);
  }
  return Number(value);
};

export const asBytes = (p: Primitive, path: string): Uint8Array => {
  if (p._tag !== "Bytes") throw shapeMismatch(p, "a byte string", path);
  return p.value;
};

export const asText = (p: Primitive, path: string): string => {
  if (p._tag !== "Text") throw shapeMismatch(p, "a text string", path);
  return p.value;
};

export const asBool = (p: Primitive, path: string): boolean => {
  if (p._tag !== "Bool") throw shapeMismatch(p, "a boolean", path);
  return p.value;
};

export const asSequence = (
  p: Primitive,
  path: string,
): ReadonlyArray<Primitive> => {
  if (p._tag !== "Sequence") throw shapeMismatch(p, "a sequence", path);
  return p.items;
};

export const asFixedSequence = (
  p: Primitive,
  lengths: number | ReadonlyArray<number>,
  path: string,
): ReadonlyArray<Primitive> => {
  const items = asSequence(p, path);
  const allowed = typeof lengths === "number" ? [lengths] : lengths;
  if (!allowed.includes(items.length)) {
    throw new DeserializeError({
      message: `${path} must have ${allowed.join(" or ")} elements`,
      cause: `length=${items.length}`,
      path,
    });
  }
  return items;
};

export const asMap = (
  p: Primitive,
  path: string,
): ReadonlyArray<MapEntry> => {
  if (p._tag !== "Map") throw shapeMismatch(p, "a map", path);
  return p.entries;
};

export const SET_TAG = 258;

/**
 * A list that may arrive wrapped in the `258` set tag, which later ledger
 * eras use for inputs, signers and witnesses. `tagged` records the wrapping
 * so the list re-encodes to the bytes it was read from.
 */
export type SetLike = {
  readonly items: ReadonlyArray<Primitive>;
  readonly tagged: boolean;
};

export const asSetLike = (p: Primitive, path: string): SetLike =>
  p._tag === "Tagged" && p.tag === SET_TAG
    ? { items: asSequence(p.value, path), tagged: true }
    : { items: asSequence(p, path), tagged: false };

export const setLikePrimitive = (
  items: ReadonlyArray<Primitive>,
  tagged: boolean,
): Primitive =>
  tagged
    ? Primitive.tagged(SET_TAG, Primitive.sequence(items))
    : Primitive.sequence(items);
