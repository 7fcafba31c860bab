import { Option } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import {
  asMap,
  asUnsigned,
  Primitive,
  type MapEntry,
} from "../codec/primitive.js";
import { DeserializeError, InvalidOperationError } from "../errors.js";
import { computeHash32 } from "../hash.js";
import { AuxiliaryDataHash } from "../identifiers.js";
import { fromHex, isHexString, toHex, utf8ToBytes } from "../utils.js";

/** Ledger limit for a single metadata text or byte string. */
export const METADATUM_MAX_LENGTH = 64;

/**
 * "No schema" JSON shape of a metadatum, as returned by chain indexers:
 * byte strings are `0x`-prefixed hex, map keys are strings.
 */
export type MetadatumJson =
  | string
  | number
  | ReadonlyArray<MetadatumJson>
  | { readonly [key: string]: MetadatumJson };

const HEX_PREFIX = "0x";

const metadatumProblem = (p: Primitive): Option.Option<string> => {
  switch (p._tag) {
    case "Int":
      return Option.none();
    case "Bytes":
      return p.value.length > METADATUM_MAX_LENGTH
        ? Option.some(`byte string longer than ${METADATUM_MAX_LENGTH} bytes`)
        : Option.none();
    case "Text":
      return utf8ToBytes(p.value).length > METADATUM_MAX_LENGTH
        ? Option.some(`text longer than ${METADATUM_MAX_LENGTH} bytes`)
        : Option.none();
    case "Sequence":
      return Option.firstSomeOf(p.items.map(metadatumProblem));
    case "Map":
      return Option.firstSomeOf(
        p.entries.flatMap(([k, v]) => [metadatumProblem(k), metadatumProblem(v)]),
      );
    case "Bool":
    case "Null":
    case "Tagged":
      return Option.some(`${p._tag} is not a metadatum`);
  }
};

const stringMetadatum = (value: string): Primitive => {
  const bytes =
    value.startsWith(HEX_PREFIX) && isHexString(value.slice(2))
      ? fromHex(value.slice(2))
      : undefined;
  const length = bytes?.length ?? utf8ToBytes(value).length;
  if (length > METADATUM_MAX_LENGTH) {
    throw new InvalidOperationError({
      message: `Metadata strings are limited to ${METADATUM_MAX_LENGTH} bytes`,
      cause: `length=${length}`,
    });
  }
  return bytes === undefined ? Primitive.text(value) : Primitive.bytes(bytes);
};

const isMetadatumArray = (
  json: MetadatumJson,
): json is ReadonlyArray<MetadatumJson> => Array.isArray(json);

export const metadatumFromJson = (json: MetadatumJson): Primitive => {
  if (typeof json === "string") return stringMetadatum(json);
  if (typeof json === "number") {
    if (!Number.isSafeInteger(json)) {
      throw new InvalidOperationError({
        message: "Metadata numbers must be integers",
        cause: json,
      });
    }
    return Primitive.int(json);
  }
  if (isMetadatumArray(json)) {
    return Primitive.sequence(json.map(metadatumFromJson));
  }
  return Primitive.map(
    Object.entries(json).map(
      ([key, value]): MapEntry => [
        stringMetadatum(key),
        metadatumFromJson(value),
      ],
    ),
  );
};

const jsonKey = (p: Primitive): string => {
  const json = metadatumToJson(p);
  return typeof json === "string" ? json : JSON.stringify(json);
};

/**
 * Integers outside the safe range come back as decimal strings; text that
 * happens to look like `0x…` hex is indistinguishable from bytes once in
 * JSON.
 */
export const metadatumToJson = (p: Primitive): MetadatumJson => {
  switch (p._tag) {
    case "Int":
      return p.value >= BigInt(Number.MIN_SAFE_INTEGER) &&
        p.value <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(p.value)
        : p.value.toString();
    case "Bytes":
      return `${HEX_PREFIX}${toHex(p.value)}`;
    case "Text":
      return p.value;
    case "Sequence":
      return p.items.map(metadatumToJson);
    case "Map":
      return Object.fromEntries(
        p.entries.map(([k, v]) => [jsonKey(k), metadatumToJson(v)]),
      );
    case "Bool":
    case "Null":
    case "Tagged":
      throw new InvalidOperationError({
        message: `${p._tag} is not a metadatum`,
        cause: p,
      });
  }
};

/**
 * Transaction metadata in its plain `{ label => metadatum }` form. Labels are
 * unsigned integers.
 */
export class AuxiliaryData extends CborSerializable {
  readonly _tag = "AuxiliaryData";
  readonly #metadata: ReadonlyMap<bigint, Primitive>;

  constructor(
    metadata: Iterable<readonly [bigint | number, Primitive]> = [],
  ) {
    super();
    const entries = new Map<bigint, Primitive>();
    for (const [rawLabel, metadatum] of metadata) {
      const label = BigInt(rawLabel);
      if (label < 0n) {
        throw new InvalidOperationError({
          message: "Metadata labels must be unsigned",
          cause: label,
        });
      }
      if (entries.has(label)) {
        throw new InvalidOperationError({
          message: `Duplicate metadata label ${label}`,
          cause: label,
        });
      }
      const problem = metadatumProblem(metadatum);
      if (Option.isSome(problem)) {
        throw new InvalidOperationError({
          message: `Invalid metadatum under label ${label}: ${problem.value}`,
          cause: metadatum,
        });
      }
      entries.set(label, metadatum);
    }
    this.#metadata = entries;
  }

  static fromPrimitive(
    value: Primitive,
    path = "auxiliary_data",
  ): AuxiliaryData {
    const entries = asMap(value, path).map(([k, v], i) => {
      const label = asUnsigned(k, `${path}.<key ${i}>`);
      const problem = metadatumProblem(v);
      if (Option.isSome(problem)) {
        throw new DeserializeError({
          message: `${path}{${label}} is not a valid metadatum`,
          cause: problem.value,
          path: `${path}{${label}}`,
        });
      }
      return [label, v] as const;
    });
    return new AuxiliaryData(entries);
  }

  get size(): number {
    return this.#metadata.size;
  }

  get(label: bigint | number): Option.Option<Primitive> {
    return Option.fromNullable(this.#metadata.get(BigInt(label)));
  }

  labels(): ReadonlyArray<bigint> {
    return [...this.#metadata.keys()].sort((a, b) =>
      a < b ? -1 : a > b ? 1 : 0,
    );
  }

  /** Copy with `metadatum` stored under `label`, replacing any previous one. */
  with(label: bigint | number, metadatum: Primitive): AuxiliaryData {
    const key = BigInt(label);
    return new AuxiliaryData([
      ...[...this.#metadata].filter(([existing]) => existing !== key),
      [key, metadatum],
    ]);
  }

  /** blake2b-256 of the canonical bytes; goes into the body's key `7`. */
  hash(): AuxiliaryDataHash {
    return new AuxiliaryDataHash(computeHash32(this.toCbor()));
  }

  toPrimitive(): Primitive {
    return Primitive.map(
      [...this.#metadata].map(
        ([label, metadatum]): MapEntry => [Primitive.int(label), metadatum],
      ),
    );
  }
}
