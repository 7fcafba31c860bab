/**
 * Fixed-size byte identifiers (hashes and key hashes) and asset names.
 *
 * Each kind carries its own `_tag`, so a `TransactionId` can't be passed
 * where a `DatumHash` is expected even though both are 32 bytes.
 */

import { CborSerializable } from "./codec/serializable.js";
import { asBytes, Primitive } from "./codec/primitive.js";
import { SizeMismatchError } from "./errors.js";
import { HASH28_LENGTH, HASH32_LENGTH } from "./hash.js";
import { compareBytes, copyBytes, fromHex, toHex, utf8ToBytes } from "./utils.js";

export abstract class ByteIdentifier extends CborSerializable {
  abstract readonly _tag: string;
  readonly #bytes: Uint8Array;

  protected constructor(kind: string, size: number, bytes: Uint8Array) {
    super();
    if (bytes.length !== size) {
      throw new SizeMismatchError({
        message: `${kind} must be ${size} bytes`,
        cause: `length=${bytes.length}`,
        expected: size,
        actual: bytes.length,
      });
    }
    this.#bytes = copyBytes(bytes);
  }

  /** A copy; identifiers never expose their backing buffer. */
  get bytes(): Uint8Array {
    return copyBytes(this.#bytes);
  }

  get size(): number {
    return this.#bytes.length;
  }

  toHex(): string {
    return toHex(this.#bytes);
  }

  toString(): string {
    return this.toHex();
  }

  compare(that: ByteIdentifier): number {
    return compareBytes(this.#bytes, that.#bytes);
  }

  toPrimitive(): Primitive {
    return Primitive.bytes(this.#bytes);
  }
}

export class TransactionId extends ByteIdentifier {
  static readonly SIZE = HASH32_LENGTH;
  readonly _tag = "TransactionId";

  constructor(bytes: Uint8Array) {
    super("TransactionId", TransactionId.SIZE, bytes);
  }

  static fromHex(hex: string): TransactionId {
    return new TransactionId(fromHex(hex));
  }

  static fromPrimitive(value: Primitive, path = "transaction_id"): TransactionId {
    return new TransactionId(asBytes(value, path));
  }
}

/** Hash of a native or Plutus script; a minting policy id is one of these. */
export class ScriptHash extends ByteIdentifier {
  static readonly SIZE = HASH28_LENGTH;
  readonly _tag = "ScriptHash";

  constructor(bytes: Uint8Array) {
    super("ScriptHash", ScriptHash.SIZE, bytes);
  }

  static fromHex(hex: string): ScriptHash {
    return new ScriptHash(fromHex(hex));
  }

  static fromPrimitive(value: Primitive, path = "script_hash"): ScriptHash {
    return new ScriptHash(asBytes(value, path));
  }
}

export type PolicyId = ScriptHash;
export const PolicyId = ScriptHash;

export class VerificationKeyHash extends ByteIdentifier {
  static readonly SIZE = HASH28_LENGTH;
  readonly _tag = "VerificationKeyHash";

  constructor(bytes: Uint8Array) {
    super("VerificationKeyHash", VerificationKeyHash.SIZE, bytes);
  }

  static fromHex(hex: string): VerificationKeyHash {
    return new VerificationKeyHash(fromHex(hex));
  }

  static fromPrimitive(
    value: Primitive,
    path = "verification_key_hash",
  ): VerificationKeyHash {
    return new VerificationKeyHash(asBytes(value, path));
  }
}

export class DatumHash extends ByteIdentifier {
  static readonly SIZE = HASH32_LENGTH;
  readonly _tag = "DatumHash";

  constructor(bytes: Uint8Array) {
    super("DatumHash", DatumHash.SIZE, bytes);
  }

  static fromHex(hex: string): DatumHash {
    return new DatumHash(fromHex(hex));
  }

  static fromPrimitive(value: Primitive, path = "datum_hash"): DatumHash {
    return new DatumHash(asBytes(value, path));
  }
}

export class AuxiliaryDataHash extends ByteIdentifier {
  static readonly SIZE = HASH32_LENGTH;
  readonly _tag = "AuxiliaryDataHash";

  constructor(bytes: Uint8Array) {
    super("AuxiliaryDataHash", AuxiliaryDataHash.SIZE, bytes);
  }

  static fromHex(hex: string): AuxiliaryDataHash {
    return new AuxiliaryDataHash(fromHex(hex));
  }

  static fromPrimitive(
    value: Primitive,
    path = "auxiliary_data_hash",
  ): AuxiliaryDataHash {
    return new AuxiliaryDataHash(asBytes(value, path));
  }
}

/** Hash over redeemers, datums and cost models of a Plutus transaction. */
export class ScriptDataHash extends ByteIdentifier {
  static readonly SIZE = HASH32_LENGTH;
  readonly _tag = "ScriptDataHash";

  constructor(bytes: Uint8Array) {
    super("ScriptDataHash", ScriptDataHash.SIZE, bytes);
  }

  static fromHex(hex: string): ScriptDataHash {
    return new ScriptDataHash(fromHex(hex));
  }

  static fromPrimitive(
    value: Primitive,
    path = "script_data_hash",
  ): ScriptDataHash {
    return new ScriptDataHash(asBytes(value, path));
  }
}

export const ASSET_NAME_MAX_LENGTH = 32;

/**
 * Token name within a policy. Variable length, bounded by the ledger's
 * 32-byte limit.
 */
export class AssetName extends CborSerializable {
  readonly _tag = "AssetName";
  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    super();
    if (bytes.length > ASSET_NAME_MAX_LENGTH) {
      throw new SizeMismatchError({
        message: `AssetName must be at most ${ASSET_NAME_MAX_LENGTH} bytes`,
        cause: `length=${bytes.length}`,
        expected: ASSET_NAME_MAX_LENGTH,
        actual: bytes.length,
      });
    }
    this.#bytes = copyBytes(bytes);
  }

  static fromHex(hex: string): AssetName {
    return new AssetName(fromHex(hex));
  }

  static fromString(name: string): AssetName {
    return new AssetName(utf8ToBytes(name));
  }

  static fromPrimitive(value: Primitive, path = "asset_name"): AssetName {
    return new AssetName(asBytes(value, path));
  }

  get bytes(): Uint8Array {
    return copyBytes(this.#bytes);
  }

  toHex(): string {
    return toHex(this.#bytes);
  }

  toString(): string {
    return this.toHex();
  }

  compare(that: AssetName): number {
    return compareBytes(this.#bytes, that.#bytes);
  }

  toPrimitive(): Primitive {
    return Primitive.bytes(this.#bytes);
  }
}
