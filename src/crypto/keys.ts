import { ed25519 } from "@noble/curves/ed25519";
import { Either, Schema } from "effect";
import { decodePrimitive } from "../codec/cbor.js";
import { CborSerializable } from "../codec/serializable.js";
import { asBytes, Primitive } from "../codec/primitive.js";
import {
  DeserializeError,
  InvalidHexError,
  InvalidKeyMaterialError,
  InvalidSignatureError,
} from "../errors.js";
import { computeHash28 } from "../hash.js";
import { VerificationKeyHash } from "../identifiers.js";
import { copyBytes, fromHex, toHex } from "../utils.js";

export const ED25519_KEY_LENGTH = 32;
export const ED25519_SIGNATURE_LENGTH = 64;

/**
 * Text envelope written by ledger tooling for keys:
 * `{ "type": ..., "description": ..., "cborHex": "5820..." }`.
 */
export const TextEnvelopeSchema = Schema.Struct({
  type: Schema.String,
  description: Schema.String,
  cborHex: Schema.String,
});
export type TextEnvelope = typeof TextEnvelopeSchema.Type;

const decodeTextEnvelope = Schema.decodeUnknownEither(
  Schema.parseJson(TextEnvelopeSchema),
);

const keyBytesFromCborHex = (cborHex: string, kind: string): Uint8Array => {
  try {
    return asBytes(decodePrimitive(fromHex(cborHex)), kind);
  } catch (e) {
    if (e instanceof DeserializeError || e instanceof InvalidHexError) {
      throw new InvalidKeyMaterialError({
        message: `${kind} cborHex is not a CBOR byte string`,
        cause: e,
      });
    }
    throw e;
  }
};

const ensureKeyLength = (bytes: Uint8Array, kind: string): Uint8Array => {
  if (bytes.length !== ED25519_KEY_LENGTH) {
    throw new InvalidKeyMaterialError({
      message: `${kind} must be ${ED25519_KEY_LENGTH} bytes`,
      cause: `length=${bytes.length}`,
    });
  }
  return copyBytes(bytes);
};

export class VerificationKey extends CborSerializable {
  readonly _tag = "VerificationKey";
  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    super();
    this.#bytes = ensureKeyLength(bytes, "VerificationKey");
  }

  static fromHex(hex: string): VerificationKey {
    return new VerificationKey(fromHex(hex));
  }

  static fromPrimitive(
    value: Primitive,
    path = "verification_key",
  ): VerificationKey {
    return new VerificationKey(asBytes(value, path));
  }

  get bytes(): Uint8Array {
    return copyBytes(this.#bytes);
  }

  toHex(): string {
    return toHex(this.#bytes);
  }

  /** blake2b-224 of the raw key, as used in addresses and required signers. */
  hash(): VerificationKeyHash {
    return new VerificationKeyHash(computeHash28(this.#bytes));
  }

  toPrimitive(): Primitive {
    return Primitive.bytes(this.#bytes);
  }
}

/**
 * Ed25519 secret seed. Never printed: `toString` is redacted and the raw
 * bytes are only handed out as a copy.
 */
export class SigningKey extends CborSerializable {
  readonly _tag = "SigningKey";
  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    super();
    this.#bytes = ensureKeyLength(bytes, "SigningKey");
  }

  static generate(): SigningKey {
    return new SigningKey(ed25519.utils.randomPrivateKey());
  }

  static fromHex(hex: string): SigningKey {
    return new SigningKey(fromHex(hex));
  }

  static fromPrimitive(value: Primitive, path = "signing_key"): SigningKey {
    return new SigningKey(asBytes(value, path));
  }

  static fromTextEnvelope(json: string): SigningKey {
    const envelope = decodeTextEnvelope(json);
    if (Either.isLeft(envelope)) {
      throw new InvalidKeyMaterialError({
        message: "Malformed key text envelope",
        cause: envelope.left,
      });
    }
    return new SigningKey(
      keyBytesFromCborHex(envelope.right.cborHex, "SigningKey"),
    );
  }

  get bytes(): Uint8Array {
    return copyBytes(this.#bytes);
  }

  toVerificationKey(): VerificationKey {
    return new VerificationKey(ed25519.getPublicKey(this.#bytes));
  }

  toTextEnvelope(
    type = "PaymentSigningKeyShelley_ed25519",
    description = "Payment Signing Key",
  ): TextEnvelope {
    return { type, description, cborHex: this.toCborHex() };
  }

  toPrimitive(): Primitive {
    return Primitive.bytes(this.#bytes);
  }

  toString(): string {
    return "SigningKey(<redacted>)";
  }
}

export class Signature extends CborSerializable {
  readonly _tag = "Signature";
  readonly #bytes: Uint8Array;

  constructor(bytes: Uint8Array) {
    super();
    if (bytes.length !== ED25519_SIGNATURE_LENGTH) {
      throw new InvalidSignatureError({
        message: `Signature must be ${ED25519_SIGNATURE_LENGTH} bytes`,
        cause: `length=${bytes.length}`,
      });
    }
    this.#bytes = copyBytes(bytes);
  }

  static fromHex(hex: string): Signature {
    return new Signature(fromHex(hex));
  }

  static fromPrimitive(value: Primitive, path = "signature"): Signature {
    return new Signature(asBytes(value, path));
  }

  get bytes(): Uint8Array {
    return copyBytes(this.#bytes);
  }

  toHex(): string {
    return toHex(this.#bytes);
  }

  toPrimitive(): Primitive {
    return Primitive.bytes(this.#bytes);
  }
}
