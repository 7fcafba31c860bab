/**
 * The slice of COSE (RFC 9052) that wallet message signing uses: an untagged
 * `COSE_Sign1` with an EdDSA signature, and an OKP `COSE_Key` for Ed25519.
 */

import { Option } from "effect";
import { decodePrimitive, encodePrimitive } from "../codec/cbor.js";
import { CborSerializable } from "../codec/serializable.js";
import {
  asBytes,
  asFixedSequence,
  asInt,
  asMap,
  primitiveEquals,
  Primitive,
  type MapEntry,
} from "../codec/primitive.js";
import { VerificationKey } from "../crypto/keys.js";
import { DeserializeError } from "../errors.js";
import { copyBytes } from "../utils.js";

export const CoseHeaderLabel = {
  Algorithm: 1,
  KeyId: 4,
} as const;

export const ADDRESS_HEADER = "address";
export const HASHED_HEADER = "hashed";

export const COSE_ALG_EDDSA = -8;
const COSE_KTY_OKP = 1;
const COSE_CRV_ED25519 = 6;
const SIGNATURE1_CONTEXT = "Signature1";

export type HeaderLabel = number | string;

const labelPrimitive = (label: HeaderLabel): Primitive =>
  typeof label === "number" ? Primitive.int(label) : Primitive.text(label);

export const headerValue = (
  header: ReadonlyArray<MapEntry>,
  label: HeaderLabel,
): Option.Option<Primitive> => {
  const key = labelPrimitive(label);
  return Option.fromNullable(
    header.find(([k]) => primitiveEquals(k, key)),
  ).pipe(Option.map(([, v]) => v));
};

export const headerEntry = (
  label: HeaderLabel,
  value: Primitive,
): MapEntry => [labelPrimitive(label), value];

/**
 * `[protected, unprotected, payload, signature]`
 *
 * The protected header is kept as the exact bytes that were signed; it is
 * never re-encoded.
 */
export class CoseSign1 extends CborSerializable {
  readonly _tag = "CoseSign1";
  readonly #protectedBytes: Uint8Array;
  readonly #payload: Uint8Array;
  readonly #signature: Uint8Array;

  constructor(
    protectedBytes: Uint8Array,
    readonly unprotectedHeader: ReadonlyArray<MapEntry>,
    payload: Uint8Array,
    signature: Uint8Array,
  ) {
    super();
    this.#protectedBytes = copyBytes(protectedBytes);
    this.#payload = copyBytes(payload);
    this.#signature = copyBytes(signature);
  }

  static fromPrimitive(value: Primitive, path = "cose_sign1"): CoseSign1 {
    const [protectedBytes, unprotected, payload, signature] = asFixedSequence(
      value,
      4,
      path,
    );
    return new CoseSign1(
      asBytes(protectedBytes, `${path}[0]`),
      asMap(unprotected, `${path}[1]`),
      asBytes(payload, `${path}[2]`),
      asBytes(signature, `${path}[3]`),
    );
  }

  /** Empty protected bytes stand for an empty header map. */
  get protectedHeader(): ReadonlyArray<MapEntry> {
    if (this.#protectedBytes.length === 0) return [];
    return asMap(
      decodePrimitive(this.#protectedBytes, "cose_sign1.protected"),
      "cose_sign1.protected",
    );
  }

  get payload(): Uint8Array {
    return copyBytes(this.#payload);
  }

  get signature(): Uint8Array {
    return copyBytes(this.#signature);
  }

  /** The bytes the signature covers (`Sig_structure`, no external AAD). */
  signedData(): Uint8Array {
    return sigStructure(this.#protectedBytes, this.#payload);
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      Primitive.bytes(this.#protectedBytes),
      Primitive.map(this.unprotectedHeader),
      Primitive.bytes(this.#payload),
      Primitive.bytes(this.#signature),
    ]);
  }
}

export const sigStructure = (
  protectedBytes: Uint8Array,
  payload: Uint8Array,
): Uint8Array =>
  encodePrimitive(
    Primitive.sequence([
      Primitive.text(SIGNATURE1_CONTEXT),
      Primitive.bytes(protectedBytes),
      Primitive.bytes(new Uint8Array(0)),
      Primitive.bytes(payload),
    ]),
  );

export const encodeProtectedHeader = (
  header: ReadonlyArray<MapEntry>,
): Uint8Array => encodePrimitive(Primitive.map(header));

const CoseKeyLabel = {
  KeyType: 1,
  Algorithm: 3,
  Curve: -1,
  X: -2,
} as const;

/** `{1: 1, 3: -8, -1: 6, -2: public key}` */
export class CoseKey extends CborSerializable {
  readonly _tag = "CoseKey";

  constructor(readonly verificationKey: VerificationKey) {
    super();
  }

  static fromPrimitive(value: Primitive, path = "cose_key"): CoseKey {
    const entries = asMap(value, path);
    const field = (label: number): Primitive =>
      Option.getOrThrowWith(headerValue(entries, label), () =>
        missingField(path, label),
      );
    const requireInt = (label: number, expected: number): void => {
      const actual = asInt(field(label), `${path}{${label}}`);
      if (actual !== BigInt(expected)) {
        throw new DeserializeError({
          message: `${path}{${label}} must be ${expected}`,
          cause: `found ${actual}`,
          path: `${path}{${label}}`,
        });
      }
    };
    requireInt(CoseKeyLabel.KeyType, COSE_KTY_OKP);
    requireInt(CoseKeyLabel.Algorithm, COSE_ALG_EDDSA);
    requireInt(CoseKeyLabel.Curve, COSE_CRV_ED25519);
    return new CoseKey(
      VerificationKey.fromPrimitive(
        field(CoseKeyLabel.X),
        `${path}{${CoseKeyLabel.X}}`,
      ),
    );
  }

  toPrimitive(): Primitive {
    return Primitive.map([
      headerEntry(CoseKeyLabel.KeyType, Primitive.int(COSE_KTY_OKP)),
      headerEntry(CoseKeyLabel.Algorithm, Primitive.int(COSE_ALG_EDDSA)),
      headerEntry(CoseKeyLabel.Curve, Primitive.int(COSE_CRV_ED25519)),
      headerEntry(CoseKeyLabel.X, this.verificationKey.toPrimitive()),
    ]);
  }
}

const missingField = (path: string, label: number): DeserializeError =>
  new DeserializeError({
    message: `${path} is missing label ${label}`,
    cause: label,
    path,
  });
