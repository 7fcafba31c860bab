import { Either, Option, Schema } from "effect";
import { paymentKeyHash } from "../address.js";
import { asBytes, asBool, Primitive } from "../codec/primitive.js";
import { fromCbor } from "../codec/serializable.js";
import { Signature, SigningKey, VerificationKey } from "../crypto/keys.js";
import { sign, verify } from "../crypto/signing.js";
import { DeserializeError } from "../errors.js";
import { bytesToUtf8, fromHex, utf8ToBytes } from "../utils.js";
import {
  ADDRESS_HEADER,
  COSE_ALG_EDDSA,
  CoseHeaderLabel,
  CoseKey,
  CoseSign1,
  encodeProtectedHeader,
  HASHED_HEADER,
  headerEntry,
  headerValue,
  sigStructure,
} from "./cose.js";

/**
 * Hex interchange form of a signed message. `key` is present when the
 * verification key travels as a separate `COSE_Key` instead of the `kid`
 * header.
 */
export const SignedEnvelopeSchema = Schema.Struct({
  signature: Schema.String,
  key: Schema.optional(Schema.String),
});
export type SignedEnvelope = typeof SignedEnvelopeSchema.Type;

export type EnvelopeOptions = {
  /** Raw address bytes placed in the protected `"address"` header. */
  readonly address?: Uint8Array;
  readonly attachCoseKey?: boolean;
};

/**
 * `payload` is the signed payload exactly as carried by the envelope;
 * `message` is its UTF-8 reading, lossy for payloads that are not text.
 */
export type EnvelopeVerification = {
  readonly verified: boolean;
  readonly payload: Uint8Array;
  readonly message: string;
  readonly signingAddress: Option.Option<Uint8Array>;
};

const rejected = (): EnvelopeVerification => ({
  verified: false,
  payload: new Uint8Array(0),
  message: "",
  signingAddress: Option.none(),
});

export const buildEnvelope = (
  payload: Uint8Array | string,
  signingKey: SigningKey,
  options: EnvelopeOptions = {},
): SignedEnvelope => {
  const vkey = signingKey.toVerificationKey();
  const payloadBytes =
    typeof payload === "string" ? utf8ToBytes(payload) : payload;
  const protectedBytes = encodeProtectedHeader([
    headerEntry(CoseHeaderLabel.Algorithm, Primitive.int(COSE_ALG_EDDSA)),
    ...(options.attachCoseKey
      ? []
      : [headerEntry(CoseHeaderLabel.KeyId, vkey.toPrimitive())]),
    ...(options.address === undefined
      ? []
      : [headerEntry(ADDRESS_HEADER, Primitive.bytes(options.address))]),
  ]);
  const signature = sign(signingKey, sigStructure(protectedBytes, payloadBytes));
  const message = new CoseSign1(
    protectedBytes,
    [headerEntry(HASHED_HEADER, Primitive.bool(false))],
    payloadBytes,
    signature.bytes,
  );
  return options.attachCoseKey
    ? {
        signature: message.toCborHex(),
        key: new CoseKey(vkey).toCborHex(),
      }
    : { signature: message.toCborHex() };
};

type ParsedEnvelope = {
  readonly message: CoseSign1;
  readonly vkey: VerificationKey;
  readonly address: Option.Option<Uint8Array>;
};

const parseEnvelope = (envelope: SignedEnvelope): ParsedEnvelope => {
  const message = fromCbor(CoseSign1, fromHex(envelope.signature));
  const protectedHeader = message.protectedHeader;
  const algorithm = headerValue(protectedHeader, CoseHeaderLabel.Algorithm);
  if (
    !Option.exists(algorithm, (alg) =>
      alg._tag === "Int" ? alg.value === BigInt(COSE_ALG_EDDSA) : false,
    )
  ) {
    throw new DeserializeError({
      message: "Only EdDSA signed messages are supported",
      cause: algorithm,
      path: "cose_sign1.protected{1}",
    });
  }
  const hashed = headerValue(message.unprotectedHeader, HASHED_HEADER).pipe(
    Option.map((value) => asBool(value, "cose_sign1.unprotected{hashed}")),
  );
  if (Option.getOrElse(hashed, () => false)) {
    throw new DeserializeError({
      message: "Hashed payloads are not supported",
      cause: HASHED_HEADER,
      path: "cose_sign1.unprotected{hashed}",
    });
  }
  const vkey =
    envelope.key === undefined
      ? VerificationKey.fromPrimitive(
          Option.getOrThrowWith(
            headerValue(protectedHeader, CoseHeaderLabel.KeyId),
            () =>
              new DeserializeError({
                message: "Envelope carries neither a COSE key nor a kid",
                cause: envelope,
                path: "cose_sign1.protected{4}",
              }),
          ),
          "cose_sign1.protected{4}",
        )
      : fromCbor(CoseKey, fromHex(envelope.key)).verificationKey;
  const address = headerValue(protectedHeader, ADDRESS_HEADER).pipe(
    Option.map((value) => asBytes(value, "cose_sign1.protected{address}")),
  );
  return { message, vkey, address };
};

/**
 * Checks the signature against the embedded (or attached) key and, when an
 * address header is present, that its payment key hash is the key's hash.
 * Every failure, malformed input included, is reported as
 * `verified: false`.
 */
export const verifyEnvelope = (
  envelope: SignedEnvelope,
): EnvelopeVerification =>
  Either.try(() => parseEnvelope(envelope)).pipe(
    Either.match({
      onLeft: rejected,
      onRight: ({ message, vkey, address }): EnvelopeVerification => {
        const signatureValid = Either.try(() =>
          verify(vkey, message.signedData(), new Signature(message.signature)),
        ).pipe(Either.getOrElse(() => false));
        const addressValid = Option.match(address, {
          onNone: () => true,
          onSome: (bytes) =>
            Option.exists(paymentKeyHash(bytes), (hash) =>
              hash.equals(vkey.hash()),
            ),
        });
        const payload = message.payload;
        return {
          verified: signatureValid && addressValid,
          payload,
          message: bytesToUtf8(payload),
          signingAddress: address,
        };
      },
    }),
  );

const decodeEnvelopeJson = Schema.decodeUnknownEither(
  Schema.parseJson(SignedEnvelopeSchema),
);

export const envelopeFromJson = (
  json: string,
): Either.Either<SignedEnvelope, DeserializeError> =>
  decodeEnvelopeJson(json).pipe(
    Either.mapLeft(
      (e) =>
        new DeserializeError({
          message: "Malformed signed message envelope",
          cause: e,
          path: "envelope",
        }),
    ),
  );

export const envelopeToJson = (envelope: SignedEnvelope): string =>
  JSON.stringify(envelope);

export const coseKeyHex = (vkey: VerificationKey): string =>
  new CoseKey(vkey).toCborHex();
