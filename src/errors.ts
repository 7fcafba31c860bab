import { Data as EffectData } from "effect";

export type GenericErrorFields = {
  readonly message: string;
  readonly cause: unknown;
};

export class SizeMismatchError extends EffectData.TaggedError(
  "SizeMismatchError",
)<
  GenericErrorFields & {
    readonly expected: number;
    readonly actual: number;
  }
> {}

export class InvalidHexError extends EffectData.TaggedError(
  "InvalidHexError",
)<GenericErrorFields> {}

/**
 * A primitive tree (or the CBOR bytes behind it) does not have the shape the
 * target type expects. `path` points at the offending node, e.g.
 * `transaction_body[1][0].amount`.
 */
export class DeserializeError extends EffectData.TaggedError(
  "DeserializeError",
)<GenericErrorFields & { readonly path: string }> {}

export class SerializeError extends EffectData.TaggedError(
  "SerializeError",
)<GenericErrorFields> {}

export class InvalidOperationError extends EffectData.TaggedError(
  "InvalidOperationError",
)<GenericErrorFields> {}

export class IncomparableTypeError extends EffectData.TaggedError(
  "IncomparableTypeError",
)<GenericErrorFields> {}

export class InvalidKeyMaterialError extends EffectData.TaggedError(
  "InvalidKeyMaterialError",
)<GenericErrorFields> {}

export class InvalidSignatureError extends EffectData.TaggedError(
  "InvalidSignatureError",
)<GenericErrorFields> {}

export class ChainQueryError extends EffectData.TaggedError(
  "ChainQueryError",
)<GenericErrorFields> {}

export class SubmitError extends EffectData.TaggedError(
  "SubmitError",
)<GenericErrorFields> {}

export class NetworkMismatchError extends EffectData.TaggedError(
  "NetworkMismatchError",
)<
  GenericErrorFields & {
    readonly expected: number;
    readonly actual: number;
  }
> {}
