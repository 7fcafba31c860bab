import { ed25519 } from "@noble/curves/ed25519";
import { Either, Option } from "effect";
import {
  InvalidKeyMaterialError,
  InvalidSignatureError,
} from "../errors.js";
import type { TransactionBody } from "../transaction/body.js";
import type { Transaction } from "../transaction/transaction.js";
import { VerificationKeyWitness } from "../transaction/witness.js";
import { Signature, SigningKey, VerificationKey } from "./keys.js";

/** Deterministic Ed25519 signature (RFC 8032). */
export const sign = (key: SigningKey, message: Uint8Array): Signature =>
  new Signature(ed25519.sign(message, key.bytes));

/**
 * `false` covers both a signature that does not match and one that is not a
 * valid curve encoding at all.
 */
export const verify = (
  vkey: VerificationKey,
  message: Uint8Array,
  signature: Signature,
): boolean =>
  Either.try(() =>
    ed25519.verify(signature.bytes, message, vkey.bytes),
  ).pipe(Either.getOrElse(() => false));

/**
 * Verification over raw bytes. Inputs of the wrong length are a `Left`, so a
 * structurally broken key or signature is never confused with `Right(false)`.
 */
export const verifyBytes = (
  vkeyBytes: Uint8Array,
  message: Uint8Array,
  signatureBytes: Uint8Array,
): Either.Either<
  boolean,
  InvalidKeyMaterialError | InvalidSignatureError
> =>
  Either.try({
    try: () => new VerificationKey(vkeyBytes),
    catch: (e) =>
      e instanceof InvalidKeyMaterialError
        ? e
        : new InvalidKeyMaterialError({
            message: "Unreadable verification key",
            cause: e,
          }),
  }).pipe(
    Either.flatMap((vkey) =>
      Either.try({
        try: () => verify(vkey, message, new Signature(signatureBytes)),
        catch: (e) =>
          e instanceof InvalidSignatureError
            ? e
            : new InvalidSignatureError({
                message: "Unreadable signature",
                cause: e,
              }),
      }),
    ),
  );

/** Witness over the body hash, which is the transaction id. */
export const signTransactionBody = (
  body: TransactionBody,
  key: SigningKey,
): VerificationKeyWitness =>
  new VerificationKeyWitness(
    key.toVerificationKey(),
    sign(key, body.hash().bytes),
  );

export const verifyWitness = (
  body: TransactionBody,
  witness: VerificationKeyWitness,
): boolean => verify(witness.vkey, body.hash().bytes, witness.signature);

/**
 * Every vkey witness must verify against the body hash, and every required
 * signer must be covered by one of them. A transaction with no vkey
 * witnesses does not verify.
 */
export const verifyTransaction = (tx: Transaction): boolean => {
  const witnesses = Option.getOrElse(tx.witnessSet.vkeyWitnesses, () => []);
  if (witnesses.length === 0) return false;
  if (!witnesses.every((witness) => verifyWitness(tx.body, witness))) {
    return false;
  }
  const signers = new Set(witnesses.map((w) => w.vkey.hash().toHex()));
  return Option.getOrElse(tx.body.requiredSigners, () => []).every((signer) =>
    signers.has(signer.toHex()),
  );
};
