import { Effect, Option } from "effect";
import type { SigningKey } from "../crypto/keys.js";
import { signTransactionBody } from "../crypto/signing.js";
import {
  InvalidOperationError,
  NetworkMismatchError,
  type SubmitError,
} from "../errors.js";
import type { TransactionId } from "../identifiers.js";
import { ChainContext } from "../services/chain-context.js";
import { ToolkitConfig } from "../services/config.js";
import type { TransactionBody } from "../transaction/body.js";
import type { AuxiliaryData } from "../transaction/metadata.js";
import { Transaction } from "../transaction/transaction.js";
import { TransactionWitnessSet } from "../transaction/witness.js";

export type SignTransactionOptions = {
  readonly auxiliaryData?: AuxiliaryData;
};

/**
 * Signs `body` with every key, one vkey witness each, in key order. When
 * auxiliary data is given its hash must already be in the body.
 */
export const signTransaction = (
  body: TransactionBody,
  keys: ReadonlyArray<SigningKey>,
  options: SignTransactionOptions = {},
): Effect.Effect<Transaction, InvalidOperationError> =>
  Effect.gen(function* () {
    const txId = body.hash().toHex();
    if (keys.length === 0) {
      return yield* Effect.fail(
        new InvalidOperationError({
          message: `No signing keys given for transaction ${txId}`,
          cause: keys,
        }),
      );
    }
    const auxiliaryData = Option.fromNullable(options.auxiliaryData);
    if (
      Option.isSome(auxiliaryData) &&
      !Option.exists(body.auxiliaryDataHash, (hash) =>
        hash.equals(auxiliaryData.value.hash()),
      )
    ) {
      return yield* Effect.fail(
        new InvalidOperationError({
          message: `Body of ${txId} does not commit to the given auxiliary data`,
          cause: auxiliaryData.value.hash().toHex(),
        }),
      );
    }
    yield* Effect.logDebug(`Signing ${txId} with ${keys.length} key(s)`);
    const witnessSet = keys.reduce(
      (set, key) => set.withVkeyWitness(signTransactionBody(body, key)),
      TransactionWitnessSet.empty,
    );
    yield* Effect.logInfo(`Signed transaction ${txId}`);
    return new Transaction(body, witnessSet, { auxiliaryData });
  });

/**
 * Checks the body's network id against the configured network, then hands
 * the signed bytes to the chain backend.
 */
export const submitTransaction = (
  tx: Transaction,
): Effect.Effect<
  TransactionId,
  NetworkMismatchError | InvalidOperationError | SubmitError,
  ToolkitConfig | ChainContext
> =>
  Effect.gen(function* () {
    const config = yield* ToolkitConfig;
    const chain = yield* ChainContext;
    const txId = tx.id;
    if (
      Option.isSome(tx.body.networkId) &&
      tx.body.networkId.value !== config.NETWORK_ID
    ) {
      return yield* Effect.fail(
        new NetworkMismatchError({
          message: `Transaction ${txId.toHex()} targets network ${tx.body.networkId.value}, configured for ${config.NETWORK}`,
          cause: tx.body.networkId.value,
          expected: config.NETWORK_ID,
          actual: tx.body.networkId.value,
        }),
      );
    }
    const bytes = yield* tx.toSubmissionBytes();
    yield* Effect.logInfo(
      `Submitting ${txId.toHex()} (${bytes.length} bytes) to ${config.NETWORK}`,
    );
    const submittedId = yield* chain.submit(bytes);
    if (!submittedId.equals(txId)) {
      yield* Effect.logWarning(
        `Backend reported id ${submittedId.toHex()} for ${txId.toHex()}`,
      );
    }
    yield* Effect.logInfo(`Submitted transaction ${submittedId.toHex()}`);
    return submittedId;
  }).pipe(
    Effect.tapErrorTag("SubmitError", (e) =>
      Effect.logError(`SubmitError: ${e.message}`),
    ),
  );
