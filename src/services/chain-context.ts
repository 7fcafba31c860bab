import { Context, Effect, Option } from "effect";
import type { ChainQueryError, SubmitError } from "../errors.js";
import type { TransactionId } from "../identifiers.js";

/**
 * One metadata label of a confirmed transaction, in the indexer's JSON form
 * (`label` is the decimal label, `jsonMetadata` the "no schema" JSON).
 */
export type MetadataEntry = {
  readonly label: string;
  readonly jsonMetadata: unknown;
};

/**
 * Everything the toolkit needs from a chain backend. The library itself
 * performs no network I/O; callers provide a layer over their indexer or
 * node client.
 */
export type ChainContextDep = {
  /** `None` when the transaction carries no metadata at all. */
  readonly fetchMetadata: (
    txId: TransactionId,
  ) => Effect.Effect<
    Option.Option<ReadonlyArray<MetadataEntry>>,
    ChainQueryError
  >;
  readonly submit: (
    transactionBytes: Uint8Array,
  ) => Effect.Effect<TransactionId, SubmitError>;
};

export class ChainContext extends Context.Tag("ChainContext")<
  ChainContext,
  ChainContextDep
>() {}
