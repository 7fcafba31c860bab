import { Either, Option } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import { asBool, asFixedSequence, Primitive } from "../codec/primitive.js";
import { InvalidOperationError } from "../errors.js";
import type { TransactionId } from "../identifiers.js";
import { TransactionBody } from "./body.js";
import { AuxiliaryData } from "./metadata.js";
import { TransactionWitnessSet } from "./witness.js";

export type TransactionOptions = {
  readonly valid?: boolean;
  readonly auxiliaryData?: Option.Option<AuxiliaryData>;
};

/**
 * `[body, witness_set, is_valid, auxiliary_data / null]`
 *
 * The three-element form without `is_valid` is accepted on decode and
 * treated as valid.
 */
export class Transaction extends CborSerializable {
  readonly _tag = "Transaction";
  readonly valid: boolean;
  readonly auxiliaryData: Option.Option<AuxiliaryData>;

  constructor(
    readonly body: TransactionBody,
    readonly witnessSet: TransactionWitnessSet,
    options: TransactionOptions = {},
  ) {
    super();
    this.valid = options.valid ?? true;
    this.auxiliaryData = options.auxiliaryData ?? Option.none();
  }

  static fromPrimitive(value: Primitive, path = "transaction"): Transaction {
    const items = asFixedSequence(value, [3, 4], path);
    const auxiliaryData = items[items.length - 1];
    return new Transaction(
      TransactionBody.fromPrimitive(items[0], `${path}[0]`),
      TransactionWitnessSet.fromPrimitive(items[1], `${path}[1]`),
      {
        valid: items.length === 4 ? asBool(items[2], `${path}[2]`) : true,
        auxiliaryData:
          auxiliaryData._tag === "Null"
            ? Option.none()
            : Option.some(
                AuxiliaryData.fromPrimitive(
                  auxiliaryData,
                  `${path}[${items.length - 1}]`,
                ),
              ),
      },
    );
  }

  get id(): TransactionId {
    return this.body.hash();
  }

  /** Copy carrying `witnessSet` instead of the current one. */
  withWitnessSet(witnessSet: TransactionWitnessSet): Transaction {
    return new Transaction(this.body, witnessSet, {
      valid: this.valid,
      auxiliaryData: this.auxiliaryData,
    });
  }

  /**
   * Bytes ready to hand to a node. A transaction without a single witness or
   * script is rejected, even when its witness set carries empty lists.
   */
  toSubmissionBytes(): Either.Either<Uint8Array, InvalidOperationError> {
    if (this.witnessSet.witnessCount() === 0) {
      return Either.left(
        new InvalidOperationError({
          message: `Transaction ${this.id.toHex()} carries no witnesses`,
          cause: this.witnessSet,
        }),
      );
    }
    return Either.right(this.toCbor());
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      this.body.toPrimitive(),
      this.witnessSet.toPrimitive(),
      Primitive.bool(this.valid),
      Option.match(this.auxiliaryData, {
        onNone: () => Primitive.null(),
        onSome: (data) => data.toPrimitive(),
      }),
    ]);
  }
}
