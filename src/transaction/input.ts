import { CborSerializable } from "../codec/serializable.js";
import {
  asFixedSequence,
  asSafeUnsigned,
  Primitive,
} from "../codec/primitive.js";
import { InvalidOperationError } from "../errors.js";
import { TransactionId } from "../identifiers.js";

/**
 * Reference to an output of an earlier transaction:
 * `[transaction_id, index]`.
 */
export class TransactionInput extends CborSerializable {
  readonly _tag = "TransactionInput";

  constructor(
    readonly transactionId: TransactionId,
    readonly index: number,
  ) {
    super();
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new InvalidOperationError({
        message: "Output index must be a non-negative integer",
        cause: index,
      });
    }
  }

  static fromPrimitive(
    value: Primitive,
    path = "transaction_input",
  ): TransactionInput {
    const [transactionId, index] = asFixedSequence(value, 2, path);
    return new TransactionInput(
      TransactionId.fromPrimitive(transactionId, `${path}[0]`),
      asSafeUnsigned(index, `${path}[1]`),
    );
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      this.transactionId.toPrimitive(),
      Primitive.int(this.index),
    ]);
  }

  toString(): string {
    return `${this.transactionId.toHex()}#${this.index}`;
  }
}
