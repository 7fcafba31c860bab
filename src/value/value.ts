import { Either } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import {
  asFixedSequence,
  asInt,
  Primitive,
} from "../codec/primitive.js";
import { IncomparableTypeError, InvalidOperationError } from "../errors.js";
import { MultiAsset } from "./multi-asset.js";

/**
 * Native coin plus any number of token bundles. The coin is non-negative by
 * convention; nothing here clamps it, subtraction reports a shortfall
 * instead.
 */
export class Value extends CborSerializable {
  readonly _tag = "Value";

  constructor(
    readonly coin: bigint,
    readonly multiAsset: MultiAsset = MultiAsset.empty,
  ) {
    super();
  }

  static fromCoin(coin: bigint | number): Value {
    return new Value(BigInt(coin));
  }

  /** `[coin, multiasset]` */
  static fromPrimitive(value: Primitive, path = "value"): Value {
    const [coin, multiAsset] = asFixedSequence(value, 2, path);
    return new Value(
      asInt(coin, `${path}[0]`),
      MultiAsset.fromPrimitive(multiAsset, `${path}[1]`),
    );
  }

  /**
   * An output amount is either a bare coin or `[coin, multiasset]`.
   */
  static fromAmountPrimitive(value: Primitive, path = "amount"): Value {
    if (value._tag === "Int") {
      return new Value(value.value);
    }
    return Value.fromPrimitive(value, path);
  }

  isCoinOnly(): boolean {
    return this.multiAsset.isEmpty();
  }

  /** Adding a bare integer only touches the coin. */
  add(that: Value | bigint): Value {
    if (typeof that === "bigint") {
      return new Value(this.coin + that, this.multiAsset);
    }
    return new Value(
      this.coin + that.coin,
      this.multiAsset.add(that.multiAsset),
    );
  }

  subtract(that: Value): Either.Either<Value, InvalidOperationError> {
    if (that.coin > this.coin) {
      return Either.left(
        new InvalidOperationError({
          message: "Invalid value subtraction: coin would become negative",
          cause: { minuend: this.coin, subtrahend: that.coin },
        }),
      );
    }
    return this.multiAsset
      .subtract(that.multiAsset)
      .pipe(
        Either.map(
          (multiAsset) => new Value(this.coin - that.coin, multiAsset),
        ),
      );
  }

  isCoveredBy(that: Value): boolean {
    return (
      this.coin <= that.coin && this.multiAsset.isCoveredBy(that.multiAsset)
    );
  }

  lessThanOrEqual(
    that: unknown,
  ): Either.Either<boolean, IncomparableTypeError> {
    if (!(that instanceof Value)) {
      return Either.left(
        new IncomparableTypeError({
          message: "A Value can only be compared with another Value",
          cause: that,
        }),
      );
    }
    return Either.right(this.isCoveredBy(that));
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      Primitive.int(this.coin),
      this.multiAsset.toPrimitive(),
    ]);
  }

  /** Output amount form: bare coin when there are no tokens. */
  toAmountPrimitive(): Primitive {
    return this.isCoinOnly() ? Primitive.int(this.coin) : this.toPrimitive();
  }
}
