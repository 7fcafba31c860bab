import { Option } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import { asBytes, asFixedSequence, Primitive } from "../codec/primitive.js";
import { DatumHash } from "../identifiers.js";
import { copyBytes, toHex } from "../utils.js";
import { Value } from "../value/value.js";

/**
 * `[address, amount, ? datum_hash]`
 *
 * The address is kept as raw bytes; turning it into (or out of) its bech32
 * text form is left to the caller.
 */
export class TransactionOutput extends CborSerializable {
  readonly _tag = "TransactionOutput";
  readonly #address: Uint8Array;
  readonly amount: Value;
  readonly datumHash: Option.Option<DatumHash>;

  constructor(
    address: Uint8Array,
    amount: Value | bigint | number,
    datumHash: Option.Option<DatumHash> = Option.none(),
  ) {
    super();
    this.#address = copyBytes(address);
    this.amount = amount instanceof Value ? amount : Value.fromCoin(amount);
    this.datumHash = datumHash;
  }

  static fromPrimitive(
    value: Primitive,
    path = "transaction_output",
  ): TransactionOutput {
    const items = asFixedSequence(value, [2, 3], path);
    return new TransactionOutput(
      asBytes(items[0], `${path}[0]`),
      Value.fromAmountPrimitive(items[1], `${path}[1]`),
      items.length === 3
        ? Option.some(DatumHash.fromPrimitive(items[2], `${path}[2]`))
        : Option.none(),
    );
  }

  get address(): Uint8Array {
    return copyBytes(this.#address);
  }

  get addressHex(): string {
    return toHex(this.#address);
  }

  toPrimitive(): Primitive {
    return Primitive.sequence([
      Primitive.bytes(this.#address),
      this.amount.toAmountPrimitive(),
      ...Option.toArray(this.datumHash).map((hash) => hash.toPrimitive()),
    ]);
  }
}
