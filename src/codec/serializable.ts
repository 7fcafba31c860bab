import { Equal, Hash } from "effect";
import { bytesEqual, fromHex, toHex } from "../utils.js";
import { decodePrimitive, encodePrimitive } from "./cbor.js";
import type { Primitive } from "./primitive.js";

export interface PrimitiveEncodable {
  toPrimitive(): Primitive;
}

/**
 * Decoding half of the codec contract. Classes implement it as a static
 * `fromPrimitive`, so the class itself can be passed wherever a decoder is
 * expected.
 */
export interface PrimitiveDecoder<A> {
  fromPrimitive(value: Primitive, path?: string): A;
}

/**
 * Base class of every ledger type. Subclasses only provide `toPrimitive`
 * (and a static `fromPrimitive`); bytes, hex and value equality follow from
 * the canonical encoding, which is unique per logical value.
 */
export abstract class CborSerializable
  implements PrimitiveEncodable, Equal.Equal
{
  abstract toPrimitive(): Primitive;

  toCbor(): Uint8Array {
    return encodePrimitive(this.toPrimitive());
  }

  toCborHex(): string {
    return toHex(this.toCbor());
  }

  equals(that: unknown): boolean {
    return (
      that instanceof CborSerializable &&
      that.constructor === this.constructor &&
      bytesEqual(this.toCbor(), that.toCbor())
    );
  }

  [Equal.symbol](that: Equal.Equal): boolean {
    return this.equals(that);
  }

  [Hash.symbol](): number {
    return Hash.string(this.toCborHex());
  }
}

export const fromCbor = <A>(
  decoder: PrimitiveDecoder<A>,
  bytes: Uint8Array,
): A => decoder.fromPrimitive(decodePrimitive(bytes));

export const fromCborHex = <A>(decoder: PrimitiveDecoder<A>, hex: string): A =>
  fromCbor(decoder, fromHex(hex));

export const sequenceToPrimitive = (
  items: ReadonlyArray<PrimitiveEncodable>,
): ReadonlyArray<Primitive> => items.map((item) => item.toPrimitive());
