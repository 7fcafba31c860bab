import { Either, Option } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import { asInt, asMap, Primitive, type MapEntry } from "../codec/primitive.js";
import { IncomparableTypeError, InvalidOperationError } from "../errors.js";
import { AssetName } from "../identifiers.js";

type AssetEntry = {
  readonly name: AssetName;
  readonly quantity: bigint;
};

/**
 * Quantities of the tokens of a single policy, keyed by asset name.
 *
 * Entries are never dropped implicitly: a zero or negative quantity stays in
 * the bundle. The one exception is `subtract`, which removes a name the
 * subtrahend also holds when the difference is exactly zero, so that
 * `a.add(b).subtract(b)` gives back `a`.
 */
export class Asset extends CborSerializable {
  readonly _tag = "Asset";
  readonly #entries: ReadonlyMap<string, AssetEntry>;

  private constructor(entries: ReadonlyMap<string, AssetEntry>) {
    super();
    this.#entries = entries;
  }

  static readonly empty: Asset = new Asset(new Map());

  static make(
    entries: Iterable<readonly [AssetName, bigint | number]>,
  ): Asset {
    const map = new Map<string, AssetEntry>();
    for (const [name, quantity] of entries) {
      const key = name.toHex();
      if (map.has(key)) {
        throw new InvalidOperationError({
          message: "Duplicate asset name",
          cause: key,
        });
      }
      map.set(key, { name, quantity: BigInt(quantity) });
    }
    return new Asset(map);
  }

  static fromPrimitive(value: Primitive, path = "asset"): Asset {
    return Asset.make(
      asMap(value, path).map(([k, v]) => {
        const name = AssetName.fromPrimitive(k, `${path}.<key>`);
        return [name, asInt(v, `${path}{${name.toHex()}}`)] as const;
      }),
    );
  }

  get size(): number {
    return this.#entries.size;
  }

  isEmpty(): boolean {
    return this.#entries.size === 0;
  }

  get(name: AssetName): Option.Option<bigint> {
    return Option.fromNullable(this.#entries.get(name.toHex())).pipe(
      Option.map((entry) => entry.quantity),
    );
  }

  *entries(): IterableIterator<[AssetName, bigint]> {
    for (const { name, quantity } of this.#entries.values()) {
      yield [name, quantity];
    }
  }

  add(that: Asset): Asset {
    const sum = new Map(this.#entries);
    for (const [key, { name, quantity }] of that.#entries) {
      const current = sum.get(key)?.quantity ?? 0n;
      sum.set(key, { name, quantity: current + quantity });
    }
    return new Asset(sum);
  }

  /** Fails unless `that` is covered by this bundle (see `isCoveredBy`). */
  subtract(that: Asset): Either.Either<Asset, InvalidOperationError> {
    if (!that.isCoveredBy(this)) {
      return Either.left(
        new InvalidOperationError({
          message: "Invalid asset subtraction: subtrahend exceeds minuend",
          cause: { minuend: this.toCborHex(), subtrahend: that.toCborHex() },
        }),
      );
    }
    const difference = new Map(this.#entries);
    for (const [key, { name, quantity }] of that.#entries) {
      const current = difference.get(key)?.quantity ?? 0n;
      const remaining = current - quantity;
      if (remaining === 0n) {
        difference.delete(key);
      } else {
        difference.set(key, { name, quantity: remaining });
      }
    }
    return Either.right(new Asset(difference));
  }

  /**
   * Partial order: every name held here is also held by `that` with at least
   * the same quantity. Names only `that` holds don't matter.
   */
  isCoveredBy(that: Asset): boolean {
    for (const [key, { quantity }] of this.#entries) {
      const other = that.#entries.get(key);
      if (other === undefined || quantity > other.quantity) {
        return false;
      }
    }
    return true;
  }

  lessThanOrEqual(that: unknown): Either.Either<boolean, IncomparableTypeError> {
    if (!(that instanceof Asset)) {
      return Either.left(
        new IncomparableTypeError({
          message: "An Asset can only be compared with another Asset",
          cause: that,
        }),
      );
    }
    return Either.right(this.isCoveredBy(that));
  }

  toPrimitive(): Primitive {
    return Primitive.map(
      [...this.#entries.values()].map(({ name, quantity }): MapEntry => [
        name.toPrimitive(),
        Primitive.int(quantity),
      ]),
    );
  }
}
