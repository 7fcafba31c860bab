import { Either, Option } from "effect";
import { CborSerializable } from "../codec/serializable.js";
import { asMap, Primitive, type MapEntry } from "../codec/primitive.js";
import { IncomparableTypeError, InvalidOperationError } from "../errors.js";
import { AssetName, ScriptHash } from "../identifiers.js";
import { Asset } from "./asset.js";

type PolicyEntry = {
  readonly policyId: ScriptHash;
  readonly asset: Asset;
};

/**
 * Token bundles grouped by minting policy. The same structure doubles as the
 * body's `mint` field, where negative quantities mean burning.
 */
export class MultiAsset extends CborSerializable {
  readonly _tag = "MultiAsset";
  readonly #policies: ReadonlyMap<string, PolicyEntry>;

  private constructor(policies: ReadonlyMap<string, PolicyEntry>) {
    super();
    this.#policies = policies;
  }

  static readonly empty: MultiAsset = new MultiAsset(new Map());

  static make(entries: Iterable<readonly [ScriptHash, Asset]>): MultiAsset {
    const map = new Map<string, PolicyEntry>();
    for (const [policyId, asset] of entries) {
      const key = policyId.toHex();
      if (map.has(key)) {
        throw new InvalidOperationError({
          message: "Duplicate policy id",
          cause: key,
        });
      }
      map.set(key, { policyId, asset });
    }
    return new MultiAsset(map);
  }

  static fromPrimitive(value: Primitive, path = "multiasset"): MultiAsset {
    return MultiAsset.make(
      asMap(value, path).map(([k, v]) => {
        const policyId = ScriptHash.fromPrimitive(k, `${path}.<key>`);
        return [
          policyId,
          Asset.fromPrimitive(v, `${path}{${policyId.toHex()}}`),
        ] as const;
      }),
    );
  }

  get size(): number {
    return this.#policies.size;
  }

  isEmpty(): boolean {
    return this.#policies.size === 0;
  }

  get(policyId: ScriptHash): Option.Option<Asset> {
    return Option.fromNullable(this.#policies.get(policyId.toHex())).pipe(
      Option.map((entry) => entry.asset),
    );
  }

  quantityOf(policyId: ScriptHash, name: AssetName): bigint {
    return this.get(policyId).pipe(
      Option.flatMap((asset) => asset.get(name)),
      Option.getOrElse(() => 0n),
    );
  }

  *entries(): IterableIterator<[ScriptHash, Asset]> {
    for (const { policyId, asset } of this.#policies.values()) {
      yield [policyId, asset];
    }
  }

  /** Every `(policy, name, quantity)` triple; the pairs are unique. */
  *flatten(): IterableIterator<[ScriptHash, AssetName, bigint]> {
    for (const { policyId, asset } of this.#policies.values()) {
      for (const [name, quantity] of asset.entries()) {
        yield [policyId, name, quantity];
      }
    }
  }

  add(that: MultiAsset): MultiAsset {
    const sum = new Map(this.#policies);
    for (const [key, { policyId, asset }] of that.#policies) {
      const current = sum.get(key)?.asset ?? Asset.empty;
      sum.set(key, { policyId, asset: current.add(asset) });
    }
    return new MultiAsset(sum);
  }

  /**
   * Ledger-balance subtraction: fails with `InvalidOperationError` unless
   * `that <= this`. A policy named by `that` whose bundle becomes empty is
   * removed.
   */
  subtract(that: MultiAsset): Either.Either<MultiAsset, InvalidOperationError> {
    if (!that.isCoveredBy(this)) {
      return Either.left(
        new InvalidOperationError({
          message: "Invalid multi-asset subtraction: subtrahend exceeds minuend",
          cause: { minuend: this.toCborHex(), subtrahend: that.toCborHex() },
        }),
      );
    }
    const difference = new Map(this.#policies);
    for (const [key, { policyId, asset }] of that.#policies) {
      const current = difference.get(key)?.asset ?? Asset.empty;
      const remaining = Either.getOrThrow(current.subtract(asset));
      if (remaining.isEmpty()) {
        difference.delete(key);
      } else {
        difference.set(key, { policyId, asset: remaining });
      }
    }
    return Either.right(new MultiAsset(difference));
  }

  /**
   * Every policy held here is held by `that` with a covering bundle. A
   * policy `that` lacks is not covered, even when its bundle is empty.
   */
  isCoveredBy(that: MultiAsset): boolean {
    for (const [key, { asset }] of this.#policies) {
      const other = that.#policies.get(key);
      if (other === undefined || !asset.isCoveredBy(other.asset)) {
        return false;
      }
    }
    return true;
  }

  lessThanOrEqual(
    that: unknown,
  ): Either.Either<boolean, IncomparableTypeError> {
    if (!(that instanceof MultiAsset)) {
      return Either.left(
        new IncomparableTypeError({
          message: "A MultiAsset can only be compared with another MultiAsset",
          cause: that,
        }),
      );
    }
    return Either.right(this.isCoveredBy(that));
  }

  toPrimitive(): Primitive {
    return Primitive.map(
      [...this.#policies.values()].map(
        ({ policyId, asset }): MapEntry => [
          policyId.toPrimitive(),
          asset.toPrimitive(),
        ],
      ),
    );
  }
}
