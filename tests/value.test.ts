import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { Either, Option } from "effect";
import type { CborSerializable } from "@/codec/serializable.js";
import { fromCborHex } from "@/codec/serializable.js";
import { IncomparableTypeError, InvalidOperationError } from "@/errors.js";
import { AssetName, ScriptHash } from "@/identifiers.js";
import { Asset } from "@/value/asset.js";
import { MultiAsset } from "@/value/multi-asset.js";
import { Value } from "@/value/value.js";
import {
  assertRoundTrip,
  assetArb,
  multiAssetArb,
  narrow,
  narrowGrowth,
  valueArb,
} from "./arbitraries.js";
import {
  assetPrimitive,
  multiAsset,
  policyBytes,
  valuePrimitive,
} from "./utils.js";

const asset = (tokens: Record<string, number>): Asset =>
  Asset.fromPrimitive(assetPrimitive(tokens));

const value = (coin: number, table: Record<string, Record<string, number>>) =>
  Value.fromPrimitive(valuePrimitive(coin, table));

const leq = (a: Asset | MultiAsset | Value, b: unknown): boolean =>
  Either.getOrThrow(a.lessThanOrEqual(b));

const expectSubtraction = <A extends Asset | MultiAsset | Value>(
  result: Either.Either<A, InvalidOperationError>,
): A => {
  expect(Either.isRight(result)).toBe(true);
  return Either.getOrThrow(result);
};

describe("Asset", () => {
  const a = asset({ Token1: 1, Token2: 2 });
  const b = asset({ Token1: 1, Token2: 3 });
  const c = asset({ Token1: 1, Token2: 2, Token3: 3 });
  const d = asset({ Token3: 1, Token4: 2 });

  it("is equal to itself and to a reordered copy", () => {
    expect(a.equals(a)).toBe(true);
    expect(a.equals(asset({ Token2: 2, Token1: 1 }))).toBe(true);
  });

  it("orders bundles by per-name quantity", () => {
    expect(leq(a, b)).toBe(true);
    expect(leq(b, a)).toBe(false);
    expect(a.equals(b)).toBe(false);

    expect(leq(a, c)).toBe(true);
    expect(leq(c, a)).toBe(false);
    expect(a.equals(c)).toBe(false);
  });

  it("leaves disjoint bundles incomparable", () => {
    expect(a.equals(d)).toBe(false);
    expect(leq(a, d)).toBe(false);
    expect(leq(d, a)).toBe(false);
  });

  it("fails to compare with a non-asset", () => {
    const result = a.lessThanOrEqual(1);
    expect(Either.isLeft(result)).toBe(true);
    expect(Either.getLeft(result).pipe(Option.getOrUndefined)).toBeInstanceOf(
      IncomparableTypeError,
    );
  });

  it("adds name-wise", () => {
    expect(a.add(d).equals(asset({ Token1: 1, Token2: 2, Token3: 1, Token4: 2 }))).toBe(true);
    expect(a.add(Asset.empty).equals(a)).toBe(true);
  });

  it("undoes an addition by subtraction", () => {
    expect(expectSubtraction(a.add(d).subtract(d)).equals(a)).toBe(true);
  });

  it("drops names that subtract to exactly zero", () => {
    const rest = expectSubtraction(c.subtract(a));
    expect(rest.equals(asset({ Token3: 3 }))).toBe(true);
    expect(rest.get(AssetName.fromString("Token1"))).toEqual(Option.none());
  });

  it("refuses to subtract more than it holds", () => {
    const result = a.subtract(b);
    expect(Either.isLeft(result)).toBe(true);
    expect(Either.getLeft(result).pipe(Option.getOrUndefined)).toBeInstanceOf(
      InvalidOperationError,
    );
    expect(Either.isLeft(a.subtract(d))).toBe(true);
  });

  it("keeps zero quantities given at construction", () => {
    const zero = asset({ Token1: 0 });
    expect(zero.size).toBe(1);
    expect(zero.get(AssetName.fromString("Token1"))).toEqual(Option.some(0n));
  });

  it("rejects duplicate names", () => {
    const name = AssetName.fromString("Token1");
    expect(() =>
      Asset.make([
        [name, 1n],
        [name, 2n],
      ]),
    ).toThrow(InvalidOperationError);
  });
});

describe("MultiAsset", () => {
  const a = multiAsset({ "1": { Token1: 1, Token2: 2 } });
  const b = multiAsset({
    "1": { Token1: 10, Token2: 20 },
    "2": { Token1: 1, Token2: 2 },
  });

  it("adds policy-wise", () => {
    expect(
      a.add(b).equals(
        multiAsset({
          "1": { Token1: 11, Token2: 22 },
          "2": { Token1: 1, Token2: 2 },
        }),
      ),
    ).toBe(true);
  });

  it("subtracts a covered bundle", () => {
    const difference = expectSubtraction(b.subtract(a));
    expect(
      difference.equals(
        multiAsset({
          "1": { Token1: 9, Token2: 18 },
          "2": { Token1: 1, Token2: 2 },
        }),
      ),
    ).toBe(true);
  });

  it("refuses a subtraction that would go negative", () => {
    expect(Either.isLeft(a.subtract(b))).toBe(true);
  });

  it("removes a policy emptied by subtraction", () => {
    const difference = expectSubtraction(b.subtract(multiAsset({ "2": { Token1: 1, Token2: 2 } })));
    expect(difference.size).toBe(1);
    expect(difference.get(new ScriptHash(policyBytes("2")))).toEqual(
      Option.none(),
    );
  });

  it("looks up quantities by policy and name", () => {
    const policy = new ScriptHash(policyBytes("1"));
    expect(b.quantityOf(policy, AssetName.fromString("Token2"))).toBe(20n);
    expect(b.quantityOf(policy, AssetName.fromString("Token9"))).toBe(0n);
  });

  it("lifts the partial order per policy", () => {
    const more = multiAsset({ "1": { Token1: 1, Token2: 2, Token3: 3 } });
    const other = multiAsset({
      "1": { Token1: 1, Token2: 3 },
      "2": { Token1: 1, Token2: 2 },
    });
    const disjoint = multiAsset({ "2": { Token1: 1, Token2: 2 } });

    expect(a.equals(more)).toBe(false);
    expect(leq(a, more)).toBe(true);
    expect(leq(more, a)).toBe(false);

    expect(a.equals(other)).toBe(false);
    expect(leq(a, other)).toBe(true);
    expect(leq(other, a)).toBe(false);

    expect(a.equals(disjoint)).toBe(false);
    expect(leq(a, disjoint)).toBe(false);
    expect(leq(disjoint, a)).toBe(false);

    expect(Either.isLeft(a.lessThanOrEqual(1))).toBe(true);
  });
});

describe("Value", () => {
  const a = value(1, { "1": { Token1: 1, Token2: 2 } });
  const b = value(11, { "1": { Token1: 11, Token2: 22 } });
  const c = value(11, {
    "1": { Token1: 11, Token2: 22 },
    "2": { Token1: 11, Token2: 22 },
  });

  it("reads and writes the [coin, multiasset] form", () => {
    const v = value(100, {
      "1": { TestToken1: 10_000_000, TestToken2: 20_000_000 },
    });
    const policy = new ScriptHash(policyBytes("1"));
    expect(v.coin).toBe(100n);
    expect(
      v.equals(
        new Value(
          100n,
          MultiAsset.make([
            [
              policy,
              Asset.make([
                [AssetName.fromString("TestToken1"), 10_000_000n],
                [AssetName.fromString("TestToken2"), 20_000_000n],
              ]),
            ],
          ]),
        ),
      ),
    ).toBe(true);
    const hex = v.toCborHex();
    expect(hex).toBe(
      "821864a1581c" +
        "31".repeat(28) +
        "a24a54657374546f6b656e311a009896804a54657374546f6b656e321a01312d00",
    );
    expect(fromCborHex(Value, hex).equals(v)).toBe(true);
  });

  it("orders values by coin and tokens", () => {
    expect(a.equals(b)).toBe(false);
    expect(leq(a, b)).toBe(true);
    expect(leq(b, a)).toBe(false);
    expect(leq(a, c)).toBe(true);
    expect(leq(c, a)).toBe(false);
    expect(leq(b, c)).toBe(true);
    expect(leq(c, b)).toBe(false);
    expect(leq(Value.fromCoin(2), Value.fromCoin(1))).toBe(false);
  });

  it("subtracts covered values", () => {
    expect(
      expectSubtraction(b.subtract(a)).equals(
        value(10, { "1": { Token1: 10, Token2: 20 } }),
      ),
    ).toBe(true);
    expect(
      expectSubtraction(c.subtract(a)).equals(
        value(10, {
          "1": { Token1: 10, Token2: 20 },
          "2": { Token1: 11, Token2: 22 },
        }),
      ),
    ).toBe(true);
  });

  it("adds coin with a bare integer", () => {
    expect(
      a.add(100n).equals(value(101, { "1": { Token1: 1, Token2: 2 } })),
    ).toBe(true);
  });

  it("refuses subtractions that are not covered", () => {
    expect(Either.isLeft(a.subtract(c))).toBe(true);
    expect(Either.isLeft(b.subtract(c))).toBe(true);
    expect(Either.isLeft(Value.fromCoin(1).subtract(Value.fromCoin(2)))).toBe(
      true,
    );
  });

  it("writes a coin-only amount as a bare integer", () => {
    expect(Value.fromCoin(5).isCoinOnly()).toBe(true);
    expect(Value.fromAmountPrimitive(Value.fromCoin(5).toAmountPrimitive()).coin).toBe(5n);
    expect(a.isCoinOnly()).toBe(false);
  });
});

type Bundle<A> = CborSerializable & {
  lessThanOrEqual(that: unknown): Either.Either<boolean, IncomparableTypeError>;
  add(that: A): A;
  subtract(that: A): Either.Either<A, InvalidOperationError>;
};

const orderLaws = <A extends Bundle<A>>(
  arb: fc.Arbitrary<A>,
  growth: fc.Arbitrary<A>,
) => {
  const below = (a: A, b: A): boolean =>
    Either.getOrThrow(a.lessThanOrEqual(b));

  it("is antisymmetric: mutual <= holds exactly for equal values", () => {
    fc.assert(
      fc.property(arb, arb, (a, b) => {
        expect(below(a, b) && below(b, a)).toBe(a.equals(b));
      }),
    );
    fc.assert(
      fc.property(arb, (a) => {
        expect(below(a, a)).toBe(true);
      }),
    );
  });

  it("subtracts whatever it covers and adds it back", () => {
    const subtractThenAdd = (a: A, b: A): void => {
      const difference = b.subtract(a);
      expect(Either.isRight(difference)).toBe(true);
      expect(Either.getOrThrow(difference).add(a).equals(b)).toBe(true);
    };
    fc.assert(
      fc.property(arb, arb, (a, b) => {
        if (below(a, b)) subtractThenAdd(a, b);
      }),
    );
    fc.assert(
      fc.property(arb, growth, (a, c) => {
        const b = a.add(c);
        expect(below(a, b)).toBe(true);
        subtractThenAdd(a, b);
      }),
    );
  });
};

describe("Asset laws", () => {
  it("round-trips through primitives and CBOR", () => {
    assertRoundTrip(Asset, assetArb());
  });
  orderLaws(assetArb(narrow), assetArb(narrowGrowth));
});

describe("MultiAsset laws", () => {
  it("round-trips through primitives and CBOR", () => {
    assertRoundTrip(MultiAsset, multiAssetArb());
  });
  orderLaws(multiAssetArb(narrow), multiAssetArb(narrowGrowth));

  it("does not let an empty bundle under a missing policy compare equal", () => {
    const hollow = MultiAsset.make([
      [new ScriptHash(policyBytes("1")), Asset.empty],
    ]);
    expect(leq(hollow, MultiAsset.empty)).toBe(false);
    expect(leq(MultiAsset.empty, hollow)).toBe(true);
    expect(hollow.equals(MultiAsset.empty)).toBe(false);
  });
});

describe("Value laws", () => {
  it("round-trips through primitives and CBOR", () => {
    assertRoundTrip(Value, valueArb());
  });
  orderLaws(valueArb(narrow), valueArb(narrowGrowth));
});
