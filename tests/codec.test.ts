import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { decodePrimitive, encodePrimitive } from "@/codec/cbor.js";
import {
  asFixedSequence,
  asSetLike,
  asUnsigned,
  Primitive,
  primitiveEquals,
  setLikePrimitive,
  type MapEntry,
} from "@/codec/primitive.js";
import { DeserializeError, SerializeError } from "@/errors.js";
import { fromHex, toHex } from "@/utils.js";

const encodeHex = (p: Primitive): string => toHex(encodePrimitive(p));
const decodeHex = (hex: string): Primitive => decodePrimitive(fromHex(hex));

const primitiveArb: fc.Arbitrary<Primitive> = fc.letrec<{
  node: Primitive;
}>((tie) => ({
  node: fc.oneof(
    { maxDepth: 3 },
    fc
      .bigInt({ min: -(2n ** 70n), max: 2n ** 70n })
      .map((n) => Primitive.int(n)),
    fc.uint8Array({ maxLength: 40 }).map((b) => Primitive.bytes(b)),
    fc.string({ maxLength: 20 }).map((s) => Primitive.text(s)),
    fc.boolean().map((b) => Primitive.bool(b)),
    fc.constant(Primitive.null()),
    fc.array(tie("node"), { maxLength: 4 }).map((items) =>
      Primitive.sequence(items),
    ),
    fc
      .uniqueArray(fc.tuple(fc.bigInt({ min: -100n, max: 100n }), tie("node")), {
        maxLength: 4,
        selector: ([k]) => k,
      })
      .map((entries) =>
        Primitive.map(
          entries.map(([k, v]): MapEntry => [Primitive.int(k), v]),
        ),
      ),
    fc
      .tuple(fc.constantFrom(121, 122, 258, 1280), tie("node"))
      .map(([tag, value]) => Primitive.tagged(tag, value)),
  ),
})).node;

describe("primitive encoding", () => {
  it("uses minimal-length integer heads", () => {
    expect(encodeHex(Primitive.int(0))).toBe("00");
    expect(encodeHex(Primitive.int(23))).toBe("17");
    expect(encodeHex(Primitive.int(24))).toBe("1818");
    expect(encodeHex(Primitive.int(256))).toBe("190100");
    expect(encodeHex(Primitive.int(65_536))).toBe("1a00010000");
    expect(encodeHex(Primitive.int(2n ** 32n))).toBe("1b0000000100000000");
    expect(encodeHex(Primitive.int(-1))).toBe("20");
    expect(encodeHex(Primitive.int(-25))).toBe("3818");
  });

  it("writes integers beyond 64 bits as bignums", () => {
    expect(encodeHex(Primitive.int(2n ** 64n - 1n))).toBe("1bffffffffffffffff");
    expect(encodeHex(Primitive.int(2n ** 64n))).toBe("c249010000000000000000");
    expect(encodeHex(Primitive.int(-(2n ** 64n) - 1n))).toBe(
      "c349010000000000000000",
    );
  });

  it("writes scalars and containers with definite lengths", () => {
    expect(encodeHex(Primitive.text("hi"))).toBe("626869");
    expect(encodeHex(Primitive.bool(true))).toBe("f5");
    expect(encodeHex(Primitive.null())).toBe("f6");
    expect(encodeHex(Primitive.bytes(new Uint8Array([1, 2])))).toBe("420102");
    expect(encodeHex(Primitive.sequence([]))).toBe("80");
    expect(encodeHex(Primitive.map([]))).toBe("a0");
    expect(encodeHex(Primitive.tagged(121, Primitive.sequence([])))).toBe(
      "d87980",
    );
  });

  it("sorts map keys by their encoded bytes", () => {
    const map = Primitive.map([
      [Primitive.text("b"), Primitive.int(1)],
      [Primitive.int(10), Primitive.int(2)],
      [Primitive.int(1), Primitive.int(3)],
    ]);
    expect(encodeHex(map)).toBe("a301030a02616201");
  });

  it("orders a one-byte negative key after a two-byte positive key", () => {
    const map = Primitive.map([
      [Primitive.int(-1), Primitive.int(0)],
      [Primitive.int(24), Primitive.int(0)],
    ]);
    expect(encodeHex(map)).toBe("a21818002000");
  });

  it("refuses to encode duplicate map keys", () => {
    const map = Primitive.map([
      [Primitive.int(1), Primitive.int(1)],
      [Primitive.int(1), Primitive.int(2)],
    ]);
    expect(() => encodePrimitive(map)).toThrow(SerializeError);
  });
});

describe("primitive decoding", () => {
  it("folds bignum tags into integers", () => {
    expect(
      primitiveEquals(
        decodeHex("c249010000000000000000"),
        Primitive.int(2n ** 64n),
      ),
    ).toBe(true);
    expect(
      primitiveEquals(
        decodeHex("c349010000000000000000"),
        Primitive.int(-(2n ** 64n) - 1n),
      ),
    ).toBe(true);
  });

  it("keeps supported tags", () => {
    const decoded = decodeHex("d901028101");
    expect(
      primitiveEquals(
        decoded,
        Primitive.tagged(258, Primitive.sequence([Primitive.int(1)])),
      ),
    ).toBe(true);
    const set = asSetLike(decoded, "$");
    expect(set.tagged).toBe(true);
    expect(set.items).toHaveLength(1);
    expect(asSetLike(decodeHex("8101"), "$").tagged).toBe(false);
    expect(toHex(encodePrimitive(setLikePrimitive(set.items, true)))).toBe(
      "d901028101",
    );
  });

  it.each([
    ["trailing bytes", "0000"],
    ["an indefinite-length array", "9f01ff"],
    ["a non-minimal integer head", "1817"],
    ["duplicate map keys", "a201010102"],
    ["a fractional float", "fb3ff8000000000000"],
    ["an integral half float", "f93c00"],
    ["an integral single float", "fa3f800000"],
    ["an integral double float", "fb3ff0000000000000"],
    ["a float nested in an array", "8201f93c00"],
    ["a float as a map value", "a101f93c00"],
    ["a float behind a tag", "d90102f93c00"],
    ["a bignum within the 64-bit range", "c24101"],
    ["a bignum of the largest 64-bit value", "c248ffffffffffffffff"],
    ["a bignum with a leading zero byte", "c24a00010000000000000000"],
    ["an empty bignum", "c340"],
    ["undefined", "f7"],
    ["an unsupported tag", "c100"],
    ["truncated input", "8201"],
  ])("rejects %s", (_, hex) => {
    expect(() => decodeHex(hex)).toThrow(DeserializeError);
  });

  it("reports the path of a shape mismatch", () => {
    const error = (() => {
      try {
        asUnsigned(Primitive.int(-1), "body{2}");
      } catch (e) {
        return e;
      }
    })();
    expect(error).toBeInstanceOf(DeserializeError);
    expect(error instanceof DeserializeError ? error.path : "").toBe("body{2}");
  });

  it("checks fixed sequence arity", () => {
    const pair = Primitive.sequence([Primitive.int(1), Primitive.int(2)]);
    expect(asFixedSequence(pair, [2, 3], "$")).toHaveLength(2);
    expect(() => asFixedSequence(pair, 3, "$")).toThrow(DeserializeError);
  });

  it("re-encodes anything it decoded to the same bytes", () => {
    fc.assert(
      fc.property(primitiveArb, (p) => {
        const bytes = encodePrimitive(p);
        const decoded = decodePrimitive(bytes);
        expect(toHex(encodePrimitive(decoded))).toBe(toHex(bytes));
      }),
    );
  });
});
