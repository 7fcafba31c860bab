import { describe, expect, it } from "vitest";
import { Option } from "effect";
import { Primitive } from "@/codec/primitive.js";
import { fromCborHex } from "@/codec/serializable.js";
import { DeserializeError, InvalidOperationError } from "@/errors.js";
import {
  AuxiliaryData,
  metadatumFromJson,
  metadatumToJson,
} from "@/transaction/metadata.js";

const message = Primitive.map([
  [Primitive.text("msg"), Primitive.sequence([Primitive.text("hello")])],
]);

describe("AuxiliaryData", () => {
  it("encodes the label map and hashes it", () => {
    const data = new AuxiliaryData([[674, message]]);
    expect(data.toCborHex()).toBe("a11902a2a1636d7367816568656c6c6f");
    expect(data.hash().toHex()).toBe(
      "70c69d21232fcf791bfd940d2b1cca35b63a3a9e2b0f0c9c10a96f3881a5c7b6",
    );
    expect(new AuxiliaryData().hash().toHex()).toBe(
      "d36a2619a672494604e11bb447cbcf5231e9f2ba25c2169177edc941bd50ad6c",
    );
  });

  it("decodes and looks up labels", () => {
    const data = fromCborHex(AuxiliaryData, "a11902a2a1636d7367816568656c6c6f");
    expect(data.labels()).toEqual([674n]);
    expect(Option.isSome(data.get(674))).toBe(true);
    expect(Option.isNone(data.get(1))).toBe(true);
  });

  it("replaces a label with `with`", () => {
    const data = new AuxiliaryData([[1, Primitive.int(1)]])
      .with(2, Primitive.int(2))
      .with(1, Primitive.int(3));
    expect(data.size).toBe(2);
    expect(data.toCborHex()).toBe("a201030202");
  });

  it("rejects values that are not metadata", () => {
    expect(() => new AuxiliaryData([[1, Primitive.bool(true)]])).toThrow(
      InvalidOperationError,
    );
    expect(
      () => new AuxiliaryData([[1, Primitive.text("x".repeat(65))]]),
    ).toThrow(InvalidOperationError);
    expect(() => new AuxiliaryData([[-1, Primitive.int(0)]])).toThrow(
      InvalidOperationError,
    );
    expect(() => fromCborHex(AuxiliaryData, "a101f5")).toThrow(
      DeserializeError,
    );
  });
});

describe("metadatum JSON", () => {
  it("converts the no-schema JSON shape", () => {
    const json = {
      name: "doc",
      size: 42,
      parts: ["a", "b"],
      raw: "0xdeadbeef",
    };
    const primitive = metadatumFromJson(json);
    expect(metadatumToJson(primitive)).toEqual(json);
    const raw = primitive._tag === "Map" ? primitive.entries[3][1] : primitive;
    expect(raw._tag).toBe("Bytes");
  });

  it("enforces the 64-byte string limit", () => {
    expect(() => metadatumFromJson("x".repeat(64))).not.toThrow();
    expect(() => metadatumFromJson("x".repeat(65))).toThrow(
      InvalidOperationError,
    );
    expect(() => metadatumFromJson(1.5)).toThrow(InvalidOperationError);
  });

  it("renders large integers as decimal strings", () => {
    expect(metadatumToJson(Primitive.int(2n ** 64n))).toBe(
      "18446744073709551616",
    );
    expect(() => metadatumToJson(Primitive.null())).toThrow(
      InvalidOperationError,
    );
  });
});
