import { describe, it, expect } from "vitest";
import { runInNewContext } from "node:vm";
import { REPRS, castExpression, castToRepr, fitsRepr, indexTypeName, isRepr, type Repr } from "@enumkit/enum";

const ALL_REPRS = Object.keys(REPRS).filter(isRepr);

describe("repr table", () => {
  it("should list the eight fixed-width reprs", () => {
    expect(ALL_REPRS).toEqual(["u8", "u16", "u32", "u64", "i8", "i16", "i32", "i64"]);
  });

  it("should know widths and ranges", () => {
    expect(REPRS.u8).toEqual({ bits: 8, signed: false, min: 0n, max: 255n });
    expect(REPRS.i16).toEqual({ bits: 16, signed: true, min: -32768n, max: 32767n });
    expect(REPRS.u64.max).toBe(18446744073709551615n);
  });

  it("should reject unknown repr names", () => {
    expect(isRepr("u128")).toBe(false);
    expect(isRepr("toString")).toBe(false);
    expect(isRepr(32)).toBe(false);
  });
});

describe("castToRepr", () => {
  it("should keep small ordinals unchanged", () => {
    for (const repr of ALL_REPRS) {
      const expected = REPRS[repr].bits === 64 ? 7n : 7;
      expect(castToRepr(repr, 7)).toBe(expected);
    }
  });

  it("should wrap at the declared width", () => {
    expect(castToRepr("u8", 256)).toBe(0);
    expect(castToRepr("u8", 300)).toBe(44);
    expect(castToRepr("i8", 200)).toBe(-56);
    expect(castToRepr("u16", 65537)).toBe(1);
    expect(castToRepr("i16", 40000)).toBe(-25536);
    expect(castToRepr("u32", -1)).toBe(4294967295);
    expect(castToRepr("i32", 4294967295)).toBe(-1);
    expect(castToRepr("u64", -1)).toBe(18446744073709551615n);
    expect(castToRepr("i64", 5)).toBe(5n);
  });
});

describe("castExpression", () => {
  it("should render the same cast as source text", () => {
    expect(castExpression("u8", "value")).toBe("value & 0xff");
    expect(castExpression("i8", "value")).toBe("(value << 24) >> 24");
    expect(castExpression("u32", "value")).toBe("value >>> 0");
    expect(castExpression("u64", "value")).toBe("BigInt.asUintN(64, BigInt(value))");
  });

  it("should agree with castToRepr when evaluated", () => {
    const samples = [0, 1, 10, 200, 70000, -3];
    for (const repr of ALL_REPRS) {
      for (const value of samples) {
        const result: unknown = runInNewContext(castExpression(repr, "value"), { value });
        expect(result).toBe(castToRepr(repr, value));
      }
    }
  });
});

describe("indexTypeName and fitsRepr", () => {
  it("should use bigint only for 64-bit reprs at repr width", () => {
    const names = ALL_REPRS.map((repr: Repr) => indexTypeName(repr, "repr"));
    expect(names).toEqual(["number", "number", "number", "bigint", "number", "number", "number", "bigint"]);
    expect(indexTypeName("u64", "word")).toBe("number");
  });

  it("should check ordinals against the range", () => {
    expect(fitsRepr("u8", 255)).toBe(true);
    expect(fitsRepr("u8", 256)).toBe(false);
    expect(fitsRepr("i8", 127)).toBe(true);
    expect(fitsRepr("i8", 128)).toBe(false);
    expect(fitsRepr("u32", -1)).toBe(false);
  });
});
