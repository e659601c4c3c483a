/**
 * Underlying representations.
 *
 * Every generated enum is backed by a fixed-width integer type. The ordinal
 * of a member is stored as a plain number; `ToIndex` reinterprets it at the
 * declared width, the way a value conversion to that integer type would.
 */

export type Repr = "u8" | "u16" | "u32" | "u64" | "i8" | "i16" | "i32" | "i64";

export interface ReprInfo {
  readonly bits: 8 | 16 | 32 | 64;
  readonly signed: boolean;
  readonly min: bigint;
  readonly max: bigint;
}

function unsigned(bits: 8 | 16 | 32 | 64): ReprInfo {
  return { bits, signed: false, min: 0n, max: (1n << BigInt(bits)) - 1n };
}

function signed(bits: 8 | 16 | 32 | 64): ReprInfo {
  const half = 1n << BigInt(bits - 1);
  return { bits, signed: true, min: -half, max: half - 1n };
}

export const REPRS: Readonly<Record<Repr, ReprInfo>> = {
  u8: unsigned(8),
  u16: unsigned(16),
  u32: unsigned(32),
  u64: unsigned(64),
  i8: signed(8),
  i16: signed(16),
  i32: signed(32),
  i64: signed(64),
};

export function isRepr(value: unknown): value is Repr {
  return typeof value === "string" && Object.prototype.hasOwnProperty.call(REPRS, value);
}

/** Where `ToIndex` lands: the declared width, or the platform word. */
export type IndexWidth = "repr" | "word";

/**
 * The TypeScript type `ToIndex` returns.
 * 64-bit reprs need a bigint; everything else fits a number.
 */
export type IndexOf<R extends Repr, W extends IndexWidth = "repr"> = W extends "word"
  ? number
  : R extends "u64" | "i64"
    ? bigint
    : number;

/**
 * Reinterpret an ordinal at the width of `repr`.
 */
export function castToRepr(repr: "u64" | "i64", value: number): bigint;
export function castToRepr(repr: Exclude<Repr, "u64" | "i64">, value: number): number;
export function castToRepr(repr: Repr, value: number): number | bigint;
export function castToRepr(repr: Repr, value: number): number | bigint {
  switch (repr) {
    case "u8":
      return value & 0xff;
    case "u16":
      return value & 0xffff;
    case "u32":
      return value >>> 0;
    case "i8":
      return (value << 24) >> 24;
    case "i16":
      return (value << 16) >> 16;
    case "i32":
      return value | 0;
    case "u64":
      return BigInt.asUintN(64, BigInt(value));
    case "i64":
      return BigInt.asIntN(64, BigInt(value));
  }
}

/**
 * Source text performing {@link castToRepr} on `expr`.
 */
export function castExpression(repr: Repr, expr: string): string {
  switch (repr) {
    case "u8":
      return `${expr} & 0xff`;
    case "u16":
      return `${expr} & 0xffff`;
    case "u32":
      return `${expr} >>> 0`;
    case "i8":
      return `(${expr} << 24) >> 24`;
    case "i16":
      return `(${expr} << 16) >> 16`;
    case "i32":
      return `${expr} | 0`;
    case "u64":
      return `BigInt.asUintN(64, BigInt(${expr}))`;
    case "i64":
      return `BigInt.asIntN(64, BigInt(${expr}))`;
  }
}

/** The TypeScript type name of `ToIndex` results, for generated code. */
export function indexTypeName(repr: Repr, width: IndexWidth): "number" | "bigint" {
  if (width === "word") return "number";
  return REPRS[repr].bits === 64 ? "bigint" : "number";
}

/**
 * True when `ordinal` lies within the range of `repr`.
 */
export function fitsRepr(repr: Repr, ordinal: number): boolean {
  const info = REPRS[repr];
  const value = BigInt(ordinal);
  return value >= info.min && value <= info.max;
}
