/**
 * Tests for the runtime builder
 */

import { describe, it, expect, expectTypeOf } from "vitest";
import { EnumSpecError, REPRS, castToRepr, defineEnum, isRepr, type EnumValue } from "@enumkit/enum";

describe("defineEnum with a sentinel", () => {
  const LightsView = defineEnum("LightsView", {
    members: ["Simplified", "Detailed"] as const,
  });

  it("should list every value sentinel first", () => {
    expect(LightsView.all()).toEqual([0, 1, 2]);
    expect(LightsView.names()).toEqual(["None", "Simplified", "Detailed"]);
    expect(LightsView.size).toBe(3);
  });

  it("should map members to ordinals and names", () => {
    const detailed = LightsView.of("Detailed");
    expect(LightsView.toIndex(detailed)).toBe(2);
    expect(LightsView.toName(detailed)).toBe("Detailed");
  });

  it("should fall back on the sentinel for unknown names", () => {
    expect(LightsView.fromName("Complex")).toBe(LightsView.sentinel);
    expect(LightsView.toIndex(LightsView.fromName("Complex"))).toBe(0);
    expect(LightsView.toIndex(LightsView.sentinel)).toBe(0);
  });

  it("should match names exactly", () => {
    expect(LightsView.fromName("detailed")).toBe(LightsView.sentinel);
    expect(LightsView.fromName(" Detailed")).toBe(LightsView.sentinel);
    expect(LightsView.fromName("Detailed")).toBe(LightsView.of("Detailed"));
  });

  it("should round-trip every value through its name", () => {
    for (const value of LightsView.all()) {
      expect(LightsView.fromName(LightsView.toName(value))).toBe(value);
    }
  });

  it("should expose its description", () => {
    expect(LightsView.typeName).toBe("LightsView");
    expect(LightsView.repr).toBe("u32");
    expect(LightsView.policy).toEqual({ sentinel: "with-sentinel", index: "repr" });
  });

  it("should freeze its tables", () => {
    expect(Object.isFrozen(LightsView)).toBe(true);
    expect(Object.isFrozen(LightsView.all())).toBe(true);
    expect(Object.isFrozen(LightsView.names())).toBe(true);
  });

  it("should type members and values", () => {
    expectTypeOf(LightsView.toName).returns.toEqualTypeOf<"None" | "Simplified" | "Detailed">();
    expectTypeOf(LightsView.fromName).returns.toEqualTypeOf<EnumValue<"LightsView">>();
    expectTypeOf(LightsView.toIndex).returns.toEqualTypeOf<number>();
  });

  it("should throw for a name that is not a member", () => {
    const loose: { of(member: string): unknown } = LightsView;
    expect(() => loose.of("Complex")).toThrow("`Complex` is not a member of LightsView");
  });
});

describe("defineEnum without a sentinel", () => {
  const LightsView = defineEnum("LightsView", {
    members: ["Simplified", "Detailed", "Complex"] as const,
    sentinel: false,
  });

  it("should list only the declared members", () => {
    expect(LightsView.all()).toHaveLength(3);
    expect(LightsView.names()).toEqual(["Simplified", "Detailed", "Complex"]);
  });

  it("should start ordinals at 0", () => {
    expect(LightsView.toIndex(LightsView.of("Detailed"))).toBe(1);
  });

  it("should report unknown names as absent", () => {
    expect(LightsView.fromName("Simplified")).toBe(LightsView.of("Simplified"));
    expect(LightsView.fromName("Bogus")).toBeUndefined();
    expect(LightsView.fromName("None")).toBeUndefined();
  });

  it("should round-trip every value through its name", () => {
    LightsView.all().forEach((value, position) => {
      expect(LightsView.toIndex(value)).toBe(position);
      expect(LightsView.fromName(LightsView.toName(value))).toBe(value);
    });
  });

  it("should round-trip ten members", () => {
    const Ten = defineEnum("Ten", {
      members: ["A", "B", "C", "D", "E", "F", "G", "H", "I", "J"] as const,
      sentinel: false,
    });

    expect(Ten.size).toBe(10);
    for (const value of Ten.all()) {
      expect(Ten.fromName(Ten.toName(value))).toBe(value);
    }
  });

  it("should type fromName as optional", () => {
    expectTypeOf(LightsView.fromName).returns.toEqualTypeOf<EnumValue<"LightsView"> | undefined>();
  });
});

describe("defineEnum options", () => {
  it("should use a custom sentinel name", () => {
    const Power = defineEnum("Power", { members: ["Low", "High"] as const, sentinelName: "Off" });
    expect(Power.names()).toEqual(["Off", "Low", "High"]);
    expect(Power.toName(Power.fromName("Max"))).toBe("Off");
  });

  it("should return plain numbers at word width", () => {
    const Wide = defineEnum("Wide", { members: ["A", "B"] as const, repr: "u64", index: "word" });
    expect(Wide.toIndex(Wide.of("B"))).toBe(2);
    expectTypeOf(Wide.toIndex).returns.toEqualTypeOf<number>();
  });

  it("should return bigints for 64-bit reprs", () => {
    const Wide = defineEnum("Wide", { members: ["A", "B"] as const, repr: "i64" });
    expect(Wide.toIndex(Wide.of("B"))).toBe(2n);
    expectTypeOf(Wide.toIndex).returns.toEqualTypeOf<bigint>();
  });

  it("should agree with the explicit cast for every repr", () => {
    for (const repr of Object.keys(REPRS).filter(isRepr)) {
      for (const sentinel of [true, false]) {
        const Levels = sentinel
          ? defineEnum("Levels", { members: ["Low", "Mid", "High"] as const, repr })
          : defineEnum("Levels", { members: ["Low", "Mid", "High"] as const, repr, sentinel: false });
        Levels.all().forEach((value, position) => {
          expect(Levels.toIndex(value)).toBe(castToRepr(repr, position));
        });
      }
    }
  });

  it("should accept exactly ten members", () => {
    const Ten = defineEnum("Ten", {
      members: ["A", "B", "C", "D", "E", "F", "G", "H", "I", "J"] as const,
    });
    expect(Ten.size).toBe(11);
    expect(Ten.toIndex(Ten.of("J"))).toBe(10);
  });

  it("should throw an EnumSpecError for an invalid spec", () => {
    expect(() => defineEnum("Mode", { members: ["None", "Fast"] as const })).toThrow(EnumSpecError);
    expect(() => defineEnum("Mode", { members: ["Fast", "Fast"] as const })).toThrow(
      "[EK9003] Member `Fast` is declared more than once in `Mode`"
    );
  });
});
