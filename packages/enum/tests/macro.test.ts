import { describe, it, expect } from "vitest";
import { globalRegistry } from "@enumkit/core";
import { reflectEnum, reflectEnumAttribute } from "@enumkit/enum";

describe("reflectEnum macro", () => {
  it("should register itself on import", () => {
    expect(globalRegistry.getAttribute("reflectEnum")).toBe(reflectEnumAttribute);
    expect(globalRegistry.getByModuleExport("@enumkit/enum", "reflectEnum")).toBe(reflectEnumAttribute);
  });

  it("should only target enums", () => {
    expect(reflectEnumAttribute.kind).toBe("attribute");
    expect(reflectEnumAttribute.validTargets).toEqual(["enum"]);
  });

  it("should throw when called without the transformer", () => {
    expect(() => reflectEnum({ repr: "u8" })).toThrow(
      "@reflectEnum must be processed by the enumkit transformer at compile time"
    );
  });
});
