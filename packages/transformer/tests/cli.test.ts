/**
 * Tests for the enumkit CLI
 */

import { describe, it, expect } from "vitest";
import { GENERATED_HEADER, generateEnumSource } from "@enumkit/enum";
import { HELP, runCli, type CliIO } from "@enumkit/transformer";

const USAGE = "Usage: enumkit <generate|expand> <file> [options]";

function memoryIO(files: Record<string, string>) {
  const written = new Map<string, string>();
  const out: string[] = [];
  const err: string[] = [];
  const io: CliIO = {
    readFile(file) {
      const content = files[file];
      if (content === undefined) {
        throw new Error(`ENOENT: no such file or directory, open '${file}'`);
      }
      return content;
    },
    writeFile: (file, content) => {
      written.set(file, content);
    },
    stdout: (text) => {
      out.push(text);
    },
    stderr: (text) => {
      err.push(text);
    },
    colors: false,
  };
  return { io, written, out, err };
}

const LIGHTS_SPEC = { name: "LightsView", members: ["Simplified", "Detailed"] };

describe("runCli", () => {
  it("should print help", () => {
    const { io, out } = memoryIO({});
    expect(runCli(["--help"], io)).toBe(0);
    expect(runCli([], io)).toBe(0);
    expect(out).toEqual([HELP, HELP]);
  });

  it("should reject unknown commands and options", () => {
    const { io, err } = memoryIO({});
    expect(runCli(["build", "x.json"], io)).toBe(1);
    expect(runCli(["generate", "x.json", "--watch"], io)).toBe(1);
    expect(runCli(["expand", "x.ts", "--out", "y.ts"], io)).toBe(1);
    expect(runCli(["generate"], io)).toBe(1);
    expect(err).toEqual([
      `Unknown command: build\n${USAGE}`,
      `Unknown option: --watch\n${USAGE}`,
      `--out only applies to generate\n${USAGE}`,
      `generate requires a file argument\n${USAGE}`,
    ]);
  });

  it("should explain diagnostic codes", () => {
    const { io, out, err } = memoryIO({});

    expect(runCli(["--explain", "EK9003"], io)).toBe(0);
    expect(runCli(["--explain", "9003"], io)).toBe(0);
    expect(out[0]).toBe(
      "EK9003: Member `{member}` is declared more than once in `{name}`\n\n" +
        "Member names map one-to-one onto ordinals. A repeated name would make\n" +
        "FromName ambiguous, so duplicates are rejected."
    );
    expect(out[1]).toBe(out[0]);
    expect(err).toEqual([]);
  });

  it("should reject unknown codes to explain", () => {
    const { io, out, err } = memoryIO({});

    expect(runCli(["--explain", "EK1234"], io)).toBe(1);
    expect(runCli(["--explain"], io)).toBe(1);
    expect(out).toEqual([]);
    expect(err).toEqual([
      "Unknown diagnostic code: EK1234",
      "--explain requires a diagnostic code\nUsage: enumkit --explain <code>",
    ]);
  });

  describe("generate", () => {
    it("should print the generated module", () => {
      const { io, out, err } = memoryIO({ "enums.json": JSON.stringify([LIGHTS_SPEC]) });

      expect(runCli(["generate", "enums.json"], io)).toBe(0);
      expect(err).toEqual([]);
      expect(out).toEqual([GENERATED_HEADER + "\n" + generateEnumSource(LIGHTS_SPEC)]);
    });

    it("should accept a single spec object", () => {
      const spec = { name: "Mode", members: ["Fast", "Slow"], sentinel: false, repr: "u8" };
      const { io, out } = memoryIO({ "mode.json": JSON.stringify(spec) });

      expect(runCli(["generate", "mode.json"], io)).toBe(0);
      expect(out[0]).toContain("export function modeFromName(name: string): Mode | undefined {");
      expect(out[0]).toContain("return value & 0xff;");
    });

    it("should write to --out", () => {
      const { io, out, written } = memoryIO({ "enums.json": JSON.stringify([LIGHTS_SPEC]) });

      expect(runCli(["generate", "enums.json", "-o", "lights.ts"], io)).toBe(0);
      expect(out).toEqual([]);
      expect(written.get("lights.ts")).toBe(GENERATED_HEADER + "\n" + generateEnumSource(LIGHTS_SPEC));
    });

    it("should render spec errors and write nothing", () => {
      const { io, out, err } = memoryIO({ "modes.json": JSON.stringify({ name: "Mode", members: ["A", "A"] }) });

      expect(runCli(["generate", "modes.json"], io)).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual([
        "error[EK9003]: Member `A` is declared more than once in `Mode`\n  --> modes.json\n\n1 error generated",
      ]);
    });

    it("should explain spec errors when verbose", () => {
      const { io, err } = memoryIO({ "modes.json": JSON.stringify({ name: "Mode", members: ["A", "A"] }) });

      expect(runCli(["generate", "modes.json", "--verbose"], io)).toBe(1);
      expect(err).toEqual([
        [
          "error[EK9003]: Member `A` is declared more than once in `Mode`",
          "  --> modes.json",
          "",
          "Explanation:",
          "  Member names map one-to-one onto ordinals. A repeated name would make",
          "  FromName ambiguous, so duplicates are rejected.",
          "",
          "1 error generated",
        ].join("\n"),
      ]);
    });

    it("should reject two specs declaring the same names", () => {
      const { io, out, err } = memoryIO({ "twice.json": JSON.stringify([LIGHTS_SPEC, LIGHTS_SPEC]) });

      expect(runCli(["generate", "twice.json"], io)).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual([
        [
          "error[EK9009]: Enum `LightsView` would redeclare `LightsView`, already declared for `LightsView`",
          "  --> twice.json[1]",
          "",
          "1 error generated",
        ].join("\n"),
      ]);
    });

    it("should reject names differing only in the case of the first letter", () => {
      const { io, written, err } = memoryIO({
        "modes.json": JSON.stringify([
          { name: "Foo", members: ["A"] },
          { name: "foo", members: ["B"] },
        ]),
      });

      expect(runCli(["generate", "modes.json", "--out", "modes.ts"], io)).toBe(1);
      expect(written.size).toBe(0);
      expect(err[0].split("\n").slice(0, 2)).toEqual([
        "error[EK9009]: Enum `foo` would redeclare `fooValues`, already declared for `Foo`",
        "  --> modes.json[1]",
      ]);
    });

    it("should generate specs with distinct names side by side", () => {
      const { io, out } = memoryIO({
        "modes.json": JSON.stringify([LIGHTS_SPEC, { name: "Mode", members: ["Fast"] }]),
      });

      expect(runCli(["generate", "modes.json"], io)).toBe(0);
      expect(out[0]).toContain("export function lightsViewNames(): readonly string[] {");
      expect(out[0]).toContain("export function modeNames(): readonly string[] {");
    });

    it("should report malformed entries by position", () => {
      const { io, err } = memoryIO({
        "specs.json": JSON.stringify([LIGHTS_SPEC, { name: 3, members: "A" }]),
      });

      expect(runCli(["generate", "specs.json"], io)).toBe(1);
      expect(err).toEqual([
        [
          'error[EK9050]: Cannot read `specs.json`: entry 1: "name" must be a string',
          "  --> specs.json[1]",
          "",
          'error[EK9050]: Cannot read `specs.json`: entry 1: "members" must be an array of strings',
          "  --> specs.json[1]",
          "",
          "2 errors generated",
        ].join("\n"),
      ]);
    });

    it("should report unreadable files", () => {
      const { io, err } = memoryIO({ "broken.json": "[{" });

      expect(runCli(["generate", "missing.json"], io)).toBe(1);
      expect(err[0].split("\n").slice(0, 2)).toEqual([
        "error[EK9050]: Cannot read `missing.json`: ENOENT: no such file or directory, open 'missing.json'",
        "  --> missing.json",
      ]);

      expect(runCli(["generate", "broken.json"], io)).toBe(1);
      expect(err[1]).toMatch(/^error\[EK9050\]: Cannot read `broken\.json`: /);
    });
  });

  describe("expand", () => {
    it("should print the expanded file", () => {
      const source = `@reflectEnum()\nexport enum LightsView {\n  Simplified,\n  Detailed,\n}\n`;
      const { io, out, err } = memoryIO({ "view.ts": source });

      expect(runCli(["expand", "view.ts"], io)).toBe(0);
      expect(err).toEqual([]);
      expect(out[0]).toContain("export function lightsViewToIndex(value: LightsView): number {");
    });

    it("should render expansion errors with source context", () => {
      const source = `@reflectEnum()\nenum Level {\n  Low = 1,\n}\n`;
      const { io, err } = memoryIO({ "level.ts": source });

      expect(runCli(["expand", "level.ts"], io)).toBe(1);
      expect(err).toEqual([
        [
          "error[EK9011]: Member `Low` has an initializer; ordinals follow declaration order",
          "  --> level.ts:3:3",
          "    |",
          "  2 | enum Level {",
          "  3 |   Low = 1,",
          "    |   ^^^^^^^",
          "  4 | }",
          "    |",
          "",
          "1 error generated",
        ].join("\n"),
      ]);
    });
  });
});
