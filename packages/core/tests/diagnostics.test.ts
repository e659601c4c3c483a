/**
 * Tests for the diagnostics catalog and CLI renderer
 */

import { describe, it, expect } from "vitest";
import * as ts from "typescript";
import {
  DIAGNOSTIC_CATALOG,
  DiagnosticBuilder,
  EK9003,
  EK9050,
  formatCode,
  getDiagnosticDescriptor,
  interpolate,
  renderDiagnosticCLI,
  renderDiagnosticsCLI,
  richToMacroDiagnostic,
  type RichDiagnostic,
} from "@enumkit/core";

const SOURCE = "enum LightsView {\n  Simplified,\n  Detailed,\n  Detailed,\n}\n";

function duplicateDiagnostic(): RichDiagnostic {
  const sourceFile = ts.createSourceFile("view.ts", SOURCE, ts.ScriptTarget.Latest, true);
  const statement = sourceFile.statements[0];
  if (!ts.isEnumDeclaration(statement)) throw new Error("expected an enum");

  return new DiagnosticBuilder(EK9003, sourceFile, () => {})
    .at(statement.members[2])
    .withArgs({ member: "Detailed", name: "LightsView" })
    .label(statement.members[1], "first declared here")
    .help("Remove or rename the second `Detailed`")
    .build();
}

describe("catalog", () => {
  it("should use unique codes", () => {
    const codes = [...DIAGNOSTIC_CATALOG.keys()];
    expect(new Set(codes).size).toBe(codes.length);
    expect(getDiagnosticDescriptor(9003)).toBe(EK9003);
    expect(getDiagnosticDescriptor(1234)).toBeUndefined();
  });

  it("should explain every entry", () => {
    for (const descriptor of DIAGNOSTIC_CATALOG.values()) {
      expect(descriptor.explanation.length).toBeGreaterThan(0);
    }
  });

  it("should format codes and fill templates", () => {
    expect(formatCode(9012)).toBe("EK9012");
    expect(interpolate("{a} then {b} then {a}", { a: "x", b: 2, c: undefined })).toBe("x then 2 then x");
  });

  it("should insert values containing dollar signs as written", () => {
    expect(interpolate("`{member}` and `{name}`", { member: "$$", name: "$&x" })).toBe("`$$` and `$&x`");
  });
});

describe("DiagnosticBuilder", () => {
  it("should hand the built diagnostic to its emitter", () => {
    const emitted: RichDiagnostic[] = [];
    new DiagnosticBuilder(EK9050, undefined, (d) => emitted.push(d))
      .from("specs.json")
      .withArgs({ file: "specs.json", detail: "entry 0: expected a spec object" })
      .note("checked before any spec rules")
      .emit();

    expect(emitted).toHaveLength(1);
    expect(emitted[0]).toMatchObject({
      code: 9050,
      severity: "error",
      message: "Cannot read `specs.json`: entry 0: expected a spec object",
      origin: "specs.json",
      notes: ["checked before any spec rules"],
    });
    expect(emitted[0].primarySpan).toBeUndefined();
  });

  it("should flatten into a macro diagnostic", () => {
    const flat = richToMacroDiagnostic(duplicateDiagnostic());

    expect(flat.message).toBe(
      "[EK9003] Member `Detailed` is declared more than once in `LightsView`\n" +
        "  = help: Remove or rename the second `Detailed`"
    );
    expect(flat.code).toBe(9003);
    expect(flat.node?.getText()).toBe("Detailed");
  });
});

describe("renderDiagnosticCLI", () => {
  it("should render source context, labels and help", () => {
    expect(renderDiagnosticCLI(duplicateDiagnostic(), { colors: false })).toBe(
      [
        "error[EK9003]: Member `Detailed` is declared more than once in `LightsView`",
        "  --> view.ts:4:3",
        "    |",
        "  3 |   Detailed,",
        "    |   -------- first declared here",
        "  4 |   Detailed,",
        "    |   ^^^^^^^^",
        "  5 | }",
        "    |",
        "   = help: Remove or rename the second `Detailed`",
      ].join("\n")
    );
  });

  it("should give labels outside the context window their own excerpt", () => {
    const sourceFile = ts.createSourceFile(
      "mode.ts",
      "enum Mode {\n  Fast,\n  Slow,\n  Eco,\n  Fast,\n}\n",
      ts.ScriptTarget.Latest,
      true
    );
    const statement = sourceFile.statements[0];
    if (!ts.isEnumDeclaration(statement)) throw new Error("expected an enum");
    const diagnostic = new DiagnosticBuilder(EK9003, sourceFile, () => {})
      .at(statement.members[3])
      .withArgs({ member: "Fast", name: "Mode" })
      .label(statement.members[0], "first declared here")
      .build();

    expect(renderDiagnosticCLI(diagnostic, { colors: false })).toBe(
      [
        "error[EK9003]: Member `Fast` is declared more than once in `Mode`",
        "  --> mode.ts:5:3",
        "    |",
        "  4 |   Eco,",
        "  5 |   Fast,",
        "    |   ^^^^",
        "  6 | }",
        "    |",
        "  2 |   Fast,",
        "    |   ---- first declared here",
        "    |",
      ].join("\n")
    );
  });

  it("should colour output when asked", () => {
    const rendered = renderDiagnosticCLI(duplicateDiagnostic(), { colors: true });
    expect(rendered.startsWith("\x1b[1m\x1b[31merror\x1b[0m")).toBe(true);
  });

  it("should append the explanation on request", () => {
    const rendered = renderDiagnosticCLI(duplicateDiagnostic(), { colors: false, showExplanation: true });
    expect(rendered).toContain("\nExplanation:\n");
  });

  it("should summarize several diagnostics", () => {
    const warning: RichDiagnostic = { ...duplicateDiagnostic(), severity: "warning" };
    const text = renderDiagnosticsCLI([duplicateDiagnostic(), duplicateDiagnostic(), warning], { colors: false });

    expect(text.endsWith("\n\n2 errors, 1 warning generated")).toBe(true);
    expect(renderDiagnosticsCLI([])).toBe("");
  });
});
