/**
 * Diagnostics System for enumkit
 *
 * Provides Rust-style error messages with:
 * - Structured error codes (EK9001-EK9999)
 * - Rich diagnostics with labeled spans, notes and help
 * - Builder API for macro authors
 *
 * @example
 * ```typescript
 * ctx.diagnostic(EK9003)
 *   .at(memberNode)
 *   .withArgs({ member: "Detailed", name: "LightsView" })
 *   .help("Remove or rename the second `Detailed`")
 *   .emit();
 * ```
 */

import type * as ts from "typescript";
import type { MacroDiagnostic } from "./types.js";

// ============================================================================
// Diagnostic Categories
// ============================================================================

export enum DiagnosticCategory {
  EnumSpec = "spec",
  MacroSyntax = "syntax",
  Configuration = "config",
  Internal = "internal",
}

export type Severity = "error" | "warning" | "info";

// ============================================================================
// Diagnostic Descriptor (Error Catalog Entry)
// ============================================================================

export interface DiagnosticDescriptor {
  /** Unique error code in range 9001-9999 */
  readonly code: number;

  /** Default severity */
  readonly severity: Severity;

  /** Category for filtering and grouping */
  readonly category: DiagnosticCategory;

  /** Message template with {placeholders} for interpolation */
  readonly messageTemplate: string;

  /** Long-form explanation, printed by `enumkit --explain` */
  readonly explanation: string;
}

// ============================================================================
// Rich Diagnostic Types
// ============================================================================

/**
 * A labeled span pointing at specific code with a message.
 */
export interface LabeledSpan {
  node: ts.Node;
  message: string;
}

/**
 * Rich diagnostic with spans, notes and help.
 * This is the structured form that renders to CLI output.
 */
export interface RichDiagnostic {
  code: number;
  severity: Severity;
  category: DiagnosticCategory;

  /** Primary message (with placeholders interpolated) */
  message: string;

  /** The primary span (main error location) */
  primarySpan?: {
    node: ts.Node;
    sourceFile: ts.SourceFile;
  };

  /** Where a diagnostic without a span came from, e.g. a spec file entry */
  origin?: string;

  labels: LabeledSpan[];
  notes: string[];
  help?: string;

  /** Long-form explanation from the catalog */
  explanation?: string;
}

/**
 * Format a catalog code for display: 9003 → "EK9003".
 */
export function formatCode(code: number): string {
  return `EK${code}`;
}

/**
 * Fill a message template's {placeholders}.
 */
export function interpolate(template: string, args: Record<string, string | number | undefined>): string {
  let message = template;
  for (const [key, value] of Object.entries(args)) {
    if (value === undefined) continue;
    message = message.replace(new RegExp(`\\{${key}\\}`, "g"), () => String(value));
  }
  return message;
}

// ============================================================================
// Diagnostic Builder
// ============================================================================

/**
 * Fluent builder for constructing rich diagnostics.
 *
 * @example
 * ```typescript
 * new DiagnosticBuilder(EK9010, sourceFile, emitter)
 *   .at(decorator)
 *   .withArgs({ macro: "reflectEnum", kind: "class" })
 *   .note("Only enum declarations carry an ordered member list")
 *   .emit();
 * ```
 */
export class DiagnosticBuilder {
  private diagnostic: RichDiagnostic;
  private args: Record<string, string> = {};

  constructor(
    private readonly descriptor: DiagnosticDescriptor,
    private readonly sourceFile: ts.SourceFile | undefined,
    private readonly emitter: (diagnostic: RichDiagnostic) => void
  ) {
    this.diagnostic = {
      code: descriptor.code,
      severity: descriptor.severity,
      category: descriptor.category,
      message: descriptor.messageTemplate,
      labels: [],
      notes: [],
      explanation: descriptor.explanation,
    };
  }

  /**
   * Set the primary span for this diagnostic.
   */
  at(node: ts.Node): this {
    if (this.sourceFile) {
      this.diagnostic.primarySpan = { node, sourceFile: this.sourceFile };
    }
    return this;
  }

  /**
   * Name the origin of a diagnostic that has no source span.
   */
  from(origin: string): this {
    this.diagnostic.origin = origin;
    return this;
  }

  withArgs(args: Record<string, string | number | undefined>): this {
    for (const [key, value] of Object.entries(args)) {
      if (value !== undefined) {
        this.args[key] = String(value);
      }
    }
    return this;
  }

  label(node: ts.Node, message: string): this {
    this.diagnostic.labels.push({ node, message });
    return this;
  }

  note(message: string): this {
    this.diagnostic.notes.push(message);
    return this;
  }

  help(message: string): this {
    this.diagnostic.help = message;
    return this;
  }

  /**
   * Finish the diagnostic without emitting it.
   */
  build(): RichDiagnostic {
    return { ...this.diagnostic, message: interpolate(this.descriptor.messageTemplate, this.args) };
  }

  /**
   * Emit the diagnostic via the registered emitter.
   */
  emit(): void {
    this.emitter(this.build());
  }
}

// ============================================================================
// Error Catalog: Enum Specs (9001-9009)
// ============================================================================

export const EK9001: DiagnosticDescriptor = {
  code: 9001,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Enum `{name}` declares no members",
  explanation: `An enumeration needs between 1 and 10 members.

The member count selects a fixed expansion path; there is no path for an
empty member list.`,
};

export const EK9002: DiagnosticDescriptor = {
  code: 9002,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Enum `{name}` declares {count} members; at most {max} are supported",
  explanation: `The arity counter and the expansion engine have one entry per
member count from 1 to 10. An eleventh member has no matching entry.

Split the enumeration, or move the extra members into a second enum.`,
};

export const EK9003: DiagnosticDescriptor = {
  code: 9003,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Member `{member}` is declared more than once in `{name}`",
  explanation: `Member names map one-to-one onto ordinals. A repeated name would make
FromName ambiguous, so duplicates are rejected.`,
};

export const EK9004: DiagnosticDescriptor = {
  code: 9004,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "`{identifier}` is not a valid identifier",
  explanation: `Type names and member names become TypeScript identifiers in the
generated code. They must start with a letter, \`_\` or \`$\` and continue with
letters, digits, \`_\` or \`$\`.

Reserved words (\`class\`, \`enum\`, \`let\`, \`yield\`, ...) are rejected, and a
type name may not be a built-in type such as \`string\` or \`number\`.`,
};

export const EK9005: DiagnosticDescriptor = {
  code: 9005,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Member `{member}` of `{name}` collides with the sentinel name",
  explanation: `With the sentinel policy, ordinal 0 is taken by the sentinel member
(\`None\` unless configured otherwise). A declared member may not reuse its name.

Either rename the member, choose another sentinelName, or use the
no-sentinel policy.`,
};

export const EK9006: DiagnosticDescriptor = {
  code: 9006,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Unknown underlying type `{repr}`",
  explanation: `The underlying representation must be one of:
u8, u16, u32, u64, i8, i16, i32, i64.`,
};

export const EK9007: DiagnosticDescriptor = {
  code: 9007,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Ordinal {ordinal} of `{name}` does not fit in `{repr}`",
  explanation: `Every ordinal must be representable in the underlying type.`,
};

export const EK9008: DiagnosticDescriptor = {
  code: 9008,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Unknown generator variant `{variant}`",
  explanation: `Built-in variants are implicit-sentinel, explicit-sentinel and optional.
Further variants can be added with registerVariant().`,
};

export const EK9009: DiagnosticDescriptor = {
  code: 9009,
  severity: "error",
  category: DiagnosticCategory.EnumSpec,
  messageTemplate: "Enum `{name}` would redeclare `{identifier}`, already declared for `{other}`",
  explanation: `Enums generated into one module share its scope. Each enum declares its
type, its value and name tables, and five functions named after the camel-case
type name (\`lightsViewToIndex\`, \`lightsViewFromName\`, ...).

Two specs with the same name, or with names that differ only in the case of
the first letter (\`Mode\` and \`mode\`), declare the same identifiers. Rename
one of them or generate them into separate files.`,
};

// ============================================================================
// Error Catalog: Macro Syntax (9010-9049)
// ============================================================================

export const EK9010: DiagnosticDescriptor = {
  code: 9010,
  severity: "error",
  category: DiagnosticCategory.MacroSyntax,
  messageTemplate: "@{macro} cannot be applied to a {kind}",
  explanation: `@reflectEnum only applies to enum declarations:

  @reflectEnum({ repr: "u32" })
  export enum LightsView { Simplified, Detailed }`,
};

export const EK9011: DiagnosticDescriptor = {
  code: 9011,
  severity: "error",
  category: DiagnosticCategory.MacroSyntax,
  messageTemplate: "Member `{member}` has an initializer; ordinals follow declaration order",
  explanation: `The generator assigns ordinals itself. Remove the \`= value\` part from
every member.`,
};

export const EK9012: DiagnosticDescriptor = {
  code: 9012,
  severity: "error",
  category: DiagnosticCategory.MacroSyntax,
  messageTemplate: "Invalid option `{option}`: {detail}",
  explanation: `Spec options take literal values. In @reflectEnum they are written as an
object literal:

  @reflectEnum({
    repr: "u8",              // underlying type
    sentinel: true,          // reserve ordinal 0 for a "no value" member
    sentinelName: "None",
    index: "repr",           // "repr" or "word"
    variant: "optional",     // a named preset
  })`,
};

// ============================================================================
// Error Catalog: Configuration (9050-9099)
// ============================================================================

export const EK9050: DiagnosticDescriptor = {
  code: 9050,
  severity: "error",
  category: DiagnosticCategory.Configuration,
  messageTemplate: "Cannot read `{file}`: {detail}",
  explanation: `The file could not be read or has the wrong shape. \`enumkit generate\`
expects a JSON file holding one spec object or an array of spec objects:

  [{ "name": "LightsView", "repr": "u32", "members": ["Simplified", "Detailed"] }]`,
};

export const EK9999: DiagnosticDescriptor = {
  code: 9999,
  severity: "error",
  category: DiagnosticCategory.Internal,
  messageTemplate: "Macro `{macro}` failed: {detail}",
  explanation: `A macro threw while expanding. This is a bug in the macro.`,
};

// ============================================================================
// Catalog Lookup
// ============================================================================

export const DIAGNOSTIC_CATALOG: ReadonlyMap<number, DiagnosticDescriptor> = new Map(
  [
    EK9001,
    EK9002,
    EK9003,
    EK9004,
    EK9005,
    EK9006,
    EK9007,
    EK9008,
    EK9009,
    EK9010,
    EK9011,
    EK9012,
    EK9050,
    EK9999,
  ].map((d) => [d.code, d])
);

export function getDiagnosticDescriptor(code: number): DiagnosticDescriptor | undefined {
  return DIAGNOSTIC_CATALOG.get(code);
}

// ============================================================================
// Conversion
// ============================================================================

/**
 * Flatten a RichDiagnostic into the plain MacroDiagnostic form.
 */
export function richToMacroDiagnostic(rich: RichDiagnostic): MacroDiagnostic {
  let message = `[${formatCode(rich.code)}] ${rich.message}`;

  if (rich.notes.length > 0) {
    message += "\n" + rich.notes.map((n) => `  = note: ${n}`).join("\n");
  }

  if (rich.help) {
    message += `\n  = help: ${rich.help}`;
  }

  return {
    severity: rich.severity,
    message,
    node: rich.primarySpan?.node,
    code: rich.code,
    rich,
  };
}

// ============================================================================
// CLI Renderer: Rust-Style Error Output
// ============================================================================

/**
 * ANSI color codes for terminal output.
 * Set NO_COLOR or ENUMKIT_NO_COLOR to disable.
 */
const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
} as const;

type ColorName = keyof typeof COLORS;

function colorsEnabledByEnv(): boolean {
  if (typeof process === "undefined") return false;
  const env = process.env;
  return !env.NO_COLOR && !env.ENUMKIT_NO_COLOR && env.FORCE_COLOR !== "0";
}

function severityColor(severity: Severity): "red" | "yellow" | "cyan" {
  switch (severity) {
    case "error":
      return "red";
    case "warning":
      return "yellow";
    case "info":
      return "cyan";
  }
}

function getLineAndColumn(sourceFile: ts.SourceFile, pos: number): { line: number; column: number } {
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(pos);
  return { line: line + 1, column: character + 1 };
}

function getLineText(sourceFile: ts.SourceFile, lineNumber: number): string {
  const lines = sourceFile.text.split("\n");
  return lines[lineNumber - 1] ?? "";
}

function createUnderline(startColumn: number, length: number, char: string = "^"): string {
  return " ".repeat(startColumn - 1) + char.repeat(Math.max(1, length));
}

/**
 * Options for CLI rendering.
 */
export interface CLIRenderOptions {
  /** Whether to use colors (default: auto-detect from the environment) */
  colors?: boolean;
  /** Maximum number of context lines before/after the error (default: 1) */
  contextLines?: number;
  /** Whether to show the explanation (default: false) */
  showExplanation?: boolean;
}

/**
 * Render a RichDiagnostic to CLI output in Rust-style format.
 *
 * @example Output:
 * ```
 * error[EK9003]: Member `Detailed` is declared more than once in `LightsView`
 *   --> src/view.ts:4:3
 *    |
 *  3 |   Detailed,
 *  4 |   Detailed,
 *    |   ^^^^^^^^
 *    |
 *    = help: Remove or rename the second `Detailed`
 * ```
 */
export function renderDiagnosticCLI(diagnostic: RichDiagnostic, options: CLIRenderOptions = {}): string {
  const { contextLines = 1, showExplanation = false } = options;
  const useColors = options.colors ?? colorsEnabledByEnv();
  const color = (text: string, ...styles: ColorName[]): string =>
    useColors ? `${styles.map((s) => COLORS[s]).join("")}${text}${COLORS.reset}` : text;

  const lines: string[] = [];
  const severityClr = severityColor(diagnostic.severity);

  lines.push(
    `${color(diagnostic.severity, "bold", severityClr)}${color(`[${formatCode(diagnostic.code)}]`, "bold", severityClr)}: ${color(diagnostic.message, "bold")}`
  );

  if (diagnostic.primarySpan) {
    const { node, sourceFile } = diagnostic.primarySpan;
    const startPos = getLineAndColumn(sourceFile, node.getStart(sourceFile));
    const endPos = getLineAndColumn(sourceFile, node.getEnd());
    lines.push(`  ${color("-->", "blue")} ${sourceFile.fileName}:${startPos.line}:${startPos.column}`);

    const totalLines = sourceFile.getLineAndCharacterOfPosition(sourceFile.text.length).line + 1;
    const minLine = Math.max(1, startPos.line - contextLines);
    const maxLine = Math.min(totalLines, endPos.line + contextLines);
    const labels = diagnostic.labels.map((label) => ({
      label,
      start: getLineAndColumn(sourceFile, label.node.getStart(sourceFile)),
    }));
    const numWidth = Math.max(2, String(Math.max(maxLine, ...labels.map((l) => l.start.line))).length);
    const gutter = " ".repeat(numWidth);

    lines.push(` ${gutter} ${color("|", "blue")}`);

    const labelRow = (label: LabeledSpan, start: { line: number; column: number }): string => {
      const end = getLineAndColumn(sourceFile, label.node.getEnd());
      const underline = createUnderline(start.column, end.column - start.column, "-");
      return ` ${gutter} ${color("|", "blue")} ${color(underline, "blue")} ${color(label.message, "blue")}`;
    };

    for (let lineNum = minLine; lineNum <= maxLine; lineNum++) {
      const lineText = getLineText(sourceFile, lineNum);
      lines.push(` ${color(String(lineNum).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${lineText}`);

      if (lineNum >= startPos.line && lineNum <= endPos.line) {
        const lineStartCol = lineNum === startPos.line ? startPos.column : 1;
        const lineEndCol = lineNum === endPos.line ? endPos.column : lineText.length + 1;
        const underline = createUnderline(lineStartCol, lineEndCol - lineStartCol);
        lines.push(` ${gutter} ${color("|", "blue")} ${color(underline, severityClr)}`);
      }

      for (const { label, start } of labels) {
        if (start.line === lineNum) lines.push(labelRow(label, start));
      }
    }

    // Labels outside the context window get their own excerpt
    for (const { label, start } of labels) {
      if (start.line >= minLine && start.line <= maxLine) continue;
      lines.push(` ${gutter} ${color("|", "blue")}`);
      lines.push(
        ` ${color(String(start.line).padStart(numWidth, " "), "blue")} ${color("|", "blue")} ${getLineText(sourceFile, start.line)}`
      );
      lines.push(labelRow(label, start));
    }

    lines.push(` ${gutter} ${color("|", "blue")}`);
  } else if (diagnostic.origin) {
    lines.push(`  ${color("-->", "blue")} ${diagnostic.origin}`);
  }

  for (const note of diagnostic.notes) {
    lines.push(`   ${color("= note:", "bold")} ${note}`);
  }

  if (diagnostic.help) {
    lines.push(`   ${color("= help:", "bold", "green")} ${diagnostic.help}`);
  }

  if (showExplanation && diagnostic.explanation) {
    lines.push("");
    lines.push(color("Explanation:", "bold"));
    for (const expLine of diagnostic.explanation.split("\n")) {
      lines.push(`  ${expLine}`);
    }
  }

  return lines.join("\n");
}

/**
 * Render multiple diagnostics with a summary.
 */
export function renderDiagnosticsCLI(diagnostics: RichDiagnostic[], options: CLIRenderOptions = {}): string {
  if (diagnostics.length === 0) {
    return "";
  }

  const lines: string[] = [];
  for (const diag of diagnostics) {
    lines.push(renderDiagnosticCLI(diag, options));
    lines.push("");
  }

  const errorCount = diagnostics.filter((d) => d.severity === "error").length;
  const warnCount = diagnostics.filter((d) => d.severity === "warning").length;

  const parts: string[] = [];
  if (errorCount > 0) parts.push(`${errorCount} error${errorCount > 1 ? "s" : ""}`);
  if (warnCount > 0) parts.push(`${warnCount} warning${warnCount > 1 ? "s" : ""}`);
  if (parts.length > 0) {
    lines.push(`${parts.join(", ")} generated`);
  }

  return lines.join("\n");
}

