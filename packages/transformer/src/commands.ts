/**
 * enumkit CLI commands
 *
 * Usage:
 *   enumkit generate <spec.json> [--out file] [--verbose]
 *   enumkit expand <file.ts> [--verbose]
 *   enumkit --explain <code>
 */

import * as fs from "fs";
import {
  DiagnosticBuilder,
  EK9009,
  EK9050,
  config,
  formatCode,
  getDiagnosticDescriptor,
  renderDiagnosticsCLI,
  type RichDiagnostic,
} from "@enumkit/core";
import {
  declaredNames,
  renderEnumModule,
  resolveEnumSpec,
  type EnumSpec,
  type EnumSpecInput,
} from "@enumkit/enum";
import { transformCode } from "./transform-code.js";

type Command = "generate" | "expand";

interface CliOptions {
  command: Command;
  file: string;
  out?: string;
  verbose: boolean;
}

/**
 * Where the CLI reads and writes. Swapped out in tests.
 */
export interface CliIO {
  readFile(file: string): string;
  writeFile(file: string, content: string): void;
  stdout(text: string): void;
  stderr(text: string): void;
  /** Colour diagnostics (default: detect from the environment) */
  colors?: boolean;
}

export const nodeIO: CliIO = {
  readFile: (file) => fs.readFileSync(file, "utf-8"),
  writeFile: (file, content) => fs.writeFileSync(file, content),
  stdout: (text) => console.log(text),
  stderr: (text) => console.error(text),
};

export const HELP = `enumkit - reflection for closed enumerations

Usage:
  enumkit generate <spec.json> [--out file]   Generate TypeScript from enum specs
  enumkit expand <file.ts>                    Print a file after @reflectEnum expansion
  enumkit --explain <code>                    Explain a diagnostic code, e.g. EK9003

Options:
  --out, -o <file>   Write generated code to a file instead of stdout
  --verbose, -v      Log progress and explain each diagnostic
  --help, -h         Show this help

A spec file holds one spec or an array of specs:
  [{ "name": "LightsView", "repr": "u32", "members": ["Simplified", "Detailed"] }]`;

class UsageError extends Error {}

function parseArgs(args: string[]): CliOptions {
  const [command, ...rest] = args;
  if (command !== "generate" && command !== "expand") {
    throw new UsageError(`Unknown command: ${command}`);
  }

  let file: string | undefined;
  let out: string | undefined;
  let verbose = false;

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    if (arg === "--out" || arg === "-o") {
      out = rest[++i];
      if (out === undefined) throw new UsageError(`${arg} requires a file argument`);
    } else if (arg === "--verbose" || arg === "-v") {
      verbose = true;
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new UsageError(`${command} requires a file argument`);
  }
  if (out !== undefined && command === "expand") {
    throw new UsageError("--out only applies to generate");
  }

  return { command, file, out, verbose };
}

// ============================================================================
// generate
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(entry: Record<string, unknown>, key: string, problems: string[]): string | undefined {
  const value = entry[key];
  if (value === undefined || typeof value === "string") return value;
  problems.push(`"${key}" must be a string`);
  return undefined;
}

function optionalBoolean(entry: Record<string, unknown>, key: string, problems: string[]): boolean | undefined {
  const value = entry[key];
  if (value === undefined || typeof value === "boolean") return value;
  problems.push(`"${key}" must be a boolean`);
  return undefined;
}

/**
 * Check the JSON shape of one spec entry. Spec rules are checked later.
 */
function readSpecEntry(entry: unknown, problems: string[]): EnumSpecInput | undefined {
  if (!isRecord(entry)) {
    problems.push("expected a spec object");
    return undefined;
  }

  const { name, members } = entry;
  if (typeof name !== "string") {
    problems.push(`"name" must be a string`);
  }

  const memberNames = Array.isArray(members) ? members.filter((m): m is string => typeof m === "string") : [];
  if (!Array.isArray(members) || memberNames.length !== members.length) {
    problems.push(`"members" must be an array of strings`);
  }

  const input = {
    repr: optionalString(entry, "repr", problems),
    sentinel: optionalBoolean(entry, "sentinel", problems),
    sentinelName: optionalString(entry, "sentinelName", problems),
    index: optionalString(entry, "index", problems),
    variant: optionalString(entry, "variant", problems),
    exported: optionalBoolean(entry, "exported", problems),
  };

  if (typeof name !== "string" || problems.length > 0) {
    return undefined;
  }
  return { ...input, name, members: memberNames };
}

function generate(options: CliOptions, io: CliIO, diagnostics: RichDiagnostic[]): void {
  const emit = (rich: RichDiagnostic): void => {
    diagnostics.push(rich);
  };
  const cannotRead = (detail: string): void =>
    new DiagnosticBuilder(EK9050, undefined, emit).from(options.file).withArgs({ file: options.file, detail }).emit();

  let parsed: unknown;
  try {
    parsed = JSON.parse(io.readFile(options.file));
  } catch (error) {
    cannotRead(error instanceof Error ? error.message : String(error));
    return;
  }

  const entries = Array.isArray(parsed) ? parsed : [parsed];
  const defaults = config.enumDefaults();
  const specs: EnumSpec[] = [];
  // Top-level identifier -> name of the spec that declares it
  const owners = new Map<string, string>();

  entries.forEach((entry: unknown, position) => {
    const origin = Array.isArray(parsed) ? `${options.file}[${position}]` : options.file;
    const problems: string[] = [];
    const input = readSpecEntry(entry, problems);

    if (!input) {
      for (const problem of problems) {
        new DiagnosticBuilder(EK9050, undefined, emit)
          .from(origin)
          .withArgs({ file: options.file, detail: `entry ${position}: ${problem}` })
          .emit();
      }
      return;
    }

    const { spec, issues } = resolveEnumSpec(input, defaults);
    for (const issue of issues) {
      new DiagnosticBuilder(issue.descriptor, undefined, emit).from(origin).withArgs(issue.args).emit();
    }
    if (spec) {
      const names = declaredNames(spec.name);
      for (const identifier of names) {
        const other = owners.get(identifier);
        if (other !== undefined) {
          new DiagnosticBuilder(EK9009, undefined, emit)
            .from(origin)
            .withArgs({ name: spec.name, identifier, other })
            .emit();
          return;
        }
      }
      for (const identifier of names) {
        owners.set(identifier, spec.name);
      }

      if (options.verbose) {
        console.log(`[enumkit] Generating ${spec.name} (${spec.members.length} members, ${spec.repr})`);
      }
      specs.push(spec);
    }
  });

  if (diagnostics.some((d) => d.severity === "error")) return;

  const code = renderEnumModule(specs);
  if (options.out === undefined) {
    io.stdout(code);
    return;
  }

  io.writeFile(options.out, code);
  if (options.verbose) {
    console.log(`[enumkit] Wrote ${specs.length} enum(s) to ${options.out}`);
  }
}

// ============================================================================
// expand
// ============================================================================

function expand(options: CliOptions, io: CliIO, diagnostics: RichDiagnostic[]): boolean {
  let code: string;
  try {
    code = io.readFile(options.file);
  } catch (error) {
    new DiagnosticBuilder(EK9050, undefined, (rich) => diagnostics.push(rich))
      .from(options.file)
      .withArgs({ file: options.file, detail: error instanceof Error ? error.message : String(error) })
      .emit();
    return false;
  }

  const result = transformCode(code, { fileName: options.file, verbose: options.verbose });
  let hasPlainError = false;

  for (const diag of result.diagnostics) {
    if (diag.rich) {
      diagnostics.push(diag.rich);
    } else {
      io.stderr(`${diag.severity}: ${diag.message}`);
      if (diag.severity === "error") hasPlainError = true;
    }
  }

  io.stdout(result.code);
  return !hasPlainError;
}

// ============================================================================
// --explain
// ============================================================================

function explain(code: string | undefined, io: CliIO): number {
  if (code === undefined) {
    io.stderr("--explain requires a diagnostic code\nUsage: enumkit --explain <code>");
    return 1;
  }

  const match = /^(?:EK)?(\d+)$/i.exec(code);
  const descriptor = match ? getDiagnosticDescriptor(Number(match[1])) : undefined;
  if (!descriptor) {
    io.stderr(`Unknown diagnostic code: ${code}`);
    return 1;
  }

  io.stdout(`${formatCode(descriptor.code)}: ${descriptor.messageTemplate}\n\n${descriptor.explanation}`);
  return 0;
}

/**
 * Run the CLI and return its exit code.
 */
export function runCli(args: string[], io: CliIO = nodeIO): number {
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    io.stdout(HELP);
    return 0;
  }

  const explainAt = args.indexOf("--explain");
  if (explainAt !== -1) {
    return explain(args[explainAt + 1], io);
  }

  let options: CliOptions;
  try {
    options = parseArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`${error.message}\nUsage: enumkit <generate|expand> <file> [options]`);
      return 1;
    }
    throw error;
  }

  const diagnostics: RichDiagnostic[] = [];
  let ok = true;
  switch (options.command) {
    case "generate":
      generate(options, io, diagnostics);
      break;
    case "expand":
      ok = expand(options, io, diagnostics);
      break;
  }

  if (diagnostics.length > 0) {
    io.stderr(renderDiagnosticsCLI(diagnostics, { colors: io.colors, showExplanation: options.verbose }));
  }

  return ok && !diagnostics.some((d) => d.severity === "error") ? 0 : 1;
}
