/**
 * Transform a single source string, for tests and the CLI.
 */

import * as ts from "typescript";
import type { MacroDiagnostic, RichDiagnostic } from "@enumkit/core";
import { enumTransformerFactory } from "./transformer.js";

/**
 * Diagnostic from transformation
 */
export interface TransformDiagnostic {
  file: string;
  start: number;
  length: number;
  message: string;
  severity: "error" | "warning" | "info";
  /** Catalog code, e.g. 9003 */
  code?: number;
  /** Structured form for CLI rendering */
  rich?: RichDiagnostic;
}

/**
 * Result of transforming a single file
 */
export interface TransformResult {
  /** Transformed code (valid TypeScript) */
  code: string;
  /** Whether the file was modified */
  changed: boolean;
  /** Macro expansion diagnostics */
  diagnostics: TransformDiagnostic[];
}

export interface TransformCodeOptions {
  fileName?: string;
  verbose?: boolean;
}

function toTransformDiagnostic(sourceFile: ts.SourceFile, diag: MacroDiagnostic): TransformDiagnostic {
  return {
    file: sourceFile.fileName,
    start: diag.node ? diag.node.getStart(sourceFile) : 0,
    length: diag.node ? diag.node.getWidth(sourceFile) : 0,
    message: diag.message,
    severity: diag.severity,
    code: diag.code,
    rich: diag.rich,
  };
}

/**
 * Expand the macros in `code` and print the result.
 * Unchanged input is returned as written.
 */
export function transformCode(code: string, options: TransformCodeOptions = {}): TransformResult {
  const fileName = options.fileName ?? "input.ts";
  const scriptKind = fileName.endsWith(".tsx") ? ts.ScriptKind.TSX : ts.ScriptKind.TS;
  const sourceFile = ts.createSourceFile(fileName, code, ts.ScriptTarget.Latest, true, scriptKind);

  const collected: MacroDiagnostic[] = [];
  const result = ts.transform(sourceFile, [
    enumTransformerFactory(undefined, {
      verbose: options.verbose,
      onDiagnostics: (_file, diagnostics) => collected.push(...diagnostics),
    }),
  ]);

  try {
    const transformed = result.transformed[0];
    const changed = transformed !== sourceFile;
    const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });

    return {
      code: changed ? printer.printFile(transformed) : code,
      changed,
      diagnostics: collected.map((diag) => toTransformDiagnostic(sourceFile, diag)),
    };
  } finally {
    result.dispose();
  }
}
