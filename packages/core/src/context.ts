/**
 * MacroContext Implementation - Provides utilities for macro expansion
 */

import * as ts from "typescript";
import type { MacroContext, MacroDiagnostic } from "./types.js";
import {
  DiagnosticBuilder,
  richToMacroDiagnostic,
  type DiagnosticDescriptor,
} from "./diagnostics.js";
import { stripPositions } from "./ast-utils.js";

export class MacroContextImpl implements MacroContext {
  private diagnostics: MacroDiagnostic[] = [];

  constructor(
    public readonly program: ts.Program | undefined,
    public readonly sourceFile: ts.SourceFile,
    public readonly factory: ts.NodeFactory,
    public readonly transformContext: ts.TransformationContext
  ) {}

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  parseStatements(code: string): ts.Statement[] {
    const tempSource = ts.createSourceFile(
      "__macro_temp__.ts",
      code,
      ts.ScriptTarget.Latest,
      true,
      ts.ScriptKind.TS
    );
    return Array.from(tempSource.statements).map((stmt) => stripPositions(stmt));
  }

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  reportWarning(node: ts.Node, message: string): void {
    this.diagnostics.push({ severity: "warning", message, node });
  }

  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder {
    return new DiagnosticBuilder(descriptor, this.sourceFile, (rich) => {
      this.diagnostics.push(richToMacroDiagnostic(rich));
    });
  }

  getDiagnostics(): MacroDiagnostic[] {
    return [...this.diagnostics];
  }
}

/**
 * Create a macro context for a source file
 */
export function createMacroContext(
  sourceFile: ts.SourceFile,
  transformContext: ts.TransformationContext,
  program?: ts.Program
): MacroContextImpl {
  return new MacroContextImpl(program, sourceFile, transformContext.factory, transformContext);
}
