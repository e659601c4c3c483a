/**
 * Core types for the enumkit macro system
 */

import * as ts from "typescript";
import type { DiagnosticBuilder, DiagnosticDescriptor, RichDiagnostic } from "./diagnostics.js";

// ============================================================================
// Macro Context - Available to all macros during expansion
// ============================================================================

export interface MacroContext {
  /** The TypeScript Program instance, when the transformer runs inside one */
  program: ts.Program | undefined;

  /** Current source file being processed */
  sourceFile: ts.SourceFile;

  /** TypeScript factory for creating nodes */
  factory: ts.NodeFactory;

  /** The transformer context */
  transformContext: ts.TransformationContext;

  // -------------------------------------------------------------------------
  // Node Creation Utilities
  // -------------------------------------------------------------------------

  /** Parse a code string into statements */
  parseStatements(code: string): ts.Statement[];

  // -------------------------------------------------------------------------
  // Diagnostics
  // -------------------------------------------------------------------------

  /** Report a compile-time warning */
  reportWarning(node: ts.Node, message: string): void;

  /** Start a rich diagnostic from a catalog entry */
  diagnostic(descriptor: DiagnosticDescriptor): DiagnosticBuilder;
}

// ============================================================================
// Macro Definitions
// ============================================================================

/** Base interface for all macro definitions */
export interface MacroDefinitionBase {
  /** Unique name of the macro */
  name: string;

  /** Optional description for documentation */
  description?: string;

  /**
   * The module specifier that exports this macro's placeholder function.
   * When set, the macro can also be looked up by module and export name.
   *
   * Examples: "@enumkit/enum"
   */
  module?: string;

  /**
   * The exported name of the placeholder in the source module.
   * Defaults to `name` if not specified.
   */
  exportName?: string;
}

/** Attribute macro - transforms declarations */
export interface AttributeMacro extends MacroDefinitionBase {
  kind: "attribute";

  /** Valid targets for this attribute */
  validTargets: AttributeTarget[];

  /**
   * Expand the attribute macro
   * @param decorator - The decorator node
   * @param target - The decorated declaration
   * @param args - Arguments passed to the decorator
   */
  expand(
    ctx: MacroContext,
    decorator: ts.Decorator,
    target: ts.Declaration,
    args: readonly ts.Expression[]
  ): ts.Node | ts.Node[];
}

export type AttributeTarget = "class" | "function" | "interface" | "type" | "enum";

/** Union of all macro types */
export type MacroDefinition = AttributeMacro;

// ============================================================================
// Macro Registry
// ============================================================================

export interface MacroRegistry {
  /** Register a new macro */
  register(macro: MacroDefinition): void;

  /** Get an attribute macro by name */
  getAttribute(name: string): AttributeMacro | undefined;

  /** Look up a macro by its source module and export name */
  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined;

  /** Get all registered macros */
  getAll(): MacroDefinition[];

  /** Clear all registered macros */
  clear(): void;
}

// ============================================================================
// Macro Diagnostics
// ============================================================================

export interface MacroDiagnostic {
  /** Severity level */
  severity: "error" | "warning" | "info";

  /** Diagnostic message */
  message: string;

  /** Source node that caused the diagnostic */
  node?: ts.Node;

  /** Catalog code, when the diagnostic came from a descriptor */
  code?: number;

  /** The structured form, when one was built */
  rich?: RichDiagnostic;
}
