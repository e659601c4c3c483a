/**
 * @enumkit/transformer - TypeScript transformer for macro expansion
 *
 * Expands registered attribute macros written on top-level declarations.
 * Usable from ts-patch (`"transform": "@enumkit/transformer"`) or directly
 * through `ts.transform`.
 */

import * as ts from "typescript";
import {
  EK9010,
  EK9999,
  config as enumkitConfig,
  createMacroContext,
  decoratorArgs,
  decoratorName,
  getWrittenDecorators,
  globalRegistry,
  type AttributeTarget,
  type MacroContextImpl,
  type MacroDiagnostic,
} from "@enumkit/core";
// Registers @reflectEnum
import "@enumkit/enum";

/**
 * Configuration for the transformer
 */
export interface EnumTransformerConfig {
  /** Enable verbose logging (also on when config `debug` is set) */
  verbose?: boolean;

  /** Receives the diagnostics of each processed file */
  onDiagnostics?: (fileName: string, diagnostics: MacroDiagnostic[]) => void;
}

/**
 * Helpers ts-patch passes as the third argument of a program transformer
 */
export interface TransformerExtras {
  addDiagnostic(diagnostic: ts.Diagnostic): unknown;
}

type MacroTarget =
  | ts.ClassDeclaration
  | ts.FunctionDeclaration
  | ts.InterfaceDeclaration
  | ts.TypeAliasDeclaration
  | ts.EnumDeclaration;

function asMacroTarget(node: ts.Node): MacroTarget | undefined {
  if (
    ts.isClassDeclaration(node) ||
    ts.isFunctionDeclaration(node) ||
    ts.isInterfaceDeclaration(node) ||
    ts.isTypeAliasDeclaration(node) ||
    ts.isEnumDeclaration(node)
  ) {
    return node;
  }
  return undefined;
}

function targetKind(node: MacroTarget): AttributeTarget {
  if (ts.isClassDeclaration(node)) return "class";
  if (ts.isFunctionDeclaration(node)) return "function";
  if (ts.isInterfaceDeclaration(node)) return "interface";
  if (ts.isTypeAliasDeclaration(node)) return "type";
  return "enum";
}

function describeNode(node: ts.Node): string {
  const target = asMacroTarget(node);
  if (target) {
    return targetKind(target) === "type" ? "type alias" : targetKind(target);
  }
  if (ts.isVariableStatement(node)) return "variable statement";
  if (ts.isModuleDeclaration(node)) return "namespace";
  return ts.SyntaxKind[node.kind];
}

/** Code of macro diagnostics without a catalog entry */
const MACRO_DIAGNOSTIC_CODE = 9000;

/**
 * `addDiagnostic` is present on the transformation context in TypeScript 5
 * but missing from its public typings.
 */
function canAddDiagnostic(
  context: ts.TransformationContext
): context is ts.TransformationContext & { addDiagnostic(diagnostic: ts.DiagnosticWithLocation): void } {
  return "addDiagnostic" in context && typeof context.addDiagnostic === "function";
}

/**
 * Convert a macro diagnostic to a TS diagnostic located in `sourceFile`.
 */
function toTsDiagnostic(sourceFile: ts.SourceFile, diag: MacroDiagnostic): ts.DiagnosticWithLocation {
  return {
    file: sourceFile,
    start: diag.node ? diag.node.getStart(sourceFile) : 0,
    length: diag.node ? diag.node.getWidth(sourceFile) : 0,
    messageText: diag.message,
    category:
      diag.severity === "error"
        ? ts.DiagnosticCategory.Error
        : diag.severity === "warning"
          ? ts.DiagnosticCategory.Warning
          : ts.DiagnosticCategory.Message,
    code: diag.code ?? MACRO_DIAGNOSTIC_CODE,
    source: "enumkit",
  };
}

/**
 * Create the TypeScript transformer factory
 * This is the entry point called by ts-patch
 */
export function enumTransformerFactory(
  program?: ts.Program,
  config?: EnumTransformerConfig,
  extras?: TransformerExtras
): ts.TransformerFactory<ts.SourceFile> {
  const verbose = config?.verbose ?? enumkitConfig.has("debug");

  if (verbose) {
    console.log("[enumkit] Initializing transformer");
    console.log(
      `[enumkit] Registered macros: ${globalRegistry
        .getAll()
        .map((m) => m.name)
        .join(", ")}`
    );
  }

  return (context: ts.TransformationContext) => {
    return (sourceFile: ts.SourceFile) => {
      if (verbose) {
        console.log(`[enumkit] Processing: ${sourceFile.fileName}`);
      }

      const ctx = createMacroContext(sourceFile, context, program);
      const transformer = new EnumTransformer(ctx, verbose);
      const result = transformer.transformSourceFile(sourceFile);

      const diagnostics = ctx.getDiagnostics();
      config?.onDiagnostics?.(sourceFile.fileName, diagnostics);

      // Report through the TS diagnostic pipeline so `tsc` fails on macro errors
      for (const diag of diagnostics) {
        const tsDiag = toTsDiagnostic(sourceFile, diag);
        if (extras) {
          extras.addDiagnostic(tsDiag);
        } else if (canAddDiagnostic(context)) {
          context.addDiagnostic(tsDiag);
        }

        // Also log for build tools that don't surface diagnostics
        if (verbose) {
          const prefix = diag.severity === "error" ? "ERROR" : "WARNING";
          const loc = diag.node
            ? ` at ${sourceFile.fileName}:${sourceFile.getLineAndCharacterOfPosition(tsDiag.start).line + 1}`
            : "";
          console.log(`[enumkit ${prefix}]${loc} ${diag.message}`);
        }
      }

      return result;
    };
  };
}

export default enumTransformerFactory;

/**
 * Expands attribute macros on the top-level statements of one file
 */
class EnumTransformer {
  constructor(
    private ctx: MacroContextImpl,
    private verbose: boolean
  ) {}

  /**
   * Imports consumed by an expansion, keyed "module::exportName::localName".
   * They are removed after the pass.
   */
  private macroImports = new Set<string>();

  /** Imports still referenced by a decorator whose expansion failed */
  private keptImports = new Set<string>();

  transformSourceFile(sourceFile: ts.SourceFile): ts.SourceFile {
    let changed = false;
    const expanded: ts.Statement[] = [];

    for (const statement of sourceFile.statements) {
      const result = this.tryExpandAttributeMacros(statement);
      if (result) {
        expanded.push(...result);
        changed = true;
      } else {
        expanded.push(statement);
      }
    }

    if (!changed) return sourceFile;

    const statements: ts.Statement[] = [];
    for (const statement of expanded) {
      if (!ts.isImportDeclaration(statement)) {
        statements.push(statement);
        continue;
      }
      const cleaned = this.removeMacroImports(statement);
      if (cleaned) statements.push(cleaned);
    }

    return this.ctx.factory.updateSourceFile(sourceFile, statements);
  }

  private isMacroImport(mod: string, specifier: ts.ImportSpecifier): boolean {
    const imported = (specifier.propertyName ?? specifier.name).text;
    const key = `${mod}::${imported}::${specifier.name.text}`;
    return this.macroImports.has(key) && !this.keptImports.has(key);
  }

  /**
   * Drop import specifiers that only brought a macro into scope. The whole
   * declaration goes when nothing else is left in it.
   */
  private removeMacroImports(node: ts.ImportDeclaration): ts.ImportDeclaration | undefined {
    if (this.macroImports.size === 0 || !ts.isStringLiteral(node.moduleSpecifier)) return node;
    const mod = node.moduleSpecifier.text;
    const clause = node.importClause;
    const bindings = clause?.namedBindings;
    if (!clause || !bindings || !ts.isNamedImports(bindings)) return node;

    const kept = bindings.elements.filter((specifier) => !this.isMacroImport(mod, specifier));
    if (kept.length === bindings.elements.length) return node;
    if (kept.length === 0 && !clause.name) return undefined;

    const visitor = (child: ts.Node): ts.Node | undefined => {
      if (ts.isImportSpecifier(child)) {
        return this.isMacroImport(mod, child) ? undefined : child;
      }
      return ts.visitEachChild(child, visitor, this.ctx.transformContext);
    };
    return ts.visitEachChild(node, visitor, this.ctx.transformContext);
  }

  private tryExpandAttributeMacros(node: ts.Statement): ts.Statement[] | undefined {
    const decorators = getWrittenDecorators(node);
    if (decorators.length === 0) return undefined;

    const target = asMacroTarget(node);
    let current: MacroTarget | undefined = target;
    const extraStatements: ts.Statement[] = [];
    const remainingDecorators: ts.Decorator[] = [];
    let wasTransformed = false;

    for (const decorator of decorators) {
      const macroName = decoratorName(decorator);
      const macro = macroName === undefined ? undefined : globalRegistry.getAttribute(macroName);

      if (!macro) {
        remainingDecorators.push(decorator);
        continue;
      }

      wasTransformed = true;
      const importKey = macro.module ? `${macro.module}::${macro.exportName ?? macro.name}::${macroName}` : undefined;
      if (importKey) this.macroImports.add(importKey);

      if (!current || !macro.validTargets.includes(targetKind(current))) {
        this.ctx
          .diagnostic(EK9010)
          .at(decorator)
          .withArgs({ macro: macro.name, kind: describeNode(current ?? node) })
          .note(`@${macro.name} applies to: ${macro.validTargets.join(", ")}`)
          .emit();
        continue;
      }

      if (this.verbose) {
        console.log(`[enumkit] Expanding attribute macro: ${macro.name}`);
      }

      try {
        const result = macro.expand(this.ctx, decorator, current, decoratorArgs(decorator));
        const produced = (Array.isArray(result) ? result : [result]).filter(ts.isStatement);
        const [first, ...rest] = produced;
        const next = first === undefined ? undefined : asMacroTarget(first);

        if (next) {
          current = next;
          extraStatements.push(...rest);
        } else {
          // The declaration itself was replaced; later decorators have nothing to apply to
          current = undefined;
          extraStatements.push(...produced);
        }
      } catch (error) {
        this.ctx
          .diagnostic(EK9999)
          .at(decorator)
          .withArgs({ macro: macro.name, detail: error instanceof Error ? error.message : String(error) })
          .emit();
        remainingDecorators.push(decorator);
        if (importKey) this.keptImports.add(importKey);
      }
    }

    if (!wasTransformed) return undefined;

    if (current) {
      return [this.updateDecorators(current, remainingDecorators), ...extraStatements];
    }
    if (target === undefined) {
      // Not a declaration a macro can expand; keep it without the macro decorators
      return [this.updateStatementDecorators(node, remainingDecorators)];
    }
    return extraStatements;
  }

  private keepModifiers(
    modifiers: ts.NodeArray<ts.ModifierLike> | undefined,
    decorators: ts.Decorator[]
  ): ts.ModifierLike[] | undefined {
    const rest = modifiers?.filter((m) => !ts.isDecorator(m)) ?? [];
    const combined = [...decorators, ...rest];
    return combined.length > 0 ? combined : undefined;
  }

  private updateDecorators(node: MacroTarget, decorators: ts.Decorator[]): ts.Statement {
    const factory = this.ctx.factory;
    const modifiers = this.keepModifiers(node.modifiers, decorators);

    if (ts.isClassDeclaration(node)) {
      return factory.updateClassDeclaration(
        node,
        modifiers,
        node.name,
        node.typeParameters,
        node.heritageClauses,
        node.members
      );
    }

    if (ts.isFunctionDeclaration(node)) {
      return factory.updateFunctionDeclaration(
        node,
        modifiers,
        node.asteriskToken,
        node.name,
        node.typeParameters,
        node.parameters,
        node.type,
        node.body
      );
    }

    if (ts.isInterfaceDeclaration(node)) {
      return factory.updateInterfaceDeclaration(
        node,
        modifiers,
        node.name,
        node.typeParameters,
        node.heritageClauses,
        node.members
      );
    }

    if (ts.isTypeAliasDeclaration(node)) {
      return factory.updateTypeAliasDeclaration(node, modifiers, node.name, node.typeParameters, node.type);
    }

    return factory.updateEnumDeclaration(node, modifiers, node.name, node.members);
  }

  private updateStatementDecorators(node: ts.Statement, decorators: ts.Decorator[]): ts.Statement {
    if (ts.isVariableStatement(node)) {
      return this.ctx.factory.updateVariableStatement(
        node,
        this.keepModifiers(node.modifiers, decorators),
        node.declarationList
      );
    }
    return node;
  }
}
