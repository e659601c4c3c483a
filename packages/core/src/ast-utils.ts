/**
 * AST helpers shared by macros and the transformer
 */

import * as ts from "typescript";

/**
 * Recursively mark AST nodes as synthetic by setting positions to -1.
 *
 * Nodes parsed from a scratch source file must not keep their positions,
 * otherwise the printer copies text from the wrong file.
 */
export function stripPositions<T extends ts.Node>(node: T): T {
  ts.setTextRange(node, { pos: -1, end: -1 });
  return ts.visitEachChild(node, (child) => stripPositions(child), undefined);
}

/**
 * Read the name a decorator refers to: `@foo` and `@foo(...)` both give "foo".
 */
export function decoratorName(decorator: ts.Decorator): string | undefined {
  const expr = decorator.expression;
  if (ts.isIdentifier(expr)) return expr.text;
  if (ts.isCallExpression(expr) && ts.isIdentifier(expr.expression)) {
    return expr.expression.text;
  }
  return undefined;
}

/**
 * Arguments of a decorator call; an empty list for a bare `@foo`.
 */
export function decoratorArgs(decorator: ts.Decorator): readonly ts.Expression[] {
  const expr = decorator.expression;
  return ts.isCallExpression(expr) ? expr.arguments : [];
}

/**
 * Decorators written on a declaration.
 *
 * The parser keeps decorators in `modifiers` for every declaration kind,
 * including ones (enums, interfaces) that `ts.getDecorators` ignores.
 */
export function getWrittenDecorators(node: ts.Node): ts.Decorator[] {
  if (!ts.canHaveModifiers(node)) return [];
  const modifiers: readonly ts.ModifierLike[] = node.modifiers ?? [];
  return modifiers.filter(ts.isDecorator);
}

/**
 * True when a declaration carries the `export` keyword.
 */
export function hasExportModifier(node: ts.Node): boolean {
  if (!ts.canHaveModifiers(node)) return false;
  return (node.modifiers ?? []).some((m) => m.kind === ts.SyntaxKind.ExportKeyword);
}
