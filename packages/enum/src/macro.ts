/**
 * @reflectEnum - reflection for enum declarations
 *
 * Replaces a decorated enum with the generated enum, lookup tables and
 * reflection functions. Ordinals follow declaration order, so members may
 * not carry initializers.
 *
 * @example
 * ```typescript
 * @reflectEnum({ repr: "u8" })
 * export enum LightsView {
 *   Simplified,
 *   Detailed,
 * }
 *
 * lightsViewToIndex(LightsView.Detailed); // 2
 * lightsViewFromName("Complex");         // LightsView.None
 * ```
 */

import * as ts from "typescript";
import {
  config,
  defineAttributeMacro,
  globalRegistry,
  hasExportModifier,
  EK9011,
  EK9012,
  type MacroContext,
} from "@enumkit/core";
import { renderEnumSource } from "./generate.js";
import { resolveEnumSpec, type EnumSpecInput, type SpecIssue } from "./spec.js";

const MACRO_NAME = "reflectEnum";

/**
 * Options accepted by `@reflectEnum`.
 */
export interface ReflectEnumOptions {
  repr?: "u8" | "u16" | "u32" | "u64" | "i8" | "i16" | "i32" | "i64";
  sentinel?: boolean;
  sentinelName?: string;
  index?: "repr" | "word";
  variant?: string;
}

type OptionInput = Pick<EnumSpecInput, "repr" | "sentinel" | "sentinelName" | "index" | "variant">;

const STRING_OPTIONS = new Set(["repr", "sentinelName", "index", "variant"]);

interface ParsedOptions {
  options: OptionInput;
  /** Value node of each option, for diagnostics */
  nodes: Map<string, ts.Expression>;
}

function invalidOption(ctx: MacroContext, node: ts.Node, option: string, detail: string): void {
  ctx.diagnostic(EK9012).at(node).withArgs({ option, detail }).emit();
}

function propertyKey(name: ts.PropertyName): string | undefined {
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  return undefined;
}

/**
 * Read the decorator's object literal. Returns `undefined` after reporting
 * when any option is malformed.
 */
function parseOptions(ctx: MacroContext, args: readonly ts.Expression[]): ParsedOptions | undefined {
  const options: OptionInput = {};
  const nodes = new Map<string, ts.Expression>();

  if (args.length === 0) return { options, nodes };

  if (args.length > 1) {
    invalidOption(ctx, args[1], "arguments", "expected a single options object");
    return undefined;
  }

  const literal = args[0];
  if (!ts.isObjectLiteralExpression(literal)) {
    invalidOption(ctx, literal, "options", "expected an object literal");
    return undefined;
  }

  let ok = true;
  for (const prop of literal.properties) {
    const key = ts.isPropertyAssignment(prop) ? propertyKey(prop.name) : undefined;
    if (!ts.isPropertyAssignment(prop) || key === undefined) {
      invalidOption(ctx, prop, "options", "expected `key: value` pairs with literal values");
      ok = false;
      continue;
    }

    const value = prop.initializer;
    nodes.set(key, value);

    if (key === "sentinel") {
      if (value.kind === ts.SyntaxKind.TrueKeyword || value.kind === ts.SyntaxKind.FalseKeyword) {
        options.sentinel = value.kind === ts.SyntaxKind.TrueKeyword;
      } else {
        invalidOption(ctx, value, key, "expected `true` or `false`");
        ok = false;
      }
      continue;
    }

    if (!STRING_OPTIONS.has(key)) {
      invalidOption(ctx, prop.name, key, "unknown option");
      ok = false;
      continue;
    }

    if (!ts.isStringLiteral(value) && !ts.isNoSubstitutionTemplateLiteral(value)) {
      invalidOption(ctx, value, key, "expected a string literal");
      ok = false;
      continue;
    }

    switch (key) {
      case "repr":
        options.repr = value.text;
        break;
      case "sentinelName":
        options.sentinelName = value.text;
        break;
      case "index":
        options.index = value.text;
        break;
      case "variant":
        options.variant = value.text;
        break;
    }
  }

  return ok ? { options, nodes } : undefined;
}

function memberText(ctx: MacroContext, member: ts.EnumMember): string {
  const name = member.name;
  if (ts.isIdentifier(name) || ts.isStringLiteral(name)) return name.text;
  return name.getText(ctx.sourceFile);
}

function reportIssue(
  ctx: MacroContext,
  target: ts.EnumDeclaration,
  decorator: ts.Decorator,
  nodes: Map<string, ts.Expression>,
  issue: SpecIssue
): void {
  const builder = ctx.diagnostic(issue.descriptor).withArgs(issue.args);

  if (issue.memberIndex !== undefined) {
    builder.at(target.members[issue.memberIndex]);
  } else if (issue.field === "name" || issue.field === "members") {
    builder.at(target.name);
  } else {
    builder.at(nodes.get(issue.field) ?? decorator);
  }

  if (issue.firstIndex !== undefined) {
    builder.label(target.members[issue.firstIndex], "first declared here");
  }

  switch (issue.descriptor.code) {
    case 9002:
      builder.help("Split the enumeration into smaller enums");
      break;
    case 9005:
      builder.help("Rename the member, set `sentinelName`, or use `sentinel: false`");
      break;
  }

  builder.emit();
}

export const reflectEnumAttribute = defineAttributeMacro({
  name: MACRO_NAME,
  module: "@enumkit/enum",
  description: "Generate reflection functions for an enum",
  validTargets: ["enum"],

  expand(ctx, decorator, target, args) {
    if (!ts.isEnumDeclaration(target)) {
      return target;
    }

    const parsed = parseOptions(ctx, args);

    let membersOk = true;
    const members = target.members.map((member) => {
      const text = memberText(ctx, member);
      if (member.initializer) {
        ctx.diagnostic(EK9011).at(member).withArgs({ member: text }).emit();
        membersOk = false;
      }
      return text;
    });

    for (const modifier of target.modifiers ?? []) {
      if (modifier.kind === ts.SyntaxKind.ConstKeyword || modifier.kind === ts.SyntaxKind.DeclareKeyword) {
        ctx.reportWarning(
          modifier,
          `@${MACRO_NAME} drops the \`${modifier.getText(ctx.sourceFile)}\` modifier; the generated enum is a regular enum`
        );
      }
    }

    if (!parsed || !membersOk) {
      return target;
    }

    const { spec, issues } = resolveEnumSpec(
      {
        ...parsed.options,
        name: target.name.text,
        members,
        exported: hasExportModifier(target),
      },
      config.enumDefaults()
    );

    for (const issue of issues) {
      reportIssue(ctx, target, decorator, parsed.nodes, issue);
    }

    if (!spec) {
      return target;
    }

    return ctx.parseStatements(renderEnumSource(spec));
  },
});

/**
 * Marker for the transformer. Calling it at runtime means the file was not
 * compiled with the enumkit transformer.
 */
export function reflectEnum(_options?: ReflectEnumOptions): <T>(target: T) => T {
  throw new Error("@reflectEnum must be processed by the enumkit transformer at compile time");
}

/** Register the enum macros with the global registry. Called on package import. */
export function register(): void {
  globalRegistry.register(reflectEnumAttribute);
}

// Auto-register when this module is imported
register();
