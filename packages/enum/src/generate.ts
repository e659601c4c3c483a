/**
 * Source generator
 *
 * Renders a resolved spec as TypeScript: a numeric `enum` whose members carry
 * their ordinals, two frozen lookup tables, and the five reflection functions
 * named after the type (`lightsViewAll`, `lightsViewToIndex`, ...).
 *
 * Every per-member fragment goes through {@link expandEach}; the sentinel,
 * when there is one, is emitted outside the expansion.
 *
 * @example
 * ```typescript
 * generateEnumSource({ name: "LightsView", members: ["Simplified", "Detailed"] });
 * // export enum LightsView {
 * //   None = 0,
 * //   Simplified = 1,
 * //   Detailed = 2,
 * // }
 * // ...
 * ```
 */

import { config } from "@enumkit/core";
import { expandEach, type Transform } from "./expansion.js";
import { castExpression, indexTypeName } from "./repr.js";
import { assertEnumSpec, type EnumSpec, type EnumSpecInput, type SpecDefaults } from "./spec.js";

/** Generated function names for a type name. */
export interface GeneratedNames {
  all: string;
  toIndex: string;
  toName: string;
  fromName: string;
  names: string;
}

function camel(name: string): string {
  return name.charAt(0).toLowerCase() + name.slice(1);
}

export function generatedNames(typeName: string): GeneratedNames {
  const base = camel(typeName);
  return {
    all: `${base}All`,
    toIndex: `${base}ToIndex`,
    toName: `${base}ToName`,
    fromName: `${base}FromName`,
    names: `${base}Names`,
  };
}

/**
 * Every top-level name the rendered source of `typeName` declares.
 * Two specs rendered into one module must not share any of them.
 */
export function declaredNames(typeName: string): string[] {
  const base = camel(typeName);
  return [
    typeName,
    `${base}Values`,
    `${base}NameTable`,
    `${base}NameList`,
    ...Object.values(generatedNames(typeName)),
  ];
}

// ============================================================================
// Fragment transforms
// ============================================================================

function memberDeclaration(ordinalOf: (member: string) => number): Transform {
  return (member) => `  ${member} = ${ordinalOf(member)},\n`;
}

function qualifiedValue(typeName: string): Transform {
  return (member) => `  ${typeName}.${member},\n`;
}

const nameTableEntry: Transform = (member) => `  ${JSON.stringify(member)},\n`;

function fromNameCase(typeName: string): Transform {
  return (member) => `    case ${JSON.stringify(member)}:\n      return ${typeName}.${member};\n`;
}

// ============================================================================
// Rendering
// ============================================================================

/**
 * Render an already-resolved spec.
 */
export function renderEnumSource(spec: EnumSpec): string {
  const { name, members, repr, policy, sentinelName } = spec;
  const withSentinel = policy.sentinel === "with-sentinel";
  const offset = withSentinel ? 1 : 0;
  const exp = spec.exported ? "export " : "";
  const fn = generatedNames(name);
  const [, valuesTable, nameTable, nameList] = declaredNames(name);

  const ordinalOf = (member: string): number => members.indexOf(member) + offset;
  const sentinelDecl = withSentinel ? `  ${sentinelName} = 0,\n` : "";
  const sentinelValue = withSentinel ? `  ${name}.${sentinelName},\n` : "";
  const sentinelEntry = withSentinel ? nameTableEntry(sentinelName) : "";

  const indexType = indexTypeName(repr, policy.index);
  const indexBody = policy.index === "word" ? "value" : castExpression(repr, "value");

  const toNameBody = withSentinel
    ? `return ${nameTable}[value] ?? ${JSON.stringify(sentinelName)};`
    : `return ${nameTable}[value];`;
  const fromNameType = withSentinel ? name : `${name} | undefined`;
  const fromNameDefault = withSentinel ? `${name}.${sentinelName}` : "undefined";
  // The FromName body refers to the enum by name
  const param = name === "name" ? "text" : "name";

  return [
    `${exp}enum ${name} {\n${sentinelDecl}${expandEach(memberDeclaration(ordinalOf), members)}}`,
    `const ${valuesTable}: readonly ${name}[] = Object.freeze([\n${sentinelValue}${expandEach(qualifiedValue(name), members)}]);`,
    `const ${nameTable}: readonly string[] = Object.freeze([\n${sentinelEntry}${expandEach(nameTableEntry, members)}]);`,
    `const ${nameList}: readonly string[] = Object.freeze(${valuesTable}.map(${fn.toName}));`,
    `${exp}function ${fn.all}(): readonly ${name}[] {\n  return ${valuesTable};\n}`,
    `${exp}function ${fn.toIndex}(value: ${name}): ${indexType} {\n  return ${indexBody};\n}`,
    `${exp}function ${fn.toName}(value: ${name}): string {\n  ${toNameBody}\n}`,
    `${exp}function ${fn.fromName}(${param}: string): ${fromNameType} {\n  switch (${param}) {\n${expandEach(fromNameCase(name), members)}    default:\n      return ${fromNameDefault};\n  }\n}`,
    `${exp}function ${fn.names}(): readonly string[] {\n  return ${nameList};\n}`,
  ].join("\n\n") + "\n";
}

/**
 * Validate a spec and render it. Unset options come from the configured
 * enum defaults.
 *
 * @throws {EnumSpecError} when the spec has issues
 */
export function generateEnumSource(input: EnumSpecInput, defaults: SpecDefaults = config.enumDefaults()): string {
  return renderEnumSource(assertEnumSpec(input, defaults));
}

export const GENERATED_HEADER = "// Generated by enumkit. Do not edit.\n";

/**
 * Render several specs as one module, as the CLI writes it.
 */
export function renderEnumModule(specs: readonly EnumSpec[]): string {
  return GENERATED_HEADER + specs.map((spec) => "\n" + renderEnumSource(spec)).join("");
}
