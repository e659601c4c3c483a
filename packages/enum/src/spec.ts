/**
 * Enum specs: the build-time description of one enumeration.
 *
 * A spec is written as an {@link EnumSpecInput}, checked against the catalog
 * rules and resolved into an {@link EnumSpec} with every option filled in.
 * Validation collects issues rather than throwing, so the macro can attach
 * each one to the node it came from.
 */

import * as ts from "typescript";
import {
  EK9001,
  EK9002,
  EK9003,
  EK9004,
  EK9005,
  EK9006,
  EK9007,
  EK9008,
  EK9012,
  interpolate,
  type DiagnosticDescriptor,
  type EnumDefaultsConfig,
} from "@enumkit/core";
import { MAX_ARITY } from "./arity.js";
import { EnumSpecError } from "./errors.js";
import { resolvePolicy, type EnumPolicy } from "./policy.js";
import { fitsRepr, isRepr, type IndexWidth, type Repr } from "./repr.js";

export interface EnumSpecInput {
  /** Type name of the enumeration */
  name: string;
  /** Member identifiers in declaration order */
  members: readonly string[];
  repr?: string;
  sentinel?: boolean;
  sentinelName?: string;
  index?: string;
  /** Named preset, see `BUILTIN_VARIANTS` */
  variant?: string;
  /** Emit `export` on generated declarations (default: true) */
  exported?: boolean;
}

export interface EnumSpec {
  readonly name: string;
  readonly repr: Repr;
  readonly members: readonly string[];
  readonly policy: EnumPolicy;
  /** Name of the ordinal-0 member; only meaningful with a sentinel */
  readonly sentinelName: string;
  readonly exported: boolean;
}

export type SpecField = "name" | "members" | "repr" | "sentinelName" | "index" | "variant";

export interface SpecIssue {
  readonly descriptor: DiagnosticDescriptor;
  readonly args: Readonly<Record<string, string | number>>;
  readonly message: string;
  readonly field: SpecField;
  /** Position of the offending member */
  readonly memberIndex?: number;
  /** Position of the earlier declaration a duplicate repeats */
  readonly firstIndex?: number;
}

export type SpecDefaults = Required<EnumDefaultsConfig>;

/**
 * Defaults used where no configuration applies.
 */
export const FIXED_DEFAULTS: SpecDefaults = {
  repr: "u32",
  sentinel: true,
  sentinelName: "None",
  index: "repr",
};

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/** Type names TypeScript refuses as an enum name */
const PREDEFINED_TYPES = new Set([
  "any",
  "bigint",
  "boolean",
  "never",
  "number",
  "object",
  "string",
  "symbol",
  "undefined",
  "unknown",
  "void",
]);

/**
 * Reserved words, including the ones reserved only in strict mode.
 * Generated modules are always strict.
 */
export function isReservedWord(text: string): boolean {
  const token = ts.stringToToken(text);
  if (token === undefined) return false;
  return (
    (token >= ts.SyntaxKind.FirstReservedWord && token <= ts.SyntaxKind.LastReservedWord) ||
    (token >= ts.SyntaxKind.FirstFutureReservedWord && token <= ts.SyntaxKind.LastFutureReservedWord)
  );
}

export function isIdentifier(text: string): boolean {
  return IDENTIFIER.test(text) && !isReservedWord(text);
}

/** An identifier that can also name an enum */
export function isTypeName(text: string): boolean {
  return isIdentifier(text) && !PREDEFINED_TYPES.has(text);
}

function isIndexWidth(value: string): value is IndexWidth {
  return value === "repr" || value === "word";
}

function issue(
  descriptor: DiagnosticDescriptor,
  field: SpecField,
  args: Record<string, string | number>,
  extra: { memberIndex?: number; firstIndex?: number } = {}
): SpecIssue {
  return { descriptor, field, args, message: interpolate(descriptor.messageTemplate, args), ...extra };
}

export interface ResolvedSpec {
  /** Present only when there are no issues */
  spec?: EnumSpec;
  issues: SpecIssue[];
}

/**
 * Check a spec and fill in its defaults.
 */
export function resolveEnumSpec(input: EnumSpecInput, defaults: SpecDefaults = FIXED_DEFAULTS): ResolvedSpec {
  const issues: SpecIssue[] = [];
  const { name, members } = input;

  if (!isTypeName(name)) {
    issues.push(issue(EK9004, "name", { identifier: name }));
  }

  if (members.length === 0) {
    issues.push(issue(EK9001, "members", { name }));
  } else if (members.length > MAX_ARITY) {
    issues.push(issue(EK9002, "members", { name, count: members.length, max: MAX_ARITY }));
  }

  const firstSeen = new Map<string, number>();
  members.forEach((member, memberIndex) => {
    if (!isIdentifier(member)) {
      issues.push(issue(EK9004, "members", { identifier: member }, { memberIndex }));
    }
    const firstIndex = firstSeen.get(member);
    if (firstIndex === undefined) {
      firstSeen.set(member, memberIndex);
    } else {
      issues.push(issue(EK9003, "members", { member, name }, { memberIndex, firstIndex }));
    }
  });

  const repr = input.repr ?? defaults.repr;
  if (!isRepr(repr)) {
    issues.push(issue(EK9006, "repr", { repr }));
  }

  const index = input.index ?? defaults.index;
  if (!isIndexWidth(index)) {
    issues.push(issue(EK9012, "index", { option: "index", detail: `expected "repr" or "word", got "${index}"` }));
  }

  const policy = resolvePolicy(
    { sentinel: input.sentinel, index: isIndexWidth(index) ? index : undefined, variant: input.variant },
    { sentinel: defaults.sentinel, index: isIndexWidth(defaults.index) ? defaults.index : "repr" }
  );
  if (!policy) {
    issues.push(issue(EK9008, "variant", { variant: input.variant ?? "" }));
  }

  const sentinelName = input.sentinelName ?? defaults.sentinelName;
  if (policy?.sentinel === "with-sentinel") {
    if (!isIdentifier(sentinelName)) {
      issues.push(issue(EK9004, "sentinelName", { identifier: sentinelName }));
    }
    members.forEach((member, memberIndex) => {
      if (member === sentinelName) {
        issues.push(issue(EK9005, "members", { member, name }, { memberIndex }));
      }
    });
  }

  if (isRepr(repr) && policy && members.length > 0) {
    const highest = policy.sentinel === "with-sentinel" ? members.length : members.length - 1;
    if (!fitsRepr(repr, highest)) {
      issues.push(issue(EK9007, "repr", { ordinal: highest, name, repr }));
    }
  }

  if (issues.length > 0 || !isRepr(repr) || !policy) {
    return { issues };
  }

  return {
    issues,
    spec: {
      name,
      repr,
      members: Object.freeze([...members]),
      policy,
      sentinelName,
      exported: input.exported ?? true,
    },
  };
}

/**
 * Issues found in a spec; empty when it is valid.
 */
export function validateEnumSpec(input: EnumSpecInput, defaults: SpecDefaults = FIXED_DEFAULTS): SpecIssue[] {
  return resolveEnumSpec(input, defaults).issues;
}

/**
 * Resolve a spec, throwing an {@link EnumSpecError} if it has issues.
 */
export function assertEnumSpec(input: EnumSpecInput, defaults: SpecDefaults = FIXED_DEFAULTS): EnumSpec {
  const { spec, issues } = resolveEnumSpec(input, defaults);
  if (!spec) {
    throw new EnumSpecError(input.name, issues);
  }
  return spec;
}

export interface OrdinalEntry {
  readonly ordinal: number;
  readonly name: string;
}

/**
 * The ordinal/name table of a spec, sentinel first when there is one.
 */
export function ordinalTable(spec: EnumSpec): readonly OrdinalEntry[] {
  const names = spec.policy.sentinel === "with-sentinel" ? [spec.sentinelName, ...spec.members] : spec.members;
  return names.map((name, ordinal) => ({ ordinal, name }));
}
