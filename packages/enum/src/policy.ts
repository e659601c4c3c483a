/**
 * Generator policies.
 *
 * Two independent switches distinguish the generator variants:
 *
 * - `sentinel`: whether ordinal 0 is taken by a "no value" member that
 *   `ToName` falls back on and `FromName` returns for unknown names.
 * - `index`: whether `ToIndex` returns the declared width or a plain
 *   platform-word number.
 *
 * Named variants bundle both switches. Explicit options win over a
 * variant, and a variant wins over configured defaults.
 */

import { createGenericRegistry } from "@enumkit/core";
import type { IndexWidth } from "./repr.js";

export type SentinelPolicy = "with-sentinel" | "no-sentinel";

export interface EnumPolicy {
  readonly sentinel: SentinelPolicy;
  readonly index: IndexWidth;
}

export const BUILTIN_VARIANTS = {
  /** Sentinel at ordinal 0; ToIndex at the declared width. */
  "implicit-sentinel": { sentinel: "with-sentinel", index: "repr" },
  /** Sentinel declared as a member; ToIndex as a plain word. */
  "explicit-sentinel": { sentinel: "with-sentinel", index: "word" },
  /** No sentinel; FromName reports unknown names as `undefined`. */
  optional: { sentinel: "no-sentinel", index: "repr" },
} as const satisfies Record<string, EnumPolicy>;

export type BuiltinVariant = keyof typeof BUILTIN_VARIANTS;

function samePolicy(a: EnumPolicy, b: EnumPolicy): boolean {
  return a.sentinel === b.sentinel && a.index === b.index;
}

const variants = createGenericRegistry<string, EnumPolicy>({
  name: "EnumVariantRegistry",
  duplicateStrategy: "skip",
  valueEquals: samePolicy,
});

for (const [name, policy] of Object.entries(BUILTIN_VARIANTS)) {
  variants.set(name, policy);
}

/**
 * Add a named variant. Registering the same policy twice under one name is a
 * no-op; a different policy under a taken name throws.
 */
export function registerVariant(name: string, policy: EnumPolicy): void {
  variants.set(name, policy);
}

export function getVariant(name: string): EnumPolicy | undefined {
  return variants.get(name);
}

export function variantNames(): string[] {
  return [...variants.keys()];
}

export interface PolicyOptions {
  sentinel?: boolean;
  index?: IndexWidth;
  variant?: string;
}

export interface PolicyDefaults {
  sentinel: boolean;
  index: IndexWidth;
}

/**
 * Resolve the effective policy. Returns `undefined` for an unknown variant.
 */
export function resolvePolicy(options: PolicyOptions, defaults: PolicyDefaults): EnumPolicy | undefined {
  let base: EnumPolicy = {
    sentinel: defaults.sentinel ? "with-sentinel" : "no-sentinel",
    index: defaults.index,
  };

  if (options.variant !== undefined) {
    const preset = variants.get(options.variant);
    if (!preset) return undefined;
    base = preset;
  }

  return {
    sentinel: options.sentinel === undefined ? base.sentinel : options.sentinel ? "with-sentinel" : "no-sentinel",
    index: options.index ?? base.index,
  };
}
