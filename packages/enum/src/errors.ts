/**
 * Errors thrown by the runtime surfaces of the generator.
 *
 * Build-time surfaces (the macro, the CLI) report diagnostics instead.
 */

import { formatCode } from "@enumkit/core";
import type { SpecIssue } from "./spec.js";
import { MAX_ARITY } from "./arity.js";

/**
 * A token list the arity counter has no entry for.
 */
export class ArityError extends Error {
  constructor(public readonly count: number) {
    super(
      count === 0
        ? "Expansion needs at least one token"
        : `Expansion supports at most ${MAX_ARITY} tokens, got ${count}`
    );
    this.name = "ArityError";
  }
}

/**
 * An enum spec that failed validation.
 */
export class EnumSpecError extends Error {
  constructor(
    public readonly typeName: string,
    public readonly issues: readonly SpecIssue[]
  ) {
    super(
      `Invalid enum spec \`${typeName}\`:\n` +
        issues.map((issue) => `  [${formatCode(issue.descriptor.code)}] ${issue.message}`).join("\n")
    );
    this.name = "EnumSpecError";
  }
}
