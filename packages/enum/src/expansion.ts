/**
 * Expansion Engine
 *
 * Applies a one-token transform to every token of a list and concatenates
 * the fragments, adding no separators of its own. There is one expander per
 * supported length; each handles its first token and hands the rest to the
 * expander one shorter. The arity counter picks the entry point.
 */

import { countArity, type ArityCount } from "./arity.js";
import { ArityError } from "./errors.js";

/** Turns one token into a code fragment. */
export type Transform = (token: string) => string;

type Expander = (transform: Transform, tokens: readonly string[]) => string;

function followedBy(next: Expander): Expander {
  return (transform, [head, ...rest]) => transform(head) + next(transform, rest);
}

const expand1: Expander = (transform, [token]) => transform(token);
const expand2 = followedBy(expand1);
const expand3 = followedBy(expand2);
const expand4 = followedBy(expand3);
const expand5 = followedBy(expand4);
const expand6 = followedBy(expand5);
const expand7 = followedBy(expand6);
const expand8 = followedBy(expand7);
const expand9 = followedBy(expand8);
const expand10 = followedBy(expand9);

const EXPANDERS: Readonly<Record<ArityCount, Expander>> = {
  1: expand1,
  2: expand2,
  3: expand3,
  4: expand4,
  5: expand5,
  6: expand6,
  7: expand7,
  8: expand8,
  9: expand9,
  10: expand10,
};

/**
 * `transform(t1) + transform(t2) + ... + transform(tk)` for 1 <= k <= 10.
 *
 * @throws {ArityError} when the list is empty or longer than ten tokens
 */
export function expandEach(transform: Transform, tokens: readonly string[]): string {
  const arity = countArity(tokens);
  if (arity === undefined) {
    throw new ArityError(tokens.length);
  }
  return EXPANDERS[arity](transform, tokens);
}
