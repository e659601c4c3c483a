/**
 * Arity Counter
 *
 * Counts a member list by positional matching: the list is followed by the
 * counts 10, 9, ..., 1 and whatever lands in slot 10 is the count. One to ten
 * tokens push a count into that slot; no tokens leave it empty, and an
 * eleventh token occupies it itself. Both cases have no matching entry.
 *
 * The ceiling is fixed at ten. Raising it means extending the count list
 * here and the expander table in `expansion.ts` together.
 */

export const MAX_ARITY = 10;

const REVERSED_COUNTS = [10, 9, 8, 7, 6, 5, 4, 3, 2, 1] as const;

type ReversedCounts = typeof REVERSED_COUNTS;

/** A supported member count: 1 through 10. */
export type ArityCount = ReversedCounts[number];

/**
 * Type-level counterpart of {@link countArity}.
 *
 * `Arity<["A", "B"]>` is `2`; an empty tuple gives `never` and an
 * eleven-element tuple gives its eleventh element, which is not a count.
 */
export type Arity<T extends readonly unknown[]> = [...T, ...ReversedCounts] extends { readonly 10: infer N }
  ? N
  : never;

/** `true` exactly for tuples of one to ten elements. */
export type IsWithinArity<T extends readonly unknown[]> = [Arity<T>] extends [never]
  ? false
  : Arity<T> extends ArityCount
    ? true
    : false;

/**
 * A member list the generator accepts: a readonly tuple of one to ten
 * names. Write the list `as const` so its length is known.
 */
export type MemberTuple = readonly string[] & { readonly length: ArityCount };

/**
 * Count a token list, or return `undefined` when it has no entry
 * (empty, or longer than {@link MAX_ARITY}).
 */
export function countArity(tokens: readonly string[]): ArityCount | undefined {
  const slot = [...tokens, ...REVERSED_COUNTS][MAX_ARITY];
  return typeof slot === "number" ? slot : undefined;
}
