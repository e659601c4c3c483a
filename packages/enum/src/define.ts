/**
 * Runtime builder
 *
 * `defineEnum` builds the five reflection operations as ordinary functions
 * over a frozen ordinal/name table, for code that does not run the
 * transformer. Values are branded numbers: only values handed out by the
 * reflection object type-check as members of the set.
 *
 * @example
 * ```typescript
 * const LightsView = defineEnum("LightsView", {
 *   members: ["Simplified", "Detailed"] as const,
 * });
 *
 * LightsView.names();                               // ["None", "Simplified", "Detailed"]
 * LightsView.toIndex(LightsView.of("Detailed"));    // 2
 * LightsView.fromName("Complex") === LightsView.sentinel; // true
 * ```
 */

import type { EnumPolicy } from "./policy.js";
import { castToRepr, type IndexOf, type IndexWidth, type Repr } from "./repr.js";
import type { MemberTuple } from "./arity.js";
import { assertEnumSpec, FIXED_DEFAULTS, ordinalTable } from "./spec.js";

/** Brand symbol for enum values */
declare const enumBrand: unique symbol;

/**
 * A value of the enumeration `Name`. At runtime this is its ordinal.
 */
export type EnumValue<Name extends string> = number & {
  readonly [enumBrand]: Name;
};

function brand<Name extends string>(ordinal: number): EnumValue<Name> {
  return ordinal as EnumValue<Name>;
}

interface EnumReflectionBase<Name extends string, Member extends string, Index> {
  readonly typeName: Name;
  readonly repr: Repr;
  readonly policy: EnumPolicy;
  /** Number of values, sentinel included */
  readonly size: number;

  /** Every value in declaration order, sentinel first */
  all(): readonly EnumValue<Name>[];
  /** The ordinal, cast to the index type */
  toIndex(value: EnumValue<Name>): Index;
  toName(value: EnumValue<Name>): Member;
  /** `toName` over `all()` */
  names(): readonly Member[];
  /** The value of a declared member */
  of(member: Member): EnumValue<Name>;
}

export interface SentinelEnum<Name extends string, Member extends string, Index>
  extends EnumReflectionBase<Name, Member, Index> {
  /** The ordinal-0 value */
  readonly sentinel: EnumValue<Name>;
  /** Exact match, or the sentinel when nothing matches */
  fromName(name: string): EnumValue<Name>;
}

export interface OptionalEnum<Name extends string, Member extends string, Index>
  extends EnumReflectionBase<Name, Member, Index> {
  /** Exact match, or `undefined` when nothing matches */
  fromName(name: string): EnumValue<Name> | undefined;
}

export type EnumReflection<Name extends string = string, Member extends string = string, Index = number | bigint> =
  | SentinelEnum<Name, Member, Index>
  | OptionalEnum<Name, Member, Index>;

interface DefineEnumBaseOptions<M extends MemberTuple, R extends Repr, W extends IndexWidth> {
  /** Member names in declaration order, written `as const` */
  members: M;
  repr?: R;
  index?: W;
}

export interface SentinelEnumOptions<M extends MemberTuple, R extends Repr, W extends IndexWidth, S extends string>
  extends DefineEnumBaseOptions<M, R, W> {
  sentinel?: true;
  sentinelName?: S;
}

export interface OptionalEnumOptions<M extends MemberTuple, R extends Repr, W extends IndexWidth>
  extends DefineEnumBaseOptions<M, R, W> {
  sentinel: false;
}

/**
 * Build the reflection object of an enumeration.
 *
 * Defaults are fixed (`u32`, sentinel `None`, index at the repr width) so
 * the result types match the runtime; configuration does not apply here.
 *
 * @throws {EnumSpecError} when the spec has issues
 */
export function defineEnum<
  Name extends string,
  M extends MemberTuple,
  R extends Repr = "u32",
  W extends IndexWidth = "repr",
  S extends string = "None",
>(name: Name, options: SentinelEnumOptions<M, R, W, S>): SentinelEnum<Name, S | M[number], IndexOf<R, W>>;
export function defineEnum<
  Name extends string,
  M extends MemberTuple,
  R extends Repr = "u32",
  W extends IndexWidth = "repr",
>(name: Name, options: OptionalEnumOptions<M, R, W>): OptionalEnum<Name, M[number], IndexOf<R, W>>;
export function defineEnum(
  name: string,
  options: SentinelEnumOptions<MemberTuple, Repr, IndexWidth, string> | OptionalEnumOptions<MemberTuple, Repr, IndexWidth>
): EnumReflection {
  const spec = assertEnumSpec(
    {
      name,
      members: options.members,
      repr: options.repr,
      index: options.index,
      sentinel: options.sentinel,
      sentinelName: "sentinelName" in options ? options.sentinelName : undefined,
    },
    FIXED_DEFAULTS
  );

  const table = ordinalTable(spec);
  const values: readonly EnumValue<string>[] = Object.freeze(table.map((entry) => brand<string>(entry.ordinal)));
  const nameTable: readonly string[] = Object.freeze(table.map((entry) => entry.name));
  const withSentinel = spec.policy.sentinel === "with-sentinel";

  const toIndex = (value: EnumValue<string>): number | bigint =>
    spec.policy.index === "word" ? value : castToRepr(spec.repr, value);

  const toName = (value: EnumValue<string>): string =>
    withSentinel ? nameTable[value] ?? spec.sentinelName : nameTable[value];

  const lookup = (text: string): EnumValue<string> | undefined => {
    const ordinal = nameTable.indexOf(text);
    return ordinal === -1 ? undefined : values[ordinal];
  };

  const nameList: readonly string[] = Object.freeze(values.map(toName));

  const base = {
    typeName: spec.name,
    repr: spec.repr,
    policy: spec.policy,
    size: values.length,
    all: () => values,
    toIndex,
    toName,
    names: () => nameList,
    of: (member: string): EnumValue<string> => {
      const value = lookup(member);
      if (value === undefined) {
        throw new Error(`\`${member}\` is not a member of ${spec.name}`);
      }
      return value;
    },
  };

  if (withSentinel) {
    const sentinel = values[0];
    return Object.freeze({
      ...base,
      sentinel,
      fromName: (text: string): EnumValue<string> => lookup(text) ?? sentinel,
    });
  }

  return Object.freeze({ ...base, fromName: lookup });
}
