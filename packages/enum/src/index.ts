/**
 * @enumkit/enum - reflection for closed enumerations
 *
 * Three ways to get the same five operations (all, toIndex, toName,
 * fromName, names):
 *
 * - `generateEnumSource(spec)` renders TypeScript source
 * - `@reflectEnum(options)` expands an enum declaration at compile time
 * - `defineEnum(name, options)` builds them at runtime
 */

export {
  MAX_ARITY,
  countArity,
  type Arity,
  type ArityCount,
  type IsWithinArity,
  type MemberTuple,
} from "./arity.js";
export { expandEach, type Transform } from "./expansion.js";
export { ArityError, EnumSpecError } from "./errors.js";
export {
  REPRS,
  isRepr,
  castToRepr,
  castExpression,
  indexTypeName,
  fitsRepr,
  type Repr,
  type ReprInfo,
  type IndexOf,
  type IndexWidth,
} from "./repr.js";
export {
  BUILTIN_VARIANTS,
  registerVariant,
  getVariant,
  variantNames,
  resolvePolicy,
  type BuiltinVariant,
  type EnumPolicy,
  type PolicyDefaults,
  type PolicyOptions,
  type SentinelPolicy,
} from "./policy.js";
export {
  FIXED_DEFAULTS,
  assertEnumSpec,
  isIdentifier,
  isReservedWord,
  isTypeName,
  ordinalTable,
  resolveEnumSpec,
  validateEnumSpec,
  type EnumSpec,
  type EnumSpecInput,
  type OrdinalEntry,
  type ResolvedSpec,
  type SpecDefaults,
  type SpecField,
  type SpecIssue,
} from "./spec.js";
export {
  GENERATED_HEADER,
  declaredNames,
  generateEnumSource,
  generatedNames,
  renderEnumModule,
  renderEnumSource,
  type GeneratedNames,
} from "./generate.js";
export {
  defineEnum,
  type EnumReflection,
  type EnumValue,
  type OptionalEnum,
  type OptionalEnumOptions,
  type SentinelEnum,
  type SentinelEnumOptions,
} from "./define.js";
export { reflectEnum, reflectEnumAttribute, register, type ReflectEnumOptions } from "./macro.js";
