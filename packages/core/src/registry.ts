/**
 * Macro Registry - Stores and retrieves macro definitions
 *
 * This module also provides a generic Registry<K, V> abstraction used for
 * other name-keyed tables, such as the enum generator's variant presets.
 */

import type { AttributeMacro, MacroDefinition, MacroRegistry } from "./types.js";

// ============================================================================
// Generic Registry<K, V> Abstraction
// ============================================================================

/**
 * Duplicate handling strategy for registry entries.
 */
export type DuplicateStrategy =
  | "error" // Throw error on duplicate (default)
  | "skip" // Silently skip if same entry exists
  | "replace"; // Replace existing entry

/**
 * Options for creating a Registry instance.
 */
export interface RegistryOptions<V> {
  /** How to handle duplicate entries (default: "error") */
  duplicateStrategy?: DuplicateStrategy;

  /** Custom equality check for values (used with "skip" strategy) */
  valueEquals?: (a: V, b: V) => boolean;

  /** Name for error messages */
  name?: string;
}

/**
 * A generic, type-safe registry for key-value pairs.
 *
 * @example
 * ```typescript
 * const variants = createGenericRegistry<string, EnumPolicy>({
 *   name: "EnumVariantRegistry",
 *   duplicateStrategy: "skip",
 *   valueEquals: samePolicy,
 * });
 *
 * variants.set("optional", { sentinel: "no-sentinel", index: "repr" });
 * ```
 */
export interface GenericRegistry<K, V> extends Iterable<[K, V]> {
  /** Register a new entry */
  set(key: K, value: V): void;

  /** Get an entry by key */
  get(key: K): V | undefined;

  /** Check if a key exists */
  has(key: K): boolean;

  /** Delete an entry */
  delete(key: K): boolean;

  /** Get all keys */
  keys(): IterableIterator<K>;

  /** Get all values */
  values(): IterableIterator<V>;

  /** Number of entries */
  readonly size: number;

  /** Clear all entries */
  clear(): void;

  [Symbol.iterator](): IterableIterator<[K, V]>;
}

class GenericRegistryImpl<K, V> implements GenericRegistry<K, V> {
  private store = new Map<K, V>();
  private readonly duplicateStrategy: DuplicateStrategy;
  private readonly name: string;
  private readonly valueEquals: ((a: V, b: V) => boolean) | undefined;

  constructor(options: RegistryOptions<V> = {}) {
    this.duplicateStrategy = options.duplicateStrategy ?? "error";
    this.name = options.name ?? "Registry";
    this.valueEquals = options.valueEquals;
  }

  set(key: K, value: V): void {
    const existing = this.store.get(key);

    if (existing !== undefined) {
      switch (this.duplicateStrategy) {
        case "error":
          throw new Error(`${this.name}: entry for key '${String(key)}' already exists`);

        case "skip":
          if (this.valueEquals) {
            if (this.valueEquals(existing, value)) return;
            throw new Error(`${this.name}: different value for key '${String(key)}' already exists`);
          }
          return;

        case "replace":
          this.store.set(key, value);
          return;
      }
    }

    this.store.set(key, value);
  }

  get(key: K): V | undefined {
    return this.store.get(key);
  }

  has(key: K): boolean {
    return this.store.has(key);
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  keys(): IterableIterator<K> {
    return this.store.keys();
  }

  values(): IterableIterator<V> {
    return this.store.values();
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
  }

  [Symbol.iterator](): IterableIterator<[K, V]> {
    return this.store[Symbol.iterator]();
  }
}

/**
 * Create a new generic registry instance.
 */
export function createGenericRegistry<K, V>(options?: RegistryOptions<V>): GenericRegistry<K, V> {
  return new GenericRegistryImpl<K, V>(options);
}

// ============================================================================
// Macro Registry Implementation
// ============================================================================

/**
 * Key for module-scoped macro lookup: "module::exportName"
 */
function moduleKey(mod: string, exportName: string): string {
  return `${mod}::${exportName}`;
}

class MacroRegistryImpl implements MacroRegistry {
  private attributeMacros = new Map<string, AttributeMacro>();

  /**
   * Secondary index: module-scoped lookup for macros that declare a `module`.
   */
  private moduleScopedMacros = new Map<string, MacroDefinition>();

  /**
   * Two definitions with the same name and module are the same macro.
   * ESM re-imports can hand us a fresh object for an already-registered macro.
   */
  private isSameMacro(existing: MacroDefinition, incoming: MacroDefinition): boolean {
    if (existing === incoming) return true;
    return existing.name === incoming.name && existing.module === incoming.module;
  }

  register(macro: MacroDefinition): void {
    const existing = this.attributeMacros.get(macro.name);
    if (existing) {
      if (this.isSameMacro(existing, macro)) return;
      throw new Error(`Attribute macro '${macro.name}' is already registered`);
    }
    this.attributeMacros.set(macro.name, macro);

    if (macro.module) {
      const exportName = macro.exportName ?? macro.name;
      this.moduleScopedMacros.set(moduleKey(macro.module, exportName), macro);
    }
  }

  getAttribute(name: string): AttributeMacro | undefined {
    return this.attributeMacros.get(name);
  }

  getByModuleExport(mod: string, exportName: string): MacroDefinition | undefined {
    return this.moduleScopedMacros.get(moduleKey(mod, exportName));
  }

  getAll(): MacroDefinition[] {
    return [...this.attributeMacros.values()];
  }

  /** Clear all registered macros (useful for testing) */
  clear(): void {
    this.attributeMacros.clear();
    this.moduleScopedMacros.clear();
  }
}

/** Create a new isolated registry (for testing or scoped usage) */
export function createRegistry(): MacroRegistry {
  return new MacroRegistryImpl();
}

/** Global macro registry singleton */
export const globalRegistry: MacroRegistry = createRegistry();

// ============================================================================
// Macro Definition Helpers
// ============================================================================

/**
 * Define an attribute macro with type inference
 */
export function defineAttributeMacro(definition: Omit<AttributeMacro, "kind">): AttributeMacro {
  return {
    ...definition,
    kind: "attribute",
  };
}

