/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: ENUMKIT_* (for CI overrides)
 * 3. Config files: enumkit.config.*, .enumkitrc, package.json#enumkit
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@enumkit/core";
 *
 * config.get("enums.repr")       // → "u32"
 * config.set({ enums: { sentinel: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";

// ============================================================================
// Types
// ============================================================================

/**
 * Defaults applied to enum specs that leave an option unset.
 * Values are validated where they are used.
 */
export interface EnumDefaultsConfig {
  /** Underlying integer type, e.g. "u32" */
  repr?: string;
  /** Reserve ordinal 0 for a sentinel member */
  sentinel?: boolean;
  /** Name of the sentinel member */
  sentinelName?: string;
  /** "repr" = ToIndex returns the underlying width, "word" = plain number */
  index?: string;
}

/**
 * Full enumkit configuration schema.
 */
export interface EnumkitConfig {
  /** Enable debug logging */
  debug?: boolean;
  /** Enum generator defaults */
  enums?: EnumDefaultsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

const MODULE_NAME = "enumkit";

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (const part of parts.slice(0, -1)) {
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Known camelCase keys, so ENUMKIT_ENUMS_SENTINELNAME can reach `sentinelName`.
 */
const CAMEL_KEYS = new Map([["sentinelname", "sentinelName"]]);

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   ENUMKIT_DEBUG=1                  → { debug: true }
 *   ENUMKIT_ENUMS_REPR=u8            → { enums: { repr: "u8" } }
 *   ENUMKIT_ENUMS__SENTINEL=false    → { enums: { sentinel: false } }
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "ENUMKIT_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    if (key === "ENUMKIT_NO_COLOR") continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".")
      .split(".")
      .map((part) => CAMEL_KEYS.get(part) ?? part)
      .join(".");

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

/**
 * Search for a configuration file from `searchFrom` up to the enclosing package root.
 */
export function loadConfigFromFiles(searchFrom?: string): {
  config: Record<string, unknown>;
  filepath?: string;
} {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchStrategy: "project",
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
    ],
  });
  const result = explorer.search(searchFrom);
  if (result && !result.isEmpty && isRecord(result.config)) {
    return { config: result.config, filepath: result.filepath };
  }
  return { config: {} };
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULT_ENUMS: Required<EnumDefaultsConfig> = {
  repr: "u32",
  sentinel: true,
  sentinelName: "None",
  index: "repr",
};

const DEFAULTS: EnumkitConfig = {
  debug: false,
  enums: DEFAULT_ENUMS,
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const fromFiles = loadConfigFromFiles();
  configFilePath = fromFiles.filepath;

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(DEFAULTS, fromFiles.config), loadConfigFromEnv());
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<EnumkitConfig>): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * The enum defaults, as configured.
 */
function enumDefaults(): Required<EnumDefaultsConfig> {
  const enums = get("enums");
  const source: Record<string, unknown> = isRecord(enums) ? enums : {};
  return {
    repr: typeof source.repr === "string" ? source.repr : DEFAULT_ENUMS.repr,
    sentinel: typeof source.sentinel === "boolean" ? source.sentinel : DEFAULT_ENUMS.sentinel,
    sentinelName: typeof source.sentinelName === "string" ? source.sentinelName : DEFAULT_ENUMS.sentinelName,
    index: typeof source.index === "string" ? source.index : DEFAULT_ENUMS.index,
  };
}

function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration so the next read loads it again (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  enumDefaults,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: EnumkitConfig): EnumkitConfig {
  return cfg;
}
