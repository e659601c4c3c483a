/**
 * Core module exports for @enumkit/core
 *
 * This package provides:
 * - Macro system infrastructure (types, registry, context)
 * - Diagnostics catalog and CLI rendering
 * - Configuration loading
 */

export * from "./types.js";
export * from "./registry.js";
export * from "./context.js";
export * from "./ast-utils.js";

// Configuration System
export {
  config,
  defineConfig,
  loadConfigFromEnv,
  loadConfigFromFiles,
  type EnumkitConfig,
  type EnumDefaultsConfig,
} from "./config.js";

// Diagnostics System
export * from "./diagnostics.js";
