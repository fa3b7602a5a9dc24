/**
 * Unified Configuration System
 *
 * Provides a centralized configuration API for optio packages.
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: OPTIO_* (for CI overrides)
 * 3. Config files: .optiorc, .optiorc.json, optio.config.json, package.json "optio" key
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@optio/core";
 *
 * config.get("debug")                // → boolean
 * config.get("option.absentAccess")  // → "error" | "warn" | "info" | "off"
 *
 * config.set({ option: { absentAccess: "warn" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { report, type ReportLevel } from "./diagnostics.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Option package configuration.
 */
export interface OptionConfig {
  /** Level at which `get` on an Absent value is reported before it throws */
  absentAccess?: ReportLevel;
}

/**
 * Full optio configuration schema.
 */
export interface OptioConfig {
  /** Enable debug mode */
  debug?: boolean;
  /** Option package configuration */
  option?: OptionConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: OptioConfig = {};
let overrides: OptioConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "OPTIO_";

/**
 * Load configuration from environment variables.
 * Variables prefixed with OPTIO_ are parsed into the config object.
 *
 * Examples:
 *   OPTIO_DEBUG=1                        → { debug: true }
 *   OPTIO_OPTION__ABSENT_ACCESS=warn     → { option: { absentAccess: "warn" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): OptioConfig {
  const envConfig: OptioConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore separates nesting levels, single underscore camel-cases
    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .split("__")
      .map((segment) => segment.replace(/_([a-z0-9])/g, (_m, c: string) => c.toUpperCase()))
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

function parseEnvValue(value: string): unknown {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  if (/^\d+$/.test(value)) return parseInt(value, 10);
  return value;
}

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
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[parts[i]] = created;
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
function deepMerge(target: OptioConfig, source: Record<string, unknown>): OptioConfig {
  const result: OptioConfig = { ...target };

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
// Config File Loading (cosmiconfig)
// ============================================================================

const MODULE_NAME = "optio";

const SEARCH_PLACES = [
  "package.json",
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `${MODULE_NAME}.config.json`,
];

/**
 * Load configuration from the first config file found in `searchFrom`.
 * A file that fails to parse is reported and skipped.
 */
function loadConfigFromFiles(searchFrom?: string): OptioConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, { searchPlaces: SEARCH_PLACES });

  try {
    const result = explorer.search(searchFrom);
    if (!result || result.isEmpty) return {};

    const loaded: unknown = result.config;
    if (!isRecord(loaded)) {
      report("warn", "config", `Ignoring ${result.filepath}: expected an object at the top level`);
      return {};
    }

    configFilePath = result.filepath;
    return loaded;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    report("warn", "config", `Ignoring unreadable config file: ${message}`);
    return {};
  }
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: OptioConfig = {
  debug: false,
  option: {
    absentAccess: "off",
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(searchFrom?: string): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles(searchFrom);
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig < programmatic overrides
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig), overrides);
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
function set(values: Partial<OptioConfig>): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<OptioConfig> {
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
 * Reload configuration, searching for a config file in `searchFrom`.
 * Programmatic values set before the reload are kept.
 */
function load(searchFrom: string): void {
  configLoaded = false;
  configFilePath = undefined;
  initializeConfig(searchFrom);
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  load,
  reset,
} as const;

/**
 * Identity helper that gives config files type checking.
 */
export function defineConfig(values: OptioConfig): OptioConfig {
  return values;
}
