/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: PARSNIP_* (for CI overrides)
 * 3. Config files: .parsniprc, parsnip.config.js, "parsnip" in package.json, ...
 * 4. Defaults (lowest priority)
 *
 * Sources are read lazily, on the first get/set after startup or reset().
 * Parsers consult `tracing` and `verbose`, so the first parse is where the
 * file search happens unless something read config earlier. JS config files
 * found by the search are executed.
 *
 * @example
 * ```typescript
 * import { config } from "@parsnip/core";
 *
 * config.get("tracing")                  // → boolean
 * config.get("diagnostics.contextChars") // → number
 *
 * config.set({ diagnostics: { colors: false } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { logger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Diagnostics rendering options.
 */
export interface DiagnosticsConfig {
  /** Emit ANSI colors when rendering diagnostics */
  colors?: boolean;
  /** Characters of unconsumed input kept in a ParseError */
  contextChars?: number;
}

/**
 * Full parsnip configuration schema.
 */
export interface ParsnipConfig {
  /** Record parser enter/exit events in the global tracer */
  tracing?: boolean;
  /** Print `[parsnip]` progress lines */
  verbose?: boolean;
  /** Diagnostics rendering */
  diagnostics?: DiagnosticsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/**
 * Options for re-initialising the store.
 */
export interface ConfigResetOptions {
  /** Directory the config file search starts from (default: process.cwd()) */
  searchFrom?: string;
}

// ============================================================================
// Global State
// ============================================================================

let configStore: ParsnipConfig = {};
let overrides: ParsnipConfig = {};
let configLoaded = false;
let configFilePath: string | undefined;
let searchFrom: string | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "PARSNIP_";

/**
 * Load configuration from environment variables.
 *
 *   PARSNIP_TRACING=1              → { tracing: true }
 *   PARSNIP_DIAGNOSTICS_COLORS=0   → { diagnostics: { colors: false } }
 *
 * `PARSNIP_DIAGNOSTICS_CONTEXTCHARS` is matched case-insensitively against the
 * camelCase key, so multi-word keys are reachable from the environment.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ParsnipConfig {
  const envConfig: ParsnipConfig = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // PARSNIP_NO_COLOR is read by the diagnostics renderer directly
    if (key === "PARSNIP_NO_COLOR") continue;

    const configPath = key
      .slice(ENV_PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".")
      .split(".")
      .map(canonicalKey)
      .join(".");

    setNestedValue(envConfig, configPath, parseEnvValue(value));
  }

  return envConfig;
}

const KNOWN_KEYS = ["tracing", "verbose", "diagnostics", "colors", "contextChars"];

function canonicalKey(part: string): string {
  return KNOWN_KEYS.find((k) => k.toLowerCase() === part) ?? part;
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
function deepMerge(target: ParsnipConfig, source: Record<string, unknown>): ParsnipConfig {
  const result: ParsnipConfig = { ...target };

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
// Config File Loading
// ============================================================================

const MODULE_NAME = "parsnip";

function loadConfigFromFiles(): ParsnipConfig {
  const explorer = cosmiconfigSync(MODULE_NAME, {
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

  try {
    const result = explorer.search(searchFrom);
    if (result && !result.isEmpty && isRecord(result.config)) {
      configFilePath = result.filepath;
      return result.config;
    }
  } catch (e) {
    logger.warn(`Ignoring unreadable config file: ${e instanceof Error ? e.message : String(e)}`);
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

const DEFAULTS: ParsnipConfig = {
  tracing: false,
  verbose: false,
  diagnostics: {
    colors: true,
    contextChars: 40,
  },
};

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  // Mark first: the logger consults config while a file is being loaded
  configLoaded = true;
  configStore = DEFAULTS;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig < set()
  configStore = deepMerge(deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig), overrides);
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by path.
 */
function get<T = unknown>(path: string): T | undefined {
  initializeConfig();
  return getNestedValue(configStore, path) as T | undefined;
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<ParsnipConfig>): void {
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
function getAll(): Readonly<ParsnipConfig> {
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
 * Drop every loaded and programmatic value; the next read reloads all sources.
 */
function reset(options: ConfigResetOptions = {}): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
  searchFrom = options.searchFrom;
}

/**
 * The configuration API.
 */
export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
} as const;

/**
 * Define a parsnip configuration with type checking.
 *
 * @example
 * ```javascript
 * // parsnip.config.js
 * import { defineConfig } from "@parsnip/core";
 *
 * export default defineConfig({ tracing: true });
 * ```
 */
export function defineConfig(cfg: ParsnipConfig): ParsnipConfig {
  return cfg;
}
