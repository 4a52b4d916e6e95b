/**
 * Configuration
 *
 * Configuration is loaded from (lowest to highest priority):
 *
 * 1. Defaults
 * 2. Config files: `package.json#sluice`, `.sluicerc`, `sluice.config.js`, ...
 * 3. Environment variables: SLUICE_* (for CI and one-off overrides)
 * 4. Programmatic: `config.set()` calls
 *
 * @example
 * ```typescript
 * import { config } from "@sluice/core";
 *
 * config.get("debug");          // → false
 * config.get("guards.reuse");   // → "throw"
 *
 * config.set({ guards: { reuse: "warn" } });
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { ConfigError } from "./errors.js";

// ============================================================================
// Types
// ============================================================================

/**
 * What to do when a producer is claimed a second time.
 *
 * - "throw": throw `ProducerConsumedError`
 * - "warn": log a warning and run anyway
 * - "off": run anyway
 */
export type ReuseGuardMode = "throw" | "warn" | "off";

export interface GuardsConfig {
  reuse?: ReuseGuardMode;
}

export interface SluiceConfig {
  /** Enables debug and info logging */
  debug?: boolean;
  guards?: GuardsConfig;
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

// ============================================================================
// Global State
// ============================================================================

let configStore: ConfigRecord = {};
let configLoaded = false;
let configFilePath: string | undefined;

const MODULE_NAME = "sluice";
const ENV_PREFIX = "SLUICE_";

const DEFAULTS: SluiceConfig = {
  debug: false,
  guards: {
    reuse: "throw",
  },
};

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const next = current[parts[i]];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: ConfigRecord = {};
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
  let current = obj;
  for (const part of path.split(".")) {
    if (!isRecord(current)) return undefined;
    current = current[part];
  }
  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(target: ConfigRecord, source: ConfigRecord): ConfigRecord {
  const result: ConfigRecord = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    result[key] =
      isRecord(sourceValue) && isRecord(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Parse SLUICE_* variables into a config object.
 *
 *   SLUICE_DEBUG=1             → { debug: true }
 *   SLUICE_GUARDS_REUSE=warn   → { guards: { reuse: "warn" } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    const configPath = key.slice(ENV_PREFIX.length).toLowerCase().replace(/_+/g, ".");

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

function loadConfigFromFiles(): ConfigRecord {
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

  let result: ReturnType<typeof explorer.search>;
  try {
    result = explorer.search();
  } catch (cause) {
    throw new ConfigError("Failed to load sluice configuration file", { cause });
  }

  if (result === null || result.isEmpty) return {};
  if (!isRecord(result.config)) {
    throw new ConfigError(`Configuration in ${result.filepath} must be an object`);
  }
  configFilePath = result.filepath;
  return result.config;
}

function initializeConfig(): void {
  if (configLoaded) return;

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv(process.env);

  configStore = deepMerge(deepMerge(DEFAULTS, fileConfig), envConfig);
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Merge values into the current configuration.
 */
function set(values: SluiceConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

function getAll(): Readonly<ConfigRecord> {
  initializeConfig();
  return configStore;
}

/**
 * Path of the config file that was loaded, if any.
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Drop all loaded and programmatic values; the next read reloads
 * defaults, files and environment.
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
}

function isDebug(): boolean {
  return get("debug") === true;
}

function reuseGuard(): ReuseGuardMode {
  const mode = get("guards.reuse");
  if (mode === "throw" || mode === "warn" || mode === "off") return mode;
  throw new ConfigError(
    `Invalid guards.reuse value ${JSON.stringify(mode)}; expected "throw", "warn" or "off"`,
  );
}

// ============================================================================
// Export: config object
// ============================================================================

export const config = {
  get,
  set,
  has,
  getAll,
  getConfigFilePath,
  reset,
  isDebug,
  reuseGuard,
} as const;
