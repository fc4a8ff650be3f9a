/**
 * Configuration
 *
 * A process-wide configuration store for the equasets packages.
 * Values are resolved from (in priority order):
 *
 * 1. Environment variables: EQUASETS_* (highest priority, for CI overrides)
 * 2. Programmatic: config.set() calls
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@equasets/core";
 *
 * config.get("log.level")            // → "warn"
 * config.set({ subsets: { threshold: 30 } });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export interface LogConfig {
  /** Minimum level written to the console */
  level?: LogLevel;
}

export interface SubsetsConfig {
  /** `subsets()` on a set larger than this logs a warning */
  threshold?: number;
}

/**
 * Full equasets configuration schema.
 */
export interface EquasetsConfig {
  /** Enable debug mode; forces the log level to "debug" */
  debug?: boolean;
  log?: LogConfig;
  subsets?: SubsetsConfig;
  [key: string]: unknown;
}

type ConfigRecord = Record<string, unknown>;

const DEFAULTS: EquasetsConfig = {
  debug: false,
  log: { level: "warn" },
  subsets: { threshold: 20 },
};

// ============================================================================
// Global State
// ============================================================================

let programmatic: ConfigRecord = {};
let configStore: ConfigRecord = {};
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Variables prefixed with EQUASETS_ are parsed into a nested config object.
 *
 *   EQUASETS_DEBUG=1                 → { debug: true }
 *   EQUASETS_LOG_LEVEL=info          → { log: { level: "info" } }
 *   EQUASETS_SUBSETS_THRESHOLD=12    → { subsets: { threshold: 12 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): ConfigRecord {
  const envConfig: ConfigRecord = {};
  const PREFIX = "EQUASETS_";

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key.slice(PREFIX.length).toLowerCase().replace(/_+/g, ".");
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

function isRecord(value: unknown): value is ConfigRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setNestedValue(obj: ConfigRecord, path: string, value: unknown): void {
  const parts = path.split(".");
  let current = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const existing = current[parts[i]];
    if (isRecord(existing)) {
      current = existing;
    } else {
      const next: ConfigRecord = {};
      current[parts[i]] = next;
      current = next;
    }
  }

  current[parts[parts.length - 1]] = value;
}

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
// Public API
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;
  // Merge: defaults < programmatic < env
  configStore = deepMerge(deepMerge(DEFAULTS, programmatic), loadConfigFromEnv(process.env));
  configLoaded = true;
}

/**
 * Get a configuration value by dot-separated path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Environment variables still win.
 */
function set(values: EquasetsConfig): void {
  programmatic = deepMerge(programmatic, values);
  configLoaded = false;
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
 * Drop programmatic values and re-read the environment on next access
 * (mainly for testing).
 */
function reset(): void {
  programmatic = {};
  configStore = {};
  configLoaded = false;
}

export const config = {
  get,
  set,
  has,
  getAll,
  reset,
};
