/**
 * Unified Configuration System
 *
 * Configuration is loaded from (in priority order):
 *
 * 1. Environment variables: TRANSCEND_* (highest priority, for CI overrides)
 * 2. Config files: transcend.config.js, .transcendrc, package.json#transcend, etc.
 * 3. Programmatic: config.set() calls
 * 4. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@transcend/core";
 *
 * config.get("precision.digits");            // → 34
 * config.resolved().angles.unit;             // → "degrees"
 *
 * config.set({ angles: { unit: "radians" } });
 * ```
 */

import { cosmiconfigSync, type CosmiconfigResult } from "cosmiconfig";
import { ConfigError } from "./errors.js";
import {
  type AngularUnit,
  type ExhaustedPolicy,
  type RoundingMode,
  isAngularUnit,
  isExhaustedPolicy,
  isRoundingMode,
} from "./types.js";

// ============================================================================
// Types
// ============================================================================

export interface PrecisionConfig {
  /** Significant decimal digits retained by every operation */
  digits?: number;
  rounding?: RoundingMode;
}

export interface AnglesConfig {
  /** Unit assumed when a trigonometric call names none */
  unit?: AngularUnit;
}

export interface SeriesConfig {
  /** Iteration cap for every convergence loop */
  limit?: number;
  exhausted?: ExhaustedPolicy;
}

/**
 * Full transcend configuration schema.
 */
export interface TranscendConfig {
  debug?: boolean;
  precision?: PrecisionConfig;
  angles?: AnglesConfig;
  series?: SeriesConfig;
  [key: string]: unknown;
}

/**
 * Configuration with every known key filled in and validated.
 */
export interface ResolvedConfig {
  readonly debug: boolean;
  readonly precision: { readonly digits: number; readonly rounding: RoundingMode };
  readonly angles: { readonly unit: AngularUnit };
  readonly series: { readonly limit: number; readonly exhausted: ExhaustedPolicy };
}

export const DEFAULTS: ResolvedConfig = {
  debug: false,
  precision: { digits: 34, rounding: "half-even" },
  angles: { unit: "degrees" },
  series: { limit: 1000, exhausted: "nan" },
};

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;
let resolvedCache: ResolvedConfig | undefined;

// ============================================================================
// Environment Variable Loading
// ============================================================================

/**
 * Load configuration from environment variables.
 * Variables prefixed with TRANSCEND_ are parsed into the config object.
 *
 * Examples:
 *   TRANSCEND_DEBUG=1                   → { debug: true }
 *   TRANSCEND_PRECISION_DIGITS=50       → { precision: { digits: 50 } }
 *   TRANSCEND_ANGLES_UNIT=radians       → { angles: { unit: "radians" } }
 */
function loadConfigFromEnv(): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};
  const PREFIX = "TRANSCEND_";

  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;

    const configPath = key
      .slice(PREFIX.length)
      .toLowerCase()
      .replace(/__/g, ".")
      .replace(/_/g, ".");

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

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
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
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
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
// Config File Loading
// ============================================================================

const MODULE_NAME = "transcend";

/**
 * Load configuration from the first config file cosmiconfig finds.
 * The sync explorer has no ES module loader, so `.mjs` files are not searched.
 */
function loadConfigFromFiles(): Record<string, unknown> {
  let result: CosmiconfigResult;
  try {
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
    result = explorer.search();
  } catch (error) {
    throw new ConfigError(`Failed to load ${MODULE_NAME} configuration`, undefined, {
      cause: error,
    });
  }

  if (!result || result.isEmpty) return {};
  const loaded: unknown = result.config;
  if (!isRecord(loaded)) {
    throw new ConfigError(
      `Configuration in ${result.filepath} must be an object`,
      result.filepath
    );
  }
  configFilePath = result.filepath;
  return loaded;
}

// ============================================================================
// Config Initialization
// ============================================================================

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;

  const defaults: Record<string, unknown> = {
    debug: DEFAULTS.debug,
    precision: { ...DEFAULTS.precision },
    angles: { ...DEFAULTS.angles },
    series: { ...DEFAULTS.series },
  };

  const fileConfig = loadConfigFromFiles();
  const envConfig = loadConfigFromEnv();

  // Merge: defaults < fileConfig < envConfig
  configStore = deepMerge(deepMerge(defaults, fileConfig), envConfig);
  configLoaded = true;
}

function positiveInteger(value: unknown, fallback: number): number {
  return typeof value === "number" && Number.isInteger(value) && value > 0 ? value : fallback;
}

/**
 * Validate every known key, falling back to the default for values of the
 * wrong shape.
 */
function resolve(): ResolvedConfig {
  const debug = getNestedValue(configStore, "debug");
  const rounding = getNestedValue(configStore, "precision.rounding");
  const unit = getNestedValue(configStore, "angles.unit");
  const exhausted = getNestedValue(configStore, "series.exhausted");

  return {
    debug: typeof debug === "boolean" ? debug : DEFAULTS.debug,
    precision: {
      digits: positiveInteger(
        getNestedValue(configStore, "precision.digits"),
        DEFAULTS.precision.digits
      ),
      rounding: isRoundingMode(rounding) ? rounding : DEFAULTS.precision.rounding,
    },
    angles: {
      unit: isAngularUnit(unit) ? unit : DEFAULTS.angles.unit,
    },
    series: {
      limit: positiveInteger(getNestedValue(configStore, "series.limit"), DEFAULTS.series.limit),
      exhausted: isExhaustedPolicy(exhausted) ? exhausted : DEFAULTS.series.exhausted,
    },
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a raw configuration value by path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically.
 */
function set(values: TranscendConfig): void {
  initializeConfig();
  configStore = deepMerge(configStore, values);
  resolvedCache = undefined;
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
function getAll(): Readonly<Record<string, unknown>> {
  initializeConfig();
  return configStore;
}

/**
 * Get the validated configuration with defaults applied.
 */
function resolved(): ResolvedConfig {
  initializeConfig();
  resolvedCache ??= resolve();
  return resolvedCache;
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  configLoaded = false;
  configFilePath = undefined;
  resolvedCache = undefined;
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
  resolved,
  getConfigFilePath,
  reset,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: TranscendConfig): TranscendConfig {
  return cfg;
}
