/**
 * Pipeline Configuration
 *
 * Configuration is resolved from (in priority order):
 *
 * 1. Programmatic: config.set() calls (highest priority)
 * 2. Environment variables: RANGELINE_*
 * 3. Defaults (lowest priority)
 *
 * @example
 * ```typescript
 * import { config } from "@rangeline/core";
 *
 * config.get("debug")          // → boolean
 * config.get("preconditions")  // → "full" | "none"
 *
 * config.set({ preconditions: "none" });
 * ```
 */

// ============================================================================
// Types
// ============================================================================

/**
 * How `take`/`skip` treat a count that is not a non-negative integer.
 *
 * "full" throws an InvalidCountError, "none" normalises the count
 * (NaN and negatives become 0, fractions are floored).
 */
export type PreconditionMode = "full" | "none";

/**
 * Full configuration schema.
 */
export interface RangelineConfig {
  /** Write a trace line for every stage constructed */
  debug: boolean;
  /** Argument checking for count-taking stages */
  preconditions: PreconditionMode;
}

const DEFAULTS: RangelineConfig = {
  debug: false,
  preconditions: "full",
};

// ============================================================================
// Global State
// ============================================================================

let configStore: RangelineConfig = { ...DEFAULTS };
let configLoaded = false;

// ============================================================================
// Environment Variable Loading
// ============================================================================

const PREFIX = "RANGELINE_";

function parseBoolean(value: string): boolean | undefined {
  if (value === "1" || value === "true") return true;
  if (value === "0" || value === "false" || value === "") return false;
  return undefined;
}

function parsePreconditionMode(value: string): PreconditionMode | undefined {
  return value === "full" || value === "none" ? value : undefined;
}

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   RANGELINE_DEBUG=1                → { debug: true }
 *   RANGELINE_PRECONDITIONS=none     → { preconditions: "none" }
 *
 * Unrecognised values are ignored.
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Partial<RangelineConfig> {
  const envConfig: Partial<RangelineConfig> = {};

  const debug = env[`${PREFIX}DEBUG`];
  if (debug !== undefined) {
    const parsed = parseBoolean(debug.toLowerCase());
    if (parsed !== undefined) envConfig.debug = parsed;
  }

  const preconditions = env[`${PREFIX}PRECONDITIONS`];
  if (preconditions !== undefined) {
    const parsed = parsePreconditionMode(preconditions.toLowerCase());
    if (parsed !== undefined) envConfig.preconditions = parsed;
  }

  return envConfig;
}

// ============================================================================
// Config Initialization
// ============================================================================

function initializeConfig(): void {
  if (configLoaded) return;

  // Merge: defaults < env
  configStore = { ...DEFAULTS, ...loadConfigFromEnv(process.env) };
  configLoaded = true;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value.
 */
function get<K extends keyof RangelineConfig>(key: K): RangelineConfig[K] {
  initializeConfig();
  return configStore[key];
}

/**
 * Set configuration values programmatically.
 */
function set(values: Partial<RangelineConfig>): void {
  initializeConfig();
  configStore = { ...configStore, ...values };
}

/**
 * Check if a boolean configuration value is on.
 */
function has(key: "debug"): boolean {
  return get(key);
}

/**
 * Get all configuration values.
 */
function getAll(): Readonly<RangelineConfig> {
  initializeConfig();
  return configStore;
}

/**
 * Reset configuration so the next read reloads defaults and environment
 * (mainly for testing).
 */
function reset(): void {
  configStore = { ...DEFAULTS };
  configLoaded = false;
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
  reset,
} as const;
