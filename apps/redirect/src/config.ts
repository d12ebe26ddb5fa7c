/**
 * Configuration Module
 *
 * Loads configuration from command-line flags, then environment
 * variables, then defaults.
 *
 * Design Decision: Fail fast on startup if anything is malformed.
 */

import { parseArgs } from "node:util";
import { isLogLevel, type Logger } from "@waypost/logger";
import { ConfigError } from "@waypost/shared";
import { DEFAULT_OPEN_TIMEOUT_MS } from "@waypost/store";

import type { Config } from "./types.js";

type Env = Readonly<Record<string, string | undefined>>;

export const DEFAULT_PORT = 8080;
export const DEFAULT_STORE_FILE = "redirects.db";

// =============================================================================
// Parsing Helpers
// =============================================================================

/**
 * Get optional environment variable with default.
 */
function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse a positive integer; malformed values are an error, not a default.
 */
function parseInteger(name: string, value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === "") return defaultValue;
  if (!/^\d+$/.test(value)) {
    throw new ConfigError(`${name} must be a non-negative integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

function parsePort(name: string, value: string | undefined): number {
  const port = parseInteger(name, value, DEFAULT_PORT);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`${name} must be between 1 and 65535, got ${port}`);
  }
  return port;
}

/**
 * Parse command-line flags. Unknown flags and positionals are rejected.
 */
function parseFlags(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        yamlfile: { type: "string" },
        jsonfile: { type: "string" },
        boltfile: { type: "string" },
        port: { type: "string" },
        host: { type: "string" },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err), { cause: err });
  }
}

/**
 * Parse log level string, falling back to info.
 */
function parseLogLevel(level: string): Config["logLevel"] {
  const normalized = level.toLowerCase();
  return isLogLevel(normalized) ? normalized : "info";
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load configuration. Call once at startup.
 *
 * File settings use `??` rather than `||`: an explicitly empty flag or
 * variable disables the source.
 *
 * @throws ConfigError on unknown flags or malformed numbers
 */
export function loadConfig(
  argv: readonly string[] = process.argv.slice(2),
  env: Env = process.env
): Config {
  const flags = parseFlags(argv);

  return Object.freeze({
    env: optional(env, "NODE_ENV", "development"),

    // Server
    port: flags.port !== undefined ? parsePort("--port", flags.port) : parsePort("PORT", env.PORT),
    host: flags.host || optional(env, "HOST", "0.0.0.0"),

    // Sources
    yamlFile: flags.yamlfile ?? env.YAML_FILE ?? "",
    jsonFile: flags.jsonfile ?? env.JSON_FILE ?? "",
    storeFile: flags.boltfile ?? env.STORE_FILE ?? DEFAULT_STORE_FILE,
    storeTimeoutMs: parseInteger("STORE_TIMEOUT_MS", env.STORE_TIMEOUT_MS, DEFAULT_OPEN_TIMEOUT_MS),

    // Logging
    logLevel: parseLogLevel(optional(env, "LOG_LEVEL", "info")),
  });
}

/**
 * Validate configuration at runtime.
 * Logs warnings for suboptimal settings.
 */
export function validateConfig(config: Config, log: Logger): void {
  if (!config.yamlFile && !config.jsonFile && !config.storeFile) {
    log.warn("No redirect files configured; only built-in redirects will be served");
  }

  if (config.storeFile && config.storeTimeoutMs === 0) {
    log.warn("STORE_TIMEOUT_MS=0: startup fails at once if another process holds the store");
  }

  if (config.storeTimeoutMs > 60_000) {
    log.warn(
      { storeTimeoutMs: config.storeTimeoutMs },
      "Store open timeout is above one minute; a locked store will stall startup"
    );
  }
}
