/**
 * Redirect Service Type Definitions
 */

import type { LogLevel, Logger } from "@waypost/logger";

// =============================================================================
// Handler Types
// =============================================================================

/**
 * One link of the handler chain. Takes a request, answers it or passes it
 * to its fallback. Read-only after construction.
 */
export type RedirectHandler = (request: Request) => Promise<Response>;

export interface HandlerOptions {
  /** Receives a debug line per redirect hit */
  logger?: Logger;
}

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Service configuration loaded from flags and environment.
 * An empty file setting disables that source.
 */
export interface Config {
  /** Environment name (NODE_ENV) */
  readonly env: string;

  /** HTTP server port */
  readonly port: number;

  /** HTTP server host */
  readonly host: string;

  /** YAML redirect file (--yamlfile, YAML_FILE) */
  readonly yamlFile: string;

  /** JSON redirect file (--jsonfile, JSON_FILE) */
  readonly jsonFile: string;

  /** Key-value store file (--boltfile, STORE_FILE) */
  readonly storeFile: string;

  /** Bound on waiting for the store lock at startup (ms) */
  readonly storeTimeoutMs: number;

  /** Log level */
  readonly logLevel: LogLevel;
}
