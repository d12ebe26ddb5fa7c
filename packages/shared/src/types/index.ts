/**
 * Shared Type Definitions
 */

import type { SOURCE_NAMES } from "../constants/index.js";

// =============================================================================
// Redirect Types
// =============================================================================

/**
 * Name of a lookup source, in the order they are declared.
 * Chain priority is defined by the redirect app, not by this union.
 */
export type SourceName = (typeof SOURCE_NAMES)[number];

/**
 * A single validated path → URL pair
 */
export interface RedirectEntry {
  /** Request path, always starting with "/" */
  path: string;

  /** Destination URL, sent verbatim as the Location header */
  url: string;
}

/**
 * Immutable path → URL mapping, built once per source at startup.
 */
export type RedirectMapping = ReadonlyMap<string, string>;

/**
 * A named mapping, ready to be placed in the handler chain
 */
export interface RedirectSource {
  name: SourceName;
  mapping: RedirectMapping;
}
