/**
 * Redirect Request Handler
 *
 * A single handler type parameterized by (source, fallback). On a hit it
 * answers 302 Found; on a miss it hands the untouched request to its
 * fallback and returns whatever that produces.
 *
 * Per-source constructors below only differ in how they build the mapping.
 */

import type { StoreOptions } from "@waypost/store";
import type { RedirectSource } from "@waypost/shared";

import { jsonSource, staticSource, storeSource, yamlSource } from "./sources.js";
import type { HandlerOptions, RedirectHandler } from "./types.js";

// =============================================================================
// Response Helpers
// =============================================================================

/**
 * Mappings may differ after a restart, so neither browsers nor CDNs may
 * keep the redirect.
 */
const CACHE_CONTROL_REDIRECT = "no-store";

/**
 * Create a 302 Found response.
 */
function createRedirectResponse(url: string): Response {
  return new Response(null, {
    status: 302,
    headers: {
      Location: url,
      "Cache-Control": CACHE_CONTROL_REDIRECT,
    },
  });
}

/**
 * Request path as mapping keys are written: percent-decoded, query dropped.
 * A malformed escape leaves the raw path, which then simply misses.
 */
export function requestPath(request: Request): string {
  const { pathname } = new URL(request.url);
  try {
    return decodeURIComponent(pathname);
  } catch {
    return pathname;
  }
}

// =============================================================================
// Lookup Handler
// =============================================================================

/**
 * Create a lookup handler for one source.
 */
export function createLookupHandler(
  source: RedirectSource,
  fallback: RedirectHandler,
  options: HandlerOptions = {}
): RedirectHandler {
  const { name, mapping } = source;
  const log = options.logger;

  return async (request) => {
    const path = requestPath(request);
    const url = mapping.get(path);

    if (url === undefined) {
      return fallback(request);
    }

    log?.debug({ source: name, path, url }, "Redirect");
    return createRedirectResponse(url);
  };
}

// =============================================================================
// Per-Source Constructors
// =============================================================================

/**
 * Handler over a static path → URL literal.
 *
 * @throws InvalidRecordError
 */
export function mapHandler(
  pathsToUrls: Readonly<Record<string, string>>,
  fallback: RedirectHandler,
  options: HandlerOptions = {}
): RedirectHandler {
  return createLookupHandler(staticSource(pathsToUrls), fallback, options);
}

/**
 * Handler over YAML content:
 *
 *     - path: /some-path
 *       url: https://www.example.com/demo
 *
 * @throws ParseError, InvalidRecordError
 */
export function yamlHandler(
  content: string,
  fallback: RedirectHandler,
  options: HandlerOptions = {}
): RedirectHandler {
  return createLookupHandler(yamlSource(content), fallback, options);
}

/**
 * Handler over JSON content: an array of `{ "path", "url" }` objects.
 *
 * @throws ParseError, InvalidRecordError
 */
export function jsonHandler(
  content: string,
  fallback: RedirectHandler,
  options: HandlerOptions = {}
): RedirectHandler {
  return createLookupHandler(jsonSource(content), fallback, options);
}

/**
 * Handler over a key-value store file, read once at construction.
 *
 * @throws StoreError, InvalidRecordError
 */
export function storeHandler(
  file: string,
  fallback: RedirectHandler,
  options: HandlerOptions & StoreOptions = {}
): RedirectHandler {
  return createLookupHandler(
    storeSource(file, { timeoutMs: options.timeoutMs }),
    fallback,
    options
  );
}
