/**
 * Chain Assembly
 *
 * Wires lookup handlers so each one's fallback is the next source in
 * priority order, ending at the default router:
 *
 *   static → store → yaml → json → default router
 *
 * A path present in several sources resolves to the earliest one. There
 * is no merging; position alone decides.
 */

import type { Logger } from "@waypost/logger";
import type { RedirectSource, SourceName } from "@waypost/shared";

import { createLookupHandler } from "./handler.js";
import { jsonSource, readSourceFile, staticSource, storeSource, yamlSource } from "./sources.js";
import type { Config, HandlerOptions, RedirectHandler } from "./types.js";

/**
 * Source priority, highest first.
 */
export const SOURCE_PRIORITY = ["static", "store", "yaml", "json"] as const satisfies readonly SourceName[];

/**
 * Build the chain from sources given highest priority first.
 */
export function assembleChain(
  sources: readonly RedirectSource[],
  terminal: RedirectHandler,
  options: HandlerOptions = {}
): RedirectHandler {
  return sources.reduceRight<RedirectHandler>(
    (fallback, source) => createLookupHandler(source, fallback, options),
    terminal
  );
}

/**
 * Load one source, or null when its file setting is empty.
 */
async function loadSource(
  name: SourceName,
  config: Config,
  staticRedirects: Readonly<Record<string, string>>,
  log: Logger
): Promise<RedirectSource | null> {
  switch (name) {
    case "static":
      return staticSource(staticRedirects);

    case "store": {
      if (!config.storeFile) return null;
      const source = storeSource(config.storeFile, { timeoutMs: config.storeTimeoutMs });
      if (source.seeded) {
        log.info({ file: config.storeFile }, "Created redirect store with example entry");
      }
      return source;
    }

    case "yaml":
      if (!config.yamlFile) return null;
      return yamlSource(await readSourceFile(config.yamlFile, "yaml"));

    case "json":
      if (!config.jsonFile) return null;
      return jsonSource(await readSourceFile(config.jsonFile, "json"));
  }
}

/**
 * Load every enabled source, one after another, in priority order.
 * The first failure aborts the load; nothing partial is returned.
 *
 * @throws WaypostError subclasses
 */
export async function loadSources(
  config: Config,
  staticRedirects: Readonly<Record<string, string>>,
  log: Logger
): Promise<RedirectSource[]> {
  const sources: RedirectSource[] = [];

  for (const name of SOURCE_PRIORITY) {
    const source = await loadSource(name, config, staticRedirects, log);
    if (!source) {
      log.info({ source: name }, "Source disabled");
      continue;
    }
    sources.push(source);
    log.info({ source: name, entries: source.mapping.size }, "Source loaded");
  }

  return sources;
}
