/**
 * Application Setup
 *
 * Loads every source, assembles the chain over the default router and
 * mounts it on an outer Hono application that owns error handling.
 */

import { Hono } from "hono";
import { createLogger, type Logger } from "@waypost/logger";
import type { RedirectSource } from "@waypost/shared";

import { assembleChain, loadSources } from "./chain.js";
import { createDefaultRouter, defaultHandler } from "./router.js";
import { STATIC_REDIRECTS } from "./static-redirects.js";
import type { Config } from "./types.js";

export interface RedirectAppOptions {
  /** Highest-priority redirects. Default: STATIC_REDIRECTS */
  staticRedirects?: Readonly<Record<string, string>>;
  logger?: Logger;
}

export interface RedirectApp {
  app: Hono;

  /** Loaded sources, highest priority first */
  sources: readonly RedirectSource[];
}

/**
 * Build the application. Resolves only once every source has loaded.
 *
 * @throws WaypostError subclasses; the caller must not serve anything
 */
export async function createRedirectApp(
  config: Config,
  options: RedirectAppOptions = {}
): Promise<RedirectApp> {
  const log = options.logger ?? createLogger("redirect", { level: config.logLevel });
  const sources = await loadSources(config, options.staticRedirects ?? STATIC_REDIRECTS, log);

  const chain = assembleChain(sources, defaultHandler(createDefaultRouter()), { logger: log });

  const app = new Hono();

  app.all("*", (c) => chain(c.req.raw));

  // Global error handler
  app.onError((err, c) => {
    log.error({ err, path: c.req.path }, "Unhandled error");
    return c.text("Internal Server Error", 500);
  });

  return { app, sources };
}
