/**
 * Default Router
 *
 * Terminal node of the chain: no source matched and there is nothing left
 * to fall back to. Every method and path gets the same greeting.
 */

import { Hono } from "hono";

import type { RedirectHandler } from "./types.js";

export const GREETING = "Hello, world!";

/**
 * Create the default Hono application.
 */
export function createDefaultRouter(): Hono {
  const app = new Hono();

  app.get("/", (c) => c.text(GREETING, 200));

  // Unmatched paths land here too; 200, not 404
  app.notFound((c) => c.text(GREETING, 200));

  return app;
}

/**
 * Adapt a Hono application to the chain's handler signature.
 */
export function defaultHandler(app: Hono = createDefaultRouter()): RedirectHandler {
  return async (request) => app.fetch(request);
}
