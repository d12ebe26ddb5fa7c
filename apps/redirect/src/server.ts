/**
 * HTTP Server Bootstrap
 *
 * Startup is strictly sequential: configuration, every source, then the
 * listener. Any failure before listening is fatal; there is no partial
 * startup and no degraded mode.
 */

import { serve } from "@hono/node-server";
import { createLogger, logger } from "@waypost/logger";
import { isWaypostError } from "@waypost/shared";

import { createRedirectApp } from "./app.js";
import { loadConfig, validateConfig } from "./config.js";

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Start the redirect server.
 */
async function main(): Promise<void> {
  const config = loadConfig();
  const log = createLogger("redirect", { level: config.logLevel });
  validateConfig(config, log);

  log.info({ env: config.env }, "Initializing...");

  const { app, sources } = await createRedirectApp(config, { logger: log });

  const server = serve({
    fetch: app.fetch,
    port: config.port,
    hostname: config.host,
  });

  log.info(
    { host: config.host, port: config.port, sources: sources.map((source) => source.name) },
    `Redirect service running on http://${config.host}:${config.port}`
  );

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, "Shutting down...");
    server.close((err) => {
      if (err) {
        log.error({ err }, "Shutdown error");
        process.exit(1);
      }
      log.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", shutdown);
  process.on("SIGINT", shutdown);
}

main().catch((err: unknown) => {
  if (isWaypostError(err)) {
    logger.fatal({ err, code: err.code, source: err.source }, `Failed to start: ${err.message}`);
  } else {
    logger.fatal({ err }, "Failed to start");
  }
  process.exit(1);
});
