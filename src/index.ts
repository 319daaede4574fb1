#!/usr/bin/env node

import config from "./config";
import { HubSpotExtractor } from "./extractors/hubspot";
import { HttpServer } from "./server/http-server";
import { SessionStore } from "./services/session-store";
import { errorMessage } from "./errors";
import logger from "./utils/logger";

/**
 * Main entry point for the comparison service
 */
async function main() {
  logger.info("🔍 HubSpot Portal Schema Compare");

  const sessions = new SessionStore({
    timeoutMs: config.session.timeoutMs,
    cleanupIntervalMs: config.session.cleanupIntervalMs,
    cacheTtlMs: config.cache.ttlMs,
  });

  const server = new HttpServer({
    port: config.server.port,
    host: config.server.host,
    sessions,
    createSource: (accessToken) => new HubSpotExtractor(accessToken),
    associationObjectTypes: config.hubspot.associationObjectTypes,
  });

  const shutdown = (signal: string) => {
    logger.warn(`Received ${signal}, stopping server...`);
    server
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.error("Failed to stop cleanly", { error: errorMessage(error) });
        process.exit(1);
      });
  };

  // Handle graceful shutdown
  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));

  await server.start();
}

// Start the application
main().catch((error: unknown) => {
  logger.error("Unhandled error:", {
    error: errorMessage(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
