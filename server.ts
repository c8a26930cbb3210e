/**
 * Datasets server - entry point
 */

import { serve } from "@hono/node-server";
import app from "./src/server/index.ts";
import { env } from "./src/config/env.ts";
import { createLogger } from "./src/core/logger.ts";
import { closeDatabase, initDatabase } from "./src/db/migrations.ts";
import { rateLimiter } from "./src/server/middleware/rateLimiter.ts";
import { memoryCache } from "./src/cache/memory.ts";

const log = createLogger("server");

try {
  initDatabase();
} catch (error) {
  log.error("Database initialization failed", error);
  process.exit(1);
}

log.info(`Starting server on port ${env.port}...`);

memoryCache.startSweeping();

const server = serve({ fetch: app.fetch, port: env.port }, (info) => {
  log.info(`Datasets API listening on http://localhost:${info.port}`);
  log.info(`Health:  http://localhost:${info.port}/health`);
  log.info(`Metrics: http://localhost:${info.port}/metrics`);
});

// Graceful shutdown handler
let isShuttingDown = false;

function gracefulShutdown(signal: string): void {
  if (isShuttingDown) return;
  isShuttingDown = true;

  log.info(`${signal} received. Shutting down gracefully...`);

  rateLimiter.stopSweeping();
  memoryCache.stopSweeping();

  server.close((error) => {
    if (error) {
      log.error("Error while closing the HTTP server", error);
    }
    // Close database connections
    closeDatabase();
    log.info("Shutdown complete.");
    process.exit(error ? 1 : 0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));
