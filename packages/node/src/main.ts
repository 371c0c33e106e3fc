/**
 * @strongbox/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { loadConfig } from "./config.js";
import { createApp } from "./app.js";
import { logLevelFor } from "./middleware/logger.js";

function main(): void {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  const { app, service } = createApp({
    serviceConfig: {
      storageDriver: config.STORAGE_DRIVER,
      dataDir: config.DATA_DIR,
      ledgerMaxAttempts: config.LEDGER_MAX_ATTEMPTS,
    },
    maxObjectBytes: config.MAX_OBJECT_BYTES,
    logFn: (entry) => {
      logger[logLevelFor(entry.status)](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    errorLogFn: ({ error, ...context }) => {
      logger.error({ ...context, err: error }, "Unhandled error");
    },
    ledgerFailureLogFn: ({ error, ...failure }) => {
      logger.error({ ...failure, err: error }, "Access record dropped");
    },
  });

  const { fingerprint } = service.publicKeyInfo();
  logger.info(
    { storage: config.STORAGE_DRIVER, dataDir: config.DATA_DIR, fingerprint },
    "Keypair generated",
  );

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Strongbox node started");

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close(() => {
      service.stop();
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

try {
  main();
} catch (err: unknown) {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
}
