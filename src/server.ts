#!/usr/bin/env node
/**
 * Todo API server entry point.
 *
 * Reads BIND_ADDR, DATABASE_URL, LOG_LEVEL and CORS_ENABLED, opens and
 * migrates the store, then serves until SIGINT/SIGTERM.
 * @module server
 */

import { loadConfig } from "./config.js";
import { openDatabase } from "./db/connection.js";
import { runMigrations } from "./db/migrate.js";
import { TodoApiServer } from "./http/index.js";
import { createLogger } from "./logger.js";
import { TodoStore } from "./todo/index.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const log = logger.child({ module: "server" });

  const db = openDatabase(config.databasePath);
  const applied = runMigrations(db);
  log.info(`Database ready at ${config.databasePath}`, {
    migrationsApplied: applied,
  });

  const server = new TodoApiServer({
    store: new TodoStore(db),
    logger,
    host: config.bind.host,
    port: config.bind.port,
    cors: config.cors,
  });
  await server.start();

  const shutdown = (signal: string): void => {
    log.info(`Received ${signal}, shutting down`);
    server
      .stop()
      .then(() => {
        db.close();
        process.exit(0);
      })
      .catch((error: unknown) => {
        log.error("Shutdown failed", {
          error: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error(
    `Error: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
