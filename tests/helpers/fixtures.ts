/**
 * Test fixture utilities.
 * @module tests/helpers/fixtures
 */

import { tmpdir } from "node:os";
import { join } from "node:path";
import { mkdir, rm } from "node:fs/promises";
import { randomBytes } from "node:crypto";
import type Database from "better-sqlite3";
import { MEMORY_DATABASE, openDatabase } from "../../src/db/connection.js";
import { runMigrations } from "../../src/db/migrate.js";
import { createLogger, type Logger } from "../../src/logger.js";
import { TodoStore } from "../../src/todo/index.js";

/**
 * Create a temporary directory for testing.
 * Returns the path and a cleanup function.
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const suffix = randomBytes(8).toString("hex");
  const path = join(tmpdir(), `todo-service-test-${suffix}`);
  await mkdir(path, { recursive: true });

  return {
    path,
    cleanup: async () => {
      await rm(path, { recursive: true, force: true });
    },
  };
}

/**
 * Open a migrated in-memory database and a store over it.
 */
export function createTestStore(): {
  db: Database.Database;
  store: TodoStore;
} {
  const db = openDatabase(MEMORY_DATABASE);
  runMigrations(db);
  return { db, store: new TodoStore(db) };
}

/**
 * Logger that drops everything.
 */
export function createSilentLogger(): Logger {
  return createLogger({ silent: true });
}
