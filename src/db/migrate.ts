/**
 * Schema migrations, applied once at startup.
 * @module db/migrate
 */

import { readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import type Database from "better-sqlite3";

/** Bundled migrations directory (sibling of src/ and dist/). */
export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(
  new URL("../../migrations", import.meta.url),
);

const MIGRATIONS_TABLE = `
  CREATE TABLE IF NOT EXISTS _migrations (
    name TEXT PRIMARY KEY NOT NULL,
    applied_at TEXT NOT NULL DEFAULT (strftime('%Y-%m-%dT%H:%M:%fZ', 'now'))
  )
`;

/**
 * List migration files in apply order.
 * @internal
 */
export function listMigrations(dir: string): string[] {
  return readdirSync(dir)
    .filter((name) => name.endsWith(".sql"))
    .sort();
}

/**
 * Apply every migration in `dir` not yet recorded in `_migrations`.
 * Each file runs in its own transaction together with its bookkeeping row.
 *
 * @returns Names of the migrations applied by this call
 */
export function runMigrations(
  db: Database.Database,
  dir: string = DEFAULT_MIGRATIONS_DIR,
): string[] {
  db.exec(MIGRATIONS_TABLE);

  const applied = new Set(
    db
      .prepare("SELECT name FROM _migrations")
      .pluck()
      .all()
      .filter((name): name is string => typeof name === "string"),
  );
  const record = db.prepare("INSERT INTO _migrations (name) VALUES (?)");

  const pending = listMigrations(dir).filter((name) => !applied.has(name));
  for (const name of pending) {
    const sql = readFileSync(join(dir, name), "utf-8");
    db.transaction(() => {
      db.exec(sql);
      record.run(name);
    })();
  }

  return pending;
}
