/**
 * Tests for schema migrations.
 * @module tests/unit/db/migrate
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import type Database from "better-sqlite3";
import { MEMORY_DATABASE, openDatabase } from "../../../src/db/connection.js";
import {
  DEFAULT_MIGRATIONS_DIR,
  listMigrations,
  runMigrations,
} from "../../../src/db/migrate.js";
import { createTempDir } from "../../helpers/fixtures.js";

describe("migrations", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = openDatabase(MEMORY_DATABASE);
  });

  afterEach(() => {
    db.close();
  });

  it("should ship the todos migration", () => {
    expect(listMigrations(DEFAULT_MIGRATIONS_DIR)).toEqual([
      "0001_create_todos.sql",
    ]);
  });

  it("should create the todos table", () => {
    expect(runMigrations(db)).toEqual(["0001_create_todos.sql"]);

    const columns = db
      .prepare("SELECT name FROM pragma_table_info('todos')")
      .pluck()
      .all();
    expect(columns).toEqual([
      "id",
      "body",
      "completed",
      "created_at",
      "updated_at",
    ]);
  });

  it("should apply each migration once", () => {
    runMigrations(db);

    expect(runMigrations(db)).toEqual([]);
  });

  describe("with a custom directory", () => {
    let dir: { path: string; cleanup: () => Promise<void> };

    beforeEach(async () => {
      dir = await createTempDir();
      await writeFile(
        join(dir.path, "002_second.sql"),
        "ALTER TABLE notes ADD COLUMN tag TEXT;",
      );
      await writeFile(
        join(dir.path, "001_first.sql"),
        "CREATE TABLE notes (id INTEGER PRIMARY KEY);",
      );
      await writeFile(join(dir.path, "README.md"), "not a migration");
    });

    afterEach(async () => {
      await dir.cleanup();
    });

    it("should apply files in name order, skipping non-sql files", () => {
      expect(runMigrations(db, dir.path)).toEqual([
        "001_first.sql",
        "002_second.sql",
      ]);
    });

    it("should roll back a failing migration", async () => {
      await writeFile(join(dir.path, "003_broken.sql"), "CREATE TABLE (;");

      expect(() => runMigrations(db, dir.path)).toThrow();

      const applied = db.prepare("SELECT name FROM _migrations").pluck().all();
      expect(applied).toEqual(["001_first.sql", "002_second.sql"]);
    });
  });
});
