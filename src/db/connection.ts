/**
 * SQLite connection bootstrap.
 * @module db/connection
 */

import Database from "better-sqlite3";

/** Special filename for a private in-memory database. */
export const MEMORY_DATABASE = ":memory:";

/**
 * Open the SQLite database at `path`, creating the file if missing.
 *
 * The returned handle is shared by every request for the life of the
 * process; close it on shutdown.
 */
export function openDatabase(path: string): Database.Database {
  const db = new Database(path);

  if (path !== MEMORY_DATABASE) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("foreign_keys = ON");

  return db;
}
