/**
 * TodoStore - SQL operations on the todos table.
 * @module todo/store
 */

import type Database from "better-sqlite3";
import { TodoError, toStoreFailure } from "../errors.js";
import {
  TODO_COLUMNS,
  decodeTodoRow,
  type CreateTodo,
  type Todo,
  type TodoId,
  type UpdateTodo,
} from "./schema.js";

/** ISO-8601 UTC timestamp with milliseconds, computed by SQLite. */
const NOW = "strftime('%Y-%m-%dT%H:%M:%fZ', 'now')";

/**
 * Next updated_at value: now, or one millisecond past the previous value
 * when the clock has not moved on.
 */
const NEXT_UPDATED_AT = `CASE
  WHEN ${NOW} > updated_at THEN ${NOW}
  ELSE strftime('%Y-%m-%dT%H:%M:%fZ', updated_at, '+0.001 seconds')
END`;

const SQL = {
  list: `SELECT ${TODO_COLUMNS} FROM todos`,
  read: `SELECT ${TODO_COLUMNS} FROM todos WHERE id = ?`,
  create: `INSERT INTO todos (body) VALUES (?) RETURNING ${TODO_COLUMNS}`,
  update: `UPDATE todos SET body = ?, completed = ?, updated_at = ${NEXT_UPDATED_AT} WHERE id = ? RETURNING ${TODO_COLUMNS}`,
  delete: `DELETE FROM todos WHERE id = ?`,
  ping: `SELECT 1`,
} as const;

/**
 * TodoStore runs each operation as a single statement against the
 * database handle it was given. It keeps no state of its own.
 *
 * @example
 * ```typescript
 * const db = openDatabase("db.sqlite");
 * runMigrations(db);
 *
 * const store = new TodoStore(db);
 * const todo = store.create({ body: "buy milk" });
 * store.update(todo.id, { body: "buy milk", completed: true });
 * ```
 */
export class TodoStore {
  constructor(private readonly db: Database.Database) {}

  /**
   * All todos, in store order.
   */
  list(): Todo[] {
    return this.run("list todos", () =>
      this.db.prepare(SQL.list).all().map(decodeTodoRow),
    );
  }

  /**
   * @throws {TodoError} NOT_FOUND if no todo has this id
   */
  read(id: TodoId): Todo {
    const row = this.run("read todo", () => this.db.prepare(SQL.read).get(id));
    if (row === undefined) {
      throw notFound(id);
    }
    return this.run("read todo", () => decodeTodoRow(row));
  }

  /**
   * Insert a todo. `completed` starts false and both timestamps are
   * set to the same instant.
   */
  create(input: CreateTodo): Todo {
    return this.run("create todo", () =>
      decodeTodoRow(this.db.prepare(SQL.create).get(input.body)),
    );
  }

  /**
   * Replace body and completed, refreshing updated_at.
   *
   * @throws {TodoError} NOT_FOUND if no todo has this id
   */
  update(id: TodoId, input: UpdateTodo): Todo {
    const row = this.run("update todo", () =>
      this.db
        .prepare(SQL.update)
        .get(input.body, input.completed ? 1 : 0, id),
    );
    if (row === undefined) {
      throw notFound(id);
    }
    return this.run("update todo", () => decodeTodoRow(row));
  }

  /**
   * Delete a todo. Deleting an id that does not exist is not an error.
   *
   * @returns Whether a row was removed
   */
  delete(id: TodoId): boolean {
    return this.run(
      "delete todo",
      () => this.db.prepare(SQL.delete).run(id).changes > 0,
    );
  }

  /**
   * Round-trip to the database, for health checks.
   */
  ping(): void {
    this.run("ping database", () => this.db.prepare(SQL.ping).get());
  }

  private run<T>(action: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw toStoreFailure(error, action);
    }
  }
}

function notFound(id: TodoId): TodoError {
  return new TodoError(`Todo ${id} not found`, "NOT_FOUND");
}
