/**
 * todo-service - todo list HTTP API over SQLite, with a client.
 *
 * @example
 * ```typescript
 * import { openDatabase, runMigrations, TodoStore, TodoApiServer, createLogger } from 'todo-service';
 *
 * const db = openDatabase('db.sqlite');
 * runMigrations(db);
 *
 * const server = new TodoApiServer({
 *   store: new TodoStore(db),
 *   logger: createLogger(),
 * });
 * await server.start();
 * ```
 *
 * @packageDocumentation
 */

// Entity
export { TodoStore } from "./todo/index.js";
export {
  todoSchema,
  createTodoSchema,
  updateTodoSchema,
  todoIdSchema,
  decodeTodoRow,
  TODO_FIELDS,
  TODO_COLUMNS,
  TODOS_PATH,
} from "./todo/index.js";
export type { Todo, TodoId, CreateTodo, UpdateTodo } from "./todo/index.js";

// Errors
export {
  TodoError,
  TransportError,
  statusForError,
  statusForErrorCode,
} from "./errors.js";
export type { TodoErrorCode, TransportErrorCode } from "./errors.js";

// Database
export { openDatabase, MEMORY_DATABASE } from "./db/connection.js";
export { runMigrations, DEFAULT_MIGRATIONS_DIR } from "./db/migrate.js";

// HTTP
export { createApp, TodoApiServer } from "./http/index.js";
export type { AppOptions, TodoApiServerOptions } from "./http/index.js";

// Client
export { TodoClient, isJsonContentType } from "./client.js";
export type { TodoResponse } from "./client.js";

// Configuration
export {
  loadConfig,
  parseBindAddr,
  resolveDatabasePath,
  DEFAULT_BIND_ADDR,
  DEFAULT_DATABASE_URL,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
} from "./config.js";
export type { BindAddress, LogLevel, ServiceConfig } from "./config.js";

// Logging
export { createLogger } from "./logger.js";
export type { Logger, LoggerOptions } from "./logger.js";
