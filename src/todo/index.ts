/**
 * Todo entity exports.
 * @module todo
 */

export { TodoStore } from "./store.js";
export {
  todoSchema,
  createTodoSchema,
  updateTodoSchema,
  todoIdSchema,
  decodeTodoRow,
  TODO_FIELDS,
  TODO_COLUMNS,
  TODOS_PATH,
} from "./schema.js";
export type { Todo, TodoId, CreateTodo, UpdateTodo } from "./schema.js";
