/**
 * Wire and storage shapes for todos.
 *
 * The field list below is the single source for the SQL column list,
 * the row decoder and the JSON shape served over HTTP.
 * @module todo/schema
 */

import { z } from "zod";

/** Path prefix of the v1 todo routes. */
export const TODOS_PATH = "/v1/todos";

// ============================================
// Todo
// ============================================

/**
 * Wire shape of a todo (v1).
 */
export const todoSchema = z.object({
  id: z.number().int().positive(),
  body: z.string(),
  completed: z.boolean(),
  created_at: z.string(),
  updated_at: z.string(),
});

export type Todo = z.infer<typeof todoSchema>;

/** Columns selected for every todo, in wire order. */
export const TODO_FIELDS: ReadonlyArray<keyof Todo> =
  todoSchema.keyof().options;

/** Comma-separated column list for SELECT and RETURNING clauses. */
export const TODO_COLUMNS = TODO_FIELDS.join(", ");

/**
 * Shape of a row as SQLite returns it. Booleans are stored as 0/1.
 */
const todoRowSchema = todoSchema.extend({
  completed: z
    .union([z.literal(0), z.literal(1), z.boolean()])
    .transform((value) => value === 1 || value === true),
});

/**
 * Decode a raw SQLite row into a Todo.
 *
 * @throws {z.ZodError} If the row does not match the todos table shape
 */
export function decodeTodoRow(row: unknown): Todo {
  return todoRowSchema.parse(row);
}

// ============================================
// Request payloads
// ============================================

/**
 * Body of `POST /v1/todos`.
 */
export const createTodoSchema = z.object({
  body: z.string(),
});

export type CreateTodo = z.infer<typeof createTodoSchema>;

/**
 * Body of `PUT /v1/todos/:id`. Both fields are required.
 */
export const updateTodoSchema = z.object({
  body: z.string(),
  completed: z.boolean(),
});

export type UpdateTodo = z.infer<typeof updateTodoSchema>;

/** Bounds of a signed 64-bit SQLite rowid. */
const MIN_TODO_ID = -(2n ** 63n);
const MAX_TODO_ID = 2n ** 63n - 1n;

/**
 * A todo id as addressed by a request. Ids past 2^53 stay bigint so
 * they reach SQLite unrounded.
 */
export type TodoId = number | bigint;

/**
 * Path id: any signed 64-bit decimal integer. Ids that match no row are
 * left to the store to report.
 */
export const todoIdSchema = z
  .string()
  .regex(/^[+-]?[0-9]+$/, "id must be an integer")
  .transform((value) => BigInt(value))
  .refine(
    (id) => id >= MIN_TODO_ID && id <= MAX_TODO_ID,
    "id must fit in a signed 64-bit integer",
  )
  .transform((id): TodoId => {
    const asNumber = Number(id);
    return Number.isSafeInteger(asNumber) ? asNumber : id;
  });
