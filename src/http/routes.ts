/**
 * Route handlers for /v1/todos.
 * @module http/routes
 */

import { Router, type Request, type Response } from "express";
import type { z } from "zod";
import { TodoError } from "../errors.js";
import {
  createTodoSchema,
  todoIdSchema,
  updateTodoSchema,
  TODOS_PATH,
  type TodoId,
  type TodoStore,
} from "../todo/index.js";

/**
 * Decode a request value, failing with REQUEST_MALFORMED.
 * @internal
 */
export function decodeRequest<S extends z.ZodTypeAny>(
  schema: S,
  value: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) =>
        i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message,
      )
      .join(", ");
    throw new TodoError(`Invalid ${what}: ${issues}`, "REQUEST_MALFORMED", {
      cause: result.error,
    });
  }
  return result.data;
}

function todoId(req: Request<{ id: string }>): TodoId {
  return decodeRequest(todoIdSchema, req.params.id, "todo id");
}

/**
 * Build the router for the five todo operations.
 *
 * Handlers run synchronously against the store; anything they throw
 * reaches the error middleware installed by createApp.
 */
export function createTodoRouter(store: TodoStore): Router {
  const router = Router();

  /**
   * GET /v1/todos - List all todos
   */
  router.get(TODOS_PATH, (_req: Request, res: Response) => {
    res.json(store.list());
  });

  /**
   * GET /v1/todos/:id - Get a single todo
   */
  router.get(
    `${TODOS_PATH}/:id`,
    (req: Request<{ id: string }>, res: Response) => {
      res.json(store.read(todoId(req)));
    },
  );

  /**
   * POST /v1/todos - Create a todo
   */
  router.post(TODOS_PATH, (req: Request, res: Response) => {
    const input = decodeRequest(createTodoSchema, req.body, "request body");
    res.status(201).json(store.create(input));
  });

  /**
   * PUT /v1/todos/:id - Replace body and completed
   */
  router.put(
    `${TODOS_PATH}/:id`,
    (req: Request<{ id: string }>, res: Response) => {
      const id = todoId(req);
      const input = decodeRequest(updateTodoSchema, req.body, "request body");
      res.json(store.update(id, input));
    },
  );

  /**
   * DELETE /v1/todos/:id - Delete a todo (missing ids succeed)
   */
  router.delete(
    `${TODOS_PATH}/:id`,
    (req: Request<{ id: string }>, res: Response) => {
      store.delete(todoId(req));
      res.status(204).end();
    },
  );

  return router;
}
