/**
 * Express application assembly.
 * @module http/app
 */

import express, {
  type ErrorRequestHandler,
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { TodoError, statusForError } from "../errors.js";
import type { Logger } from "../logger.js";
import type { TodoStore } from "../todo/index.js";
import { createTodoRouter } from "./routes.js";

/**
 * Options for building the application.
 */
export interface AppOptions {
  /** Shared store handle used by every request */
  store: TodoStore;
  /** Process logger */
  logger: Logger;
  /** Enable permissive CORS (default: false) */
  cors?: boolean;
}

/** Request body size limit for JSON payloads. */
const JSON_LIMIT = "100kb";

/**
 * Build the express app: middleware, todo routes, health check and
 * error mapping.
 *
 * @example
 * ```typescript
 * const app = createApp({ store, logger });
 * app.listen(3000, "127.0.0.1");
 * ```
 */
export function createApp(options: AppOptions): Express {
  const { store } = options;
  const log = options.logger.child({ module: "http" });
  const app = express();

  app.disable("x-powered-by");
  app.use(express.json({ limit: JSON_LIMIT }));

  app.use((_req: Request, res: Response, next: NextFunction) => {
    res.setHeader("X-Content-Type-Options", "nosniff");
    next();
  });

  // WARNING: cors enables Access-Control-Allow-Origin: *
  if (options.cors) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      res.header("Access-Control-Allow-Origin", "*");
      res.header(
        "Access-Control-Allow-Methods",
        "GET, POST, PUT, DELETE, OPTIONS",
      );
      res.header("Access-Control-Allow-Headers", "Content-Type");
      if (req.method === "OPTIONS") {
        res.sendStatus(204);
        return;
      }
      next();
    });
  }

  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = process.hrtime.bigint();
    res.on("finish", () => {
      const durationMs =
        Number(process.hrtime.bigint() - startedAt) / 1_000_000;
      log.debug(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
        durationMs: Math.round(durationMs * 100) / 100,
      });
    });
    next();
  });

  // Health check endpoint
  app.get("/health", (_req: Request, res: Response) => {
    store.ping();
    res.json({ status: "ok" });
  });

  app.use(createTodoRouter(store));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(createErrorHandler(log));

  return app;
}

/**
 * Shape of the errors raised by express's body parser.
 * @internal
 */
interface HttpClientError {
  status: number;
  expose: boolean;
  type?: string;
  message: string;
}

function isHttpClientError(error: unknown): error is HttpClientError {
  if (!(error instanceof Error)) return false;
  const status: unknown = Reflect.get(error, "status");
  return (
    Reflect.get(error, "expose") === true &&
    typeof status === "number" &&
    status >= 400 &&
    status < 500
  );
}

/**
 * Map thrown errors to a status code and `{ error }` body.
 * Server-side failures are logged and answered with a generic message.
 * @internal
 */
export function createErrorHandler(log: Logger): ErrorRequestHandler {
  return (
    error: unknown,
    req: Request,
    res: Response,
    next: NextFunction,
  ): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (isHttpClientError(error)) {
      const malformed =
        error.type === "entity.parse.failed"
          ? new TodoError("Malformed JSON body", "REQUEST_MALFORMED", {
              cause: error,
            })
          : undefined;
      res
        .status(malformed ? statusForError(malformed) : error.status)
        .json({ error: malformed?.message ?? error.message });
      return;
    }

    const status = statusForError(error);
    if (status >= 500) {
      log.error(`${req.method} ${req.originalUrl} failed`, {
        error: error instanceof Error ? error.message : String(error),
        cause:
          error instanceof Error && error.cause instanceof Error
            ? error.cause.message
            : undefined,
      });
      res.status(status).json({ error: "Internal server error" });
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    res.status(status).json({ error: message });
  };
}
