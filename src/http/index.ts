/**
 * HTTP layer exports.
 * @module http
 */

export { createApp, createErrorHandler } from "./app.js";
export type { AppOptions } from "./app.js";
export { createTodoRouter, decodeRequest } from "./routes.js";
export { TodoApiServer } from "./server.js";
export type { TodoApiServerOptions } from "./server.js";
