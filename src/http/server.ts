/**
 * HTTP server lifecycle for the todo API.
 * @module http/server
 */

import type { Server } from "node:http";
import type { Logger } from "../logger.js";
import type { TodoStore } from "../todo/index.js";
import { createApp } from "./app.js";

/**
 * Options for creating the server.
 */
export interface TodoApiServerOptions {
  /** Shared store handle */
  store: TodoStore;
  /** Process logger */
  logger: Logger;
  /** Host to bind to (default: "127.0.0.1") */
  host?: string;
  /** Port to listen on; 0 picks a free port (default: 3000) */
  port?: number;
  /** Enable CORS (default: false) */
  cors?: boolean;
}

const DEFAULTS = {
  host: "127.0.0.1",
  port: 3000,
};

/**
 * TodoApiServer wraps the express app with start/stop.
 *
 * @example
 * ```typescript
 * const server = new TodoApiServer({ store, logger, port: 3000 });
 * await server.start();
 * // ...
 * await server.stop();
 * ```
 */
export class TodoApiServer {
  private readonly options: TodoApiServerOptions;
  private readonly host: string;
  private readonly port: number;
  private httpServer: Server | null = null;

  constructor(options: TodoApiServerOptions) {
    this.options = options;
    this.host = options.host ?? DEFAULTS.host;
    this.port = options.port ?? DEFAULTS.port;
  }

  /**
   * Start listening.
   *
   * @throws {Error} If the server is already running or the address is taken
   */
  async start(): Promise<void> {
    if (this.httpServer) {
      throw new Error("Todo API server is already running");
    }

    const app = createApp({
      store: this.options.store,
      logger: this.options.logger,
      cors: this.options.cors ?? false,
    });

    const server = await new Promise<Server>((resolve, reject) => {
      const listening = app.listen(this.port, this.host, () => {
        listening.off("error", reject);
        resolve(listening);
      });
      listening.once("error", reject);
    });
    this.httpServer = server;

    this.options.logger.info(`Todo API listening at ${this.url()}`);
  }

  /**
   * Stop accepting connections and wait for open ones to finish.
   */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;

    await new Promise<void>((resolve, reject) => {
      server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
      server.closeIdleConnections();
    });
  }

  /**
   * Check if the server is running.
   */
  isRunning(): boolean {
    return this.httpServer !== null;
  }

  /**
   * Address actually bound, resolving port 0.
   *
   * @throws {Error} If the server is not running
   */
  address(): { host: string; port: number } {
    const address = this.httpServer?.address();
    if (!address || typeof address === "string") {
      throw new Error("Todo API server is not running");
    }
    return { host: this.host, port: address.port };
  }

  /**
   * Base URL of the running server.
   */
  url(): string {
    const { host, port } = this.address();
    const authority = host.includes(":") ? `[${host}]` : host;
    return `http://${authority}:${port}`;
  }
}
