/**
 * Shared state handed to every CLI command.
 * @module cli/context
 */

import { TodoClient } from "../client.js";
import { todoIdSchema, type TodoId } from "../todo/schema.js";
import { CLIError, ExitCode } from "./utils/index.js";

export const USAGE_HINT = "Usage: todo <base-url> <list|create|read|update|delete>";

/**
 * Gives commands the API client for the base URL on the command line.
 */
export class CommandContext {
  private client: TodoClient | undefined;

  constructor(private readonly baseUrl: string | undefined) {}

  /**
   * The client for the base URL, created on first use.
   *
   * @throws {CLIError} CONFIG_ERROR if the base URL is missing or invalid
   */
  getClient(): TodoClient {
    if (this.client) {
      return this.client;
    }
    if (this.baseUrl === undefined) {
      throw new CLIError("Missing base URL", ExitCode.CONFIG_ERROR, USAGE_HINT);
    }
    try {
      this.client = new TodoClient(this.baseUrl);
    } catch (error) {
      throw new CLIError(
        error instanceof Error ? error.message : String(error),
        ExitCode.CONFIG_ERROR,
        USAGE_HINT,
      );
    }
    return this.client;
  }
}

/**
 * Parse a todo id argument.
 *
 * @throws {CLIError} CONFIG_ERROR if the value is not a 64-bit integer
 */
export function parseTodoId(value: unknown): TodoId {
  const result = todoIdSchema.safeParse(String(value));
  if (!result.success) {
    throw new CLIError(
      `Invalid id: ${String(value)}. Use a 64-bit integer.`,
      ExitCode.CONFIG_ERROR,
    );
  }
  return result.data;
}
