/**
 * CLI create command - create a todo.
 * @module cli/commands/create
 */

import type { CAC } from "cac";
import type { CommandContext } from "../context.js";
import { renderResponse, type OutputOptions } from "../utils/index.js";

/**
 * Register the create command.
 */
export function registerCreateCommand(
  cli: CAC,
  context: CommandContext,
): void {
  cli
    .command("create <body>", "Create a new todo")
    .action(async (body: unknown, options: OutputOptions) => {
      const response = await context
        .getClient()
        .create({ body: String(body) });
      renderResponse(response, options);
    });
}
