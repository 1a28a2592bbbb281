/**
 * CLI delete command - delete a todo.
 * @module cli/commands/delete
 */

import type { CAC } from "cac";
import { parseTodoId, type CommandContext } from "../context.js";
import { renderResponse, type OutputOptions } from "../utils/index.js";

/**
 * Register the delete command.
 */
export function registerDeleteCommand(
  cli: CAC,
  context: CommandContext,
): void {
  cli
    .command("delete <id>", "Delete a todo")
    .action(async (id: unknown, options: OutputOptions) => {
      const response = await context.getClient().delete(parseTodoId(id));
      renderResponse(response, options);
    });
}
