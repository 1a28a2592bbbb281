/**
 * CLI update command - replace a todo's body and completed flag.
 * @module cli/commands/update
 */

import type { CAC } from "cac";
import { parseTodoId, type CommandContext } from "../context.js";
import { renderResponse, type OutputOptions } from "../utils/index.js";

interface UpdateOptions extends OutputOptions {
  completed?: boolean;
}

/**
 * Register the update command.
 *
 * The update is a full replace: omitting --completed marks the todo
 * as not completed.
 */
export function registerUpdateCommand(
  cli: CAC,
  context: CommandContext,
): void {
  cli
    .command("update <id> <body>", "Update a todo")
    .option("-c, --completed", "Mark todo as completed")
    .action(async (id: unknown, body: unknown, options: UpdateOptions) => {
      const response = await context.getClient().update(parseTodoId(id), {
        body: String(body),
        completed: options.completed === true,
      });
      renderResponse(response, options);
    });
}
