/**
 * CLI read command - show one todo.
 * @module cli/commands/read
 */

import type { CAC } from "cac";
import { parseTodoId, type CommandContext } from "../context.js";
import { renderResponse, type OutputOptions } from "../utils/index.js";

/**
 * Register the read command.
 */
export function registerReadCommand(cli: CAC, context: CommandContext): void {
  cli
    .command("read <id>", "Read a todo")
    .action(async (id: unknown, options: OutputOptions) => {
      const response = await context.getClient().read(parseTodoId(id));
      renderResponse(response, options);
    });
}
