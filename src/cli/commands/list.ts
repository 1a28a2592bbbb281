/**
 * CLI list command - list all todos.
 * @module cli/commands/list
 */

import type { CAC } from "cac";
import type { CommandContext } from "../context.js";
import { renderResponse, type OutputOptions } from "../utils/index.js";

/**
 * Register the list command.
 */
export function registerListCommand(cli: CAC, context: CommandContext): void {
  cli
    .command("list", "List all todos")
    .action(async (options: OutputOptions) => {
      const response = await context.getClient().list();
      renderResponse(response, options);
    });
}
