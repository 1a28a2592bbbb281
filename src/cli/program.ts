/**
 * CLI program definition for the todo client.
 * @module cli/program
 */

import { cac, type CAC } from "cac";
import { CommandContext, USAGE_HINT } from "./context.js";
import {
  registerCreateCommand,
  registerDeleteCommand,
  registerListCommand,
  registerReadCommand,
  registerUpdateCommand,
} from "./commands/index.js";
import { CLIError, ExitCode } from "./utils/index.js";

export const VERSION = "0.1.0";

/**
 * Create and configure the CLI for one base URL.
 */
export function createCLI(context: CommandContext): CAC {
  const cli = cac("todo");

  cli.usage("<base-url> <command> [options]");
  cli.option("--quiet", "Suppress status and content-type lines");

  registerListCommand(cli, context);
  registerCreateCommand(cli, context);
  registerReadCommand(cli, context);
  registerUpdateCommand(cli, context);
  registerDeleteCommand(cli, context);

  cli.help();
  cli.version(VERSION);

  return cli;
}

/**
 * Run the CLI against `argv` (as in process.argv).
 *
 * The base URL comes before the command, so it is split off before
 * cac sees the arguments.
 *
 * @throws {CLIError} On missing arguments or unknown commands
 */
export async function run(argv: string[]): Promise<void> {
  const [node = "node", bin = "todo", ...args] = argv;
  const first = args[0];
  const hasBaseUrl = first !== undefined && !first.startsWith("-");
  const baseUrl = hasBaseUrl ? first : undefined;
  const rest = hasBaseUrl ? args.slice(1) : args;

  const cli = createCLI(new CommandContext(baseUrl));

  if (baseUrl !== undefined && cli.commands.some((c) => c.name === baseUrl)) {
    throw new CLIError(
      "Missing base URL",
      ExitCode.CONFIG_ERROR,
      USAGE_HINT,
    );
  }

  cli.parse([node, bin, ...rest], { run: false });

  if (!cli.matchedCommand) {
    if (cli.options["help"] || cli.options["version"]) {
      return;
    }
    throw new CLIError(
      rest[0] !== undefined ? `Unknown command: ${rest[0]}` : "Missing command",
      ExitCode.CONFIG_ERROR,
      USAGE_HINT,
    );
  }

  await cli.runMatchedCommand();
}
