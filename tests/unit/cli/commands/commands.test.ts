/**
 * Tests for CLI command registration.
 * @module tests/unit/cli/commands
 */

import { describe, it, expect } from "vitest";
import { cac } from "cac";
import { CommandContext } from "../../../../src/cli/context.js";
import {
  registerCreateCommand,
  registerDeleteCommand,
  registerListCommand,
  registerReadCommand,
  registerUpdateCommand,
} from "../../../../src/cli/commands/index.js";

describe("command registration", () => {
  function createTestCLI() {
    const cli = cac("test");
    const context = new CommandContext("http://127.0.0.1:3000");
    registerListCommand(cli, context);
    registerCreateCommand(cli, context);
    registerReadCommand(cli, context);
    registerUpdateCommand(cli, context);
    registerDeleteCommand(cli, context);
    return cli;
  }

  it("should register the five todo commands", () => {
    const cli = createTestCLI();

    expect(cli.commands.map((c) => c.rawName)).toEqual([
      "list",
      "create <body>",
      "read <id>",
      "update <id> <body>",
      "delete <id>",
    ]);
  });

  it("should give update a completed flag", () => {
    const cli = createTestCLI();

    const updateCmd = cli.commands.find((c) => c.name === "update");
    const completedOpt = updateCmd?.options.find((o) =>
      o.names.includes("completed"),
    );

    expect(completedOpt).toBeDefined();
    expect(completedOpt?.names).toContain("c");
  });
});

describe("CommandContext", () => {
  it("should reuse one client", () => {
    const context = new CommandContext("http://127.0.0.1:3000");

    expect(context.getClient()).toBe(context.getClient());
  });
});
